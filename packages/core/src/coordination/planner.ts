/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ValidateFunction } from 'ajv';
import { PlanningError } from '../core/errors.js';
import {
  STEP_KIND_ORDER,
  STEP_LABELS,
  StepKind,
  type Analysis,
  type ExecutionPlan,
  type PlanStep,
} from '../interfaces/plan.js';
import { combinedContextText, type AgentRequest } from '../interfaces/request.js';
import { compileValidator, formatErrors } from '../utils/jsonValidator.js';

export interface StepSignal {
  readonly kind: StepKind;
  /** Matched case-insensitively anywhere in the text ("text" also hits "context"). */
  readonly keywords: readonly string[];
  /** Needed no matter what the request says. */
  readonly always?: boolean;
  readonly description: string;
  readonly rationale: string;
}

/** The whole planning policy. One row per step kind, in priority order. */
export const STEP_SIGNALS: readonly StepSignal[] = [
  {
    kind: StepKind.DOCUMENT_ANALYSIS,
    keywords: ['document', 'text', 'extract', 'read', 'scan'],
    description: 'Extract and analyze text from document',
    rationale: 'User request mentions document or text extraction',
  },
  {
    kind: StepKind.INFORMATION_LOOKUP,
    keywords: ['search', 'find', 'information', 'lookup', 'research'],
    description: 'Search for relevant information',
    rationale: 'User request requires external information lookup',
  },
  {
    kind: StepKind.KNOWLEDGE_RETRIEVAL,
    keywords: [],
    always: true,
    description: 'Query knowledge base for context',
    rationale: 'Knowledge base consultation needed for comprehensive response',
  },
];

const ESTIMATED_COST_PER_STEP = 1000;

function signalFor(kind: StepKind): StepSignal {
  const signal = STEP_SIGNALS.find((s) => s.kind === kind);
  if (!signal) {
    throw new PlanningError(`No signal row for step kind ${kind}`);
  }
  return signal;
}

function mentions(haystack: string, keywords: readonly string[]): boolean {
  return keywords.some((kw) => haystack.includes(kw));
}

/**
 * Decide which step kinds a request needs from the query and side-context
 * text alone. Attachments without a matching keyword add nothing. Pure; never
 * fails.
 */
export function analyzeRequest(request: AgentRequest): Analysis {
  const haystack = `${request.query}\n${combinedContextText(request.context)}`.toLowerCase();

  const needed = (kind: StepKind): boolean => {
    const signal = signalFor(kind);
    return signal.always === true || mentions(haystack, signal.keywords);
  };

  const needsDocumentAnalysis = needed(StepKind.DOCUMENT_ANALYSIS);
  const needsInformationLookup = needed(StepKind.INFORMATION_LOOKUP);
  const needsKnowledgeRetrieval = needed(StepKind.KNOWLEDGE_RETRIEVAL);
  const complexity = [needsDocumentAnalysis, needsInformationLookup, needsKnowledgeRetrieval].filter(Boolean).length;

  return {
    needsDocumentAnalysis,
    needsInformationLookup,
    needsKnowledgeRetrieval,
    complexity,
    summary:
      `Request requires ${complexity} steps. ` +
      `${STEP_LABELS[StepKind.DOCUMENT_ANALYSIS]}: ${needsDocumentAnalysis}, ` +
      `${STEP_LABELS[StepKind.INFORMATION_LOOKUP]}: ${needsInformationLookup}, ` +
      `${STEP_LABELS[StepKind.KNOWLEDGE_RETRIEVAL]}: ${needsKnowledgeRetrieval}`,
  };
}

function isNeeded(analysis: Analysis, kind: StepKind): boolean {
  switch (kind) {
    case StepKind.DOCUMENT_ANALYSIS:
      return analysis.needsDocumentAnalysis;
    case StepKind.INFORMATION_LOOKUP:
      return analysis.needsInformationLookup;
    case StepKind.KNOWLEDGE_RETRIEVAL:
      return analysis.needsKnowledgeRetrieval;
  }
}

/**
 * Turn an analysis into a plan. Ids follow priority order starting at 1;
 * knowledge retrieval depends on document analysis when both are present.
 */
export function buildPlan(analysis: Analysis): ExecutionPlan {
  const steps: PlanStep[] = [];
  const idOf = new Map<StepKind, number>();

  for (const kind of STEP_KIND_ORDER) {
    if (!isNeeded(analysis, kind)) continue;
    const id = steps.length + 1;
    const analysisId = idOf.get(StepKind.DOCUMENT_ANALYSIS);
    const dependsOn =
      kind === StepKind.KNOWLEDGE_RETRIEVAL && analysisId !== undefined ? [analysisId] : [];
    const signal = signalFor(kind);
    steps.push(
      Object.freeze({
        id,
        kind,
        dependsOn: Object.freeze(dependsOn),
        description: signal.description,
        rationale: signal.rationale,
      }),
    );
    idOf.set(kind, id);
  }

  return Object.freeze({
    steps: Object.freeze(steps),
    participatingKinds: Object.freeze(steps.map((s) => s.kind)),
    mode: analysis.complexity > 1 ? 'parallel' : 'sequential',
    estimatedCost: steps.length * ESTIMATED_COST_PER_STEP,
  });
}

let planValidator: ValidateFunction<ExecutionPlan> | undefined;

function findCycle(steps: readonly PlanStep[]): number[] | undefined {
  const deps = new Map(steps.map((s) => [s.id, s.dependsOn]));
  const state = new Map<number, 'visiting' | 'done'>();
  const path: number[] = [];

  const visit = (id: number): number[] | undefined => {
    if (state.get(id) === 'done') return undefined;
    if (state.get(id) === 'visiting') return [...path.slice(path.indexOf(id)), id];
    state.set(id, 'visiting');
    path.push(id);
    for (const dep of deps.get(id) ?? []) {
      const cycle = visit(dep);
      if (cycle) return cycle;
    }
    path.pop();
    state.set(id, 'done');
    return undefined;
  };

  for (const step of steps) {
    const cycle = visit(step.id);
    if (cycle) return cycle;
  }
  return undefined;
}

/**
 * Check a plan before it runs. Throws {@link PlanningError} on a schema
 * violation, a duplicate id or kind, an unknown or cyclic dependency, or a
 * dependency on a step that comes later in the plan.
 */
export function validatePlan(plan: unknown): ExecutionPlan {
  const validate = (planValidator ??= compileValidator<ExecutionPlan>('plan.schema.json'));
  if (!validate(plan)) {
    throw new PlanningError(`Plan failed schema validation: ${formatErrors(validate.errors).join('; ')}`);
  }

  const position = new Map<number, number>();
  const kinds = new Set<StepKind>();
  plan.steps.forEach((step, index) => {
    if (position.has(step.id)) {
      throw new PlanningError(`Duplicate step id ${step.id}`);
    }
    if (kinds.has(step.kind)) {
      throw new PlanningError(`More than one ${step.kind} step`);
    }
    position.set(step.id, index);
    kinds.add(step.kind);
  });

  for (const step of plan.steps) {
    for (const dep of step.dependsOn) {
      if (!position.has(dep)) {
        throw new PlanningError(`Step ${step.id} depends on unknown step ${dep}`);
      }
    }
  }

  const cycle = findCycle(plan.steps);
  if (cycle) {
    throw new PlanningError(`Dependency cycle: ${cycle.join(' -> ')}`);
  }

  plan.steps.forEach((step, index) => {
    for (const dep of step.dependsOn) {
      if ((position.get(dep) ?? index) >= index) {
        throw new PlanningError(`Step ${step.id} depends on later step ${dep}`);
      }
    }
  });

  const participating = new Set(plan.participatingKinds);
  if (participating.size !== kinds.size || [...kinds].some((k) => !participating.has(k))) {
    throw new PlanningError('participatingKinds does not match the kinds of the steps');
  }

  return plan;
}
