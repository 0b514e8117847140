/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { AgentRequest } from './request.js';

/** The fixed vocabulary of step kinds. */
export enum StepKind {
  DOCUMENT_ANALYSIS = 'document_analysis',
  INFORMATION_LOOKUP = 'information_lookup',
  KNOWLEDGE_RETRIEVAL = 'knowledge_retrieval',
}

/** Priority order for plan ids and report sections. */
export const STEP_KIND_ORDER: readonly StepKind[] = [
  StepKind.DOCUMENT_ANALYSIS,
  StepKind.INFORMATION_LOOKUP,
  StepKind.KNOWLEDGE_RETRIEVAL,
];

export const STEP_LABELS: Record<StepKind, string> = {
  [StepKind.DOCUMENT_ANALYSIS]: 'Document Analysis',
  [StepKind.INFORMATION_LOOKUP]: 'Information Lookup',
  [StepKind.KNOWLEDGE_RETRIEVAL]: 'Knowledge Retrieval',
};

export type ExecutionMode = 'sequential' | 'parallel';

export interface Analysis {
  readonly needsDocumentAnalysis: boolean;
  readonly needsInformationLookup: boolean;
  readonly needsKnowledgeRetrieval: boolean;
  readonly complexity: number;     // count of needed kinds, always >= 1
  readonly summary: string;
}

export interface PlanStep {
  readonly id: number;             // positive, unique within the plan
  readonly kind: StepKind;
  readonly dependsOn: readonly number[];
  readonly description: string;
  readonly rationale: string;
}

export interface ExecutionPlan {
  readonly steps: readonly PlanStep[];
  readonly participatingKinds: readonly StepKind[];
  readonly mode: ExecutionMode;    // hint only
  readonly estimatedCost: number;
}

/* ------------------------------------------------------------------ */
/* Step results                                                        */
/* ------------------------------------------------------------------ */

export type DocumentType = 'invoice' | 'receipt' | 'contract' | 'report' | 'general document';

export interface DocumentAnalysisPayload {
  text: string;                    // the text that was analyzed
  analysis: string;
  documentType: DocumentType;
  confidence: number;
}

export interface InformationLookupPayload {
  query: string;
  response: string;
  resultCount: number;
}

export interface RetrievedSource {
  id: string;
  collection: string;
  score: number;
  payload: Record<string, unknown>;
}

export interface KnowledgeRetrievalPayload {
  response: string;
  sources: RetrievedSource[];
  sourceCount: number;
  collectionsSearched: string[];
  embeddingModel: string;
}

interface StepResultBase<K extends StepKind, P> {
  kind: K;
  payload: P;
  model: string;
  durationMs: number;
}

export type DocumentAnalysisResult = StepResultBase<StepKind.DOCUMENT_ANALYSIS, DocumentAnalysisPayload>;
export type InformationLookupResult = StepResultBase<StepKind.INFORMATION_LOOKUP, InformationLookupPayload>;
export type KnowledgeRetrievalResult = StepResultBase<StepKind.KNOWLEDGE_RETRIEVAL, KnowledgeRetrievalPayload>;

export type StepResult = DocumentAnalysisResult | InformationLookupResult | KnowledgeRetrievalResult;

export type StepResultOf<K extends StepKind> = Extract<StepResult, { kind: K }>;

/** Results keyed by kind; a plan holds at most one step per kind. */
export type StepResults = { [K in StepKind]?: StepResultOf<K> };

export function recordResult(results: StepResults, result: StepResult): void {
  switch (result.kind) {
    case StepKind.DOCUMENT_ANALYSIS:
      results[StepKind.DOCUMENT_ANALYSIS] = result;
      break;
    case StepKind.INFORMATION_LOOKUP:
      results[StepKind.INFORMATION_LOOKUP] = result;
      break;
    case StepKind.KNOWLEDGE_RETRIEVAL:
      results[StepKind.KNOWLEDGE_RETRIEVAL] = result;
      break;
  }
}

/* ------------------------------------------------------------------ */
/* Outcome                                                             */
/* ------------------------------------------------------------------ */

export type OutcomeStatus = 'SUCCESS' | 'FAILURE';

export interface SuccessOutcome {
  readonly status: 'SUCCESS';
  readonly sessionId: string;
  readonly request: AgentRequest;
  readonly analysis: Analysis;
  readonly plan: ExecutionPlan;
  readonly results: Readonly<StepResults>;
  readonly report: string;
  readonly durationMs: number;
  readonly completedAt: string;
}

export interface FailureOutcome {
  readonly status: 'FAILURE';
  /** Absent when the submitted value was not a valid request. */
  readonly request?: AgentRequest;
  readonly error: string;
  readonly durationMs: number;
  readonly completedAt: string;
}

export type ExecutionOutcome = SuccessOutcome | FailureOutcome;
