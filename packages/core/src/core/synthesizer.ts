/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  STEP_KIND_ORDER,
  STEP_LABELS,
  StepKind,
  type ExecutionPlan,
  type StepResults,
} from '../interfaces/plan.js';
import type { AgentRequest } from '../interfaces/request.js';

/**
 * Merges step results into the final plain-text report. Sections always
 * follow {@link STEP_KIND_ORDER}; a kind without a result is left out.
 */
export class Synthesizer {
  constructor(private readonly orchestratorModel: string) {}

  compose(results: Readonly<StepResults>, plan: ExecutionPlan, request: AgentRequest): string {
    const lines: string[] = [
      '=== ORCHESTRATOR SYNTHESIS ===',
      '',
      'EXECUTION SUMMARY:',
      `- Query: ${request.query}`,
      `- Orchestrator Model: ${this.orchestratorModel}`,
      `- Total Steps: ${plan.steps.length}`,
      `- Step Kinds: ${plan.participatingKinds.map((k) => STEP_LABELS[k]).join(', ')}`,
      `- Execution Mode: ${plan.mode}`,
      '',
    ];

    for (const kind of STEP_KIND_ORDER) {
      lines.push(...this.section(kind, results));
    }

    lines.push('CONCLUSION:', `All ${plan.steps.length} planned steps completed successfully.`);
    return lines.join('\n');
  }

  private section(kind: StepKind, results: Readonly<StepResults>): string[] {
    const heading = `${STEP_LABELS[kind].toUpperCase()} RESULTS:`;
    switch (kind) {
      case StepKind.DOCUMENT_ANALYSIS: {
        const r = results[kind];
        if (!r) return [];
        return [
          heading,
          `- Model: ${r.model}`,
          `- Document Type: ${r.payload.documentType}`,
          `- Confidence: ${Math.round(r.payload.confidence * 100)}%`,
          '- Analysis:',
          r.payload.analysis,
          '',
        ];
      }
      case StepKind.INFORMATION_LOOKUP: {
        const r = results[kind];
        if (!r) return [];
        return [heading, `- Model: ${r.model}`, r.payload.response, ''];
      }
      case StepKind.KNOWLEDGE_RETRIEVAL: {
        const r = results[kind];
        if (!r) return [];
        return [
          heading,
          `- Model: ${r.model}`,
          `- Embedding Model: ${r.payload.embeddingModel}`,
          `- Vector Search Results: ${r.payload.sourceCount}`,
          `- Collections Searched: ${r.payload.collectionsSearched.join(', ')}`,
          '',
          'Response:',
          r.payload.response,
          '',
        ];
      }
    }
  }
}
