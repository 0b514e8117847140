/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { StepContext } from '../agents/agent.js';
import { StepKind, type StepResults } from '../interfaces/plan.js';
import { combinedContextText, type AgentRequest } from '../interfaces/request.js';

/**
 * Build the context one step sees: the slice of the request its kind needs,
 * overlaid with whatever its dependencies contributed.
 *
 * Document analysis output replaces the text handed to knowledge retrieval.
 * Information lookup output is never forwarded.
 */
export function buildStepContext(
  kind: StepKind,
  request: AgentRequest,
  dependencies: StepResults = {},
): StepContext {
  const ctx = request.context;
  const text = combinedContextText(ctx);

  switch (kind) {
    case StepKind.DOCUMENT_ANALYSIS:
      return {
        ...(text ? { text } : {}),
        ...(ctx?.images?.length ? { images: ctx.images } : {}),
        ...(ctx?.urls?.length ? { urls: ctx.urls } : {}),
      };
    case StepKind.INFORMATION_LOOKUP:
      return {};
    case StepKind.KNOWLEDGE_RETRIEVAL: {
      const extracted = dependencies[StepKind.DOCUMENT_ANALYSIS]?.payload.text;
      const effective = extracted ?? text;
      return {
        ...(effective ? { text: effective } : {}),
        ...(ctx?.collections?.length ? { collections: ctx.collections } : {}),
      };
    }
  }
}
