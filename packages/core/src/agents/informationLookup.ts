/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ActivityReporter } from '../event-bus/types.js';
import { StepKind, type InformationLookupPayload, type InformationLookupResult } from '../interfaces/plan.js';
import type { Cache } from '../services/cache.js';
import type { InferenceBackend } from '../services/inference.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { BaseStepExecutor, type ExecutorSettings, type StepContext } from './agent.js';

export const LOOKUP_RESULT_COUNT = 3;

function isLookupPayload(value: unknown): value is InformationLookupPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'query' in value && typeof value.query === 'string' &&
    'response' in value && typeof value.response === 'string' &&
    'resultCount' in value && typeof value.resultCount === 'number'
  );
}

export class InformationLookupExecutor extends BaseStepExecutor<StepKind.INFORMATION_LOOKUP> {
  readonly kind = StepKind.INFORMATION_LOOKUP;
  private readonly cacheTtlSeconds: number;

  constructor(
    settings: ExecutorSettings & { cacheTtlSeconds: number },
    private readonly inference: InferenceBackend,
    private readonly cache: Cache,
    logger: Logger = createLogger('information-lookup'),
  ) {
    super(settings, logger);
    this.cacheTtlSeconds = settings.cacheTtlSeconds;
  }

  // The request context is not consulted; lookups are keyed on the query alone.
  async execute(query: string, _context: StepContext, reporter: ActivityReporter): Promise<InformationLookupResult> {
    const startedAt = performance.now();
    const cacheKey = `info:${query}`;

    const cached = await this.readCache(this.cache, cacheKey, isLookupPayload);
    if (cached) {
      reporter.report('Using cached information lookup.');
      return { kind: this.kind, model: this.model, durationMs: this.elapsedSince(startedAt), payload: cached };
    }

    const prompt = `Research and provide comprehensive information about: "${query}"

Provide:
1. A summary of the topic
2. Key insights and important points
3. Relevant context and background

Format your response clearly and concisely.`;

    const response = await this.inference.generate(prompt, this.systemPrompt, this.model);
    const payload: InformationLookupPayload = { query, response, resultCount: LOOKUP_RESULT_COUNT };
    await this.writeCache(this.cache, cacheKey, payload, this.cacheTtlSeconds);

    return { kind: this.kind, model: this.model, durationMs: this.elapsedSince(startedAt), payload };
  }
}
