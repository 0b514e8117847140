/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { createHash } from 'node:crypto';
import { toErrorMessage } from '../core/errors.js';
import type { ActivityReporter } from '../event-bus/types.js';
import {
  StepKind,
  type KnowledgeRetrievalPayload,
  type KnowledgeRetrievalResult,
  type RetrievedSource,
} from '../interfaces/plan.js';
import type { Cache } from '../services/cache.js';
import type { InferenceBackend } from '../services/inference.js';
import type { KnowledgeStore } from '../services/knowledgeStore.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { BaseStepExecutor, type ExecutorSettings, type StepContext } from './agent.js';

export const HITS_PER_COLLECTION = 3;
export const MAX_SOURCES = 5;

export interface RetrievalSettings extends ExecutorSettings {
  embeddingModel: string;
  defaultCollection: string;
  cacheTtlSeconds: number;
}

function isRetrievalPayload(value: unknown): value is KnowledgeRetrievalPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'response' in value && typeof value.response === 'string' &&
    'sources' in value && Array.isArray(value.sources) &&
    'sourceCount' in value && typeof value.sourceCount === 'number' &&
    'collectionsSearched' in value && Array.isArray(value.collectionsSearched) &&
    'embeddingModel' in value && typeof value.embeddingModel === 'string'
  );
}

function formatSources(sources: readonly RetrievedSource[]): string {
  if (sources.length === 0) {
    return 'No similar documents found in the knowledge store.';
  }
  return sources
    .map((s) => `[Collection: ${s.collection}, Score: ${s.score.toFixed(3)}]\n${JSON.stringify(s.payload)}`)
    .join('\n\n');
}

export class KnowledgeRetrievalExecutor extends BaseStepExecutor<StepKind.KNOWLEDGE_RETRIEVAL> {
  readonly kind = StepKind.KNOWLEDGE_RETRIEVAL;
  private readonly embeddingModel: string;
  private readonly defaultCollection: string;
  private readonly cacheTtlSeconds: number;

  constructor(
    settings: RetrievalSettings,
    private readonly inference: InferenceBackend,
    private readonly store: KnowledgeStore,
    private readonly cache: Cache,
    logger: Logger = createLogger('knowledge-retrieval'),
  ) {
    super(settings, logger);
    this.embeddingModel = settings.embeddingModel;
    this.defaultCollection = settings.defaultCollection;
    this.cacheTtlSeconds = settings.cacheTtlSeconds;
  }

  async execute(query: string, context: StepContext, reporter: ActivityReporter): Promise<KnowledgeRetrievalResult> {
    const startedAt = performance.now();
    const collections =
      context.collections && context.collections.length > 0
        ? [...context.collections]
        : [this.defaultCollection];
    const additional = context.text ?? '';

    // Dependency text changes the answer, so it is part of the key.
    const contextDigest = createHash('sha1').update(additional).digest('hex').slice(0, 12);
    const cacheKey = `rag:${query}:${collections.join(':')}:${contextDigest}`;

    const cached = await this.readCache(this.cache, cacheKey, isRetrievalPayload);
    if (cached) {
      reporter.report('Using cached knowledge retrieval.');
      return { kind: this.kind, model: this.model, durationMs: this.elapsedSince(startedAt), payload: cached };
    }

    const vector = await this.inference.embed(query, this.embeddingModel);

    const hits: RetrievedSource[] = [];
    for (const collection of collections) {
      try {
        const found = await this.store.search(collection, vector, HITS_PER_COLLECTION);
        hits.push(...found.map((hit) => ({ ...hit, collection })));
      } catch (error) {
        reporter.report(`Search in collection "${collection}" failed: ${toErrorMessage(error)}`, true);
      }
    }
    const sources = hits.sort((a, b) => b.score - a.score).slice(0, MAX_SOURCES);

    const prompt = `Using the following information sources, provide a comprehensive response:

Vector Search Results (${sources.length} documents from ${collections.length} collections):
${formatSources(sources)}

User Query: ${query}
Additional Context: ${additional}

Provide a clear, helpful response that combines all available information.`;

    const response = await this.inference.generate(prompt, this.systemPrompt, this.model);
    const payload: KnowledgeRetrievalPayload = {
      response,
      sources,
      sourceCount: sources.length,
      collectionsSearched: collections,
      embeddingModel: this.embeddingModel,
    };
    await this.writeCache(this.cache, cacheKey, payload, this.cacheTtlSeconds);

    return { kind: this.kind, model: this.model, durationMs: this.elapsedSince(startedAt), payload };
  }
}
