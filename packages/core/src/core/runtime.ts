/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Redis } from 'ioredis';
import type { ExecutorSet } from '../agents/agent.js';
import { DocumentAnalysisExecutor } from '../agents/documentAnalysis.js';
import { InformationLookupExecutor } from '../agents/informationLookup.js';
import { KnowledgeRetrievalExecutor } from '../agents/knowledgeRetrieval.js';
import { buildRedisConnection, type AppConfig } from '../config/config.js';
import { Scheduler } from '../coordination/scheduler.js';
import { BullTaskQueue, LocalTaskQueue, type TaskQueue } from '../coordination/taskQueue.js';
import type { MessageBroker } from '../event-bus/broker.js';
import { InMemoryBroker } from '../event-bus/memoryBroker.js';
import { ProgressBus } from '../event-bus/progressBus.js';
import { RedisBroker } from '../event-bus/redisBroker.js';
import { StepKind } from '../interfaces/plan.js';
import { MemoryCache, RedisCache, type Cache } from '../services/cache.js';
import { HttpContentFetcher, type ContentFetcher } from '../services/contentFetcher.js';
import { RedisHistoryStore, type HistoryStore } from '../services/historyStore.js';
import { GenAiInferenceBackend, type InferenceBackend } from '../services/inference.js';
import {
  InMemoryKnowledgeStore,
  seedKnowledgeStore,
  type KnowledgeStore,
} from '../services/knowledgeStore.js';
import { createLogger } from '../utils/logger.js';
import { ConfigurationError } from './errors.js';
import { Orchestrator } from './orchestrator.js';
import { SubmissionService } from './submission.js';
import { Synthesizer } from './synthesizer.js';

const logger = createLogger('runtime');

/** Collaborators a caller (usually a test) may supply instead of the defaults. */
export interface RuntimeOverrides {
  broker?: MessageBroker;
  inference?: InferenceBackend;
  knowledgeStore?: KnowledgeStore;
  fetcher?: ContentFetcher;
  cache?: Cache;
  history?: HistoryStore;
  queue?: TaskQueue;
}

export interface Runtime {
  config: AppConfig;
  broker: MessageBroker;
  bus: ProgressBus;
  queue: TaskQueue;
  executors: ExecutorSet;
  orchestrator: Orchestrator;
  submission: SubmissionService;
  close(): Promise<void>;
}

/** Broker and queue only: what a process that just relays progress needs. */
export function createRelay(
  config: AppConfig,
  overrides: Pick<RuntimeOverrides, 'broker'> = {},
): { broker: MessageBroker; bus: ProgressBus } {
  const broker =
    overrides.broker ?? (config.redisUrl ? RedisBroker.fromUrl(config.redisUrl) : new InMemoryBroker());
  return { broker, bus: new ProgressBus(broker) };
}

/**
 * Wire the whole engine from configuration. With `redisUrl` set the broker,
 * queue, cache and history go through Redis; otherwise everything is
 * in-process and sessions are not recorded.
 */
export async function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Promise<Runtime> {
  const redis = config.redisUrl ? new Redis(config.redisUrl, { maxRetriesPerRequest: 3 }) : undefined;
  redis?.on('error', (error: Error) => logger.error('Redis error', error.message));

  const { broker, bus } = createRelay(config, overrides);
  const cache = overrides.cache ?? (redis ? new RedisCache(redis) : new MemoryCache());
  const history = overrides.history ?? (redis ? new RedisHistoryStore(redis, config.historyTtlSeconds) : undefined);
  const queue =
    overrides.queue ??
    (config.redisUrl
      ? new BullTaskQueue(config.queueName, buildRedisConnection(config.redisUrl), config.queueConcurrency)
      : new LocalTaskQueue(config.queueConcurrency));

  const inference = overrides.inference ?? createInference(config);
  const fetcher = overrides.fetcher ?? new HttpContentFetcher();

  let knowledgeStore = overrides.knowledgeStore;
  if (!knowledgeStore) {
    const local = new InMemoryKnowledgeStore();
    if (config.knowledgeFile) {
      const count = await seedKnowledgeStore(local, config.knowledgeFile, (text) =>
        inference.embed(text, config.models.embedding),
      );
      logger.info(`Indexed ${count} documents from ${config.knowledgeFile}`);
    }
    knowledgeStore = local;
  }

  const executors: ExecutorSet = {
    [StepKind.DOCUMENT_ANALYSIS]: new DocumentAnalysisExecutor(
      { model: config.models.documentAnalysis, systemPrompt: config.prompts.documentAnalysis },
      inference,
      fetcher,
    ),
    [StepKind.INFORMATION_LOOKUP]: new InformationLookupExecutor(
      {
        model: config.models.informationLookup,
        systemPrompt: config.prompts.informationLookup,
        cacheTtlSeconds: config.cacheTtlSeconds,
      },
      inference,
      cache,
    ),
    [StepKind.KNOWLEDGE_RETRIEVAL]: new KnowledgeRetrievalExecutor(
      {
        model: config.models.knowledgeRetrieval,
        systemPrompt: config.prompts.knowledgeRetrieval,
        embeddingModel: config.models.embedding,
        defaultCollection: config.defaultCollection,
        cacheTtlSeconds: config.cacheTtlSeconds,
      },
      inference,
      knowledgeStore,
      cache,
    ),
  };

  const orchestrator = new Orchestrator({
    scheduler: new Scheduler(executors, { stepTimeoutMs: config.stepTimeoutMs }),
    synthesizer: new Synthesizer(config.models.orchestrator),
    orchestratorModel: config.models.orchestrator,
    bus,
    ...(history ? { history } : {}),
  });
  const submission = new SubmissionService({ orchestrator, bus, queue });

  return {
    config,
    broker,
    bus,
    queue,
    executors,
    orchestrator,
    submission,
    close: async () => {
      await queue.close();
      await broker.close();
      await redis?.quit();
    },
  };
}

function createInference(config: AppConfig): InferenceBackend {
  if (!config.apiKey) {
    throw new ConfigurationError(['GEMINI_API_KEY is required to run steps']);
  }
  return new GenAiInferenceBackend({
    apiKey: config.apiKey,
    retries: config.inferenceRetries,
    retryDelayMs: config.retryDelayMs,
  });
}
