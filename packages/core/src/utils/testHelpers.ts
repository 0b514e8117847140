/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { vi, type Mock } from 'vitest';
import type { StepExecutor } from '../agents/agent.js';
import { DEFAULT_MODELS, DEFAULT_PROMPTS, type AppConfig } from '../config/config.js';
import type { LiveConnection } from '../event-bus/connectionRegistry.js';
import type { Unsubscribe } from '../event-bus/broker.js';
import { InMemoryBroker } from '../event-bus/memoryBroker.js';
import {
  activityChannel,
  resultChannel,
  type ActivityEvent,
  type ActivityReporter,
  type AgentLabel,
  type MessageHandler,
  type ResultEvent,
} from '../event-bus/types.js';
import {
  StepKind,
  type DocumentAnalysisPayload,
  type DocumentAnalysisResult,
  type InformationLookupPayload,
  type InformationLookupResult,
  type KnowledgeRetrievalPayload,
  type KnowledgeRetrievalResult,
} from '../interfaces/plan.js';
import type { HistoryStore, SessionRecord } from '../services/historyStore.js';
import type { InferenceBackend } from '../services/inference.js';
import type { Logger } from './logger.js';

/**
 * Mock inference backend; both calls are plain `vi.fn`s.
 */
export function createMockInference(): {
  backend: InferenceBackend;
  generate: Mock<InferenceBackend['generate']>;
  embed: Mock<InferenceBackend['embed']>;
} {
  const generate = vi.fn<InferenceBackend['generate']>().mockResolvedValue('model output');
  const embed = vi.fn<InferenceBackend['embed']>().mockResolvedValue([1, 0]);
  return { backend: { generate, embed }, generate, embed };
}

export type MockLogger = { [K in 'debug' | 'info' | 'warn' | 'error']: Mock<Logger[K]> } & Logger;

/** Logger whose calls can be asserted; `child` hands back the same mock. */
export function createMockLogger(): MockLogger {
  const logger: MockLogger = {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
    child: () => logger,
  };
  return logger;
}

/* ------------------------------------------------------------------ */
/* Step results and fake executors                                     */
/* ------------------------------------------------------------------ */

export function documentResult(
  payload: Partial<DocumentAnalysisPayload> = {},
  model = 'doc-model',
): DocumentAnalysisResult {
  return {
    kind: StepKind.DOCUMENT_ANALYSIS,
    model,
    durationMs: 5,
    payload: {
      text: 'extracted text',
      analysis: 'Document Type: general document',
      documentType: 'general document',
      confidence: 0.95,
      ...payload,
    },
  };
}

export function lookupResult(
  payload: Partial<InformationLookupPayload> = {},
  model = 'lookup-model',
): InformationLookupResult {
  return {
    kind: StepKind.INFORMATION_LOOKUP,
    model,
    durationMs: 5,
    payload: { query: 'query', response: 'lookup response', resultCount: 3, ...payload },
  };
}

export function retrievalResult(
  payload: Partial<KnowledgeRetrievalPayload> = {},
  model = 'rag-model',
): KnowledgeRetrievalResult {
  return {
    kind: StepKind.KNOWLEDGE_RETRIEVAL,
    model,
    durationMs: 5,
    payload: {
      response: 'retrieval response',
      sources: [],
      sourceCount: 0,
      collectionsSearched: ['documents'],
      embeddingModel: 'embed-model',
      ...payload,
    },
  };
}

export interface FakeExecutor<K extends StepKind> extends StepExecutor<K> {
  execute: Mock<StepExecutor<K>['execute']>;
}

export type FakeExecutorSet = { [K in StepKind]: FakeExecutor<K> };

export type ExecuteOverrides = { [K in StepKind]?: StepExecutor<K>['execute'] };

export function fakeExecutor<K extends StepKind>(
  kind: K,
  execute: StepExecutor<K>['execute'],
): FakeExecutor<K> {
  return { kind, model: `${kind}-model`, execute: vi.fn(execute) };
}

/** One fake per kind; each resolves with a canned result unless overridden. */
export function createFakeExecutors(overrides: ExecuteOverrides = {}): FakeExecutorSet {
  return {
    [StepKind.DOCUMENT_ANALYSIS]: fakeExecutor(
      StepKind.DOCUMENT_ANALYSIS,
      overrides[StepKind.DOCUMENT_ANALYSIS] ?? (async () => documentResult()),
    ),
    [StepKind.INFORMATION_LOOKUP]: fakeExecutor(
      StepKind.INFORMATION_LOOKUP,
      overrides[StepKind.INFORMATION_LOOKUP] ?? (async () => lookupResult()),
    ),
    [StepKind.KNOWLEDGE_RETRIEVAL]: fakeExecutor(
      StepKind.KNOWLEDGE_RETRIEVAL,
      overrides[StepKind.KNOWLEDGE_RETRIEVAL] ?? (async () => retrievalResult()),
    ),
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/* ------------------------------------------------------------------ */
/* Progress capture                                                    */
/* ------------------------------------------------------------------ */

export interface RecordedActivity {
  agent: AgentLabel;
  message: string;
  isError: boolean;
}

/** Reporter factory that records every report in call order. */
export function createRecordingReporters(): {
  events: RecordedActivity[];
  messages: () => string[];
  reporters: (agent: AgentLabel) => ActivityReporter;
} {
  const events: RecordedActivity[] = [];
  return {
    events,
    messages: () => events.map((e) => e.message),
    reporters: (agent) => ({
      report: (message, isError = false) => events.push({ agent, message, isError }),
    }),
  };
}

export function recordingReporter(agent: AgentLabel = 'orchestrator'): ActivityReporter & {
  events: RecordedActivity[];
} {
  const events: RecordedActivity[] = [];
  return {
    events,
    report: (message, isError = false) => {
      events.push({ agent, message, isError });
    },
  };
}

/* ------------------------------------------------------------------ */
/* Broker and history doubles                                          */
/* ------------------------------------------------------------------ */

export interface PublishedMessage {
  channel: string;
  message: string;
}

/** In-memory broker that also keeps every message it delivered and counts live subscriptions. */
export class RecordingBroker extends InMemoryBroker {
  private readonly published: PublishedMessage[] = [];
  private readonly live = new Set<object>();

  override publish(channel: string, message: string): Promise<void> {
    this.published.push({ channel, message });
    return super.publish(channel, message);
  }

  override async psubscribe(pattern: string, handler: MessageHandler): Promise<Unsubscribe> {
    const unsubscribe = await super.psubscribe(pattern, handler);
    const token = {};
    this.live.add(token);
    return async () => {
      this.live.delete(token);
      await unsubscribe();
    };
  }

  override async close(): Promise<void> {
    this.live.clear();
    await super.close();
  }

  get subscriptionCount(): number {
    return this.live.size;
  }

  history(): PublishedMessage[] {
    return [...this.published];
  }
}

/** Activity events published for one client, decoded from the broker's record. */
export function activityEvents(broker: RecordingBroker, clientId: string): ActivityEvent[] {
  const channel = activityChannel(clientId);
  return broker
    .history()
    .filter((m) => m.channel === channel)
    .map((m) => JSON.parse(m.message));
}

export function resultEvents(broker: RecordingBroker, clientId: string): ResultEvent[] {
  const channel = resultChannel(clientId);
  return broker
    .history()
    .filter((m) => m.channel === channel)
    .map((m) => JSON.parse(m.message));
}

/** Keeps saved sessions in save order. */
export class RecordingHistoryStore implements HistoryStore {
  readonly sessions: SessionRecord[] = [];

  async save(session: SessionRecord): Promise<void> {
    this.sessions.push(session);
  }
}

/* ------------------------------------------------------------------ */
/* Connections and config                                              */
/* ------------------------------------------------------------------ */

/** In-memory live connection; `send` is a spy so tests can make it fail. */
export class FakeConnection implements LiveConnection {
  readonly sent: string[] = [];
  readonly closeCalls: Array<{ code?: number; reason?: string }> = [];
  readonly send = vi.fn(async (payload: string): Promise<void> => {
    this.sent.push(payload);
  });

  close(code?: number, reason?: string): void {
    this.closeCalls.push({ code, reason });
  }
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    models: { ...DEFAULT_MODELS, orchestrator: 'orch-model' },
    prompts: { ...DEFAULT_PROMPTS },
    gatewayPort: 0,
    stepTimeoutMs: 5_000,
    inferenceRetries: 0,
    retryDelayMs: 0,
    cacheTtlSeconds: 1800,
    historyTtlSeconds: 60,
    defaultCollection: 'documents',
    queueName: 'test-submissions',
    queueConcurrency: 1,
    ...overrides,
  };
}

/**
 * Poll until `predicate` holds.
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 2_000, intervalMs = 10): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}
