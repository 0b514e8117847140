/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './interfaces/plan.js';
export * from './interfaces/request.js';
export * from './core/errors.js';
export * from './event-bus/index.js';

export { analyzeRequest, buildPlan, validatePlan, STEP_SIGNALS, type StepSignal } from './coordination/planner.js';
export { Scheduler, type ReporterFactory, type SchedulerOptions } from './coordination/scheduler.js';
export { withRetries, withTimeout } from './coordination/recovery.js';
export {
  BullTaskQueue,
  LocalTaskQueue,
  type JobHandler,
  type SubmissionJob,
  type TaskQueue,
} from './coordination/taskQueue.js';
export { buildStepContext } from './context/broker.js';

export {
  BaseStepExecutor,
  type ExecutorSet,
  type ExecutorSettings,
  type StepContext,
  type StepExecutor,
} from './agents/agent.js';
export { DocumentAnalysisExecutor, DOCUMENT_CONFIDENCE, detectDocumentType } from './agents/documentAnalysis.js';
export { InformationLookupExecutor, LOOKUP_RESULT_COUNT } from './agents/informationLookup.js';
export { KnowledgeRetrievalExecutor, type RetrievalSettings } from './agents/knowledgeRetrieval.js';

export { Synthesizer } from './core/synthesizer.js';
export { Orchestrator, type OrchestratorOptions } from './core/orchestrator.js';
export { SubmissionService, parseRequest, type SubmissionOptions } from './core/submission.js';
export { createRelay, createRuntime, type Runtime, type RuntimeOverrides } from './core/runtime.js';

export * from './services/cache.js';
export * from './services/contentFetcher.js';
export * from './services/historyStore.js';
export * from './services/inference.js';
export * from './services/knowledgeStore.js';

export * from './config/config.js';
export { createLogger, type Logger, type LogLevel } from './utils/logger.js';
export { startServer, type ServerHandle } from './server.js';
export { startWorker } from './worker.js';
