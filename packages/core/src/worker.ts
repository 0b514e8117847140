/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { AppConfig } from './config/config.js';
import { createRuntime, type Runtime, type RuntimeOverrides } from './core/runtime.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('worker');

/** Consume submissions from the queue and run them through the engine. */
export async function startWorker(config: AppConfig, overrides: RuntimeOverrides = {}): Promise<Runtime> {
  const runtime = await createRuntime(config, overrides);
  runtime.queue.process((job) => runtime.submission.processJob(job));
  logger.info(`Consuming ${config.queueName} with concurrency ${config.queueConcurrency}`);
  return runtime;
}
