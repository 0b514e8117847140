/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { loadConfig } from '../config/config.js';
import { createLogger } from '../utils/logger.js';
import { startWorker } from '../worker.js';

const logger = createLogger('worker');

async function main() {
  const config = await loadConfig();
  const runtime = await startWorker(config);

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, draining queue`);
    runtime.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', error);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.error('Failed to start worker', error);
  process.exit(1);
});
