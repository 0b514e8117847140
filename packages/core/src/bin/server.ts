/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { loadConfig } from '../config/config.js';
import { startServer } from '../server.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('server');

async function main() {
  const config = await loadConfig();
  const server = await startServer(config);

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close().then(
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
  logger.error('Failed to start server', error);
  process.exit(1);
});
