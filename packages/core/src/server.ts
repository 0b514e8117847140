/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { AppConfig } from './config/config.js';
import { createRelay, createRuntime, type Runtime, type RuntimeOverrides } from './core/runtime.js';
import type { SubmissionService } from './core/submission.js';
import { ConnectionRegistry } from './event-bus/connectionRegistry.js';
import { startConnectionGateway, type GatewayHandle } from './event-bus/wsGateway.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('server');

export interface ServerHandle {
  port: number;
  registry: ConnectionRegistry;
  gateway: GatewayHandle;
  /** Present only when the engine runs in this process (no Redis). */
  submission?: SubmissionService;
  close(): Promise<void>;
}

/**
 * Start the live-connection side: registry plus WebSocket gateway.
 *
 * With Redis configured this process only relays; workers elsewhere publish
 * progress through the broker. Without Redis there is nobody else to run
 * the work, so the engine and an in-process queue consumer start here too.
 */
export async function startServer(config: AppConfig, overrides: RuntimeOverrides = {}): Promise<ServerHandle> {
  let runtime: Runtime | undefined;
  let relay: ReturnType<typeof createRelay>;

  if (config.redisUrl) {
    relay = createRelay(config, overrides);
  } else {
    const local = await createRuntime(config, overrides);
    local.queue.process((job) => local.submission.processJob(job));
    relay = { broker: local.broker, bus: local.bus };
    runtime = local;
    logger.info('No REDIS_URL set; running the engine in-process');
  }

  const registry = new ConnectionRegistry(relay.bus);
  await registry.start();
  const gateway = startConnectionGateway(registry, { port: config.gatewayPort });
  const port = await gateway.ready;
  logger.info(`Clients connect at ws://localhost:${port}/ws/<clientId>`);

  return {
    port,
    registry,
    gateway,
    ...(runtime ? { submission: runtime.submission } : {}),
    close: async () => {
      await gateway.close();
      await registry.stop();
      if (runtime) await runtime.close();
      else await relay.broker.close();
    },
  };
}
