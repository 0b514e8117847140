/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DeliveryError, toErrorMessage } from '../core/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { Unsubscribe } from './broker.js';
import type { ProgressBus } from './progressBus.js';

/** Transport-neutral view of a client's duplex connection. */
export interface LiveConnection {
  send(payload: string): Promise<void>;
  close(code?: number, reason?: string): void;
}

export const CLOSE_REPLACED = 4000;
export const CLOSE_SHUTDOWN = 1001;

/**
 * Owns the client id → connection mapping for one process.
 *
 * Every mutation is a plain synchronous Map operation on the event loop, so
 * no lock is needed. Forwarding starts the write and returns; nothing is held
 * while the bytes are in flight.
 */
export class ConnectionRegistry {
  private readonly connections = new Map<string, LiveConnection>();
  private unsubscribe?: Unsubscribe;

  constructor(
    private readonly bus: ProgressBus,
    private readonly logger: Logger = createLogger('registry'),
  ) {}

  /** Subscribe to every client's activity and result channels. Idempotent. */
  async start(): Promise<void> {
    if (this.unsubscribe) return;
    this.unsubscribe = await this.bus.subscribe((clientId, payload) => {
      void this.deliver(clientId, payload);
    });
    this.logger.info('Connection registry listening for progress events');
  }

  async stop(): Promise<void> {
    const unsubscribe = this.unsubscribe;
    this.unsubscribe = undefined;
    for (const [clientId, connection] of this.connections) {
      this.closeQuietly(clientId, connection, CLOSE_SHUTDOWN, 'server shutdown');
    }
    this.connections.clear();
    if (unsubscribe) {
      await unsubscribe();
    }
  }

  /** Register `connection` for `clientId`, closing any connection it replaces. */
  connect(clientId: string, connection: LiveConnection): void {
    const previous = this.connections.get(clientId);
    this.connections.set(clientId, connection);
    this.logger.info(`Client ${clientId} connected`);
    if (previous && previous !== connection) {
      this.closeQuietly(clientId, previous, CLOSE_REPLACED, 'replaced by a newer connection');
    }
  }

  /**
   * Remove the mapping. When `connection` is given, only that exact
   * connection is removed; a newer one registered meanwhile stays.
   */
  disconnect(clientId: string, connection?: LiveConnection): boolean {
    const current = this.connections.get(clientId);
    if (!current || (connection && current !== connection)) return false;
    this.connections.delete(clientId);
    this.logger.info(`Client ${clientId} disconnected`);
    return true;
  }

  has(clientId: string): boolean {
    return this.connections.has(clientId);
  }

  get size(): number {
    return this.connections.size;
  }

  /**
   * Forward a raw payload to the client's connection, or drop it if the
   * client is not connected. Resolves once the write settled; never rejects.
   */
  async deliver(clientId: string, payload: string): Promise<void> {
    const connection = this.connections.get(clientId);
    if (!connection) {
      this.logger.debug(`No live connection for ${clientId}; dropping event`);
      return;
    }
    try {
      await connection.send(payload);
    } catch (cause) {
      const failure = new DeliveryError(
        `Delivery to ${clientId} failed: ${toErrorMessage(cause)}`,
        clientId,
        { cause },
      );
      this.logger.warn(failure.message);
      this.disconnect(clientId, connection);
    }
  }

  private closeQuietly(clientId: string, connection: LiveConnection, code: number, reason: string): void {
    try {
      connection.close(code, reason);
    } catch (error) {
      this.logger.warn(`Closing connection for ${clientId} failed: ${toErrorMessage(error)}`);
    }
  }
}
