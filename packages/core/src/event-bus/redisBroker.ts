/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Redis } from 'ioredis';
import { createLogger, type Logger } from '../utils/logger.js';
import type { MessageBroker, Unsubscribe } from './broker.js';
import type { MessageHandler } from './types.js';

/**
 * Cross-process broker over Redis pub/sub. Publishing goes through the
 * command connection; pattern subscriptions live on a lazily duplicated
 * connection, since a subscribed Redis connection cannot issue commands.
 */
export class RedisBroker implements MessageBroker {
  private subscriber?: Redis;
  private readonly handlers = new Map<string, Set<MessageHandler>>();

  constructor(
    private readonly publisher: Redis,
    private readonly logger: Logger = createLogger('redis-broker'),
  ) {
    this.publisher.on('error', (error: Error) => {
      this.logger.error('Redis publisher error', error.message);
    });
  }

  static fromUrl(url: string): RedisBroker {
    return new RedisBroker(new Redis(url, { maxRetriesPerRequest: 3 }));
  }

  async publish(channel: string, message: string): Promise<void> {
    await this.publisher.publish(channel, message);
  }

  async psubscribe(pattern: string, handler: MessageHandler): Promise<Unsubscribe> {
    const subscriber = this.ensureSubscriber();
    let handlers = this.handlers.get(pattern);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(pattern, handlers);
      await subscriber.psubscribe(pattern);
      this.logger.info(`Subscribed to ${pattern}`);
    }
    handlers.add(handler);

    const registered = handlers;
    return async () => {
      registered.delete(handler);
      if (registered.size === 0 && this.handlers.get(pattern) === registered) {
        this.handlers.delete(pattern);
        await subscriber.punsubscribe(pattern);
      }
    };
  }

  async close(): Promise<void> {
    this.handlers.clear();
    const connections = [this.publisher, this.subscriber].filter(
      (c): c is Redis => c !== undefined,
    );
    await Promise.all(connections.map((c) => c.quit()));
  }

  private ensureSubscriber(): Redis {
    if (this.subscriber) return this.subscriber;
    const subscriber = this.publisher.duplicate();
    subscriber.on('pmessage', (pattern: string, channel: string, message: string) => {
      for (const handler of this.handlers.get(pattern) ?? []) {
        try {
          handler(channel, message);
        } catch (error) {
          this.logger.error(`Handler for ${pattern} threw`, error);
        }
      }
    });
    subscriber.on('error', (error: Error) => {
      this.logger.error('Redis subscriber error', error.message);
    });
    this.subscriber = subscriber;
    return subscriber;
  }
}
