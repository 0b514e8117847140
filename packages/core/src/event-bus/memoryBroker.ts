/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { createLogger, type Logger } from '../utils/logger.js';
import { globToRegExp, type MessageBroker, type Unsubscribe } from './broker.js';
import type { MessageHandler } from './types.js';

interface Subscription {
  pattern: string;
  matcher: RegExp;
  handler: MessageHandler;
}

/**
 * Single-process broker. Handlers run synchronously inside `publish`, so
 * per-channel order is publish order.
 */
export class InMemoryBroker implements MessageBroker {
  private _subscriptions: Subscription[] = [];
  private _closed = false;

  constructor(private readonly logger: Logger = createLogger('memory-broker')) {}

  async publish(channel: string, message: string): Promise<void> {
    if (this._closed) {
      throw new Error('Broker is closed');
    }

    // Snapshot so a handler that unsubscribes does not skip its neighbour.
    for (const sub of [...this._subscriptions]) {
      if (!sub.matcher.test(channel)) continue;
      try {
        sub.handler(channel, message);
      } catch (error) {
        this.logger.error(`Handler for ${sub.pattern} threw`, error);
      }
    }
  }

  async psubscribe(pattern: string, handler: MessageHandler): Promise<Unsubscribe> {
    const sub: Subscription = { pattern, matcher: globToRegExp(pattern), handler };
    this._subscriptions.push(sub);

    return async () => {
      const index = this._subscriptions.indexOf(sub);
      if (index > -1) {
        this._subscriptions.splice(index, 1);
      }
    };
  }

  async close(): Promise<void> {
    this._closed = true;
    this._subscriptions = [];
  }
}
