/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { toErrorMessage } from '../core/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { MessageBroker, Unsubscribe } from './broker.js';
import {
  ACTIVITY_PATTERN,
  RESULT_PATTERN,
  activityChannel,
  parseChannel,
  resultChannel,
  silentReporter,
  type ActivityEvent,
  type ActivityReporter,
  type AgentLabel,
  type ClientMessageHandler,
  type ResultEvent,
} from './types.js';

/**
 * Client-keyed progress channel on top of a {@link MessageBroker}.
 *
 * Publishing is a one-way notification: it returns immediately, never throws,
 * and a broker failure is only logged. Nobody listening is not an error.
 */
export class ProgressBus {
  constructor(
    private readonly broker: MessageBroker,
    private readonly logger: Logger = createLogger('progress-bus'),
  ) {}

  publishActivity(clientId: string, agent: AgentLabel, message: string, isError = false): void {
    const event: ActivityEvent = {
      type: 'activity_update',
      agent,
      message,
      is_error: isError,
      timestamp: new Date().toISOString(),
    };
    this.send(activityChannel(clientId), JSON.stringify(event));
  }

  publishResult(clientId: string, event: ResultEvent): void {
    this.send(resultChannel(clientId), JSON.stringify(event));
  }

  /** A reporter bound to one client and agent; silent when there is no client. */
  reporter(clientId: string | undefined, agent: AgentLabel): ActivityReporter {
    if (clientId === undefined) return silentReporter;
    return {
      report: (message, isError = false) => this.publishActivity(clientId, agent, message, isError),
    };
  }

  /** Receive every activity and result payload, routed by client id. */
  async subscribe(handler: ClientMessageHandler): Promise<Unsubscribe> {
    const route = (channel: string, message: string) => {
      const parsed = parseChannel(channel);
      if (!parsed) {
        this.logger.warn(`Ignoring message on unexpected channel ${channel}`);
        return;
      }
      handler(parsed.clientId, message, parsed.category);
    };

    const unsubscribers = await Promise.all([
      this.broker.psubscribe(ACTIVITY_PATTERN, route),
      this.broker.psubscribe(RESULT_PATTERN, route),
    ]);
    return async () => {
      await Promise.all(unsubscribers.map((unsubscribe) => unsubscribe()));
    };
  }

  private send(channel: string, payload: string): void {
    try {
      this.broker.publish(channel, payload).catch((error: unknown) => {
        this.logger.warn(`Publish to ${channel} failed: ${toErrorMessage(error)}`);
      });
    } catch (error) {
      this.logger.warn(`Publish to ${channel} failed: ${toErrorMessage(error)}`);
    }
  }
}
