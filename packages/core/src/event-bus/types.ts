/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { StepKind, SuccessOutcome } from '../interfaces/plan.js';

/** Who emitted an activity: a step kind, or the orchestrator for plan-level events. */
export type AgentLabel = StepKind | 'orchestrator';

export type ChannelCategory = 'activity' | 'result';

const PREFIX: Record<ChannelCategory, string> = {
  activity: 'agent_activity',
  result: 'agent_results',
};

export const ACTIVITY_PATTERN = `${PREFIX.activity}:*`;
export const RESULT_PATTERN = `${PREFIX.result}:*`;

export function activityChannel(clientId: string): string {
  return `${PREFIX.activity}:${clientId}`;
}

export function resultChannel(clientId: string): string {
  return `${PREFIX.result}:${clientId}`;
}

/** Split `agent_activity:<clientId>` at the first colon. Client ids may contain colons. */
export function parseChannel(
  channel: string,
): { category: ChannelCategory; clientId: string } | undefined {
  const split = channel.indexOf(':');
  if (split <= 0) return undefined;
  const prefix = channel.slice(0, split);
  const clientId = channel.slice(split + 1);
  if (!clientId) return undefined;
  if (prefix === PREFIX.activity) return { category: 'activity', clientId };
  if (prefix === PREFIX.result) return { category: 'result', clientId };
  return undefined;
}

/* ------------------------------------------------------------------ */
/* Wire contract                                                      */
/* ------------------------------------------------------------------ */

export interface ActivityEvent {
  type: 'activity_update';
  agent: AgentLabel;
  message: string;
  is_error: boolean;
  timestamp: string;       // ISO-8601
}

export type ResultEvent =
  | { type: 'result'; task_id: string; status: 'SUCCESS'; result: SuccessOutcome; timestamp: string }
  | { type: 'result'; task_id: string; status: 'FAILURE'; error: string; timestamp: string };

/** Raw handler on the broker side: channel name plus the untouched payload. */
export type MessageHandler = (channel: string, message: string) => void;

/** Bus-level handler, already routed to a client. */
export type ClientMessageHandler = (
  clientId: string,
  payload: string,
  category: ChannelCategory,
) => void;

/** One-way progress sink handed to step executors. */
export interface ActivityReporter {
  report(message: string, isError?: boolean): void;
}

export const silentReporter: ActivityReporter = {
  report: () => undefined,
};
