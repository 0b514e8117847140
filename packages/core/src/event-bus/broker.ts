/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { MessageHandler } from './types.js';

export type Unsubscribe = () => Promise<void>;

/**
 * Pub/sub capability the progress relay runs on. Publishers and subscribers
 * may live in different processes; only strings cross the boundary.
 */
export interface MessageBroker {
  publish(channel: string, message: string): Promise<void>;
  /** Subscribe to a glob pattern (`*` and `?`), e.g. `agent_activity:*`. */
  psubscribe(pattern: string, handler: MessageHandler): Promise<Unsubscribe>;
  close(): Promise<void>;
}

/** Glob semantics shared by the in-memory broker and its tests. */
export function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .split('')
    .map((ch) => {
      if (ch === '*') return '.*';
      if (ch === '?') return '.';
      return ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${source}$`);
}
