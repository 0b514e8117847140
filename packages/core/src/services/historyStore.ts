/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Redis } from 'ioredis';
import { PersistenceError, toErrorMessage } from '../core/errors.js';
import type { ExecutionPlan, OutcomeStatus } from '../interfaces/plan.js';

/** One completed request as recorded in history. */
export interface SessionRecord {
  id: string;
  input: string;
  context: string;
  result: string;
  plan: ExecutionPlan;
  status: OutcomeStatus;
  durationMs: number;
  timestamp: string;
  model: string;
}

export interface HistoryStore {
  save(session: SessionRecord): Promise<void>;
}

export const HISTORY_TTL_SECONDS = 30 * 24 * 60 * 60;

/** One key per session, `history:<id>`, expiring after the TTL. */
export class RedisHistoryStore implements HistoryStore {
  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds = HISTORY_TTL_SECONDS,
  ) {}

  async save(session: SessionRecord): Promise<void> {
    try {
      await this.redis.setex(`history:${session.id}`, this.ttlSeconds, JSON.stringify(session));
    } catch (cause) {
      throw new PersistenceError(`Saving session ${session.id} failed: ${toErrorMessage(cause)}`, { cause });
    }
  }
}
