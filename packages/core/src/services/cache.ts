/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Redis } from 'ioredis';

/**
 * JSON value cache. Values come back as `unknown`; callers narrow them.
 */
export interface Cache {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
}

interface CacheEntry {
  json: string;
  expiresAt: number;
}

export class MemoryCache implements Cache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(
    private readonly maxEntries = 1000,
    private readonly now: () => number = Date.now,
  ) {}

  async get(key: string): Promise<unknown> {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() > entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    const value: unknown = JSON.parse(entry.json);
    return value;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    // Stored serialized, the same shape a Redis round-trip produces.
    this.entries.set(key, { json: JSON.stringify(value), expiresAt: this.now() + ttlSeconds * 1000 });
    if (this.entries.size > this.maxEntries) {
      const now = this.now();
      for (const [k, v] of this.entries) {
        if (now > v.expiresAt) this.entries.delete(k);
      }
      // Still full: evict oldest insertions.
      for (const k of this.entries.keys()) {
        if (this.entries.size <= this.maxEntries) break;
        this.entries.delete(k);
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }
}

export class RedisCache implements Cache {
  constructor(
    private readonly redis: Redis,
    private readonly prefix = 'cache:',
  ) {}

  async get(key: string): Promise<unknown> {
    const raw = await this.redis.get(this.prefix + key);
    if (raw === null) return undefined;
    const value: unknown = JSON.parse(raw);
    return value;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    await this.redis.setex(this.prefix + key, ttlSeconds, JSON.stringify(value));
  }
}
