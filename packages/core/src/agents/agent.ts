/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ActivityReporter } from '../event-bus/types.js';
import type { StepKind, StepResultOf } from '../interfaces/plan.js';
import type { Cache } from '../services/cache.js';
import { toErrorMessage } from '../core/errors.js';
import type { Logger } from '../utils/logger.js';

/**
 * The slice of the request a step is allowed to see. Built per kind by
 * the context broker, augmented with dependency output.
 */
export interface StepContext {
  text?: string;
  images?: readonly string[];
  collections?: readonly string[];
  urls?: readonly string[];
}

/**
 * Base interface for all step executors
 */
export interface StepExecutor<K extends StepKind = StepKind> {
  /** Step kind this executor serves */
  readonly kind: K;

  /** Model id recorded on every result */
  readonly model: string;

  /**
   * Run the step. Progress goes to `reporter`, which is already bound to
   * the requesting client.
   */
  execute(query: string, context: StepContext, reporter: ActivityReporter): Promise<StepResultOf<K>>;
}

/** One executor per kind; the scheduler looks them up by `step.kind`. */
export type ExecutorSet = { readonly [K in StepKind]: StepExecutor<K> };

export interface ExecutorSettings {
  model: string;
  systemPrompt: string;
}

export abstract class BaseStepExecutor<K extends StepKind> implements StepExecutor<K> {
  abstract readonly kind: K;
  readonly model: string;
  protected readonly systemPrompt: string;

  constructor(settings: ExecutorSettings, protected readonly logger: Logger) {
    this.model = settings.model;
    this.systemPrompt = settings.systemPrompt;
  }

  abstract execute(query: string, context: StepContext, reporter: ActivityReporter): Promise<StepResultOf<K>>;

  protected elapsedSince(startedAt: number): number {
    return Math.round(performance.now() - startedAt);
  }

  /** Cache misses and cache outages look the same to the caller. */
  protected async readCache<T>(
    cache: Cache,
    key: string,
    guard: (value: unknown) => value is T,
  ): Promise<T | undefined> {
    try {
      const value = await cache.get(key);
      if (value === undefined) return undefined;
      if (guard(value)) return value;
      this.logger.warn(`Ignoring malformed cache entry ${key}`);
      return undefined;
    } catch (error) {
      this.logger.warn(`Cache read failed for ${key}: ${toErrorMessage(error)}`);
      return undefined;
    }
  }

  protected async writeCache(cache: Cache, key: string, value: unknown, ttlSeconds: number): Promise<void> {
    try {
      await cache.set(key, value, ttlSeconds);
    } catch (error) {
      this.logger.warn(`Cache write failed for ${key}: ${toErrorMessage(error)}`);
    }
  }
}
