/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Queue, Worker, type RedisOptions } from 'bullmq';
import { toErrorMessage } from '../core/errors.js';
import type { AgentRequest } from '../interfaces/request.js';
import { createLogger, type Logger } from '../utils/logger.js';

/** An asynchronous submission. `taskId` doubles as the idempotency key. */
export interface SubmissionJob {
  taskId: string;
  clientId: string;
  request: AgentRequest;
}

export type JobHandler = (job: SubmissionJob) => Promise<unknown>;

export interface TaskQueue {
  /** Re-enqueueing a task id that is already known is a no-op. */
  enqueue(job: SubmissionJob): Promise<void>;
  /** Start consuming with `handler`. At most one consumer per queue instance. */
  process(handler: JobHandler): void;
  close(): Promise<void>;
}

/**
 * In-process queue with bounded concurrency, used when no Redis is
 * configured. Jobs do not survive a restart.
 */
export class LocalTaskQueue implements TaskQueue {
  private readonly waiting: SubmissionJob[] = [];
  private readonly seen = new Set<string>();
  private readonly idleWaiters: Array<() => void> = [];
  private handler?: JobHandler;
  private running = 0;
  private closed = false;

  constructor(
    private readonly concurrency = 1,
    private readonly logger: Logger = createLogger('local-queue'),
    private readonly rememberedIds = 1000,
  ) {}

  async enqueue(job: SubmissionJob): Promise<void> {
    if (this.closed) {
      throw new Error('Queue is closed');
    }
    if (this.seen.has(job.taskId)) {
      this.logger.debug(`Task ${job.taskId} already enqueued; ignoring duplicate`);
      return;
    }
    this.seen.add(job.taskId);
    if (this.seen.size > this.rememberedIds) {
      for (const id of this.seen) {
        this.seen.delete(id);
        break;
      }
    }
    this.waiting.push(job);
    this.drain();
  }

  process(handler: JobHandler): void {
    if (this.handler) {
      throw new Error('Queue already has a consumer');
    }
    this.handler = handler;
    this.drain();
  }

  /** Resolves once nothing is running and nothing is waiting to run. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  async close(): Promise<void> {
    this.closed = true;
    this.waiting.length = 0;
    await this.onIdle();
  }

  private isIdle(): boolean {
    return this.running === 0 && (this.waiting.length === 0 || !this.handler);
  }

  private drain(): void {
    const handler = this.handler;
    if (!handler) return;
    while (this.running < this.concurrency) {
      const job = this.waiting.shift();
      if (!job) break;
      this.running += 1;
      void handler(job)
        .catch((error: unknown) => {
          this.logger.error(`Task ${job.taskId} failed: ${toErrorMessage(error)}`);
        })
        .finally(() => {
          this.running -= 1;
          this.drain();
          if (this.isIdle()) {
            for (const resolve of this.idleWaiters.splice(0)) resolve();
          }
        });
    }
  }
}

/** Durable queue over BullMQ; producer and consumer may be different processes. */
export class BullTaskQueue implements TaskQueue {
  private readonly queue: Queue<SubmissionJob>;
  private worker?: Worker<SubmissionJob>;

  constructor(
    private readonly name: string,
    private readonly connection: RedisOptions,
    private readonly concurrency = 1,
    private readonly logger: Logger = createLogger('bull-queue'),
  ) {
    this.queue = new Queue<SubmissionJob>(name, { connection });
  }

  async enqueue(job: SubmissionJob): Promise<void> {
    // BullMQ ignores an add whose jobId already exists.
    await this.queue.add('submission', job, {
      jobId: job.taskId,
      attempts: 1,
      removeOnComplete: 100,
      removeOnFail: 500,
    });
  }

  process(handler: JobHandler): void {
    if (this.worker) {
      throw new Error('Queue already has a consumer');
    }
    const worker = new Worker<SubmissionJob>(
      this.name,
      async (job) => {
        await handler(job.data);
      },
      // Workers block on Redis; BullMQ requires unlimited retries per request.
      { connection: { ...this.connection, maxRetriesPerRequest: null }, concurrency: this.concurrency },
    );
    worker.on('error', (error) => {
      this.logger.error('Worker error', error.message);
    });
    worker.on('failed', (job, error) => {
      this.logger.error(`Task ${job?.id ?? '(unknown)'} failed: ${error.message}`);
    });
    this.worker = worker;
  }

  async close(): Promise<void> {
    await this.worker?.close();
    await this.queue.close();
  }
}
