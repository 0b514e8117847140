/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createMockLogger, deferred, type Deferred, type MockLogger } from '../utils/testHelpers.js';
import { BullTaskQueue, LocalTaskQueue, type SubmissionJob } from './taskQueue.js';

const bull = vi.hoisted(() => {
  const add = vi.fn(async () => ({ id: 'job' }));
  const queueClose = vi.fn(async () => undefined);
  const workerClose = vi.fn(async () => undefined);
  const workerOn = vi.fn();
  const Queue = vi.fn(function () {
    return { add, close: queueClose };
  });
  const Worker = vi.fn(function (
    _name: string,
    _processor: (job: { data: SubmissionJob }) => Promise<void>,
    _options: unknown,
  ) {
    return { on: workerOn, close: workerClose };
  });
  return { add, queueClose, workerClose, workerOn, Queue, Worker };
});

vi.mock('bullmq', () => ({ Queue: bull.Queue, Worker: bull.Worker }));

function job(taskId: string): SubmissionJob {
  return { taskId, clientId: 'c1', request: { query: `query ${taskId}` } };
}

describe('LocalTaskQueue', () => {
  let logger: MockLogger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  it('holds jobs until a consumer is attached', async () => {
    const queue = new LocalTaskQueue(1, logger);
    const handled: string[] = [];

    await queue.enqueue(job('t1'));
    await queue.onIdle();
    expect(handled).toEqual([]);

    queue.process(async (j) => {
      handled.push(j.taskId);
    });
    await queue.onIdle();

    expect(handled).toEqual(['t1']);
  });

  it('never runs more jobs at once than its concurrency', async () => {
    const queue = new LocalTaskQueue(2, logger);
    const gates = new Map<string, Deferred<void>>();
    let running = 0;
    let peak = 0;
    queue.process(async (j) => {
      running += 1;
      peak = Math.max(peak, running);
      const gate = deferred<void>();
      gates.set(j.taskId, gate);
      await gate.promise;
      running -= 1;
    });

    for (const id of ['t1', 't2', 't3', 't4']) {
      await queue.enqueue(job(id));
    }
    expect([...gates.keys()]).toEqual(['t1', 't2']);

    gates.get('t1')?.resolve();
    await vi.waitFor(() => expect(gates.has('t3')).toBe(true));
    for (const id of ['t2', 't3']) gates.get(id)?.resolve();
    await vi.waitFor(() => expect(gates.has('t4')).toBe(true));
    gates.get('t4')?.resolve();
    await queue.onIdle();

    expect(peak).toBe(2);
  });

  it('ignores a task id it has already seen', async () => {
    const queue = new LocalTaskQueue(1, logger);
    const handler = vi.fn(async () => undefined);

    await queue.enqueue(job('t1'));
    await queue.enqueue(job('t1'));
    queue.process(handler);
    await queue.onIdle();

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('logs a failing job and keeps going', async () => {
    const queue = new LocalTaskQueue(1, logger);
    const handled: string[] = [];
    queue.process(async (j) => {
      if (j.taskId === 't1') throw new Error('exploded');
      handled.push(j.taskId);
    });

    await queue.enqueue(job('t1'));
    await queue.enqueue(job('t2'));
    await queue.onIdle();

    expect(handled).toEqual(['t2']);
    expect(logger.error).toHaveBeenCalledWith('Task t1 failed: exploded');
  });

  it('accepts a single consumer and nothing after close', async () => {
    const queue = new LocalTaskQueue(1, logger);
    queue.process(async () => undefined);

    expect(() => queue.process(async () => undefined)).toThrow('Queue already has a consumer');
    await queue.close();
    await expect(queue.enqueue(job('t1'))).rejects.toThrow('Queue is closed');
  });
});

describe('BullTaskQueue', () => {
  const connection = { host: 'localhost', port: 6379 };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('adds jobs keyed by task id', async () => {
    const queue = new BullTaskQueue('submissions', connection, 3, createMockLogger());

    await queue.enqueue(job('t1'));

    expect(bull.Queue).toHaveBeenCalledWith('submissions', { connection });
    expect(bull.add).toHaveBeenCalledWith('submission', job('t1'), {
      jobId: 't1',
      attempts: 1,
      removeOnComplete: 100,
      removeOnFail: 500,
    });
  });

  it('hands job data to the consumer', async () => {
    const queue = new BullTaskQueue('submissions', connection, 3, createMockLogger());
    const handler = vi.fn(async () => undefined);

    queue.process(handler);
    const [name, processor, options] = bull.Worker.mock.calls[0];
    await processor({ data: job('t7') });

    expect(name).toBe('submissions');
    expect(options).toEqual({ connection: { ...connection, maxRetriesPerRequest: null }, concurrency: 3 });
    expect(handler).toHaveBeenCalledWith(job('t7'));
    expect(() => queue.process(handler)).toThrow('Queue already has a consumer');
  });

  it('closes the worker and the queue', async () => {
    const queue = new BullTaskQueue('submissions', connection, 1, createMockLogger());
    queue.process(async () => undefined);

    await queue.close();

    expect(bull.workerClose).toHaveBeenCalledTimes(1);
    expect(bull.queueClose).toHaveBeenCalledTimes(1);
  });
});
