/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { StepKind } from '../interfaces/plan.js';
import { createMockLogger, RecordingBroker, type MockLogger } from '../utils/testHelpers.js';
import type { MessageBroker } from './broker.js';
import { ProgressBus } from './progressBus.js';
import { parseChannel, silentReporter, type ChannelCategory } from './types.js';

function brokenBroker(publish: MessageBroker['publish']): MessageBroker {
  return {
    publish,
    psubscribe: vi.fn<MessageBroker['psubscribe']>(async () => async () => undefined),
    close: vi.fn<MessageBroker['close']>(async () => undefined),
  };
}

describe('ProgressBus', () => {
  let logger: MockLogger;
  let broker: RecordingBroker;
  let bus: ProgressBus;

  beforeEach(() => {
    logger = createMockLogger();
    broker = new RecordingBroker(logger);
    bus = new ProgressBus(broker, logger);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('publishes activity in the wire format on the client channel', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-04T05:06:07.089Z'));

    bus.publishActivity('c1', StepKind.INFORMATION_LOOKUP, 'Searching...', true);

    const [published] = broker.history();
    expect(published.channel).toBe('agent_activity:c1');
    expect(JSON.parse(published.message)).toEqual({
      type: 'activity_update',
      agent: 'information_lookup',
      message: 'Searching...',
      is_error: true,
      timestamp: '2026-03-04T05:06:07.089Z',
    });
  });

  it('routes activity and results to subscribers by client id', async () => {
    const received: Array<[string, ChannelCategory]> = [];
    await bus.subscribe((clientId, _payload, category) => received.push([clientId, category]));

    bus.publishActivity('team:42', 'orchestrator', 'hi');
    bus.publishResult('c2', { type: 'result', task_id: 't1', status: 'FAILURE', error: 'nope', timestamp: 'now' });

    expect(received).toEqual([
      ['team:42', 'activity'],
      ['c2', 'result'],
    ]);
  });

  it('hands the payload through untouched', async () => {
    const payloads: string[] = [];
    await bus.subscribe((_clientId, payload) => payloads.push(payload));

    bus.publishResult('c2', { type: 'result', task_id: 't1', status: 'FAILURE', error: 'nope', timestamp: 'now' });

    expect(payloads).toEqual([broker.history()[0].message]);
  });

  it('drops both subscriptions on unsubscribe', async () => {
    const unsubscribe = await bus.subscribe(vi.fn());
    expect(broker.subscriptionCount).toBe(2);

    await unsubscribe();

    expect(broker.subscriptionCount).toBe(0);
  });

  it('never throws when the broker rejects', async () => {
    const failing = new ProgressBus(
      brokenBroker(async () => {
        throw new Error('redis down');
      }),
      logger,
    );

    expect(() => failing.publishActivity('c1', 'orchestrator', 'x')).not.toThrow();
    await vi.waitFor(() => {
      expect(logger.warn).toHaveBeenCalledWith('Publish to agent_activity:c1 failed: redis down');
    });
  });

  it('never throws when the broker throws synchronously', () => {
    const failing = new ProgressBus(
      brokenBroker(() => {
        throw new Error('not connected');
      }),
      logger,
    );

    expect(() => failing.publishActivity('c1', 'orchestrator', 'x')).not.toThrow();
    expect(logger.warn).toHaveBeenCalledWith('Publish to agent_activity:c1 failed: not connected');
  });

  it('gives a silent reporter when there is no client', () => {
    expect(bus.reporter(undefined, 'orchestrator')).toBe(silentReporter);

    bus.reporter('c1', StepKind.KNOWLEDGE_RETRIEVAL).report('Embedding query...');
    expect(JSON.parse(broker.history()[0].message)).toMatchObject({
      agent: 'knowledge_retrieval',
      message: 'Embedding query...',
      is_error: false,
    });
  });
});

describe('parseChannel', () => {
  it('splits at the first colon', () => {
    expect(parseChannel('agent_results:a:b')).toEqual({ category: 'result', clientId: 'a:b' });
    expect(parseChannel('agent_activity:c1')).toEqual({ category: 'activity', clientId: 'c1' });
  });

  it('rejects unknown prefixes and empty client ids', () => {
    expect(parseChannel('other:c1')).toBeUndefined();
    expect(parseChannel('agent_activity:')).toBeUndefined();
    expect(parseChannel('agent_activity')).toBeUndefined();
  });
});
