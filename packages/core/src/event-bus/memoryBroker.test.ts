/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createMockLogger, RecordingBroker, type MockLogger } from '../utils/testHelpers.js';
import { globToRegExp } from './broker.js';

describe('InMemoryBroker', () => {
  let logger: MockLogger;
  let broker: RecordingBroker;

  beforeEach(() => {
    logger = createMockLogger();
    broker = new RecordingBroker(logger);
  });

  it('delivers to matching pattern subscriptions only', async () => {
    const activity = vi.fn();
    const results = vi.fn();
    await broker.psubscribe('agent_activity:*', activity);
    await broker.psubscribe('agent_results:*', results);

    await broker.publish('agent_activity:c1', 'hello');

    expect(activity).toHaveBeenCalledWith('agent_activity:c1', 'hello');
    expect(results).not.toHaveBeenCalled();
  });

  it('keeps publish order per channel', async () => {
    const received: string[] = [];
    await broker.psubscribe('agent_activity:*', (_channel, message) => received.push(message));

    for (let i = 0; i < 5; i++) {
      await broker.publish('agent_activity:c1', `m${i}`);
    }

    expect(received).toEqual(['m0', 'm1', 'm2', 'm3', 'm4']);
  });

  it('stops delivering after unsubscribe', async () => {
    const handler = vi.fn();
    const unsubscribe = await broker.psubscribe('agent_activity:*', handler);
    expect(broker.subscriptionCount).toBe(1);

    await unsubscribe();
    await broker.publish('agent_activity:c1', 'late');

    expect(handler).not.toHaveBeenCalled();
    expect(broker.subscriptionCount).toBe(0);
  });

  it('isolates a throwing handler from its neighbours', async () => {
    const healthy = vi.fn();
    await broker.psubscribe('agent_activity:*', () => {
      throw new Error('handler bug');
    });
    await broker.psubscribe('agent_activity:*', healthy);

    await expect(broker.publish('agent_activity:c1', 'x')).resolves.toBeUndefined();

    expect(healthy).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith('Handler for agent_activity:* threw', expect.any(Error));
  });

  it('refuses to publish once closed', async () => {
    await broker.psubscribe('agent_activity:*', vi.fn());
    await broker.close();

    await expect(broker.publish('agent_activity:c1', 'x')).rejects.toThrow('Broker is closed');
    expect(broker.subscriptionCount).toBe(0);
  });
});

describe('globToRegExp', () => {
  it('supports * and ? and escapes everything else', () => {
    expect(globToRegExp('agent_activity:*').test('agent_activity:team:42')).toBe(true);
    expect(globToRegExp('agent_activity:*').test('agent_results:42')).toBe(false);
    expect(globToRegExp('a?c').test('abc')).toBe(true);
    expect(globToRegExp('a.c').test('abc')).toBe(false);
  });
});
