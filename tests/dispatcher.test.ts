/**
 * Tests for the bounded dispatcher
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Dispatcher } from '../src/core/dispatcher.js';
import { ResultChannel } from '../src/core/channel.js';
import { CancellationToken } from '../src/core/cancellation.js';
import { logger } from '../src/utils/logger.js';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function drain<T>(channel: ResultChannel<T>, onItem?: (item: T, count: number) => void): Promise<T[]> {
  const items: T[] = [];
  for await (const item of channel) {
    items.push(item);
    onItem?.(item, items.length);
  }
  return items;
}

function* counting(total: number, pulls: { count: number }): Generator<number> {
  for (let i = 0; i < total; i++) {
    pulls.count++;
    yield i;
  }
}

describe('Dispatcher', () => {
  beforeEach(() => {
    logger.setQuiet(true);
  });

  it('should reject a non-positive concurrency', () => {
    const token = new CancellationToken();
    expect(() => new Dispatcher({ concurrency: 0, probe: async () => 1, token })).toThrow(RangeError);
  });

  it('should never run more probes than the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    const token = new CancellationToken();
    const dispatcher = new Dispatcher<number, number>({
      concurrency: 3,
      token,
      probe: async (n) => {
        active++;
        peak = Math.max(peak, active);
        await sleep(2);
        active--;
        return n;
      },
    });
    const channel = new ResultChannel<number>();

    const [report, outcomes] = await Promise.all([
      dispatcher.run(counting(20, { count: 0 }), channel),
      drain(channel),
    ]);

    expect(peak).toBe(3);
    expect(report).toEqual({ dispatched: 20, cancelled: false });
    expect(outcomes).toHaveLength(20);
  });

  it('should produce exactly one outcome per candidate', async () => {
    const token = new CancellationToken();
    const dispatcher = new Dispatcher<number, string>({
      concurrency: 4,
      token,
      probe: async (n) => {
        await sleep(n % 3);
        return `outcome-${n}`;
      },
    });
    const channel = new ResultChannel<string>();

    const [, outcomes] = await Promise.all([
      dispatcher.run(counting(12, { count: 0 }), channel),
      drain(channel),
    ]);

    const expected = Array.from({ length: 12 }, (_, n) => `outcome-${n}`);
    expect([...outcomes].sort()).toEqual([...expected].sort());
  });

  it('should pull candidates only when a slot is free', async () => {
    const pulls = { count: 0 };
    const release: Array<() => void> = [];
    const token = new CancellationToken();
    const dispatcher = new Dispatcher<number, number>({
      concurrency: 2,
      token,
      probe: (n) =>
        new Promise<number>((resolve) => {
          release.push(() => resolve(n));
        }),
    });
    const channel = new ResultChannel<number>();

    const running = Promise.all([dispatcher.run(counting(1000, pulls), channel), drain(channel)]);
    await sleep(10);

    expect(pulls.count).toBe(2);

    token.cancel('interrupted');
    for (const done of release) done();
    const [report, outcomes] = await running;

    expect(report).toEqual({ dispatched: 2, cancelled: true });
    expect([...outcomes].sort()).toEqual([0, 1]);
  });

  it('should stop dispatching after cancellation and deliver in-flight outcomes', async () => {
    const pulls = { count: 0 };
    const token = new CancellationToken();
    const dispatcher = new Dispatcher<number, number>({
      concurrency: 2,
      token,
      probe: async (n) => {
        await sleep(1);
        return n;
      },
    });
    const channel = new ResultChannel<number>();

    const [report, outcomes] = await Promise.all([
      dispatcher.run(counting(100, pulls), channel),
      drain(channel, (_item, count) => {
        if (count === 5) token.cancel('interrupted');
      }),
    ]);

    expect(report.cancelled).toBe(true);
    expect(report.dispatched).toBeLessThan(100);
    expect(pulls.count).toBe(report.dispatched);
    expect(outcomes).toHaveLength(report.dispatched);
  });

  it('should fail the channel when a probe rejects', async () => {
    const token = new CancellationToken();
    const dispatcher = new Dispatcher<number, number>({
      concurrency: 1,
      token,
      probe: async (n) => {
        if (n === 2) throw new Error('probe contract broken');
        return n;
      },
    });
    const channel = new ResultChannel<number>();
    const received: number[] = [];

    const [report, failure] = await Promise.all([
      dispatcher.run(counting(10, { count: 0 }), channel),
      drain(channel, (item) => received.push(item)).then(
        () => undefined,
        (error: unknown) => error
      ),
    ]);

    expect(failure).toBeInstanceOf(Error);
    expect(token.reason).toBe('interrupted');
    expect(report.dispatched).toBeLessThan(10);
    expect(received).toEqual([0, 1]);
  });
});
