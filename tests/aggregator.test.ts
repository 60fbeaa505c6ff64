/**
 * Tests for ResultAggregator and result rendering
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ResultAggregator, formatThroughput } from '../src/core/aggregator.js';
import { CancellationToken } from '../src/core/cancellation.js';
import { ResultChannel } from '../src/core/channel.js';
import {
  renderDnsOutcome,
  renderHttpOutcome,
  renderVhostOutcome,
  type ModeStrategy,
} from '../src/core/modes.js';
import { logger } from '../src/utils/logger.js';
import { SilentProgress } from '../src/utils/progress.js';
import type { HttpCandidate, HttpOutcome } from '../src/core/types.js';

const strategy: ModeStrategy<HttpCandidate, HttpOutcome> = {
  mode: 'dir',
  count: () => 0,
  generate: () => [],
  probe: () => Promise.reject(new Error('not used')),
  accept: (outcome) => outcome.statusCode !== undefined && outcome.statusCode !== 404,
  identity: (outcome) => `${outcome.method} ${outcome.statusCode} ${outcome.url}`,
  render: renderHttpOutcome,
};

function outcome(path: string, statusCode?: number): HttpOutcome {
  return {
    mode: 'dir',
    method: 'GET',
    url: `http://localhost:3000${path}`,
    body: '',
    headers: [],
    statusCode,
    elapsed: 1,
  };
}

function failed(path: string): HttpOutcome {
  return {
    ...outcome(path),
    error: { kind: 'connection', message: 'connect ECONNREFUSED', code: 'ECONNREFUSED' },
  };
}

function closedChannel(outcomes: HttpOutcome[]): ResultChannel<HttpOutcome> {
  const channel = new ResultChannel<HttpOutcome>();
  for (const item of outcomes) channel.push(item);
  channel.close();
  return channel;
}

describe('ResultAggregator', () => {
  let token: CancellationToken;
  let progress: SilentProgress;

  beforeEach(() => {
    logger.setQuiet(true);
    token = new CancellationToken();
    progress = new SilentProgress({ echo: false, record: true });
  });

  it('should print every accepted outcome but keep one per identity', async () => {
    const aggregator = new ResultAggregator({ strategy, token, progress });
    const report = await aggregator.consume(
      closedChannel([outcome('/admin', 200), outcome('/missing', 404), outcome('/admin', 200)]),
      3
    );

    expect(report.results.map((r) => r.url)).toEqual(['http://localhost:3000/admin']);
    expect(report.completed).toBe(3);
    expect(report.termination).toBe('completed');
    expect(progress.lines).toEqual([
      'GET\t200\t\t\t\thttp://localhost:3000/admin',
      'GET\t200\t\t\t\thttp://localhost:3000/admin',
    ]);
  });

  it('should treat the same URL with another status as a new result', async () => {
    const aggregator = new ResultAggregator({ strategy, token, progress });
    const report = await aggregator.consume(
      closedChannel([outcome('/admin', 200), outcome('/admin', 500)]),
      2
    );
    expect(report.results.map((r) => r.statusCode)).toEqual([200, 500]);
  });

  it('should stop as unreachable when the first outcome is an error', async () => {
    const aggregator = new ResultAggregator({ strategy, token, progress });
    const report = await aggregator.consume(
      closedChannel([failed('/admin'), outcome('/login', 200)]),
      2
    );

    expect(report.termination).toBe('unreachable');
    expect(token.reason).toBe('unreachable');
    expect(progress.lines[0]).toContain('ERROR\tGET http://localhost:3000/admin\tconnect ECONNREFUSED');
    // in-flight outcomes are still evaluated after cancellation
    expect(report.results.map((r) => r.url)).toEqual(['http://localhost:3000/login']);
  });

  it('should keep going on later errors by default', async () => {
    const aggregator = new ResultAggregator({ strategy, token, progress });
    const report = await aggregator.consume(
      closedChannel([outcome('/admin', 200), failed('/login'), outcome('/index', 200)]),
      3
    );

    expect(report.termination).toBe('completed');
    expect(token.cancelled).toBe(false);
    expect(report.results).toHaveLength(2);
  });

  it('should stop on a later error when asked to', async () => {
    const aggregator = new ResultAggregator({
      strategy,
      token,
      progress,
      exitOnConnectionErrors: true,
    });
    const report = await aggregator.consume(
      closedChannel([outcome('/admin', 200), failed('/login')]),
      2
    );

    expect(report.termination).toBe('connection-error');
  });

  it('should keep an earlier cancellation reason', async () => {
    token.cancel('interrupted');
    const aggregator = new ResultAggregator({ strategy, token, progress });
    const report = await aggregator.consume(closedChannel([failed('/admin')]), 1);
    expect(report.termination).toBe('interrupted');
  });

  it('should report throughput once a whole second has passed', async () => {
    const now = vi.fn<() => number>().mockReturnValueOnce(0).mockReturnValueOnce(500).mockReturnValueOnce(2500);
    const setThroughput = vi.spyOn(progress, 'setThroughput');
    const aggregator = new ResultAggregator({ strategy, token, progress, now });

    await aggregator.consume(closedChannel([outcome('/a', 200), outcome('/b', 200)]), 2);

    expect(setThroughput.mock.calls).toEqual([['warming up...'], ['1']]);
  });

  it('should surface a failed channel', async () => {
    const channel = new ResultChannel<HttpOutcome>();
    channel.fail(new Error('dispatcher failed'));
    const finish = vi.spyOn(progress, 'finish');
    const aggregator = new ResultAggregator({ strategy, token, progress });

    await expect(aggregator.consume(channel, 0)).rejects.toThrow('dispatcher failed');
    expect(finish).toHaveBeenCalledTimes(1);
  });
});

describe('formatThroughput', () => {
  it('should warm up during the first second', () => {
    expect(formatThroughput(0, 0)).toBe('warming up...');
    expect(formatThroughput(50, 999)).toBe('warming up...');
  });

  it('should divide by whole seconds', () => {
    expect(formatThroughput(10, 2000)).toBe('5');
    expect(formatThroughput(7, 3500)).toBe('2');
  });
});

describe('rendering', () => {
  it('should print the redirect target under a 3xx line', () => {
    expect(
      renderHttpOutcome({ ...outcome('/admin', 301), location: 'http://localhost:3000/admin/' })
    ).toEqual(['GET\t301\t\t\t\thttp://localhost:3000/admin', '\t\t\t\t\t\t=> http://localhost:3000/admin/']);
  });

  it('should append the request body in fuzz mode', () => {
    expect(
      renderHttpOutcome({ ...outcome('/login', 200), mode: 'fuzz', method: 'POST', body: 'user=alice' })
    ).toEqual(['POST\t200\t\t\t\thttp://localhost:3000/login\tuser=alice']);
  });

  it('should print the headers that carried fuzz markers', () => {
    expect(
      renderHttpOutcome(
        {
          ...outcome('/api', 200),
          mode: 'fuzz',
          headers: [
            ['Accept', 'application/json'],
            ['X-Api-Key', 'k2'],
          ],
        },
        [1]
      )
    ).toEqual(['GET\t200\t\t\t\thttp://localhost:3000/api\tX-Api-Key: k2']);
  });

  it('should print addresses below a resolved name', () => {
    expect(
      renderDnsOutcome({
        mode: 'dns',
        domain: 'www.example.com.',
        resolved: true,
        addresses: [
          { family: 4, address: '10.0.0.1' },
          { family: 6, address: 'fd00::1' },
        ],
        elapsed: 1,
      })
    ).toEqual(['OK\twww.example.com', '\t\tIPv4: 10.0.0.1', '\t\tIPv6: fd00::1']);
  });

  it('should print the virtual host', () => {
    expect(
      renderVhostOutcome({
        mode: 'vhost',
        method: 'GET',
        url: 'http://localhost:3000/',
        vhost: 'admin.test.local',
        statusCode: 200,
        ignored: false,
        elapsed: 1,
      })
    ).toEqual(['GET\t200\t\t\t\tadmin.test.local']);
  });
});
