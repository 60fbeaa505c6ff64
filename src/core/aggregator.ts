/**
 * Single consumer of the result channel: filtering, deduplication,
 * throughput and the early-termination rule.
 */

import chalk from 'chalk';
import { logger } from '../utils/logger.js';
import type { CancellationToken } from './cancellation.js';
import type { ResultChannel } from './channel.js';
import type { ModeStrategy } from './modes.js';
import type { ProbeOutcome, ProgressSink, TerminationReason } from './types.js';

export interface AggregatorOptions<C, O extends ProbeOutcome> {
  strategy: ModeStrategy<C, O>;
  token: CancellationToken;
  progress: ProgressSink;
  exitOnConnectionErrors?: boolean;
  now?: () => number;
}

export interface AggregationReport<O> {
  /** Accepted results in arrival order, one per identity key */
  results: O[];
  completed: number;
  startTime: Date;
  termination: TerminationReason;
}

/**
 * Throughput label: whole requests per whole second, or a warm-up notice
 * during the first second.
 */
export function formatThroughput(completed: number, elapsedMs: number): string {
  const seconds = Math.floor(elapsedMs / 1000);
  if (seconds <= 0) {
    return 'warming up...';
  }
  return String(Math.floor(completed / seconds));
}

export class ResultAggregator<C, O extends ProbeOutcome> {
  private readonly strategy: ModeStrategy<C, O>;
  private readonly token: CancellationToken;
  private readonly progress: ProgressSink;
  private readonly exitOnConnectionErrors: boolean;
  private readonly now: () => number;

  private readonly seen = new Set<string>();
  private readonly results: O[] = [];
  private completed = 0;

  constructor(options: AggregatorOptions<C, O>) {
    this.strategy = options.strategy;
    this.token = options.token;
    this.progress = options.progress;
    this.exitOnConnectionErrors = options.exitOnConnectionErrors ?? false;
    this.now = options.now ?? Date.now;
  }

  /**
   * Drain the channel until the dispatcher closes it. After cancellation the
   * probes already in flight are still received and evaluated.
   */
  async consume(channel: ResultChannel<O>, total: number): Promise<AggregationReport<O>> {
    const started = this.now();
    this.progress.start(total);

    try {
      for await (const outcome of channel) {
        this.completed++;
        this.progress.advance();
        this.progress.setThroughput(formatThroughput(this.completed, this.now() - started));
        this.handle(outcome);
      }
    } finally {
      this.progress.finish();
    }

    return {
      results: [...this.results],
      completed: this.completed,
      startTime: new Date(started),
      termination: this.token.reason ?? 'completed',
    };
  }

  /**
   * Evaluate one outcome. Returns true when it was added to the results.
   */
  handle(outcome: O): boolean {
    if (outcome.error) {
      this.progress.println(
        chalk.red(`ERROR\t${describeTarget(outcome)}\t${outcome.error.message}`),
        'stderr'
      );
      this.escalate();
      return false;
    }

    if (!this.strategy.accept(outcome)) {
      return false;
    }

    for (const line of this.strategy.render(outcome)) {
      this.progress.println(line);
    }

    // duplicates are still printed, only the first one is kept
    const key = this.strategy.identity(outcome);
    if (this.seen.has(key)) {
      return false;
    }
    this.seen.add(key);
    this.results.push(outcome);
    return true;
  }

  private escalate(): void {
    if (this.token.cancelled) return;

    const reason =
      this.completed === 1
        ? 'unreachable'
        : this.exitOnConnectionErrors
          ? 'connection-error'
          : undefined;

    if (reason && this.token.cancel(reason)) {
      logger.warn('Check connectivity to the target');
    }
  }
}

function describeTarget(outcome: ProbeOutcome): string {
  switch (outcome.mode) {
    case 'dns':
      return outcome.domain;
    case 'vhost':
      return `${outcome.url} (${outcome.vhost})`;
    default:
      return `${outcome.method} ${outcome.url}`;
  }
}
