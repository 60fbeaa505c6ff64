/**
 * Bounded worker pool feeding probe outcomes into the result channel
 */

import pLimit from 'p-limit';
import { logger } from '../utils/logger.js';
import type { CancellationToken } from './cancellation.js';
import type { ResultChannel } from './channel.js';

export const DEFAULT_CONCURRENCY = 10;

export interface DispatcherOptions<C, O> {
  concurrency?: number;
  /** Must resolve with exactly one outcome per candidate */
  probe: (candidate: C) => Promise<O>;
  token: CancellationToken;
}

export interface DispatchReport {
  /** Candidates pulled from the source, each produced exactly one outcome */
  dispatched: number;
  /** True when the source was abandoned because the token was raised */
  cancelled: boolean;
}

/**
 * Pulls candidates lazily from the source, keeps at most `concurrency`
 * probes in flight and pushes every outcome onto the channel. The channel is
 * always closed (or failed) when `run` settles; `run` itself never rejects.
 */
export class Dispatcher<C, O> {
  private readonly concurrency: number;
  private readonly probe: (candidate: C) => Promise<O>;
  private readonly token: CancellationToken;

  constructor(options: DispatcherOptions<C, O>) {
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
    this.probe = options.probe;
    this.token = options.token;
  }

  async run(source: Iterable<C>, channel: ResultChannel<O>): Promise<DispatchReport> {
    const limit = pLimit(this.concurrency);
    const inFlight = new Set<Promise<void>>();
    let dispatched = 0;
    let abandoned = false;
    let failure: { error: unknown } | undefined;

    const execute = (candidate: C): Promise<void> =>
      limit(() => this.probe(candidate)).then(
        (outcome) => {
          channel.push(outcome);
        },
        (error: unknown) => {
          // a probe broke its contract: stop pulling and surface the error
          failure ??= { error };
          this.token.cancel('interrupted');
        }
      );

    try {
      const iterator = source[Symbol.iterator]();
      for (;;) {
        if (this.token.cancelled) {
          abandoned = true;
          break;
        }

        const next = iterator.next();
        if (next.done) break;

        dispatched++;
        const task: Promise<void> = execute(next.value).finally(() => {
          inFlight.delete(task);
        });
        inFlight.add(task);

        if (inFlight.size >= this.concurrency) {
          await Promise.race(inFlight);
        }
      }
    } catch (error) {
      failure ??= { error };
      this.token.cancel('interrupted');
    }

    await Promise.all(inFlight);

    if (failure) {
      logger.debug('Dispatcher stopped on error');
      channel.fail(failure.error);
    } else {
      channel.close();
    }

    logger.debug(`Dispatched ${dispatched} candidates${abandoned ? ' (cancelled)' : ''}`);
    return { dispatched, cancelled: abandoned };
  }
}
