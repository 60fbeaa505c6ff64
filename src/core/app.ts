/**
 * Main application orchestrator
 */
import type { Dispatcher as HttpDispatcher } from 'undici';
import { ResultAggregator } from './aggregator.js';
import { CancellationToken } from './cancellation.js';
import { ResultChannel } from './channel.js';
import { CsrfContext } from './csrf.js';
import { Dispatcher } from './dispatcher.js';
import { ConfigError } from './errors.js';
import { createFilterPolicy, hasBodyRules } from './filter.js';
import {
  createDirStrategy,
  createDnsStrategy,
  createFuzzStrategy,
  createVhostStrategy,
  type ModeStrategy,
} from './modes.js';
import { JsonFileSink } from './output.js';
import { DnsProber, HttpProber, type DnsResolver } from './probe.js';
import { loadWordlists } from './wordlist.js';
import { logger } from '../utils/logger.js';
import { SilentProgress } from '../utils/progress.js';
import type {
  FilterPolicy,
  FuzzScanConfig,
  ProbeOutcome,
  ProgressSink,
  ResultSink,
  ScanConfig,
  ScanResults,
} from './types.js';

/**
 * Collaborators that can be swapped out (tests, embedding, signal handling)
 */
export interface AppDependencies {
  /** undici dispatcher used for every HTTP request instead of a fresh agent */
  httpDispatcher?: HttpDispatcher;
  resolver?: DnsResolver;
  progress?: ProgressSink;
  resultSink?: ResultSink;
  token?: CancellationToken;
}

/**
 * Main application class that orchestrates the scan
 */
export class App {
  private config: ScanConfig;
  private dependencies: AppDependencies;
  readonly token: CancellationToken;

  constructor(config: ScanConfig, dependencies: AppDependencies = {}) {
    this.config = config;
    this.dependencies = dependencies;
    this.token = dependencies.token ?? new CancellationToken();
    this.token.onCancel((reason) => logger.debug(`Scan cancelled: ${reason}`));

    logger.setQuiet(config.quiet);
  }

  /**
   * Run the complete scan. Startup failures (wordlists, filters, CSRF)
   * reject before anything is dispatched.
   */
  async run(): Promise<ScanResults> {
    const wordlists = await loadWordlists(this.config.wordlists);
    if (wordlists.length === 0) {
      throw new ConfigError('At least one wordlist is required');
    }

    const policy = createFilterPolicy({
      includeStatusCodes: this.config.includeStatusCodes,
      ignoreStatusCodes: this.config.ignoreStatusCodes,
      includeStrings: this.config.mode === 'vhost' ? [] : this.config.includeStrings,
      ignoreStrings: this.config.mode === 'vhost' ? [] : this.config.ignoreStrings,
    });

    const config = this.config;
    if (config.mode === 'dns') {
      const dns = new DnsProber({
        timeout: config.timeout,
        resolver: this.dependencies.resolver,
      });
      return await this.execute(createDnsStrategy(wordlists[0], config.url, dns));
    }

    const http = new HttpProber({
      timeout: config.timeout,
      userAgent: config.userAgent,
      ignoreCertificate: config.ignoreCertificate,
      captureBody: hasBodyRules(policy),
      connections: config.concurrency,
      dispatcher: this.dependencies.httpDispatcher,
    });

    try {
      switch (config.mode) {
        case 'dir':
          return await this.execute(
            createDirStrategy(
              wordlists[0],
              {
                url: config.url,
                method: config.method,
                body: config.body,
                headers: config.headers,
                extensions: config.extensions,
                appendSlash: config.appendSlash,
              },
              http,
              policy
            )
          );
        case 'vhost':
          return await this.execute(
            createVhostStrategy(
              wordlists[0],
              {
                url: config.url,
                domain: config.domain,
                method: config.method,
                headers: config.headers,
              },
              http,
              config.ignoreStrings
            )
          );
        case 'fuzz':
          return await this.execute(await this.fuzzStrategy(config, wordlists, http, policy));
      }
    } finally {
      await http.close();
    }
  }

  /**
   * Fuzz strategy, after the CSRF pre-flight when one is configured
   */
  private async fuzzStrategy(
    config: FuzzScanConfig,
    wordlists: string[][],
    http: HttpProber,
    policy: FilterPolicy
  ) {
    const csrf = config.csrf ? await CsrfContext.capture(config.csrf, http) : CsrfContext.none();

    return createFuzzStrategy(
      wordlists,
      {
        url: config.url,
        method: config.method,
        body: config.body,
        headers: config.headers,
      },
      http,
      policy,
      csrf
    );
  }

  /**
   * Mode-agnostic driver: dispatcher and aggregator run side by side over
   * one result channel.
   */
  private async execute<C, O extends ProbeOutcome>(
    strategy: ModeStrategy<C, O>
  ): Promise<ScanResults<O>> {
    const total = strategy.count();
    const progress = this.dependencies.progress ?? new SilentProgress();
    const channel = new ResultChannel<O>();

    logger.info(`Starting ${strategy.mode} scan of ${this.config.url} (${total} requests)`);

    const dispatcher = new Dispatcher<C, O>({
      concurrency: this.config.concurrency,
      probe: (candidate) => strategy.probe(candidate),
      token: this.token,
    });
    const aggregator = new ResultAggregator<C, O>({
      strategy,
      token: this.token,
      progress,
      exitOnConnectionErrors: this.config.exitOnConnectionErrors,
    });

    const [dispatch, report] = await Promise.all([
      dispatcher.run(strategy.generate(), channel),
      aggregator.consume(channel, total),
    ]);

    const endTime = new Date();
    const results: ScanResults<O> = {
      mode: strategy.mode,
      target: this.config.url,
      results: report.results,
      stats: {
        total,
        dispatched: dispatch.dispatched,
        completed: report.completed,
        accepted: report.results.length,
        startTime: report.startTime,
        endTime,
        durationMs: endTime.getTime() - report.startTime.getTime(),
      },
      termination: report.termination,
    };

    logger.info(
      `Finished: ${results.stats.completed}/${total} probes, ${results.stats.accepted} results (${results.termination})`
    );

    const sink =
      this.dependencies.resultSink ??
      (this.config.output ? new JsonFileSink(this.config.output) : undefined);
    if (sink) {
      await sink.save(results);
    }

    return results;
  }
}
