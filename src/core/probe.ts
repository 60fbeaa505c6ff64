/**
 * src/core/probe.ts
 *
 * Probe executors. One call = one candidate = one outcome; every failure is
 * captured into `outcome.error`, nothing here rejects.
 */

import { promises as dns } from 'dns';
import { request, type Dispatcher } from 'undici';
import { CacheManager } from './cache.js';
import { classifyProbeError } from './errors.js';
import { logger } from '../utils/logger.js';
import { createHttpAgent, headerValue, isHttpMethod, toUndiciHeaders } from '../utils/http.js';
import type {
  DnsCandidate,
  DnsOutcome,
  HttpCandidate,
  HttpHeader,
  HttpOutcome,
  ProbeError,
  ResolvedAddress,
  VhostCandidate,
  VhostOutcome,
} from './types.js';

export interface HttpProberOptions {
  timeout: number;
  userAgent: string;
  /** Disables TLS certificate validation for this prober's agent */
  ignoreCertificate?: boolean;
  /** Keep response bodies of dir/fuzz probes (needed by body filters) */
  captureBody?: boolean;
  /** Connection cap for the owned agent */
  connections?: number;
  /** Use this dispatcher instead of creating an agent (not closed by the prober) */
  dispatcher?: Dispatcher;
}

interface RawResponse {
  statusCode: number;
  location?: string;
  body?: string;
}

/**
 * HTTP prober for dir, fuzz and vhost modes
 */
export class HttpProber {
  private readonly timeout: number;
  private readonly userAgent: string;
  private readonly captureBody: boolean;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;

  constructor(options: HttpProberOptions) {
    this.timeout = options.timeout;
    this.userAgent = options.userAgent;
    this.captureBody = options.captureBody ?? false;

    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
      this.ownsDispatcher = false;
    } else {
      if (options.ignoreCertificate) {
        logger.warn('TLS certificate validation is disabled');
      }
      this.dispatcher = createHttpAgent({
        ignoreCertificate: options.ignoreCertificate,
        connections: options.connections,
        timeout: options.timeout,
      });
      this.ownsDispatcher = true;
    }
  }

  /**
   * Dir/fuzz probe: status code, redirect target and (optionally) the body
   */
  async probe(candidate: HttpCandidate): Promise<HttpOutcome> {
    const start = Date.now();
    const outcome: HttpOutcome = {
      mode: candidate.mode,
      method: candidate.method,
      url: candidate.url,
      body: candidate.body,
      headers: candidate.headers,
      elapsed: 0,
    };

    try {
      const response = await this.send(
        candidate.url,
        candidate.method,
        candidate.headers,
        candidate.body,
        this.captureBody
      );
      outcome.statusCode = response.statusCode;
      if (response.location !== undefined) outcome.location = response.location;
      if (response.body !== undefined) outcome.bodyExcerpt = response.body;
    } catch (error) {
      outcome.error = this.describeFailure(candidate.url, error);
    }

    outcome.elapsed = Date.now() - start;
    return outcome;
  }

  /**
   * Vhost probe: target URL with a host override; the body decides `ignored`
   */
  async probeVhost(candidate: VhostCandidate, ignoreStrings: readonly string[]): Promise<VhostOutcome> {
    const start = Date.now();
    const outcome: VhostOutcome = {
      mode: 'vhost',
      method: candidate.method,
      url: candidate.url,
      vhost: candidate.vhost,
      ignored: false,
      elapsed: 0,
    };

    try {
      const response = await this.send(
        candidate.url,
        candidate.method,
        [...candidate.headers, ['host', candidate.vhost]],
        '',
        true
      );
      const body = response.body ?? '';
      outcome.statusCode = response.statusCode;
      outcome.ignored = ignoreStrings.some((needle) => body.includes(needle));
    } catch (error) {
      outcome.error = this.describeFailure(`${candidate.url} (${candidate.vhost})`, error);
    }

    outcome.elapsed = Date.now() - start;
    return outcome;
  }

  /**
   * Plain GET returning status and body text. Unlike the probes, this throws.
   */
  async fetchText(
    url: string,
    headers: readonly HttpHeader[] = []
  ): Promise<{ statusCode: number; body: string }> {
    const response = await this.send(url, 'GET', headers, '', true);
    return { statusCode: response.statusCode, body: response.body ?? '' };
  }

  /**
   * Close the agent and cleanup connections
   */
  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private async send(
    url: string,
    method: string,
    headers: readonly HttpHeader[],
    body: string,
    readBody: boolean
  ): Promise<RawResponse> {
    if (!isHttpMethod(method)) {
      throw new Error(`Unsupported HTTP method: ${method}`);
    }

    const response = await request(url, {
      method,
      headers: toUndiciHeaders([['user-agent', this.userAgent], ...headers]),
      body: body.length > 0 ? body : undefined,
      dispatcher: this.dispatcher,
      maxRedirections: 0,
      headersTimeout: this.timeout,
      bodyTimeout: this.timeout,
      signal: AbortSignal.timeout(this.timeout),
      throwOnError: false,
    });

    const statusCode = response.statusCode;
    const location =
      statusCode >= 300 && statusCode < 400 ? headerValue(response.headers.location) : undefined;

    if (readBody) {
      return { statusCode, location, body: await response.body.text() };
    }

    // free the socket without buffering the body
    await response.body.dump();
    return { statusCode, location };
  }

  private describeFailure(target: string, error: unknown): ProbeError {
    const failure = classifyProbeError(error);
    logger.debug(`probe ${target} -> ${failure.kind}: ${failure.message}`);
    return failure;
  }
}

/**
 * The subset of node:dns Resolver the DNS prober needs
 */
export interface DnsResolver {
  resolve4(hostname: string): Promise<string[]>;
  resolve6(hostname: string): Promise<string[]>;
}

export interface DnsProberOptions {
  timeout: number;
  resolver?: DnsResolver;
  cacheSize?: number;
}

/** Answers that mean "this name has no such record", not "the lookup failed" */
const NOT_RESOLVED_CODES = new Set([
  'ENOTFOUND',
  'ENODATA',
  'ESERVFAIL',
  'ENONAME',
  'EREFUSED',
  'EBADNAME',
]);

type LookupResult = { addresses: string[] } | { error: unknown };

/**
 * DNS prober: A and AAAA lookups for one absolute name
 */
export class DnsProber {
  private readonly resolver: DnsResolver;
  private readonly cache: CacheManager<ResolvedAddress[]>;

  constructor(options: DnsProberOptions) {
    this.resolver = options.resolver ?? new dns.Resolver({ timeout: options.timeout, tries: 1 });
    this.cache = new CacheManager<ResolvedAddress[]>(options.cacheSize ?? 5000, 3600000);
  }

  async probe(candidate: DnsCandidate): Promise<DnsOutcome> {
    const start = Date.now();
    const outcome: DnsOutcome = {
      mode: 'dns',
      domain: candidate.domain,
      resolved: false,
      addresses: [],
      elapsed: 0,
    };

    try {
      const addresses = await this.cache.getOrSet(`dns:${candidate.domain}`, () =>
        this.resolve(candidate.domain)
      );
      outcome.addresses = addresses;
      outcome.resolved = addresses.length > 0;
    } catch (error) {
      outcome.error = { ...classifyProbeError(error), kind: 'dns' };
      logger.debug(`resolve ${candidate.domain} -> ${outcome.error.message}`);
    }

    outcome.elapsed = Date.now() - start;
    return outcome;
  }

  private async lookup(query: (name: string) => Promise<string[]>, name: string): Promise<LookupResult> {
    try {
      return { addresses: await query(name) };
    } catch (error) {
      return { error };
    }
  }

  /**
   * Resolves both families. Throws only when a lookup failed for a reason
   * other than the record not existing.
   */
  private async resolve(name: string): Promise<ResolvedAddress[]> {
    const [v4, v6] = await Promise.all([
      this.lookup((host) => this.resolver.resolve4(host), name),
      this.lookup((host) => this.resolver.resolve6(host), name),
    ]);

    const addresses: ResolvedAddress[] = [];
    const failures: unknown[] = [];

    for (const [family, result] of [
      [4, v4],
      [6, v6],
    ] as const) {
      if ('addresses' in result) {
        addresses.push(...result.addresses.map((address) => ({ family, address })));
      } else if (!isNotResolved(result.error)) {
        failures.push(result.error);
      }
    }

    if (addresses.length === 0 && failures.length > 0) {
      throw failures[0];
    }
    return addresses;
  }
}

function isNotResolved(error: unknown): boolean {
  const code = classifyProbeError(error).code;
  return code !== undefined && NOT_RESOLVED_CODES.has(code);
}
