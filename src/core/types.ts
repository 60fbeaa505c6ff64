// src/core/types.ts
/**
 * Type definitions for multibuster
 */

/**
 * Enumeration modes
 */
export type ScanMode = 'dir' | 'dns' | 'vhost' | 'fuzz';

/**
 * HTTP header as a name/value pair. Order and duplicates are preserved.
 */
export type HttpHeader = readonly [name: string, value: string];

/**
 * Settings shared by every mode
 */
export interface CommonScanConfig {
  url: string;
  wordlists: string[];
  concurrency: number;
  timeout: number;
  ignoreCertificate: boolean;
  exitOnConnectionErrors: boolean;
  userAgent: string;
  method: string;
  body: string;
  headers: HttpHeader[];
  includeStatusCodes: string[];
  ignoreStatusCodes: string[];
  includeStrings: string[];
  ignoreStrings: string[];
  output?: string;
  verbosity: number;
  quiet: boolean;
}

export interface DirScanConfig extends CommonScanConfig {
  mode: 'dir';
  extensions: string[];
  appendSlash: boolean;
}

export interface DnsScanConfig extends CommonScanConfig {
  mode: 'dns';
}

export interface VhostScanConfig extends CommonScanConfig {
  mode: 'vhost';
  domain: string;
}

/**
 * Pre-flight request used to capture a CSRF token
 */
export interface CsrfConfig {
  url: string;
  pattern: string;
  headers: HttpHeader[];
}

export interface FuzzScanConfig extends CommonScanConfig {
  mode: 'fuzz';
  csrf?: CsrfConfig;
}

/**
 * Application configuration, already validated by the CLI
 */
export type ScanConfig = DirScanConfig | DnsScanConfig | VhostScanConfig | FuzzScanConfig;

/**
 * One HTTP request to perform (dir and fuzz modes)
 */
export interface HttpCandidate {
  readonly mode: 'dir' | 'fuzz';
  readonly url: string;
  readonly method: string;
  readonly body: string;
  readonly headers: readonly HttpHeader[];
}

/**
 * One absolute domain name to resolve
 */
export interface DnsCandidate {
  readonly mode: 'dns';
  readonly domain: string;
}

/**
 * One virtual host to try against the target URL
 */
export interface VhostCandidate {
  readonly mode: 'vhost';
  readonly url: string;
  readonly vhost: string;
  readonly method: string;
  readonly headers: readonly HttpHeader[];
}

export type Candidate = HttpCandidate | DnsCandidate | VhostCandidate;

/**
 * Failure of a single probe. Never thrown, always carried by the outcome.
 */
export interface ProbeError {
  kind: 'connection' | 'timeout' | 'tls' | 'dns' | 'protocol';
  message: string;
  code?: string;
}

interface OutcomeBase {
  /** Milliseconds spent on the probe */
  elapsed: number;
  error?: ProbeError;
}

export interface HttpOutcome extends OutcomeBase {
  mode: 'dir' | 'fuzz';
  method: string;
  url: string;
  /** Request body as sent, placeholders already substituted */
  body: string;
  /** Request headers as sent, placeholders already substituted */
  headers: readonly HttpHeader[];
  statusCode?: number;
  bodyExcerpt?: string;
  location?: string;
}

export interface ResolvedAddress {
  family: 4 | 6;
  address: string;
}

export interface DnsOutcome extends OutcomeBase {
  mode: 'dns';
  domain: string;
  resolved: boolean;
  addresses: ResolvedAddress[];
}

export interface VhostOutcome extends OutcomeBase {
  mode: 'vhost';
  method: string;
  url: string;
  vhost: string;
  statusCode?: number;
  ignored: boolean;
}

export type ProbeOutcome = HttpOutcome | DnsOutcome | VhostOutcome;

/**
 * Include/exclude rules applied to HTTP outcomes
 */
export interface FilterPolicy {
  includeCodes: ReadonlySet<string>;
  excludeCodes: ReadonlySet<string>;
  includeBody: readonly string[];
  excludeBody: readonly string[];
}

/**
 * Why a run stopped
 */
export type TerminationReason = 'completed' | 'unreachable' | 'connection-error' | 'interrupted';

/**
 * Run statistics
 */
export interface RunStats {
  total: number;
  dispatched: number;
  completed: number;
  accepted: number;
  startTime: Date;
  endTime: Date;
  durationMs: number;
}

/**
 * Complete scan results
 */
export interface ScanResults<O extends ProbeOutcome = ProbeOutcome> {
  mode: ScanMode;
  target: string;
  results: O[];
  stats: RunStats;
  termination: TerminationReason;
}

export type OutputStream = 'stdout' | 'stderr';

/**
 * Receives progress events from the aggregator
 */
export interface ProgressSink {
  start(total: number): void;
  advance(): void;
  setThroughput(label: string): void;
  /** Print a line without corrupting the progress display */
  println(line: string, stream?: OutputStream): void;
  finish(): void;
}

/**
 * Receives the accepted results once, at the end of a run
 */
export interface ResultSink {
  save(results: ScanResults): Promise<void>;
}

/**
 * Cache entry
 */
export interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * Logger levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
