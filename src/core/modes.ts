/**
 * Mode strategies: the only place where the four modes differ.
 * The driver loop works with any `ModeStrategy`.
 */

import type { CsrfContext } from './csrf.js';
import { acceptsResponse } from './filter.js';
import {
  countFuzzCandidates,
  countPathCandidates,
  generateDnsCandidates,
  generateFuzzCandidates,
  generatePathCandidates,
  generateVhostCandidates,
  hasMarker,
  type FuzzTemplate,
  type PathTemplate,
  type VhostTemplate,
} from './generator.js';
import type { DnsProber, HttpProber } from './probe.js';
import type {
  DnsCandidate,
  DnsOutcome,
  FilterPolicy,
  HttpCandidate,
  HttpOutcome,
  ProbeOutcome,
  ScanMode,
  VhostCandidate,
  VhostOutcome,
} from './types.js';

export interface ModeStrategy<C, O extends ProbeOutcome> {
  readonly mode: ScanMode;
  /** Number of candidates `generate` yields */
  count(): number;
  generate(): Iterable<C>;
  probe(candidate: C): Promise<O>;
  /** Pure predicate over an error-free outcome */
  accept(outcome: O): boolean;
  /** Deduplication key of an accepted outcome */
  identity(outcome: O): string;
  /** Human-readable lines for an accepted outcome */
  render(outcome: O): string[];
}

/**
 * Tabs between status and target, so targets line up in a terminal
 */
function padStatus(status: string): string {
  switch (Math.floor(status.length / 8)) {
    case 0:
      return '\t'.repeat(4);
    case 1:
      return '\t'.repeat(3);
    case 2:
      return '\t'.repeat(2);
    case 3:
      return '\t';
    default:
      return '';
  }
}

function statusLabel(statusCode: number | undefined): string {
  return statusCode === undefined ? '-' : String(statusCode);
}

/**
 * `shownHeaders` are positions in `outcome.headers` printed after the body,
 * the headers that carried fuzz markers.
 */
export function renderHttpOutcome(
  outcome: HttpOutcome,
  shownHeaders: readonly number[] = []
): string[] {
  const status = statusLabel(outcome.statusCode);
  let line = `${outcome.method}\t${status}${padStatus(status)}${outcome.url}`;
  if (outcome.mode === 'fuzz' && outcome.body.length > 0) {
    line += `\t${outcome.body}`;
  }
  for (const index of shownHeaders) {
    const header = outcome.headers[index];
    if (header) {
      line += `\t${header[0]}: ${header[1]}`;
    }
  }
  const lines = [line];
  if (outcome.location) {
    lines.push(`\t\t\t\t\t\t=> ${outcome.location}`);
  }
  return lines;
}

export function renderDnsOutcome(outcome: DnsOutcome): string[] {
  const name = outcome.domain.replace(/\.$/, '');
  return [
    `OK\t${name}`,
    ...outcome.addresses.map(({ family, address }) => `\t\tIPv${family}: ${address}`),
  ];
}

export function renderVhostOutcome(outcome: VhostOutcome): string[] {
  const status = statusLabel(outcome.statusCode);
  return [`${outcome.method}\t${status}${padStatus(status)}${outcome.vhost}`];
}

export function createDirStrategy(
  words: readonly string[],
  template: PathTemplate,
  prober: HttpProber,
  policy: FilterPolicy
): ModeStrategy<HttpCandidate, HttpOutcome> {
  return {
    mode: 'dir',
    count: () => countPathCandidates(words, template),
    generate: () => generatePathCandidates(words, template),
    probe: (candidate) => prober.probe(candidate),
    accept: (outcome) =>
      outcome.statusCode !== undefined &&
      acceptsResponse(policy, outcome.statusCode, outcome.bodyExcerpt),
    identity: (outcome) => `${outcome.method} ${statusLabel(outcome.statusCode)} ${outcome.url}`,
    render: (outcome) => renderHttpOutcome(outcome),
  };
}

export function createDnsStrategy(
  words: readonly string[],
  domain: string,
  prober: DnsProber
): ModeStrategy<DnsCandidate, DnsOutcome> {
  return {
    mode: 'dns',
    count: () => words.length,
    generate: () => generateDnsCandidates(words, domain),
    probe: (candidate) => prober.probe(candidate),
    accept: (outcome) => outcome.resolved,
    identity: (outcome) => outcome.domain,
    render: renderDnsOutcome,
  };
}

export function createVhostStrategy(
  words: readonly string[],
  template: VhostTemplate,
  prober: HttpProber,
  ignoreStrings: readonly string[]
): ModeStrategy<VhostCandidate, VhostOutcome> {
  return {
    mode: 'vhost',
    count: () => words.length,
    generate: () => generateVhostCandidates(words, template),
    probe: (candidate) => prober.probeVhost(candidate, ignoreStrings),
    accept: (outcome) => outcome.statusCode !== undefined && !outcome.ignored,
    identity: (outcome) => outcome.vhost,
    render: renderVhostOutcome,
  };
}

export function createFuzzStrategy(
  wordlists: readonly (readonly string[])[],
  template: FuzzTemplate,
  prober: HttpProber,
  policy: FilterPolicy,
  csrf: CsrfContext
): ModeStrategy<HttpCandidate, HttpOutcome> {
  const fuzzedHeaders = template.headers.flatMap(([name, value], index) =>
    hasMarker(name, wordlists.length) || hasMarker(value, wordlists.length) ? [index] : []
  );

  return {
    mode: 'fuzz',
    count: () => countFuzzCandidates(wordlists),
    generate: () => generateFuzzCandidates(wordlists, template),
    probe: (candidate) => prober.probe(csrf.applyTo(candidate)),
    accept: (outcome) =>
      outcome.statusCode !== undefined &&
      acceptsResponse(policy, outcome.statusCode, outcome.bodyExcerpt),
    identity: (outcome) =>
      [
        outcome.method,
        statusLabel(outcome.statusCode),
        outcome.url,
        outcome.body,
        JSON.stringify(outcome.headers),
      ].join(' '),
    render: (outcome) => renderHttpOutcome(outcome, fuzzedHeaders),
  };
}
