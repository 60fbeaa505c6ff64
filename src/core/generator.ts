/**
 * Candidate generation for every mode.
 *
 * Generators are lazy: only the wordlists live in memory, never the full
 * candidate sequence (a fuzz run over several lists can be very large).
 * Calling a generator again restarts it from the first word.
 */

import type { DnsCandidate, HttpCandidate, HttpHeader, VhostCandidate } from './types.js';

export const FUZZ_MARKER = 'FUZZ';

export interface PathTemplate {
  url: string;
  method: string;
  body: string;
  headers: readonly HttpHeader[];
  extensions: readonly string[];
  appendSlash: boolean;
}

export interface VhostTemplate {
  url: string;
  domain: string;
  method: string;
  headers: readonly HttpHeader[];
}

export interface FuzzTemplate {
  url: string;
  method: string;
  body: string;
  headers: readonly HttpHeader[];
}

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

function usableExtensions(extensions: readonly string[]): string[] {
  return extensions.map((ext) => ext.trim()).filter((ext) => ext.length > 0);
}

/**
 * Total number of candidates generatePathCandidates yields
 */
export function countPathCandidates(words: readonly string[], template: PathTemplate): number {
  const perWord = 1 + usableExtensions(template.extensions).length + (template.appendSlash ? 1 : 0);
  return words.length * perWord;
}

/**
 * Path mode: bare word, one candidate per extension, then the slash variant
 */
export function* generatePathCandidates(
  words: readonly string[],
  template: PathTemplate
): Generator<HttpCandidate> {
  const base = withTrailingSlash(template.url);
  const extensions = usableExtensions(template.extensions);

  const build = (path: string): HttpCandidate =>
    Object.freeze({
      mode: 'dir',
      url: `${base}${path}`,
      method: template.method,
      body: template.body,
      headers: template.headers,
    });

  for (const word of words) {
    yield build(word);
    for (const ext of extensions) {
      yield build(`${word}.${ext}`);
    }
    if (template.appendSlash) {
      yield build(`${word}/`);
    }
  }
}

/**
 * DNS mode: `word.domain.` as an absolute name
 */
export function* generateDnsCandidates(
  words: readonly string[],
  domain: string
): Generator<DnsCandidate> {
  const zone = domain.replace(/\.+$/, '');
  for (const word of words) {
    yield Object.freeze({ mode: 'dns', domain: `${word}.${zone}.` });
  }
}

/**
 * Vhost mode: same URL every time, host override `word.domain`
 */
export function* generateVhostCandidates(
  words: readonly string[],
  template: VhostTemplate
): Generator<VhostCandidate> {
  for (const word of words) {
    yield Object.freeze({
      mode: 'vhost',
      url: template.url,
      vhost: `${word}.${template.domain}`,
      method: template.method,
      headers: template.headers,
    });
  }
}

/**
 * Marker bound to the wordlist at `index`: FUZZ, FUZZ2, FUZZ3, ...
 */
export function fuzzMarker(index: number): string {
  return index === 0 ? FUZZ_MARKER : `${FUZZ_MARKER}${index + 1}`;
}

/**
 * Pattern matching the markers bound to the first `count` wordlists, longest
 * first so FUZZ12 wins over FUZZ and FUZZ2. Digits after a bound marker stay
 * literal text.
 */
export function markerPattern(count: number): RegExp | undefined {
  if (count <= 0) return undefined;
  const markers = Array.from({ length: count }, (_, index) => fuzzMarker(index)).sort(
    (a, b) => b.length - a.length
  );
  return new RegExp(markers.join('|'), 'g');
}

function replaceMarkers(text: string, pattern: RegExp | undefined, words: readonly string[]): string {
  if (!pattern) return text;
  return text.replace(pattern, (marker) => {
    const index = marker === FUZZ_MARKER ? 0 : Number(marker.slice(FUZZ_MARKER.length)) - 1;
    return words[index] ?? marker;
  });
}

/**
 * Replace every bound marker in a single pass so substituted words are never
 * expanded again. Markers without a wordlist stay as they are.
 */
export function substituteMarkers(text: string, words: readonly string[]): string {
  return replaceMarkers(text, markerPattern(words.length), words);
}

/**
 * True when `text` contains a marker bound to one of the first `count` wordlists
 */
export function hasMarker(text: string, count: number): boolean {
  const pattern = markerPattern(count);
  return pattern !== undefined && text.search(pattern) !== -1;
}

/**
 * Size of the cartesian product of all wordlists
 */
export function countFuzzCandidates(wordlists: readonly (readonly string[])[]): number {
  if (wordlists.length === 0) return 0;
  return wordlists.reduce((total, list) => total * list.length, 1);
}

function* product(
  wordlists: readonly (readonly string[])[],
  depth: number,
  prefix: string[]
): Generator<string[]> {
  if (depth === wordlists.length) {
    yield [...prefix];
    return;
  }
  for (const word of wordlists[depth]) {
    prefix.push(word);
    yield* product(wordlists, depth + 1, prefix);
    prefix.pop();
  }
}

/**
 * Fuzz mode: cartesian product across wordlists, first list outermost
 */
export function* generateFuzzCandidates(
  wordlists: readonly (readonly string[])[],
  template: FuzzTemplate
): Generator<HttpCandidate> {
  if (wordlists.length === 0) return;

  const pattern = markerPattern(wordlists.length);
  for (const words of product(wordlists, 0, [])) {
    yield Object.freeze({
      mode: 'fuzz',
      url: replaceMarkers(template.url, pattern, words),
      method: template.method,
      body: replaceMarkers(template.body, pattern, words),
      headers: template.headers.map(
        ([name, value]): HttpHeader => [
          replaceMarkers(name, pattern, words),
          replaceMarkers(value, pattern, words),
        ]
      ),
    });
  }
}
