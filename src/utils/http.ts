/**
 * HTTP utilities with connection pooling
 */

import { Agent } from 'undici';
import type { HttpHeader } from '../core/types.js';

export interface HttpAgentOptions {
  /** Skip TLS certificate validation. Off unless explicitly requested. */
  ignoreCertificate?: boolean;
  /** Connection cap per origin, usually the worker count */
  connections?: number;
  timeout?: number;
}

/**
 * Create a persistent HTTP agent with connection pooling
 */
export function createHttpAgent(options: HttpAgentOptions = {}): Agent {
  return new Agent({
    connections: options.connections ?? 100,
    keepAliveTimeout: 10000,
    keepAliveMaxTimeout: 60000,
    connect: {
      rejectUnauthorized: !options.ignoreCertificate,
      timeout: options.timeout,
    },
  });
}

export const HTTP_METHODS = [
  'GET',
  'HEAD',
  'POST',
  'PUT',
  'DELETE',
  'CONNECT',
  'OPTIONS',
  'TRACE',
  'PATCH',
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export function isHttpMethod(method: string): method is HttpMethod {
  return HTTP_METHODS.some((known) => known === method);
}

/**
 * Parse URL safely
 */
export function parseUrl(urlString: string): URL | null {
  try {
    return new URL(urlString);
  } catch {
    return null;
  }
}

/**
 * True for absolute http:// or https:// URLs
 */
export function isHttpUrl(urlString: string): boolean {
  const url = parseUrl(urlString);
  return url !== null && (url.protocol === 'http:' || url.protocol === 'https:');
}

/**
 * Split a `Name: value` header argument. The value may itself contain colons.
 */
export function splitHttpHeader(raw: string): HttpHeader {
  const separator = raw.indexOf(':');
  if (separator === -1) {
    return [raw.trim(), ''];
  }
  return [raw.slice(0, separator).trim(), raw.slice(separator + 1).trim()];
}

/**
 * Flatten header pairs into the array form undici accepts, keeping duplicates
 */
export function toUndiciHeaders(headers: readonly HttpHeader[]): string[] {
  return headers.flatMap(([name, value]) => [name, value]);
}

/**
 * First value of a response header
 */
export function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}
