/**
 * Startup errors and per-probe error classification
 */

import type { ProbeError } from './types.js';

/**
 * Base class for fatal errors raised before any probe is dispatched
 */
export class ScanError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Invalid or conflicting configuration
 */
export class ConfigError extends ScanError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

/**
 * A wordlist could not be read
 */
export class WordlistError extends ScanError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('WORDLIST_UNREADABLE', `Specified wordlist cannot be read: ${path} (${reason})`, {
      cause,
    });
    this.path = path;
  }
}

/**
 * The CSRF pre-flight request failed or its pattern did not match
 */
export class CsrfError extends ScanError {
  constructor(message: string, cause?: unknown) {
    super('CSRF_CAPTURE_FAILED', message, cause === undefined ? undefined : { cause });
  }
}

const TIMEOUT_CODES = new Set([
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'ETIMEDOUT',
  'ETIMEOUT',
  'ABORT_ERR',
]);

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
]);

const TLS_CODES = new Set([
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'CERT_HAS_EXPIRED',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'ERR_SSL_WRONG_VERSION_NUMBER',
]);

function readCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Map an error thrown by undici or node:dns to a ProbeError.
 * Walks the `cause` chain because fetch-style errors wrap the socket error.
 */
export function classifyProbeError(error: unknown): ProbeError {
  const message = error instanceof Error ? error.message : String(error);
  let current: unknown = error;

  while (current !== undefined && current !== null) {
    const code = readCode(current);
    const name = current instanceof Error ? current.name : undefined;

    if ((code && TIMEOUT_CODES.has(code)) || name === 'TimeoutError' || name === 'AbortError') {
      return { kind: 'timeout', message, code: code ?? name };
    }
    if (code && CONNECTION_CODES.has(code)) {
      return { kind: 'connection', message, code };
    }
    if (code && (TLS_CODES.has(code) || code.startsWith('ERR_TLS_') || code.startsWith('ERR_SSL_'))) {
      return { kind: 'tls', message, code };
    }

    current = current instanceof Error ? current.cause : undefined;
  }

  return { kind: 'protocol', message, code: readCode(error) };
}
