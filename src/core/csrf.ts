/**
 * CSRF token capture and replay (fuzz mode)
 */

import { CsrfError } from './errors.js';
import { logger } from '../utils/logger.js';
import type { HttpProber } from './probe.js';
import type { CsrfConfig, HttpCandidate, HttpHeader } from './types.js';

export const CSRF_MARKER = 'CSRFCSRF';

/**
 * Token captured once before dispatch and shared read-only by every worker
 */
export class CsrfContext {
  readonly token: string | undefined;

  private constructor(token: string | undefined) {
    this.token = token;
    Object.freeze(this);
  }

  /**
   * Context for runs without a CSRF pre-flight: `apply` is the identity
   */
  static none(): CsrfContext {
    return new CsrfContext(undefined);
  }

  static of(token: string): CsrfContext {
    return new CsrfContext(token);
  }

  /**
   * GET the configured URL and extract the first capture group of `pattern`
   * from the body. Every failure is fatal; there is no retry.
   */
  static async capture(
    config: CsrfConfig,
    prober: Pick<HttpProber, 'fetchText'>
  ): Promise<CsrfContext> {
    let pattern: RegExp;
    try {
      pattern = new RegExp(config.pattern);
    } catch (error) {
      throw new CsrfError(`Invalid CSRF pattern: ${config.pattern}`, error);
    }

    let body: string;
    try {
      ({ body } = await prober.fetchText(config.url, config.headers));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CsrfError(`Unable to fetch CSRF token from ${config.url}: ${reason}`, error);
    }

    const match = pattern.exec(body);
    if (!match) {
      throw new CsrfError(`CSRF pattern ${config.pattern} did not match the response of ${config.url}`);
    }

    const token = match[1];
    if (token === undefined) {
      throw new CsrfError(`CSRF pattern ${config.pattern} has no capture group`);
    }

    logger.info(`Captured CSRF token: ${token}`);
    return new CsrfContext(token);
  }

  /**
   * Replace every CSRF marker with the captured token
   */
  apply(text: string): string {
    if (this.token === undefined) return text;
    return text.split(CSRF_MARKER).join(this.token);
  }

  /**
   * Candidate with the token substituted in URL, headers and body
   */
  applyTo(candidate: HttpCandidate): HttpCandidate {
    if (this.token === undefined) return candidate;
    return Object.freeze({
      ...candidate,
      url: this.apply(candidate.url),
      body: this.apply(candidate.body),
      headers: candidate.headers.map(
        ([name, value]): HttpHeader => [this.apply(name), this.apply(value)]
      ),
    });
  }
}
