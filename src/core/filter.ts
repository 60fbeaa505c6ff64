/**
 * Result filtering: status codes and body substrings
 */

import { ConfigError } from './errors.js';
import { logger } from '../utils/logger.js';
import type { FilterPolicy } from './types.js';

export interface FilterOptions {
  includeStatusCodes?: readonly string[];
  ignoreStatusCodes?: readonly string[];
  includeStrings?: readonly string[];
  ignoreStrings?: readonly string[];
}

const STATUS_CODE = /^[1-9]\d{2}$/;

/**
 * Normalise status code arguments: comma lists are split, empty tokens
 * dropped, invalid codes dropped with a warning.
 */
export function parseStatusCodes(values: readonly string[], flag: string): string[] {
  const codes: string[] = [];
  for (const token of values.flatMap((value) => value.split(','))) {
    const code = token.trim();
    if (!code) continue;
    if (!STATUS_CODE.test(code)) {
      logger.warn(`Ignoring invalid status code for '${flag}' param: ${code}`);
      continue;
    }
    codes.push(code);
  }
  return codes;
}

/**
 * Build a policy. Include and exclude rules on the same axis are exclusive.
 */
export function createFilterPolicy(options: FilterOptions = {}): FilterPolicy {
  const includeCodes = new Set(options.includeStatusCodes ?? []);
  const excludeCodes = new Set(options.ignoreStatusCodes ?? []);
  const includeBody = (options.includeStrings ?? []).filter((s) => s.length > 0);
  const excludeBody = (options.ignoreStrings ?? []).filter((s) => s.length > 0);

  if (includeCodes.size > 0 && excludeCodes.size > 0) {
    throw new ConfigError('Include and ignore status codes cannot be used together');
  }
  if (includeBody.length > 0 && excludeBody.length > 0) {
    throw new ConfigError('Include and ignore strings cannot be used together');
  }

  return Object.freeze({ includeCodes, excludeCodes, includeBody, excludeBody });
}

/**
 * True when the policy needs response bodies
 */
export function hasBodyRules(policy: FilterPolicy): boolean {
  return policy.includeBody.length > 0 || policy.excludeBody.length > 0;
}

export function acceptsStatus(policy: FilterPolicy, statusCode: number): boolean {
  const status = String(statusCode);
  if (policy.includeCodes.size > 0) {
    return policy.includeCodes.has(status);
  }
  return !policy.excludeCodes.has(status);
}

export function acceptsBody(policy: FilterPolicy, body: string | undefined): boolean {
  if (!hasBodyRules(policy)) {
    return true;
  }
  const text = body ?? '';
  if (policy.includeBody.length > 0) {
    return policy.includeBody.some((needle) => text.includes(needle));
  }
  return !policy.excludeBody.some((needle) => text.includes(needle));
}

/**
 * Pure acceptance predicate over (status, body)
 */
export function acceptsResponse(
  policy: FilterPolicy,
  statusCode: number,
  body: string | undefined
): boolean {
  return acceptsStatus(policy, statusCode) && acceptsBody(policy, body);
}
