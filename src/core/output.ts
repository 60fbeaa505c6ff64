/**
 * Result persistence
 */

import { writeFile } from 'fs/promises';
import { logger } from '../utils/logger.js';
import type { ResultSink, ScanResults } from './types.js';

/**
 * Format results as JSON
 */
export function formatJSON(results: ScanResults): string {
  return JSON.stringify(
    {
      mode: results.mode,
      target: results.target,
      termination: results.termination,
      stats: results.stats,
      results: results.results,
    },
    null,
    2
  );
}

/**
 * Writes the accepted results to a JSON file, once per run
 */
export class JsonFileSink implements ResultSink {
  private readonly path: string;
  private written = false;

  constructor(path: string) {
    this.path = path;
  }

  async save(results: ScanResults): Promise<void> {
    if (this.written) {
      throw new Error(`Results were already written to ${this.path}`);
    }
    this.written = true;
    await writeFile(this.path, formatJSON(results), 'utf-8');
    logger.success(`Results exported to: ${this.path}`);
  }
}
