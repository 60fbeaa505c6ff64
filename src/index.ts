/**
 * multibuster - wordlist enumerator for paths, DNS names, virtual hosts and custom fuzzing
 * Main entry point for programmatic usage
 */

import { App, type AppDependencies } from './core/app.js';
import type { ScanConfig, ScanResults } from './core/types.js';

export { App, type AppDependencies } from './core/app.js';
export { ResultAggregator, formatThroughput } from './core/aggregator.js';
export { CancellationToken, type CancellationReason } from './core/cancellation.js';
export { ResultChannel } from './core/channel.js';
export { CsrfContext, CSRF_MARKER } from './core/csrf.js';
export { Dispatcher, DEFAULT_CONCURRENCY } from './core/dispatcher.js';
export * from './core/errors.js';
export * from './core/filter.js';
export * from './core/generator.js';
export * from './core/modes.js';
export { JsonFileSink, formatJSON } from './core/output.js';
export { DnsProber, HttpProber, type DnsResolver } from './core/probe.js';
export { loadWordlist, loadWordlists, parseWordlist } from './core/wordlist.js';
export { ConsoleProgress, SilentProgress } from './utils/progress.js';
export * from './core/types.js';

/**
 * Version information
 */
export const VERSION = '1.0.0';

/**
 * Run a scan without the CLI
 * @example
 * ```typescript
 * import { scan } from 'multibuster';
 *
 * const results = await scan({
 *   mode: 'dir',
 *   url: 'http://localhost:3000/',
 *   wordlists: ['words.txt'],
 *   extensions: ['php'],
 *   appendSlash: false,
 *   // ...remaining CommonScanConfig fields
 * });
 * ```
 */
export async function scan(
  config: ScanConfig,
  dependencies: AppDependencies = {}
): Promise<ScanResults> {
  return await new App(config, dependencies).run();
}
