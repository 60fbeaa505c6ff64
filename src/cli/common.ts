/**
 * Options and run loop shared by every scan command
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { App } from '../core/app.js';
import { DEFAULT_CONCURRENCY } from '../core/dispatcher.js';
import { parseStatusCodes } from '../core/filter.js';
import { logger, type LogWriter } from '../utils/logger.js';
import { ConsoleProgress, SilentProgress, formatElapsed } from '../utils/progress.js';
import { isHttpMethod, isHttpUrl, splitHttpHeader } from '../utils/http.js';
import type { CommonScanConfig, ProgressSink, ScanConfig, ScanResults } from '../core/types.js';

export const DEFAULTS = {
  threads: DEFAULT_CONCURRENCY,
  timeout: 10000,
  userAgent: 'multibuster',
  method: 'GET',
  ignoreStatusCodes: ['404'],
} as const;

/**
 * Raw option values as commander hands them over
 */
export type CommonOptions = {
  url: string;
  wordlist: string[];
  threads: number;
  timeout: number;
  ignoreCertificate: boolean;
  exitOnError: boolean;
  output?: string;
  banner: boolean;
  progressBar: boolean;
  httpMethod: string;
  httpBody: string;
  httpHeader: string[];
  userAgent: string;
  includeStatusCodes?: string[];
  ignoreStatusCodes?: string[];
  ignoreString: string[];
  includeString: string[];
  verbose: number;
  quiet: boolean;
};

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
}

export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Repeatable option that also accepts comma separated lists
 */
export function collectList(value: string, previous: string[] = []): string[] {
  return [...previous, ...value.split(',').map((v) => v.trim())];
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

/**
 * Register the options every mode understands
 */
export function addCommonOptions(command: Command): Command {
  return command
    .requiredOption('-u, --url <url>', 'Target URL (domain in dns mode)')
    .requiredOption('-w, --wordlist <path>', 'Wordlist file (repeatable)', collectList)
    .option('-t, --threads <number>', 'Concurrent requests', parsePositiveInt, DEFAULTS.threads)
    .option('--timeout <ms>', 'Per-request timeout in milliseconds', parsePositiveInt, DEFAULTS.timeout)
    .option('-k, --ignore-certificate', 'Disable TLS certificate validation', false)
    .option('-K, --exit-on-error', 'Exit on connection errors', false)
    .option('-o, --output <file>', 'Save the results as JSON')
    .option('--no-banner', 'Skip the initial banner')
    .option('--no-progress-bar', 'Disable the progress bar')
    .option('-X, --http-method <method>', 'HTTP method', DEFAULTS.method)
    .option('-b, --http-body <body>', 'HTTP request body', '')
    .option('-H, --http-header <header>', 'Append an HTTP header "Name: value" (repeatable)', collect, [])
    .option('-a, --user-agent <agent>', 'User-Agent header', DEFAULTS.userAgent)
    .option('-s, --include-status-codes <codes>', 'Status codes to include', collectList)
    .option('-S, --ignore-status-codes <codes>', 'Status codes to ignore (default: 404)', collectList)
    .option('-x, --ignore-string <text>', 'Ignore results whose body contains text (repeatable)', collect, [])
    .option('-i, --include-string <text>', 'Include results whose body contains text (repeatable)', collect, [])
    .option('-v, --verbose', 'Increase verbosity (repeatable)', increaseVerbosity, 0)
    .option('-q, --quiet', 'Suppress log output', false);
}

/**
 * Validate domain format
 */
export function isValidDomain(domain: string): boolean {
  const domainRegex = /^(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]{2,}\.?$/;
  return domainRegex.test(domain);
}

/**
 * Turn raw options into the validated part of the config every mode shares
 */
export function buildCommonConfig(options: CommonOptions, requireHttpUrl: boolean): CommonScanConfig {
  if (requireHttpUrl && !isHttpUrl(options.url)) {
    throw new Error(
      `Invalid URL: ${options.url}, only http:// or https:// URLs are supported`
    );
  }
  if (!requireHttpUrl && !isValidDomain(options.url)) {
    throw new Error(`Invalid domain: ${options.url}`);
  }

  const wordlists = options.wordlist.filter((path) => path.length > 0);
  if (wordlists.length === 0) {
    throw new Error('At least one wordlist is required (-w)');
  }

  const method = options.httpMethod.toUpperCase();
  if (!isHttpMethod(method)) {
    throw new Error(`Unsupported HTTP method: ${options.httpMethod}`);
  }

  const includeStatusCodes = parseStatusCodes(options.includeStatusCodes ?? [], '-s');
  const ignoreStatusCodes =
    options.ignoreStatusCodes !== undefined
      ? parseStatusCodes(options.ignoreStatusCodes, '-S')
      : options.includeStatusCodes !== undefined
        ? []
        : [...DEFAULTS.ignoreStatusCodes];

  return {
    url: options.url,
    wordlists,
    concurrency: options.threads,
    timeout: options.timeout,
    ignoreCertificate: options.ignoreCertificate,
    exitOnConnectionErrors: options.exitOnError,
    userAgent: options.userAgent,
    method,
    body: options.httpBody,
    headers: options.httpHeader.map(splitHttpHeader),
    includeStatusCodes,
    ignoreStatusCodes,
    includeStrings: options.includeString,
    ignoreStrings: options.ignoreString,
    output: options.output,
    verbosity: options.verbose,
    quiet: options.quiet,
  };
}

function printBanner(): void {
  console.log(
    chalk.cyan.bold('\n╔════════════════════════════════════════════════════════════╗\n') +
      chalk.cyan.bold('║                      MULTIBUSTER                           ║\n') +
      chalk.cyan.bold('╚════════════════════════════════════════════════════════════╝\n')
  );
}

function printConfiguration(config: ScanConfig): void {
  console.log(
    chalk.bold('   Target') + chalk.gray(' ──▶ ') + chalk.cyan.bold(config.url) + chalk.gray(` (${config.mode})\n`)
  );
  console.log(chalk.dim('   Configuration'));
  console.log(chalk.gray('   ├─ Threads          : ') + chalk.white.bold(String(config.concurrency)));
  console.log(chalk.gray('   ├─ Timeout          : ') + chalk.white(`${config.timeout}ms`));
  console.log(chalk.gray('   ├─ Wordlists        : ') + chalk.white(config.wordlists.join(chalk.gray(', '))));
  if (config.ignoreCertificate) {
    console.log(chalk.gray('   ├─ TLS validation   : ') + chalk.red.bold('Disabled'));
  }
  if (config.output) {
    console.log(chalk.gray('   ├─ Output File      : ') + chalk.blue(config.output));
  }
  console.log(chalk.gray('   └─ Started          : ') + chalk.white(new Date().toLocaleString()));
  console.log();
}

function printSummary(results: ScanResults): void {
  const { stats } = results;
  const stopped =
    results.termination === 'completed'
      ? chalk.green('completed')
      : chalk.yellow(`stopped early (${results.termination})`);

  console.log(chalk.bold('\n   Results Summary'));
  console.log(chalk.gray('   ├─ Found              : ') + chalk.cyan.bold(String(stats.accepted)));
  console.log(
    chalk.gray('   ├─ Requests           : ') + chalk.white(`${stats.completed}/${stats.total}`)
  );
  console.log(chalk.gray('   ├─ Duration           : ') + chalk.white(formatElapsed(stats.durationMs)));
  console.log(chalk.gray('   ├─ Run                : ') + stopped);
  console.log(chalk.gray('   └─ Finished           : ') + chalk.white(stats.endTime.toLocaleString()));
  console.log();
}

/**
 * Route log lines through the progress display, warnings and errors on stderr
 */
export function progressWriter(progress: ProgressSink): LogWriter {
  return (line, level) =>
    progress.println(line, level === 'warn' || level === 'error' ? 'stderr' : 'stdout');
}

/**
 * Run one scan from the CLI: banner, progress, SIGINT handling, summary.
 * Returns the exit code.
 */
export async function runScan(config: ScanConfig, options: CommonOptions): Promise<number> {
  logger.setVerbosity(config.verbosity);
  logger.setQuiet(config.quiet);

  if (options.banner && !config.quiet) {
    printBanner();
    printConfiguration(config);
  }

  const progress: ProgressSink =
    options.progressBar && !config.quiet && process.stderr.isTTY
      ? new ConsoleProgress({ drawDelta: config.mode === 'dns' ? 25 : 100 })
      : new SilentProgress({ echo: true });
  logger.setWriter(progressWriter(progress));

  const app = new App(config, { progress });
  const interrupt = () => {
    if (app.token.cancel('interrupted')) {
      logger.warn('Interrupted, waiting for in-flight requests...');
    }
  };
  process.once('SIGINT', interrupt);

  try {
    const results = await app.run();
    if (!config.quiet) {
      printSummary(results);
    }
    return 0;
  } finally {
    process.removeListener('SIGINT', interrupt);
    logger.setWriter(undefined);
  }
}

/**
 * Print a fatal error the way every command does
 */
export function reportFailure(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red.bold('\n   ✘ Scan failed\n'));
  console.error(chalk.red('   Error: ') + chalk.white(message));
  console.error(chalk.dim('\n   Check your input arguments or network connectivity.\n'));
}
