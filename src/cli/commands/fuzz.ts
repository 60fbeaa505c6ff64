/**
 * Fuzz command: custom fuzzing with FUZZ/FUZZ2/... markers and CSRF replay
 */

import { Command } from 'commander';
import {
  addCommonOptions,
  buildCommonConfig,
  collect,
  reportFailure,
  runScan,
  type CommonOptions,
} from '../common.js';
import { isHttpUrl, splitHttpHeader } from '../../utils/http.js';
import type { FuzzScanConfig } from '../../core/types.js';

interface FuzzOptions extends CommonOptions {
  csrfUrl?: string;
  csrfRegex?: string;
  csrfHeader: string[];
}

export const fuzzCommand = addCommonOptions(
  new Command('fuzz').description('Custom fuzzing enumeration mode')
)
  .option('--csrf-url <url>', 'Grab the CSRF token via GET to this URL')
  .option('--csrf-regex <pattern>', 'Extract the CSRF token with the first capture group')
  .option('--csrf-header <header>', 'Header for the CSRF GET request (repeatable)', collect, [])
  .addHelpText(
    'after',
    `
Example:
  multibuster fuzz -u http://localhost:3000/login -X POST \\
    -H "Content-Type: application/json" \\
    -b '{"user":"FUZZ","password":"FUZZ2","csrf":"CSRFCSRF"}' \\
    -w users.txt -w passwords.txt -s 200 \\
    --csrf-url http://localhost:3000/csrf --csrf-regex '"csrf":"(\\w+)"'`
  )
  .action(async (options: FuzzOptions) => {
    try {
      if ((options.csrfUrl === undefined) !== (options.csrfRegex === undefined)) {
        throw new Error('--csrf-url and --csrf-regex must be used together');
      }
      if (options.csrfHeader.length > 0 && options.csrfUrl === undefined) {
        throw new Error('--csrf-header requires --csrf-url');
      }
      if (options.csrfUrl !== undefined && !isHttpUrl(options.csrfUrl)) {
        throw new Error(`Invalid CSRF URL: ${options.csrfUrl}`);
      }

      const config: FuzzScanConfig = {
        ...buildCommonConfig(options, true),
        mode: 'fuzz',
      };
      if (options.csrfUrl !== undefined && options.csrfRegex !== undefined) {
        config.csrf = {
          url: options.csrfUrl,
          pattern: options.csrfRegex,
          headers: options.csrfHeader.map(splitHttpHeader),
        };
      }
      process.exit(await runScan(config, options));
    } catch (error) {
      reportFailure(error);
      process.exit(1);
    }
  });
