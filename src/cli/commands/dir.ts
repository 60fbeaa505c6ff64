/**
 * Dir command: directories and files enumeration
 */

import { Command } from 'commander';
import {
  addCommonOptions,
  buildCommonConfig,
  collectList,
  reportFailure,
  runScan,
  type CommonOptions,
} from '../common.js';
import type { DirScanConfig } from '../../core/types.js';

interface DirOptions extends CommonOptions {
  extensions: string[];
  appendSlash: boolean;
}

export const dirCommand = addCommonOptions(
  new Command('dir').description('Directories and files enumeration mode')
)
  .option('-e, --extensions <list>', 'Extensions to append, comma separated', collectList, [])
  .option('-f, --append-slash', 'Also try every word with a trailing /', false)
  .action(async (options: DirOptions) => {
    try {
      const config: DirScanConfig = {
        ...buildCommonConfig(options, true),
        mode: 'dir',
        extensions: options.extensions.filter((ext) => ext.length > 0),
        appendSlash: options.appendSlash,
      };
      process.exit(await runScan(config, options));
    } catch (error) {
      reportFailure(error);
      process.exit(1);
    }
  });
