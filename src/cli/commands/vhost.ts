/**
 * Vhost command: virtual hosts enumeration
 */

import { Command } from 'commander';
import {
  addCommonOptions,
  buildCommonConfig,
  isValidDomain,
  reportFailure,
  runScan,
  type CommonOptions,
} from '../common.js';
import type { VhostScanConfig } from '../../core/types.js';

interface VhostOptions extends CommonOptions {
  domain?: string;
}

export const vhostCommand = addCommonOptions(
  new Command('vhost').description('Virtual hosts enumeration mode')
)
  .option('-d, --domain <domain>', 'Domain appended to every word')
  .action(async (options: VhostOptions) => {
    try {
      if (!options.domain) {
        throw new Error('domain not specified (-d)');
      }
      if (!isValidDomain(options.domain)) {
        throw new Error(`Invalid domain: ${options.domain}`);
      }
      if (options.ignoreString.length === 0) {
        throw new Error('ignore strings not specified (-x)');
      }

      const config: VhostScanConfig = {
        ...buildCommonConfig(options, true),
        mode: 'vhost',
        domain: options.domain,
      };
      process.exit(await runScan(config, options));
    } catch (error) {
      reportFailure(error);
      process.exit(1);
    }
  });
