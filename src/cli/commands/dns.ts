/**
 * Dns command: A/AAAA subdomain enumeration
 */

import { Command } from 'commander';
import {
  addCommonOptions,
  buildCommonConfig,
  reportFailure,
  runScan,
  type CommonOptions,
} from '../common.js';
import type { DnsScanConfig } from '../../core/types.js';

export const dnsCommand = addCommonOptions(
  new Command('dns').description('A/AAAA entries enumeration mode')
).action(async (options: CommonOptions) => {
  try {
    const config: DnsScanConfig = { ...buildCommonConfig(options, false), mode: 'dns' };
    process.exit(await runScan(config, options));
  } catch (error) {
    reportFailure(error);
    process.exit(1);
  }
});
