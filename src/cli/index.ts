#!/usr/bin/env node

/**
 * multibuster CLI Entry Point
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { dirCommand } from './commands/dir.js';
import { dnsCommand } from './commands/dns.js';
import { vhostCommand } from './commands/vhost.js';
import { fuzzCommand } from './commands/fuzz.js';
import { VERSION } from '../index.js';

const program = new Command();

program
  .name('multibuster')
  .description('Wordlist enumerator for paths, DNS subdomains, virtual hosts and custom fuzzing')
  .version(VERSION);

const banner = `
${chalk.cyan('╔═══════════════════════════════════════════════════════════╗')}
${chalk.cyan('║')}  ${chalk.bold.white('MULTIBUSTER')} ${chalk.gray(`v${VERSION}`)}                                  ${chalk.cyan('║')}
${chalk.cyan('║')}  ${chalk.gray('Paths · DNS · Virtual hosts · Fuzzing')}                    ${chalk.cyan('║')}
${chalk.cyan('╚═══════════════════════════════════════════════════════════╝')}
`;

program.addHelpText('beforeAll', banner);
program.addHelpText(
  'after',
  `
Examples:
  multibuster dir -u http://localhost:3000/ -w wordlist.txt -e php
  multibuster dns -u example.com -w wordlist.txt
  multibuster vhost -u http://localhost:3000/ -w wordlist.txt -d test.local -x "Hello"
  multibuster fuzz -u http://localhost:3000/login -X POST -b '{"user":"FUZZ"}' -w users.txt`
);

program.addCommand(dirCommand);
program.addCommand(dnsCommand);
program.addCommand(vhostCommand);
program.addCommand(fuzzCommand);

// Error handling
program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof CommanderError) {
    // help and version output end up here as well
    process.exit(error.exitCode);
  }
  if (error instanceof Error) {
    console.error(chalk.red(`\n❌ Error: ${error.message}\n`));
    process.exit(1);
  }
  throw error;
}
