/**
 * Tests for CLI option handling
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Command, CommanderError } from 'commander';
import {
  addCommonOptions,
  buildCommonConfig,
  collectList,
  isValidDomain,
  parsePositiveInt,
  type CommonOptions,
} from '../src/cli/common.js';
import { logger } from '../src/utils/logger.js';

function parse(args: string[]): CommonOptions {
  const command = addCommonOptions(new Command('dir')).exitOverride();
  command.parse(args, { from: 'user' });
  return command.opts<CommonOptions>();
}

describe('common options', () => {
  beforeEach(() => {
    logger.setQuiet(true);
  });

  it('should apply defaults', () => {
    const config = buildCommonConfig(parse(['-u', 'http://localhost:3000/', '-w', 'words.txt']), true);

    expect(config).toMatchObject({
      url: 'http://localhost:3000/',
      wordlists: ['words.txt'],
      concurrency: 10,
      timeout: 10000,
      userAgent: 'multibuster',
      method: 'GET',
      includeStatusCodes: [],
      ignoreStatusCodes: ['404'],
      exitOnConnectionErrors: false,
      ignoreCertificate: false,
    });
  });

  it('should drop the default ignore list when include codes are given', () => {
    const config = buildCommonConfig(
      parse(['-u', 'http://localhost:3000/', '-w', 'words.txt', '-s', '200,301']),
      true
    );
    expect(config.includeStatusCodes).toEqual(['200', '301']);
    expect(config.ignoreStatusCodes).toEqual([]);
  });

  it('should collect repeated wordlists, headers and verbosity', () => {
    const config = buildCommonConfig(
      parse([
        '-u', 'http://localhost:3000/',
        '-w', 'users.txt', '-w', 'passwords.txt',
        '-H', 'Authorization: Bearer test-token',
        '-H', 'X-Trace: a:b',
        '-X', 'post',
        '-v', '-v',
      ]),
      true
    );

    expect(config.wordlists).toEqual(['users.txt', 'passwords.txt']);
    expect(config.headers).toEqual([
      ['Authorization', 'Bearer test-token'],
      ['X-Trace', 'a:b'],
    ]);
    expect(config.method).toBe('POST');
    expect(config.verbosity).toBe(2);
  });

  it('should require a wordlist', () => {
    const command = addCommonOptions(new Command('dir'))
      .exitOverride()
      .configureOutput({ writeErr: () => undefined });

    expect(() => command.parse(['-u', 'http://localhost:3000/'], { from: 'user' })).toThrow(
      CommanderError
    );
  });

  it('should reject non-http targets outside dns mode', () => {
    expect(() => buildCommonConfig(parse(['-u', 'ftp://localhost/', '-w', 'w.txt']), true)).toThrow(
      'Invalid URL: ftp://localhost/'
    );
  });

  it('should require a domain in dns mode', () => {
    expect(() => buildCommonConfig(parse(['-u', 'http://example.com', '-w', 'w.txt']), false)).toThrow(
      'Invalid domain'
    );
    expect(buildCommonConfig(parse(['-u', 'example.com', '-w', 'w.txt']), false).url).toBe('example.com');
  });

  it('should reject unknown methods', () => {
    expect(() =>
      buildCommonConfig(parse(['-u', 'http://localhost/', '-w', 'w.txt', '-X', 'BREW']), true)
    ).toThrow('Unsupported HTTP method: BREW');
  });
});

describe('argument parsers', () => {
  it('should parse positive integers only', () => {
    expect(parsePositiveInt('25')).toBe(25);
    expect(() => parsePositiveInt('0')).toThrow('Not a positive integer.');
    expect(() => parsePositiveInt('1.5')).toThrow('Not a positive integer.');
  });

  it('should split comma separated values', () => {
    expect(collectList('php, html', ['txt'])).toEqual(['txt', 'php', 'html']);
  });

  it('should validate domains', () => {
    expect(isValidDomain('example.com')).toBe(true);
    expect(isValidDomain('example.com.')).toBe(true);
    expect(isValidDomain('not a domain')).toBe(false);
  });
});
