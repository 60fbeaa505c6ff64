/**
 * Tests for the logger
 */

import { describe, it, expect, afterEach } from 'vitest';
import { logger } from '../src/utils/logger.js';
import { formatElapsed } from '../src/utils/progress.js';

describe('logger', () => {
  const lines: string[] = [];

  afterEach(() => {
    lines.length = 0;
    logger.setWriter(undefined);
    logger.setQuiet(true);
    logger.setLevel('info');
  });

  function capture() {
    logger.setQuiet(false);
    logger.setWriter((line) => {
      lines.push(line);
    });
  }

  it('should map verbosity to levels', () => {
    capture();
    logger.setVerbosity(0);
    logger.info('hidden at warn');
    logger.setVerbosity(1);
    logger.info('shown at info');
    logger.debug('hidden at info');
    logger.setVerbosity(3);
    logger.debug('shown at debug');

    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain('[INFO] shown at info');
    expect(lines[1]).toContain('[DEBUG] shown at debug');
  });

  it('should drop messages below the level', () => {
    capture();
    logger.setLevel('warn');
    logger.info('hidden');
    logger.warn('shown');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('[WARN] shown');
  });

  it('should append extra arguments', () => {
    capture();
    logger.error('failed:', new Error('boom'), 3);
    expect(lines[0]).toContain('[ERROR] failed:');
    expect(lines[0].endsWith(' boom 3')).toBe(true);
  });

  it('should print nothing when quiet', () => {
    capture();
    logger.setQuiet(true);
    logger.error('hidden');
    expect(lines).toEqual([]);
  });
});

describe('formatElapsed', () => {
  it('should format hours, minutes and seconds', () => {
    expect(formatElapsed(0)).toBe('00:00:00');
    expect(formatElapsed(3_725_999)).toBe('01:02:05');
  });
});
