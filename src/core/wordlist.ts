/**
 * Wordlist loading
 */

import { readFile } from 'fs/promises';
import { WordlistError } from './errors.js';
import { logger } from '../utils/logger.js';

/**
 * Split wordlist text into words: one per line, blank lines dropped,
 * duplicates and order kept.
 */
export function parseWordlist(content: string): string[] {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Read a wordlist file. Any read failure is fatal for the run.
 */
export async function loadWordlist(path: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new WordlistError(path, error);
  }

  const words = parseWordlist(content);
  logger.info(`Loaded ${words.length} words from ${path}`);
  return words;
}

/**
 * Read every wordlist, in order, failing on the first unreadable one
 */
export async function loadWordlists(paths: readonly string[]): Promise<string[][]> {
  const lists: string[][] = [];
  for (const path of paths) {
    lists.push(await loadWordlist(path));
  }
  return lists;
}
