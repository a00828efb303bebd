// Corpus loader: reads sample text from files or glob patterns.

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { glob, hasMagic } from 'glob';
import { CorpusLoadError } from '../utils/errors.js';
import { logDebug, logInfo } from '../utils/log.js';
import type { SpellChecker } from '../core/spell-checker.js';
import type { CorpusSource } from '../types.js';

export interface CorpusReadOptions {
  encoding?: BufferEncoding;
  cwd?: string;
}

async function resolveSource(source: string, cwd: string): Promise<string[]> {
  if (!hasMagic(source, { windowsPathsNoEscape: true })) {
    return [resolve(cwd, source)];
  }
  const matches = await glob(source.replace(/\\/g, '/'), { cwd, absolute: true, nodir: true });
  if (matches.length === 0) {
    throw new CorpusLoadError(source, new Error('No files matched the pattern'));
  }
  return matches.sort();
}

/**
 * Read every corpus source into one text. A source is a file path or a glob
 * pattern; files are read in sorted order and joined with newlines.
 * Any failure is raised as CorpusLoadError before anything is returned.
 */
export async function readCorpus(sources: string[], options: CorpusReadOptions = {}): Promise<CorpusSource> {
  if (sources.length === 0) {
    throw new CorpusLoadError('(none)', new Error('No corpus sources configured'));
  }
  const cwd = options.cwd ?? process.cwd();
  const encoding = options.encoding ?? 'utf-8';

  const files: string[] = [];
  for (const source of sources) {
    for (const file of await resolveSource(source, cwd)) {
      if (!files.includes(file)) files.push(file);
    }
  }

  const parts: string[] = [];
  for (const file of files) {
    try {
      parts.push(await readFile(file, { encoding }));
    } catch (err) {
      throw new CorpusLoadError(file, err);
    }
    logDebug('corpus', 'Read corpus file', { file });
  }

  return { text: parts.join('\n'), files };
}

/**
 * Read the sources, then rebuild the checker's model. When reading fails the
 * checker keeps whatever corpus it had before.
 */
export async function loadCorpus(
  checker: SpellChecker,
  sources: string[],
  options: CorpusReadOptions = {}
): Promise<{ files: string[]; distinctWords: number; totalWords: number }> {
  const { text, files } = await readCorpus(sources, options);
  checker.buildCorpus(text);
  const { distinctWords, totalWords } = checker.stats(0);
  logInfo('corpus', `Loaded ${files.length} corpus file(s)`, { distinctWords, totalWords });
  return { files, distinctWords, totalWords };
}
