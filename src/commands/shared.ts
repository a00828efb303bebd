// Helpers shared by the commands that need a built corpus

import { readFileSync } from 'node:fs';
import chalk from 'chalk';
import { SpellChecker } from '../core/spell-checker.js';
import { loadCorpus } from '../storage/corpus.js';
import { toCheckerOptions } from '../utils/config.js';
import { errorMessage } from '../utils/log.js';
import type { Config } from '../types.js';

export async function openChecker(config: Config): Promise<{ checker: SpellChecker; files: string[] }> {
  if (config.corpus.length === 0) {
    console.error(chalk.red('Error: No corpus configured.'));
    console.error(chalk.yellow('Pass --corpus <file|glob> or run `spell config set corpus <file|glob>`.'));
    process.exit(1);
  }

  const checker = new SpellChecker(toCheckerOptions(config));
  try {
    const { files } = await loadCorpus(checker, config.corpus, { encoding: config.encoding });
    return { checker, files };
  } catch (err) {
    console.error(chalk.red(`Error: ${errorMessage(err)}`));
    process.exit(1);
  }
}

/** Text from positional arguments, or from --file when given. */
export function readInput(words: string[], file: string | undefined, encoding: BufferEncoding): string {
  if (file) {
    try {
      return readFileSync(file, { encoding });
    } catch (err) {
      console.error(chalk.red(`Error: Could not read ${file}: ${errorMessage(err)}`));
      process.exit(1);
    }
  }
  if (words.length === 0) {
    console.error(chalk.red('Error: Provide text to check or --file <path>.'));
    process.exit(1);
  }
  return words.join(' ');
}

export function parseLimit(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const n = parseInt(value, 10);
  if (!Number.isFinite(n) || n < 1) {
    console.error(chalk.red(`Invalid limit: ${value}`));
    process.exit(1);
  }
  return n;
}
