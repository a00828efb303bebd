// Correct command - prints the auto-corrected text

import { Command } from 'commander';
import { loadConfig } from '../utils/config.js';
import { openChecker, readInput } from './shared.js';

export function registerCorrectCommand(program: Command): void {
  program
    .command('correct [text...]')
    .description('Replace unknown words with their most likely correction')
    .option('--file <path>', 'Correct the contents of a file')
    .action(async (text: string[], options: { file?: string }) => {
      const config = loadConfig();
      const input = readInput(text, options.file, config.encoding);
      const { checker } = await openChecker(config);
      process.stdout.write(checker.autoCorrect(input) + (options.file ? '' : '\n'));
    });
}
