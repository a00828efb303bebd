// Known command - splits words into known and unknown

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../utils/config.js';
import { openChecker } from './shared.js';

export function registerKnownCommand(program: Command): void {
  program
    .command('known <words...>')
    .description('Show which words are in the corpus')
    .option('-f, --format <type>', 'Output format (human|json)', 'human')
    .action(async (words: string[], options: { format: string }) => {
      const config = loadConfig();
      const { checker } = await openChecker(config);
      const known = [...checker.findKnownWords(words)];
      const unknown = [...checker.findUnknownWords(words)];

      if (options.format === 'json') {
        console.log(JSON.stringify({ known, unknown }, null, 2));
        return;
      }

      for (const word of known) console.log(`${chalk.green('✓')} ${word}`);
      for (const word of unknown) console.log(`${chalk.red('✗')} ${word}`);
    });
}
