// Suggest command

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../utils/config.js';
import { openChecker, parseLimit } from './shared.js';

export function registerSuggestCommand(program: Command): void {
  program
    .command('suggest <word>')
    .description('Suggest corrections for a single word')
    .option('-l, --limit <n>', 'Number of suggestions')
    .option('-f, --format <type>', 'Output format (human|json)', 'human')
    .action(async (word: string, options: { limit?: string; format: string }) => {
      const config = loadConfig();
      const limit = parseLimit(options.limit, config.suggestionLimit);
      const { checker } = await openChecker(config);

      const known = checker.isKnown(word);
      const suggestions = checker.suggestAlternatives(word).slice(0, limit);

      if (options.format === 'json') {
        console.log(JSON.stringify({ word, known, suggestions }, null, 2));
        return;
      }

      if (known) {
        console.log(chalk.green(`"${word}" is a known word (frequency ${checker.frequency(word)}).`));
        return;
      }
      if (suggestions.length === 0) {
        console.log(chalk.yellow(`No suggestions for "${word}".`));
        return;
      }
      for (const [i, suggestion] of suggestions.entries()) {
        console.log(`${chalk.gray(`${i + 1}.`)} ${chalk.bold(suggestion)} ${chalk.gray(`(${checker.frequency(suggestion)})`)}`);
      }
    });
}
