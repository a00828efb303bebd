// Check command

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../utils/config.js';
import { CHECK_FORMATS, formatCheckCsv, formatCheckJson, formatCheckMarkdown, isCheckFormat } from '../utils/formatters.js';
import { openChecker, parseLimit, readInput } from './shared.js';

export function registerCheckCommand(program: Command): void {
  program
    .command('check [text...]')
    .description('List unknown words with suggested corrections')
    .option('--file <path>', 'Check the contents of a file')
    .option('-l, --limit <n>', 'Suggestions shown per word')
    .option('-f, --format <type>', `Output format (${CHECK_FORMATS.join('|')})`, 'human')
    .action(async (text: string[], options: { file?: string; limit?: string; format: string }) => {
      if (!isCheckFormat(options.format)) {
        console.error(chalk.red(`Unknown format: ${options.format}`));
        process.exit(1);
      }

      const config = loadConfig();
      const limit = parseLimit(options.limit, config.suggestionLimit);
      const input = readInput(text, options.file, config.encoding);
      const { checker } = await openChecker(config);
      const items = checker.check(input);

      switch (options.format) {
        case 'json':
          console.log(formatCheckJson(items, limit));
          return;
        case 'csv':
          console.log(formatCheckCsv(items, limit));
          return;
        case 'markdown':
          console.log(formatCheckMarkdown(items, limit));
          return;
        case 'human':
          break;
      }

      if (items.length === 0) {
        console.log(chalk.green('No unknown words found.'));
        return;
      }

      console.log(chalk.cyan(`Found ${items.length} unknown word(s):\n`));
      for (const item of items) {
        const suggestions = item.suggestedAlternatives.slice(0, limit);
        const rendered = suggestions.length > 0 ? chalk.green(suggestions.join(', ')) : chalk.gray('(no suggestions)');
        console.log(`  ${chalk.bold.red(item.suspectedWord)} ${chalk.gray('→')} ${rendered}`);
      }
    });
}
