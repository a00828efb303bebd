// Stats command

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../utils/config.js';
import { formatStatsJson } from '../utils/formatters.js';
import { openChecker, parseLimit } from './shared.js';

export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('Show corpus statistics and the most frequent words')
    .option('-t, --top <n>', 'Number of top words', '10')
    .option('-f, --format <type>', 'Output format (human|json)', 'human')
    .action(async (options: { top: string; format: string }) => {
      const config = loadConfig();
      const top = parseLimit(options.top, 10);
      const { checker, files } = await openChecker(config);
      const stats = checker.stats(top);

      if (options.format === 'json') {
        console.log(formatStatsJson(stats, files));
        return;
      }

      console.log(chalk.blue('\nCorpus Stats\n'));
      console.log(chalk.gray('Files:'));
      for (const file of files) {
        console.log(chalk.gray(`  - ${file}`));
      }
      console.log(chalk.white(`\n  Distinct words: ${stats.distinctWords}`));
      console.log(chalk.white(`  Total words:    ${stats.totalWords}`));

      if (stats.topWords.length > 0) {
        console.log(chalk.gray(`\nTop ${stats.topWords.length}:`));
        const width = Math.max(...stats.topWords.map(w => w.word.length));
        for (const { word, count } of stats.topWords) {
          console.log(`  ${chalk.bold(word.padEnd(width))}  ${chalk.cyan(String(count))}`);
        }
      }
      console.log();
    });
}
