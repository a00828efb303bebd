#!/usr/bin/env node
// corpus-spell CLI - frequency-based spelling suggestions from a sample corpus

import { Command } from 'commander';
import { registerCommands } from './commands/index.js';
import { setCorpusOverride } from './utils/config.js';

const program = new Command();

program
  .name('spell')
  .description('Check and correct spelling against a sample text corpus')
  .version('1.0.0')
  .option('--corpus <sources...>', 'Corpus files or glob patterns (overrides config)');

program.hook('preAction', (thisCommand) => {
  const opts = thisCommand.opts<{ corpus?: string[] }>();
  setCorpusOverride(opts.corpus);
});

registerCommands(program);

await program.parseAsync();
