// Command registrations

import type { Command } from 'commander';
import { registerCheckCommand } from './check.js';
import { registerCorrectCommand } from './correct.js';
import { registerSuggestCommand } from './suggest.js';
import { registerKnownCommand } from './known.js';
import { registerStatsCommand } from './stats.js';
import { registerConfigCommand } from './config.js';

export function registerCommands(program: Command): void {
  registerCheckCommand(program);
  registerCorrectCommand(program);
  registerSuggestCommand(program);
  registerKnownCommand(program);
  registerStatsCommand(program);
  registerConfigCommand(program);
}
