// Config command - view and manage configuration

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, saveConfig, getConfigPath, parseConfigValue, ENV_OVERRIDES } from '../utils/config.js';
import { errorMessage } from '../utils/log.js';

export function registerConfigCommand(program: Command): void {
  const cmd = program
    .command('config')
    .description('View and manage configuration');

  // spell config (no subcommand): show all config
  cmd.action(() => {
    const config = loadConfig();

    console.log(chalk.bold('corpus-spell configuration'));
    console.log(chalk.gray('──────────────────────────'));
    console.log(chalk.gray(`Config file: ${getConfigPath()}`));
    console.log();

    for (const [key, value] of Object.entries(config)) {
      if (Array.isArray(value)) {
        if (value.length === 0) {
          console.log(`${chalk.cyan(key)}: ${chalk.gray('(empty)')}`);
        } else {
          console.log(`${chalk.cyan(key)}:`);
          for (const item of value) console.log(`  - ${item}`);
        }
      } else {
        console.log(`${chalk.cyan(key)}: ${value}`);
      }
    }

    const activeOverrides = Object.keys(ENV_OVERRIDES).filter(envVar => process.env[envVar]);
    if (activeOverrides.length > 0) {
      console.log();
      console.log(chalk.bold('Active env overrides:'));
      for (const envVar of activeOverrides) {
        console.log(`  ${chalk.yellow(envVar)}=${process.env[envVar]}`);
      }
    }
  });

  cmd
    .command('path')
    .description('Print the config file path')
    .action(() => {
      console.log(getConfigPath());
    });

  cmd
    .command('get <key>')
    .description('Get a configuration value')
    .action((key: string) => {
      const config = loadConfig();
      const entry = Object.entries(config).find(([name]) => name === key);
      if (!entry) {
        console.error(chalk.red(`Unknown config key: ${key}`));
        console.error(chalk.gray(`Valid keys: ${Object.keys(config).join(', ')}`));
        process.exit(1);
      }
      const value: unknown = entry[1];
      console.log(typeof value === 'object' ? JSON.stringify(value, null, 2) : String(value));
    });

  cmd
    .command('set <key> <value>')
    .description('Set a configuration value (corpus takes a comma list or JSON array)')
    .action((key: string, value: string) => {
      try {
        const update = parseConfigValue(key, value);
        saveConfig({ ...loadConfig(), ...update });
        console.log(chalk.green(`Set ${key} = ${value}`));
      } catch (err) {
        console.error(chalk.red(errorMessage(err)));
        process.exit(1);
      }
    });
}
