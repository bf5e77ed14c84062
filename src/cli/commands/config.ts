/**
 * Config Command
 *
 * Manages ~/.docchat/config.toml via CLI:
 *   docchat config get <key>          - Get a specific value
 *   docchat config set <key> <value>  - Set a value
 *   docchat config list               - Show all configuration
 *   docchat config path               - Show config file location
 *   docchat config reset --force      - Restore defaults
 */

import * as fs from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';

import {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  getConfigPath,
} from '../../config/index.js';
import { formatError } from '../../errors/index.js';
import type { CommandContext } from '../types.js';

/**
 * Format a value for display
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value === '' ? '""' : value;
  if (typeof value === 'boolean' || typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

/**
 * Report a config error and set a failing exit code
 */
function handleConfigError(ctx: CommandContext, error: unknown): void {
  if (ctx.options.json) {
    console.error(formatError(error, { json: true }));
  } else {
    console.error(formatError(error, { verbose: ctx.options.verbose }));
  }
  process.exitCode = 1;
}

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Manage configuration settings');

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., docchat config get embedding.model)')
    .action((key: string) => {
      const ctx = getContext();

      try {
        const value = getConfigValue(key);

        if (value === undefined) {
          ctx.error(`Unknown config key: ${key}`);
          ctx.log('');
          ctx.log(`Run ${chalk.cyan('docchat config list')} to see all available keys.`);
          process.exitCode = 1;
          return;
        }

        if (ctx.options.json) {
          console.log(JSON.stringify({ key, value }));
        } else {
          ctx.log(formatValue(value));
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., docchat config set retrieval.top_k 8)')
    .action((key: string, value: string) => {
      const ctx = getContext();

      try {
        setConfigValue(key, value);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, key, value: getConfigValue(key) }));
        } else {
          ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();

      try {
        const entries = listConfig();

        if (ctx.options.json) {
          console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
          return;
        }

        ctx.log(chalk.bold('Configuration:'));
        ctx.log('');

        // Blank line between top-level sections
        let currentGroup = '';
        for (const [key, value] of entries) {
          const group = key.includes('.') ? (key.split('.')[0] ?? '') : '';
          if (group !== currentGroup) {
            ctx.log('');
            currentGroup = group;
          }
          ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
        }

        ctx.log('');
        ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow('This will reset all configuration to defaults.'));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      try {
        const configPath = getConfigPath();
        if (fs.existsSync(configPath)) {
          fs.unlinkSync(configPath);
        }

        // Writes the template again
        loadConfig(true);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, message: 'Configuration reset to defaults' }));
        } else {
          ctx.log(`${chalk.green('✓')} Configuration reset to defaults`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  return configCmd;
}
