/**
 * Config Command
 *
 *   asnx config get markers.start
 *   asnx config set output.line_ending crlf
 *   asnx config list
 *   asnx config path
 *   asnx config reset --force
 *
 * Failures are thrown like in the other commands, so a bad key or value
 * exits with code 2.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigValue, setConfigValue, listConfig, resetConfig, getConfigPath } from '../../config/index.js';
import type { CommandContext } from '../types.js';
import { CLIError, ConfigError } from '../../errors/index.js';

/**
 * Print a JSON payload under --json, the text form otherwise
 */
function emit(ctx: CommandContext, payload: unknown, text: string): void {
  if (ctx.options.json) {
    console.log(JSON.stringify(payload));
  } else {
    ctx.log(text);
  }
}

function show(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config')
    .description('Show or change markers, output and split settings');

  configCmd
    .command('get <key>')
    .description('Print one setting, e.g. markers.start')
    .action((key: string) => {
      const value = getConfigValue(key);
      if (value === undefined) {
        throw new ConfigError(`Unknown config key: ${key}`, 'Run: asnx config list  to see available keys');
      }
      emit(getContext(), { key, value }, show(value));
    });

  configCmd
    .command('set <key> <value>')
    .description('Change one setting; the whole file is validated before saving')
    .action((key: string, value: string) => {
      setConfigValue(key, value);
      emit(getContext(), { key, value }, `${chalk.green('✓')} ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('Print the effective settings, defaults included')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig();

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      // Same layout as config.toml: one [table] per section
      let table = '';
      for (const [key, value] of entries) {
        const [section = '', name = key] = key.split('.');
        if (section !== table) {
          if (table !== '') ctx.log('');
          ctx.log(chalk.bold(`[${section}]`));
          table = section;
        }
        ctx.log(`${chalk.cyan(name)} = ${chalk.yellow(JSON.stringify(value))}`);
      }
      ctx.log('');
      ctx.log(chalk.dim(`# ${getConfigPath()}`));
    });

  configCmd
    .command('path')
    .description('Print the location of config.toml')
    .action(() => {
      const configPath = getConfigPath();
      emit(getContext(), { path: configPath }, configPath);
    });

  configCmd
    .command('reset')
    .description('Overwrite config.toml with the defaults')
    .option('-f, --force', 'Required; confirms the reset')
    .action((options: { force?: boolean }) => {
      if (!options.force) {
        throw new CLIError('Refusing to reset without --force', 'Run: asnx config reset --force');
      }
      resetConfig();
      emit(getContext(), { path: getConfigPath() }, `${chalk.green('✓')} Reset ${chalk.cyan(getConfigPath())} to defaults`);
    });

  return configCmd;
}
