/**
 * asnx CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createExtractCommand } from './commands/extract.js';
import { createSplitCommand } from './commands/split.js';
import { createDefsCommand } from './commands/defs.js';
import { createMapCommand } from './commands/map.js';
import { createConfigCommand } from './commands/config.js';
import {
  handleError,
  createGlobalErrorHandler,
  CLIError,
} from '../errors/index.js';

// Version injected at build time via tsup env
const VERSION = process.env.CLI_VERSION ?? '0.0.0';

const program = new Command();

program
  .name('asnx')
  .description('Extract ASN.1 modules from specification text documents')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('asnx extract 36331-j00.txt')}          Write every ASN.1 block to 36331-j00.asn
  ${chalk.cyan('asnx extract spec.txt -o rrc.asn')}    Choose the output file
  ${chalk.cyan('asnx split spec.txt -o sections')}     One file per block, named after its clause
  ${chalk.cyan('asnx defs rrc.asn')}                   List the definitions in an ASN.1 file
  ${chalk.cyan('asnx map extracted sections')}         Map modules to the section files they use
  ${chalk.cyan('asnx config set markers.start "-- BEGIN"')}  Change a setting

${chalk.dim('Exit codes:')}
  0 success, 1 general error, 2 configuration error,
  3 input unreadable, 4 output unwritable
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = () => createContext(getGlobalOptions());

program.addCommand(createExtractCommand(getContext));
program.addCommand(createSplitCommand(getContext));
program.addCommand(createDefsCommand(getContext));
program.addCommand(createMapCommand(getContext));
program.addCommand(createConfigCommand(getContext));

// Handle unknown commands
program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0]}`,
    'Run: asnx --help  to see available commands'
  );
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Catch errors that escape every try/catch
  const globalHandler = createGlobalErrorHandler(getErrorOptions);
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
