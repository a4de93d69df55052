/**
 * Defs Command
 *
 * Lists the ASN.1 assignments (`Name ::= ...`) in an extracted file:
 *   asnx defs rrc.asn           - name and line of each definition
 *   asnx defs rrc.asn --full    - each definition's full text
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { DefsOptionsSchema, InputArgSchema, parseInput, type DefsOptions } from '../validation.js';
import { findDefinitions, readDocument, splitDefinitions } from '../../extractor/index.js';

/**
 * Create the defs command
 */
export function createDefsCommand(
  getContext: () => CommandContext
): Command {
  return new Command('defs')
    .argument('<file>', 'ASN.1 file to list')
    .description('List the type and value definitions in an ASN.1 file')
    .option('--full', 'Print each definition in full')
    .action(async (fileArg: string, rawOptions: DefsOptions) => {
      const ctx = getContext();
      const file = parseInput(InputArgSchema, fileArg);
      const options = parseInput(DefsOptionsSchema, rawOptions);

      const text = (await readDocument(file, 'utf-8')).join('\n');
      const definitions = findDefinitions(text);
      ctx.debug(`Found ${definitions.length} definitions in ${file}`);

      if (options.full) {
        const bodies = splitDefinitions(text);
        if (ctx.options.json) {
          console.log(JSON.stringify(bodies));
        } else {
          ctx.log(bodies.join('\n\n'));
        }
        return;
      }

      if (ctx.options.json) {
        console.log(JSON.stringify(definitions));
        return;
      }

      if (definitions.length === 0) {
        ctx.log(chalk.dim('No definitions found.'));
        return;
      }

      const width = Math.max(...definitions.map((def) => def.name.length));
      for (const def of definitions) {
        ctx.log(`${chalk.cyan(def.name.padEnd(width))}  ${chalk.dim(String(def.line))}`);
      }
    });
}
