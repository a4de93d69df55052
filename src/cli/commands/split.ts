/**
 * Split Command
 *
 * Writes each ASN.1 block to its own file, named after the line above
 * the block's start marker:
 *   asnx split spec.txt                 - files go to ./asn1_sections
 *   asnx split spec.txt -o sections     - custom directory
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { InputArgSchema, SplitOptionsSchema, parseInput, type SplitOptions } from '../validation.js';
import { resolveMarkers } from './extract.js';
import { loadConfig } from '../../config/index.js';
import { readDocument, splitDocument, writeSections } from '../../extractor/index.js';
import { CLIError } from '../../errors/index.js';

/**
 * Create the split command
 */
export function createSplitCommand(
  getContext: () => CommandContext
): Command {
  return new Command('split')
    .argument('<input>', 'Specification text file to scan')
    .description('Write each ASN.1 block to its own file')
    .option('-o, --out <dir>', 'Output directory (default: asn1_sections)')
    .option('--start <marker>', 'Block start marker (default: "-- ASN1START")')
    .option('--stop <marker>', 'Block stop marker (default: "-- ASN1STOP")')
    .action(async (inputArg: string, rawOptions: SplitOptions) => {
      const ctx = getContext();
      const input = parseInput(InputArgSchema, inputArg);
      const options = parseInput(SplitOptionsSchema, rawOptions);
      ctx.debug(`Split command called for: ${input}`);

      const config = loadConfig(false);
      const markers = resolveMarkers(config, options);
      const outDir = options.out ?? config.split.out_dir;

      const lines = await readDocument(input);
      const sections = splitDocument(lines, {
        markers,
        extension: config.split.extension,
      });

      if (sections.length === 0) {
        throw new CLIError(
          'No ASN.1 blocks were found',
          `Check that ${input} contains "${markers.start}" lines, or pass --start`
        );
      }

      for (const section of sections) {
        if (!section.terminated) {
          ctx.warn(`Section "${section.header}" (line ${section.startLine}) is not closed; kept up to end of document`);
        }
        ctx.debug(`${section.fileName} <- line ${section.startLine}`);
      }

      const files = await writeSections(outDir, sections);

      if (ctx.options.json) {
        console.log(JSON.stringify({ input, outDir, files }));
        return;
      }

      ctx.log(`${chalk.green('✓')} Extracted ${files.length} blocks into ${chalk.cyan(outDir)}`);
    });
}
