/**
 * Extract Command
 *
 * Pulls every ASN.1 block out of a specification text file:
 *   asnx extract 36331-j00.txt             - writes 36331-j00.asn
 *   asnx extract spec.txt -o rrc.asn       - explicit output path
 *   asnx extract spec.txt --start "-- BEGIN" --stop "-- END"
 *
 * Marker lines are dropped and blocks are concatenated with no separator.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { ExtractOptionsSchema, InputArgSchema, parseInput, type ExtractOptions } from '../validation.js';
import { loadConfig, type Config } from '../../config/index.js';
import { extractFile, type BlockMarkers } from '../../extractor/index.js';

/**
 * Command-line markers override the configured ones
 */
export function resolveMarkers(
  config: Config,
  options: { start?: string; stop?: string }
): BlockMarkers {
  return {
    start: options.start ?? config.markers.start,
    stop: options.stop ?? config.markers.stop,
  };
}

/**
 * Create the extract command
 */
export function createExtractCommand(
  getContext: () => CommandContext
): Command {
  return new Command('extract')
    .alias('x')
    .argument('<input>', 'Specification text file to scan')
    .description('Extract ASN.1 blocks into a single .asn file')
    .option('-o, --output <path>', 'Output file (default: input path with its extension replaced)')
    .option('--start <marker>', 'Block start marker (default: "-- ASN1START")')
    .option('--stop <marker>', 'Block stop marker (default: "-- ASN1STOP")')
    .option('--crlf', 'Terminate output lines with CRLF')
    .action(async (inputArg: string, rawOptions: ExtractOptions) => {
      const ctx = getContext();
      const input = parseInput(InputArgSchema, inputArg);
      const options = parseInput(ExtractOptionsSchema, rawOptions);
      ctx.debug(`Extract command called for: ${input}`);
      ctx.debug(`Options: ${JSON.stringify(options)}`);

      const config = loadConfig(false);
      const markers = resolveMarkers(config, options);
      ctx.debug(`Markers: ${JSON.stringify(markers)}`);

      const report = await extractFile(input, {
        output: options.output,
        extension: config.output.extension,
        markers,
        lineEnding: options.crlf ? 'crlf' : config.output.line_ending,
        logger: ctx,
      });

      if (ctx.options.json) {
        console.log(JSON.stringify(report));
        return;
      }

      if (report.blocks === 0) {
        ctx.warn(`No "${markers.start}" markers found in ${input}; wrote an empty file`);
      }

      const blockWord = report.blocks === 1 ? 'block' : 'blocks';
      const lineWord = report.lines === 1 ? 'line' : 'lines';
      ctx.log(
        `${chalk.green('✓')} Extracted ${report.blocks} ${blockWord} (${report.lines} ${lineWord}) to ${chalk.cyan(report.output)}`
      );
    });
}
