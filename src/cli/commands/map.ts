/**
 * Map Command
 *
 * Records which section files (from `split`) each extracted module
 * (from `extract`) is built from:
 *   asnx map extracted asn1_sections                 - writes mapping.json
 *   asnx map extracted asn1_sections --mode name     - match by type name
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { DirectoryArgSchema, MapOptionsSchema, parseInput, type MapOptions } from '../validation.js';
import { loadConfig } from '../../config/index.js';
import { generateMapping, writeMapping } from '../../extractor/index.js';

export function createMapCommand(
  getContext: () => CommandContext
): Command {
  return new Command('map')
    .argument('<extracted-dir>', 'Directory of extracted modules')
    .argument('<sections-dir>', 'Directory written by asnx split')
    .description('Write a JSON map from extracted modules to the section files they use')
    .option('-m, --mode <mode>', 'Matching: defs, content or name (default: defs)')
    .option('-o, --output <path>', 'Mapping file (default: mapping.json)')
    .action(async (extractedArg: string, sectionsArg: string, rawOptions: MapOptions) => {
      const ctx = getContext();
      const extractedDir = parseInput(DirectoryArgSchema, extractedArg);
      const sectionsDir = parseInput(DirectoryArgSchema, sectionsArg);
      const options = parseInput(MapOptionsSchema, rawOptions);

      const config = loadConfig(false);
      const mapping = await generateMapping(extractedDir, sectionsDir, {
        mode: options.mode,
        extractedExtension: config.output.extension,
        sectionExtension: config.split.extension,
      });

      const modules = Object.keys(mapping);
      if (modules.length === 0) {
        ctx.warn(`No ${config.output.extension} files found in ${extractedDir}`);
      }
      for (const name of modules) {
        ctx.debug(`${name}: ${mapping[name]?.length ?? 0} sections`);
      }

      await writeMapping(options.output, mapping);

      if (ctx.options.json) {
        console.log(JSON.stringify({ output: options.output, mode: options.mode, mapping }));
        return;
      }

      ctx.log(
        `${chalk.green('✓')} Mapped ${modules.length} ${modules.length === 1 ? 'module' : 'modules'} (${options.mode}) to ${chalk.cyan(options.output)}`
      );
    });
}
