/**
 * asn1-extract - Library Entry Point
 *
 * The CLI (`asnx`) covers most use cases:
 * ```bash
 * asnx extract 36331-j00.txt     # -> 36331-j00.asn
 * asnx split 36331-j00.txt       # one file per block
 * asnx defs 36331-j00.asn        # list definitions
 * ```
 *
 * The same operations are exported for build scripts and indexing
 * pipelines that want the ASN.1 text without a subprocess.
 *
 * @example In-memory extraction
 * ```typescript
 * import { extract } from 'asn1-extract';
 *
 * const asn = extract(documentText.split('\n'));
 * ```
 *
 * @example File to file
 * ```typescript
 * import { extractFile } from 'asn1-extract';
 *
 * const report = await extractFile('spec.txt');
 * console.log(`${report.blocks} blocks -> ${report.output}`);
 * ```
 *
 * @packageDocumentation
 */

export type { GlobalOptions, CommandContext } from './cli/types.js';

export * from './extractor/index.js';

export {
  CLIError,
  ConfigError,
  FileAccessError,
  InputUnreadableError,
  OutputUnwritableError,
  ValidationError,
  describeError,
  type ErrorOutput,
} from './errors/index.js';

export { loadConfig, DEFAULT_CONFIG, type Config } from './config/index.js';

export { silentLogger, type Logger } from './utils/index.js';
