/**
 * Document I/O
 *
 * The only place where extraction touches the file system. Read failures
 * become InputUnreadableError and write failures OutputUnwritableError;
 * everything between is pure.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { InputUnreadableError, OutputUnwritableError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { DOCUMENT_ENCODING, splitLines, serializeLines } from './lines.js';
import { deriveOutputPath, DEFAULT_OUTPUT_EXTENSION } from './output-path.js';
import { scanBlocks, summarize } from './scanner.js';
import {
  DEFAULT_MARKERS,
  type BlockMarkers,
  type ExtractionSummary,
  type LineEnding,
} from './types.js';

/**
 * Options for extractFile()
 */
export interface ExtractFileOptions {
  /** Explicit output path. Derived from the input path when omitted. */
  output?: string;
  /** Extension used when deriving the output path (default: .asn) */
  extension?: string;
  markers?: BlockMarkers;
  lineEnding?: LineEnding;
  logger?: Logger;
}

/**
 * Result of extracting one document
 */
export interface ExtractionReport extends ExtractionSummary {
  input: string;
  output: string;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Read a document as lines. The default encoding keeps every byte as
 * one character; pass 'utf-8' when the lines are meant for display.
 *
 * @throws InputUnreadableError if the path is missing, a directory, or unreadable
 */
export async function readDocument(
  path: string,
  encoding: BufferEncoding = DOCUMENT_ENCODING
): Promise<string[]> {
  let content: Buffer;
  try {
    content = await readFile(path);
  } catch (error) {
    throw new InputUnreadableError(path, toError(error));
  }
  return splitLines(content.toString(encoding));
}

/**
 * Create or truncate a file and write each line followed by a terminator.
 *
 * @throws OutputUnwritableError if the file cannot be opened for writing
 */
export async function writeLines(
  path: string,
  lines: readonly string[],
  lineEnding: LineEnding = 'lf'
): Promise<void> {
  try {
    await writeFile(path, serializeLines(lines, lineEnding), DOCUMENT_ENCODING);
  } catch (error) {
    throw new OutputUnwritableError(path, toError(error));
  }
}

/**
 * Extract the ASN.1 blocks of one document into a single file.
 *
 * The input is read to completion before the output is opened, so an
 * unreadable input never creates or truncates the output.
 */
export async function extractFile(
  input: string,
  options: ExtractFileOptions = {}
): Promise<ExtractionReport> {
  const {
    extension = DEFAULT_OUTPUT_EXTENSION,
    markers = DEFAULT_MARKERS,
    lineEnding = 'lf',
    logger = silentLogger,
  } = options;
  const output = options.output ?? deriveOutputPath(input, extension);

  const lines = await readDocument(input);
  logger.debug?.(`Read ${lines.length} lines from ${input}`);

  const blocks = scanBlocks(lines, markers);
  const summary = summarize(blocks);

  for (const block of blocks) {
    if (!block.terminated) {
      logger.warn(
        `Block starting at line ${block.startLine} has no "${markers.stop}" marker; kept up to end of document`
      );
    }
  }

  await writeLines(
    output,
    blocks.flatMap((block) => block.lines),
    lineEnding
  );
  logger.debug?.(`Wrote ${summary.lines} lines to ${output}`);

  return { input, output, ...summary };
}
