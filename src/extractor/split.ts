/**
 * Section Splitter
 *
 * Writes every block of a document to its own file, named after the
 * header line above the block. Useful for feeding single definitions
 * to downstream tooling instead of one concatenated module.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { OutputUnwritableError } from '../errors/index.js';
import { DOCUMENT_ENCODING } from './lines.js';
import { DEFAULT_SECTION_EXTENSION, SectionNamer } from './naming.js';
import { scanBlocks } from './scanner.js';
import { DEFAULT_MARKERS, type BlockMarkers } from './types.js';

/**
 * A block ready to be written as a standalone file
 */
export interface Section {
  fileName: string;
  /** Header the name was built from (UTF-8 text, before sanitizing) */
  header: string;
  startLine: number;
  content: string;
  terminated: boolean;
}

export interface SplitOptions {
  markers?: BlockMarkers;
  /** File extension for section files (default: .txt) */
  extension?: string;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Turn the blocks of a document into named sections.
 *
 * Content is the block's lines joined by newlines with trailing
 * whitespace removed, plus a single final newline.
 */
export function splitDocument(
  lines: Iterable<string>,
  options: SplitOptions = {}
): Section[] {
  const { markers = DEFAULT_MARKERS, extension = DEFAULT_SECTION_EXTENSION } = options;
  const namer = new SectionNamer(extension);

  return scanBlocks(lines, markers).map((block) => {
    // Fallback uses the 0-based index of the START line
    const header =
      block.header === undefined
        ? `section_${block.startLine - 1}`
        : Buffer.from(block.header, DOCUMENT_ENCODING).toString('utf-8');
    return {
      fileName: namer.name(header),
      header,
      startLine: block.startLine,
      content: block.lines.join('\n').trimEnd() + '\n',
      terminated: block.terminated,
    };
  });
}

/**
 * Create the directory (recursively) and write each section into it.
 *
 * @returns Paths of the written files, in document order
 * @throws OutputUnwritableError on the first directory or file that fails
 */
export async function writeSections(
  outDir: string,
  sections: readonly Section[]
): Promise<string[]> {
  try {
    await mkdir(outDir, { recursive: true });
  } catch (error) {
    throw new OutputUnwritableError(outDir, toError(error));
  }

  const written: string[] = [];
  for (const section of sections) {
    const path = join(outDir, section.fileName);
    try {
      await writeFile(path, section.content, DOCUMENT_ENCODING);
    } catch (error) {
      throw new OutputUnwritableError(path, toError(error));
    }
    written.push(path);
  }
  return written;
}
