/**
 * Line splitting and joining
 *
 * Documents are split on `\n` only. A `\r` stays part of its line,
 * so CRLF input is written back byte for byte.
 */

import type { LineEnding } from './types.js';

/**
 * Documents are decoded one byte per character. Markers are ASCII, so
 * matching works on any ASCII-compatible encoding, and writing back with
 * the same encoding reproduces every captured byte.
 */
export const DOCUMENT_ENCODING: BufferEncoding = 'latin1';

const TERMINATORS: Record<LineEnding, string> = {
  lf: '\n',
  crlf: '\r\n',
};

/**
 * Split text into lines. A final terminator does not start an extra
 * empty line, and a missing one is tolerated.
 */
export function splitLines(text: string): string[] {
  if (text === '') {
    return [];
  }
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Join lines with a terminator after every line, including the last.
 * With CRLF, a line that still carries its own `\r` gets only the `\n`.
 */
export function serializeLines(
  lines: readonly string[],
  lineEnding: LineEnding = 'lf'
): string {
  const eol = TERMINATORS[lineEnding];
  return lines
    .map((line) => (lineEnding === 'crlf' && line.endsWith('\r') ? line.slice(0, -1) : line) + eol)
    .join('');
}
