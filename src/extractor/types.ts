/**
 * Extractor Types
 *
 * Shapes shared by the marker scanner, the file I/O layer and the CLI.
 */

/**
 * The pair of literal substrings that bracket an ASN.1 block.
 * A line "contains" a marker when the marker appears anywhere in it.
 */
export interface BlockMarkers {
  start: string;
  stop: string;
}

/**
 * Markers used by 3GPP specifications.
 */
export const DEFAULT_MARKERS: Readonly<BlockMarkers> = {
  start: '-- ASN1START',
  stop: '-- ASN1STOP',
};

/**
 * Scanner state. Exactly one is active at a time; every run starts idle.
 */
export type CaptureMode = 'idle' | 'capturing';

/**
 * Line terminator written after every output line.
 */
export type LineEnding = 'lf' | 'crlf';

/**
 * One block found in a document.
 */
export interface Block {
  /** 1-based line number of the START marker line */
  startLine: number;

  /**
   * Last non-empty line (trimmed) before the START marker.
   * Undefined when the block opens the document.
   */
  header?: string;

  /** Lines strictly between the markers, verbatim */
  lines: string[];

  /** False when the document ended before a STOP marker */
  terminated: boolean;
}

/**
 * Counts reported after a scan.
 */
export interface ExtractionSummary {
  blocks: number;
  lines: number;
  /** Blocks closed by end of document rather than a STOP marker */
  unterminated: number;
}
