/**
 * Block Scanner
 *
 * A two-state machine over document lines:
 *
 *   idle ──(line contains START)──▶ capturing
 *   capturing ──(line contains STOP)──▶ idle
 *
 * Marker lines are never captured. While idle only START is tested and
 * while capturing only STOP is, so a stray STOP is ignored and a second
 * START inside a block is ordinary content. A block still open at the end
 * of the document is kept as it stands.
 */

import {
  DEFAULT_MARKERS,
  type Block,
  type BlockMarkers,
  type CaptureMode,
  type ExtractionSummary,
} from './types.js';

/**
 * Incremental scanner. Feed lines in document order with push(),
 * then call finish() once.
 *
 * @example
 * const extractor = new BlockExtractor();
 * for (const line of lines) extractor.push(line);
 * const blocks = extractor.finish();
 */
export class BlockExtractor {
  private mode: CaptureMode = 'idle';
  private current: Block | null = null;
  private readonly blocks: Block[] = [];
  private lineNumber = 0;
  private lastNonEmpty: string | undefined;

  constructor(private readonly markers: BlockMarkers = DEFAULT_MARKERS) {}

  /** Current scanner state */
  get state(): CaptureMode {
    return this.mode;
  }

  push(line: string): void {
    this.lineNumber++;

    if (this.mode === 'idle') {
      if (line.includes(this.markers.start)) {
        this.mode = 'capturing';
        this.current = {
          startLine: this.lineNumber,
          header: this.lastNonEmpty,
          lines: [],
          terminated: false,
        };
      }
    } else if (this.current !== null) {
      if (line.includes(this.markers.stop)) {
        this.current.terminated = true;
        this.blocks.push(this.current);
        this.current = null;
        this.mode = 'idle';
      } else {
        this.current.lines.push(line);
      }
    }

    const trimmed = line.trim();
    if (trimmed !== '') {
      this.lastNonEmpty = trimmed;
    }
  }

  /**
   * End the scan and return every block in document order.
   * An open block is closed as unterminated.
   */
  finish(): Block[] {
    if (this.current !== null) {
      this.blocks.push(this.current);
      this.current = null;
      this.mode = 'idle';
    }
    return [...this.blocks];
  }
}

/**
 * Scan a whole document and return its blocks.
 */
export function scanBlocks(
  lines: Iterable<string>,
  markers: BlockMarkers = DEFAULT_MARKERS
): Block[] {
  const extractor = new BlockExtractor(markers);
  for (const line of lines) {
    extractor.push(line);
  }
  return extractor.finish();
}

/**
 * Return the captured buffer: the lines of every block, concatenated
 * in document order with no separator. Never throws.
 *
 * @example
 * extract(['intro', '-- ASN1START', 'A ::= INTEGER', '-- ASN1STOP'])
 * // => ['A ::= INTEGER']
 */
export function extract(
  lines: Iterable<string>,
  markers: BlockMarkers = DEFAULT_MARKERS
): string[] {
  return scanBlocks(lines, markers).flatMap((block) => block.lines);
}

export function summarize(blocks: readonly Block[]): ExtractionSummary {
  let lines = 0;
  let unterminated = 0;
  for (const block of blocks) {
    lines += block.lines.length;
    if (!block.terminated) unterminated++;
  }
  return { blocks: blocks.length, lines, unterminated };
}
