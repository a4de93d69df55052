/**
 * Section file naming
 *
 * A block's file name comes from the prose line just above it, usually
 * the clause title, e.g. "TDD-Config information element".
 */

export const DEFAULT_SECTION_EXTENSION = '.txt';

// Characters Windows and POSIX file systems reject or treat specially
const RESERVED_CHARS = /[\\/:*?"<>|]/g;

/**
 * Clean a header into a file-name stem: whitespace runs collapse to one
 * space, characters outside printable ASCII and reserved characters
 * become `_`. An empty result becomes `section`.
 */
export function sanitizeHeader(header: string): string {
  const cleaned = Array.from(header.replace(/\s+/g, ' ').trim())
    .map((ch) => {
      const code = ch.codePointAt(0) ?? 0;
      return code >= 32 && code < 127 ? ch : '_';
    })
    .join('')
    .replace(RESERVED_CHARS, '_');
  return cleaned === '' ? 'section' : cleaned;
}

/**
 * Hands out unique file names. The first use of a stem keeps it as is;
 * later uses get `_1`, `_2`, ... appended.
 */
export class SectionNamer {
  private readonly seen = new Map<string, number>();

  constructor(private readonly extension: string = DEFAULT_SECTION_EXTENSION) {}

  name(header: string): string {
    const stem = sanitizeHeader(header);
    const count = this.seen.get(stem) ?? 0;
    this.seen.set(stem, count + 1);
    const unique = count > 0 ? `${stem}_${count}` : stem;
    return unique + this.extension;
  }
}
