/**
 * ASN.1 definition listing
 *
 * Finds type and value assignments (`Name ::= ...`) in extracted text.
 * This is a pattern scan, not a parser: it looks for an identifier at the
 * start of a line followed by `::=`. The whitespace between the two may
 * include line breaks, so `Foo\n  ::= SEQUENCE` counts.
 */

const DEFINITION_PATTERN = /^\s*([A-Za-z][A-Za-z0-9-]*)\s*::=/gm;

export interface Definition {
  name: string;
  /** 1-based line number of the name */
  line: number;
}

interface DefinitionMatch extends Definition {
  /** Offset where the match begins, leading whitespace included */
  offset: number;
}

function matchDefinitions(text: string): DefinitionMatch[] {
  const matches: DefinitionMatch[] = [];
  for (const match of text.matchAll(DEFINITION_PATTERN)) {
    const name = match[1];
    if (name === undefined || match.index === undefined) continue;
    // Leading whitespace is all that precedes the name inside the match
    const nameOffset = match.index + match[0].indexOf(name);
    const line = text.slice(0, nameOffset).split('\n').length;
    matches.push({ name, line, offset: match.index });
  }
  return matches;
}

export function findDefinitions(text: string): Definition[] {
  return matchDefinitions(text).map(({ name, line }) => ({ name, line }));
}

/**
 * Cut text into one piece per definition. A piece runs from its
 * `Name ::=` up to the next one (or the end). Text before the first
 * definition is dropped, as are pieces that are empty after trimming.
 */
export function splitDefinitions(text: string): string[] {
  const offsets = matchDefinitions(text).map((def) => def.offset);

  const pieces: string[] = [];
  offsets.forEach((start, i) => {
    const piece = text.slice(start, offsets[i + 1] ?? text.length).trim();
    if (piece !== '') {
      pieces.push(piece);
    }
  });
  return pieces;
}
