/**
 * Line splitting and serialization tests
 */

import { describe, it, expect } from 'vitest';
import { splitLines, serializeLines } from '../lines.js';

describe('splitLines', () => {
  it('returns no lines for empty text', () => {
    expect(splitLines('')).toEqual([]);
  });

  it('does not add an empty line for a trailing newline', () => {
    expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
  });

  it('tolerates a missing final newline', () => {
    expect(splitLines('a\nb')).toEqual(['a', 'b']);
  });

  it('keeps a single empty line', () => {
    expect(splitLines('\n')).toEqual(['']);
  });

  it('keeps carriage returns inside lines', () => {
    expect(splitLines('a\r\nb\r\n')).toEqual(['a\r', 'b\r']);
  });
});

describe('serializeLines', () => {
  it('terminates every line with LF by default', () => {
    expect(serializeLines(['A ::= INTEGER', 'B ::= BOOLEAN'])).toBe('A ::= INTEGER\nB ::= BOOLEAN\n');
  });

  it('uses CRLF when asked', () => {
    expect(serializeLines(['a', 'b'], 'crlf')).toBe('a\r\nb\r\n');
  });

  it('does not double the carriage return of CRLF input', () => {
    expect(serializeLines(splitLines('a\r\nb\n'), 'crlf')).toBe('a\r\nb\r\n');
  });

  it('writes nothing for no lines', () => {
    expect(serializeLines([])).toBe('');
  });

  it('round-trips CRLF input byte for byte', () => {
    const text = 'x\r\ny\r\n';
    expect(serializeLines(splitLines(text))).toBe(text);
  });
});
