/**
 * Tests for the block scanner
 *
 * Tests cover:
 * - Documents without blocks
 * - Single and multiple well-formed blocks
 * - Stray and repeated markers
 * - Unterminated trailing block
 * - Substring marker matching
 * - Block metadata (start line, header, terminated)
 */

import { describe, it, expect } from 'vitest';
import {
  BlockExtractor,
  extract,
  scanBlocks,
  summarize,
} from '../scanner.js';

describe('extract', () => {
  describe('documents without blocks', () => {
    it('returns nothing for an empty document', () => {
      expect(extract([])).toEqual([]);
    });

    it('returns nothing for prose only', () => {
      expect(extract(['intro', 'A ::= INTEGER', 'outro'])).toEqual([]);
    });

    it('ignores a STOP marker seen while idle', () => {
      expect(extract(['-- ASN1STOP', 'prose'])).toEqual([]);
    });
  });

  describe('well-formed blocks', () => {
    it('returns exactly the lines between one pair of markers', () => {
      const lines = ['intro', '-- ASN1START', 'A ::= SEQUENCE {', '  a INTEGER', '}', '-- ASN1STOP', 'outro'];

      expect(extract(lines)).toEqual(['A ::= SEQUENCE {', '  a INTEGER', '}']);
    });

    it('concatenates several blocks in document order', () => {
      const lines = [
        'intro',
        '-- ASN1START',
        'A ::= INTEGER',
        '-- ASN1STOP',
        'more prose',
        '-- ASN1START',
        'B ::= BOOLEAN',
        '-- ASN1STOP',
      ];

      expect(extract(lines)).toEqual(['A ::= INTEGER', 'B ::= BOOLEAN']);
    });

    it('returns nothing for a block with no interior lines', () => {
      expect(extract(['-- ASN1START', '-- ASN1STOP'])).toEqual([]);
    });

    it('keeps lines verbatim, including whitespace and empty lines', () => {
      const lines = ['-- ASN1START', '\tA ::= INTEGER  ', '', '   ', '-- ASN1STOP'];

      expect(extract(lines)).toEqual(['\tA ::= INTEGER  ', '', '   ']);
    });

    it('keeps duplicate lines from different blocks', () => {
      const lines = ['-- ASN1START', 'X', '-- ASN1STOP', '-- ASN1START', 'X', '-- ASN1STOP'];

      expect(extract(lines)).toEqual(['X', 'X']);
    });
  });

  describe('marker matching', () => {
    it('matches markers anywhere in a line', () => {
      const lines = ['// -- ASN1START extra text', 'A ::= INTEGER', 'end -- ASN1STOP here'];

      expect(extract(lines)).toEqual(['A ::= INTEGER']);
    });

    it('captures a START marker seen inside a block as content', () => {
      const lines = ['-- ASN1START', 'A', '-- ASN1START', 'B', '-- ASN1STOP', 'prose'];

      expect(extract(lines)).toEqual(['A', '-- ASN1START', 'B']);
    });

    it('uses custom markers', () => {
      const lines = ['BEGIN', 'A', 'END', '-- ASN1START', 'B', '-- ASN1STOP'];

      expect(extract(lines, { start: 'BEGIN', stop: 'END' })).toEqual(['A']);
    });

    it('does not match marker text that differs in case', () => {
      expect(extract(['-- asn1start', 'A', '-- asn1stop'])).toEqual([]);
    });
  });

  describe('unterminated blocks', () => {
    it('keeps every line after the last START when STOP never comes', () => {
      const lines = ['-- ASN1START', 'A', '-- ASN1STOP', 'prose', '-- ASN1START', 'B', 'C'];

      expect(extract(lines)).toEqual(['A', 'B', 'C']);
    });
  });

  it('gives the same result when run twice on the same input', () => {
    const lines = ['x', '-- ASN1START', 'A', '-- ASN1STOP', '-- ASN1START', 'B'];

    expect(extract(lines)).toEqual(extract(lines));
  });

  it('accepts any iterable of lines', () => {
    function* lines() {
      yield '-- ASN1START';
      yield 'A ::= NULL';
      yield '-- ASN1STOP';
    }

    expect(extract(lines())).toEqual(['A ::= NULL']);
  });
});

describe('scanBlocks', () => {
  it('records start line, header and termination per block', () => {
    const lines = [
      'TDD-Config information element',
      '',
      '-- ASN1START',
      'TDD-Config ::= SEQUENCE {}',
      '-- ASN1STOP',
      'MIB message',
      '-- ASN1START',
      'MIB ::= NULL',
    ];

    expect(scanBlocks(lines)).toEqual([
      {
        startLine: 3,
        header: 'TDD-Config information element',
        lines: ['TDD-Config ::= SEQUENCE {}'],
        terminated: true,
      },
      {
        startLine: 7,
        header: 'MIB message',
        lines: ['MIB ::= NULL'],
        terminated: false,
      },
    ]);
  });

  it('leaves header undefined for a block that opens the document', () => {
    const [block] = scanBlocks(['-- ASN1START', 'A', '-- ASN1STOP']);

    expect(block?.header).toBeUndefined();
  });

  it('trims the header line', () => {
    const [block] = scanBlocks(['   Clause title  ', '-- ASN1START', '-- ASN1STOP']);

    expect(block?.header).toBe('Clause title');
  });

  it('uses the previous STOP line as header for back-to-back blocks', () => {
    const blocks = scanBlocks(['-- ASN1START', 'A', '-- ASN1STOP', '-- ASN1START', 'B', '-- ASN1STOP']);

    expect(blocks[1]?.header).toBe('-- ASN1STOP');
  });
});

describe('BlockExtractor', () => {
  it('starts idle and tracks the capture state', () => {
    const extractor = new BlockExtractor();
    expect(extractor.state).toBe('idle');

    extractor.push('-- ASN1START');
    expect(extractor.state).toBe('capturing');

    extractor.push('-- ASN1STOP');
    expect(extractor.state).toBe('idle');
  });

  it('closes an open block on finish', () => {
    const extractor = new BlockExtractor();
    extractor.push('-- ASN1START');
    extractor.push('A');

    const blocks = extractor.finish();

    expect(extractor.state).toBe('idle');
    expect(blocks).toHaveLength(1);
    expect(blocks[0]?.terminated).toBe(false);
  });
});

describe('summarize', () => {
  it('counts blocks, lines and unterminated blocks', () => {
    const blocks = scanBlocks(['-- ASN1START', 'A', 'B', '-- ASN1STOP', '-- ASN1START', 'C']);

    expect(summarize(blocks)).toEqual({ blocks: 2, lines: 3, unterminated: 1 });
  });

  it('returns zeros for no blocks', () => {
    expect(summarize([])).toEqual({ blocks: 0, lines: 0, unterminated: 0 });
  });
});
