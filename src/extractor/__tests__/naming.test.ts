/**
 * Section naming tests
 */

import { describe, it, expect } from 'vitest';
import { sanitizeHeader, SectionNamer } from '../naming.js';

describe('sanitizeHeader', () => {
  it('keeps a plain header as is', () => {
    expect(sanitizeHeader('TDD-Config information element')).toBe('TDD-Config information element');
  });

  it('collapses whitespace runs and trims', () => {
    expect(sanitizeHeader('  MIB \t  message  ')).toBe('MIB message');
  });

  it('replaces reserved characters', () => {
    expect(sanitizeHeader('a/b\\c:d*e?f"g<h>i|j')).toBe('a_b_c_d_e_f_g_h_i_j');
  });

  it('replaces characters outside printable ASCII', () => {
    expect(sanitizeHeader('Réf–1')).toBe('R_f_1');
  });

  it('falls back to "section" for a blank header', () => {
    expect(sanitizeHeader('   ')).toBe('section');
  });
});

describe('SectionNamer', () => {
  it('appends a counter to repeated names', () => {
    const namer = new SectionNamer();

    expect(namer.name('MIB')).toBe('MIB.txt');
    expect(namer.name('SIB1')).toBe('SIB1.txt');
    expect(namer.name('MIB')).toBe('MIB_1.txt');
    expect(namer.name('MIB')).toBe('MIB_2.txt');
  });

  it('counts collisions after sanitizing', () => {
    const namer = new SectionNamer();

    expect(namer.name('a/b')).toBe('a_b.txt');
    expect(namer.name('a:b')).toBe('a_b_1.txt');
  });

  it('uses the given extension', () => {
    expect(new SectionNamer('.asn').name('MIB')).toBe('MIB.asn');
  });
});
