/**
 * Section splitter tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { splitDocument, writeSections } from '../split.js';
import { OutputUnwritableError } from '../../errors/index.js';

const DOCUMENT = [
  '6.2.2 Message definitions',
  'MIB message',
  '-- ASN1START',
  'MIB ::= SEQUENCE {',
  '  spare BIT STRING (SIZE (10))',
  '}',
  '',
  '-- ASN1STOP',
  'MIB message',
  '-- ASN1START',
  'MIB-v2 ::= NULL',
  '-- ASN1STOP',
];

describe('splitDocument', () => {
  it('names each section after its header and trims its content', () => {
    const sections = splitDocument(DOCUMENT);

    expect(sections).toEqual([
      {
        fileName: 'MIB message.txt',
        header: 'MIB message',
        startLine: 3,
        content: 'MIB ::= SEQUENCE {\n  spare BIT STRING (SIZE (10))\n}\n',
        terminated: true,
      },
      {
        fileName: 'MIB message_1.txt',
        header: 'MIB message',
        startLine: 10,
        content: 'MIB-v2 ::= NULL\n',
        terminated: true,
      },
    ]);
  });

  it('names a block without a header after its start index', () => {
    const [section] = splitDocument(['', '-- ASN1START', 'A ::= NULL', '-- ASN1STOP']);

    expect(section?.fileName).toBe('section_1.txt');
    expect(section?.header).toBe('section_1');
  });

  it('keeps an unterminated block and flags it', () => {
    const [section] = splitDocument(['Header', '-- ASN1START', 'A ::= NULL']);

    expect(section?.terminated).toBe(false);
    expect(section?.content).toBe('A ::= NULL\n');
  });

  it('honours custom markers and extension', () => {
    const sections = splitDocument(['Title', 'BEGIN', 'A', 'END'], {
      markers: { start: 'BEGIN', stop: 'END' },
      extension: '.asn',
    });

    expect(sections.map((s) => s.fileName)).toEqual(['Title.asn']);
  });

  it('reads headers as UTF-8 before naming', () => {
    // "Träger" as its UTF-8 bytes, one character per byte
    const header = Buffer.from('Tr\u00e4ger message', 'utf-8').toString('latin1');
    const [section] = splitDocument([header, '-- ASN1START', 'A', '-- ASN1STOP']);

    expect(section?.header).toBe('Tr\u00e4ger message');
    expect(section?.fileName).toBe('Tr_ger message.txt');
  });

  it('returns no sections when there are no blocks', () => {
    expect(splitDocument(['prose'])).toEqual([]);
  });
});

describe('writeSections', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'asnx-split-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('creates the directory and writes each section', async () => {
    const outDir = join(tempDir, 'nested', 'sections');
    const files = await writeSections(outDir, splitDocument(DOCUMENT));

    expect(files).toEqual([
      join(outDir, 'MIB message.txt'),
      join(outDir, 'MIB message_1.txt'),
    ]);
    expect(readdirSync(outDir).sort()).toEqual(['MIB message.txt', 'MIB message_1.txt']);
    expect(readFileSync(join(outDir, 'MIB message_1.txt'), 'utf-8')).toBe('MIB-v2 ::= NULL\n');
  });

  it('writes section content byte for byte', async () => {
    const line = 'A ::= NULL -- caf' + String.fromCharCode(0xe9);
    const files = await writeSections(tempDir, splitDocument(['T', '-- ASN1START', line]));

    expect(readFileSync(files[0] ?? '')).toEqual(
      Buffer.concat([Buffer.from('A ::= NULL -- caf'), Buffer.from([0xe9, 0x0a])])
    );
  });

  it('throws OutputUnwritableError when the directory cannot be created', async () => {
    const blocker = join(tempDir, 'file');
    writeFileSync(blocker, 'not a directory');

    await expect(
      writeSections(join(blocker, 'out'), splitDocument(DOCUMENT))
    ).rejects.toBeInstanceOf(OutputUnwritableError);
  });
});
