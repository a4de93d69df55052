/**
 * Tests for defs command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { createDefsCommand } from '../defs.js';
import type { CommandContext } from '../../types.js';
import { InputUnreadableError } from '../../../errors/index.js';

const ASN_TEXT = [
  'MIB ::= SEQUENCE {',
  '  systemFrameNumber BIT STRING (SIZE (8))',
  '}',
  '',
  'TDD-Config ::= SEQUENCE {}',
  '',
].join('\n');

describe('createDefsCommand', () => {
  let mockContext: CommandContext;
  let logOutput: string[];
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let testDir: string;
  let asnFile: string;

  function run(...args: string[]): Promise<Command> {
    const program = new Command();
    program.addCommand(createDefsCommand(() => mockContext));
    program.exitOverride();
    return program.parseAsync(['node', 'test', 'defs', ...args]);
  }

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'asnx-defs-cmd-'));
    asnFile = path.join(testDir, 'rrc.asn');
    fs.writeFileSync(asnFile, ASN_TEXT);

    logOutput = [];
    mockContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('lists each definition with its line number', async () => {
    await run(asnFile);

    expect(logOutput).toHaveLength(2);
    expect(logOutput[0]).toContain('MIB       ');
    expect(logOutput[0]).toContain('1');
    expect(logOutput[1]).toContain('TDD-Config');
    expect(logOutput[1]).toContain('5');
  });

  it('prints definitions as JSON', async () => {
    mockContext.options.json = true;

    await run(asnFile);

    expect(JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]))).toEqual([
      { name: 'MIB', line: 1 },
      { name: 'TDD-Config', line: 5 },
    ]);
  });

  it('prints full definitions with --full', async () => {
    await run(asnFile, '--full');

    expect(logOutput).toEqual([
      'MIB ::= SEQUENCE {\n  systemFrameNumber BIT STRING (SIZE (8))\n}\n\nTDD-Config ::= SEQUENCE {}',
    ]);
  });

  it('reports a file without definitions', async () => {
    fs.writeFileSync(asnFile, 'BEGIN\nEND\n');

    await run(asnFile);

    expect(logOutput).toHaveLength(1);
    expect(logOutput[0]).toContain('No definitions found.');
  });

  it('throws InputUnreadableError for a missing file', async () => {
    await expect(run(path.join(testDir, 'missing.asn'))).rejects.toBeInstanceOf(InputUnreadableError);
  });
});
