/**
 * Extracted-to-section mapping
 *
 * Links the two outputs of asnx: for every extracted module (`extract`)
 * it lists the section files (`split`) whose definitions the module uses.
 *
 * Modes:
 * - defs: a section is used when any one of its `Name ::=` definitions
 *   appears in the module, whitespace ignored. Definitions of one section
 *   may be scattered through the module.
 * - content: the whole section must appear as one contiguous run.
 * - name: an identifier in the module equals the section's file name
 *   with " message" / " information element(s)" removed.
 */

import { readFile, stat, mkdir, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import fg from 'fast-glob';
import { InputUnreadableError, OutputUnwritableError } from '../errors/index.js';
import { splitDefinitions } from './definitions.js';
import { DEFAULT_SECTION_EXTENSION } from './naming.js';
import { DEFAULT_OUTPUT_EXTENSION } from './output-path.js';

export const MAPPING_MODES = ['defs', 'content', 'name'] as const;

export type MappingMode = (typeof MAPPING_MODES)[number];

/** Extracted file name -> section file names it uses, both sorted */
export type Mapping = Record<string, string[]>;

/**
 * A file already read into memory
 */
export interface SourceFile {
  /** File name, relative to its directory */
  name: string;
  text: string;
}

export interface MappingOptions {
  mode?: MappingMode;
  /** Extension of extracted modules (default: .asn) */
  extractedExtension?: string;
  /** Extension of section files (default: .txt) */
  sectionExtension?: string;
}

const SECTION_SUFFIXES = [' information elements', ' information element', ' message'];

const IDENTIFIER = /[A-Za-z][A-Za-z0-9-]*/g;

/**
 * Drop byte order marks and collapse every whitespace run to one space.
 */
export function canonicalize(text: string): string {
  return text.replace(/\uFEFF/g, '').replace(/\s+/g, ' ').trim();
}

/**
 * "DRB-Identity information elements" -> "DRB-Identity"
 */
export function sectionTypeName(stem: string): string {
  const suffix = SECTION_SUFFIXES.find((s) => stem.endsWith(s));
  return suffix === undefined ? stem : stem.slice(0, -suffix.length);
}

export function collectIdentifiers(text: string): Set<string> {
  return new Set(text.match(IDENTIFIER) ?? []);
}

type Matcher = (extracted: SourceFile) => string[];

function compareNames(a: SourceFile, b: SourceFile): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function byDefinitions(sections: readonly SourceFile[]): Matcher {
  const index = sections
    .map((section) => ({
      name: section.name,
      definitions: splitDefinitions(section.text).map(canonicalize).filter((def) => def !== ''),
    }))
    .filter((entry) => entry.definitions.length > 0);

  return (extracted) => {
    const text = canonicalize(extracted.text);
    return index
      .filter((entry) => entry.definitions.some((def) => text.includes(def)))
      .map((entry) => entry.name);
  };
}

function byContent(sections: readonly SourceFile[]): Matcher {
  const index = sections
    .map((section) => ({ name: section.name, text: canonicalize(section.text) }))
    .filter((entry) => entry.text !== '');

  return (extracted) => {
    const text = canonicalize(extracted.text);
    return index.filter((entry) => text.includes(entry.text)).map((entry) => entry.name);
  };
}

function byName(sections: readonly SourceFile[], sectionExtension: string): Matcher {
  // First section (in name order) wins when two share a type name
  const index = new Map<string, string>();
  for (const section of sections) {
    const typeName = sectionTypeName(basename(section.name, sectionExtension));
    if (!index.has(typeName)) {
      index.set(typeName, section.name);
    }
  }

  return (extracted) => {
    const matches: string[] = [];
    for (const token of [...collectIdentifiers(extracted.text)].sort()) {
      const name = index.get(token);
      if (name !== undefined) {
        matches.push(name);
      }
    }
    return matches;
  };
}

/**
 * Map in-memory modules to the sections they use. Both lists are
 * processed in name order.
 */
export function mapSections(
  modules: readonly SourceFile[],
  sections: readonly SourceFile[],
  options: Pick<MappingOptions, 'mode' | 'sectionExtension'> = {}
): Mapping {
  const { mode = 'defs', sectionExtension = DEFAULT_SECTION_EXTENSION } = options;
  const sorted = [...sections].sort(compareNames);

  const matcher =
    mode === 'defs'
      ? byDefinitions(sorted)
      : mode === 'content'
        ? byContent(sorted)
        : byName(sorted, sectionExtension);

  const mapping: Mapping = {};
  for (const extracted of [...modules].sort(compareNames)) {
    mapping[extracted.name] = matcher(extracted);
  }
  return mapping;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Read every file with the given extension directly inside a directory.
 *
 * @throws InputUnreadableError if the directory or one of its files cannot be read
 */
export async function readSourceFiles(dir: string, extension: string): Promise<SourceFile[]> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(dir)).isDirectory();
  } catch (error) {
    throw new InputUnreadableError(dir, toError(error));
  }
  if (!isDirectory) {
    throw new InputUnreadableError(dir, new Error(`Not a directory: ${dir}`));
  }

  const names = await fg(`*${fg.escapePath(extension)}`, {
    cwd: dir,
    onlyFiles: true,
    deep: 1,
    dot: false,
  });

  const files: SourceFile[] = [];
  for (const name of names.sort()) {
    const path = join(dir, name);
    try {
      files.push({ name, text: await readFile(path, 'utf-8') });
    } catch (error) {
      throw new InputUnreadableError(path, toError(error));
    }
  }
  return files;
}

/**
 * Read both directories and map extracted modules to section files.
 */
export async function generateMapping(
  extractedDir: string,
  sectionsDir: string,
  options: MappingOptions = {}
): Promise<Mapping> {
  const {
    extractedExtension = DEFAULT_OUTPUT_EXTENSION,
    sectionExtension = DEFAULT_SECTION_EXTENSION,
  } = options;

  const modules = await readSourceFiles(extractedDir, extractedExtension);
  const sections = await readSourceFiles(sectionsDir, sectionExtension);
  return mapSections(modules, sections, { mode: options.mode, sectionExtension });
}

/**
 * Write the mapping as indented JSON, creating parent directories.
 *
 * @throws OutputUnwritableError if the file cannot be written
 */
export async function writeMapping(path: string, mapping: Mapping): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(mapping, null, 2) + '\n', 'utf-8');
  } catch (error) {
    throw new OutputUnwritableError(path, toError(error));
  }
}
