/**
 * Extractor Module
 *
 * Pulls ASN.1 blocks out of specification text:
 * - scanner.ts: the START/STOP state machine
 * - io.ts: document read/write and the one-shot extractFile()
 * - split.ts: one file per block, named from its header
 * - definitions.ts: `Name ::=` listing
 * - mapping.ts: which section files an extracted module uses
 */

export {
  BlockExtractor,
  scanBlocks,
  extract,
  summarize,
} from './scanner.js';

export {
  readDocument,
  writeLines,
  extractFile,
  type ExtractFileOptions,
  type ExtractionReport,
} from './io.js';

export {
  splitDocument,
  writeSections,
  type Section,
  type SplitOptions,
} from './split.js';

export { findDefinitions, splitDefinitions, type Definition } from './definitions.js';
export {
  canonicalize,
  collectIdentifiers,
  sectionTypeName,
  mapSections,
  readSourceFiles,
  generateMapping,
  writeMapping,
  MAPPING_MODES,
  type Mapping,
  type MappingMode,
  type MappingOptions,
  type SourceFile,
} from './mapping.js';
export { deriveOutputPath, DEFAULT_OUTPUT_EXTENSION } from './output-path.js';
export { sanitizeHeader, SectionNamer, DEFAULT_SECTION_EXTENSION } from './naming.js';
export { splitLines, serializeLines, DOCUMENT_ENCODING } from './lines.js';

export {
  DEFAULT_MARKERS,
  type BlockMarkers,
  type Block,
  type CaptureMode,
  type LineEnding,
  type ExtractionSummary,
} from './types.js';
