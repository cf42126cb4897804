export { DataFileCodec, DATA_FILE_EXTENSION, type DataFileCodecOptions } from './codec.js';
export { readLinesSync, splitLines } from './lines.js';
export {
  formatSectionTable,
  listDataFile,
  listSections,
  summarizeSections,
  type SectionSummary,
} from './listing.js';
export {
  decodeSection,
  loadDataFile,
  parseDataFile,
  parseSections,
  readSections,
  splitSections,
  type LegacyDefaults,
  type RawLine,
  type RawSection,
  type ReadOptions,
} from './reader.js';
export {
  DataFileWriter,
  SectionWriter,
  formatDataFile,
  type CollectionRun,
  type DataFileWriterOptions,
  type HeaderIntent,
  type WrittenSection,
} from './writer.js';
