/**
 * Data File Reader
 *
 * A data file is an ordered sequence of sections, each a header line
 * followed by one line per record:
 *
 * ```
 * {"start":"...","end":"...","interface":"cpusched","datatype":"event"}
 * 10,cpu0,switch
 * 12,cpu1,wakeup
 * {"start":"...","end":"...","interface":"memtime","datatype":"point"}
 * 0,512,firefox
 * ```
 *
 * Blank lines are ignored. A file without any header is a legacy
 * single-section file and is read with caller-supplied defaults.
 */

import { MalformedRecordError, TruncatedFileError } from '../errors/index.js';
import { decodeRecord } from '../records/codec.js';
import type { Datatype, RecordOf } from '../records/types.js';
import {
  decodeHeader,
  isHeaderLine,
  type HeaderOf,
  type HeaderValue,
  type JsonValue,
  type SectionHeader,
} from '../sections/header.js';
import type { IndexedSection, SectionOf } from '../sections/section.js';
import { readLinesSync, splitLines } from './lines.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * Header used for a legacy file that carries no header line.
 */
export interface LegacyDefaults {
  interface: string;
  datatype: Datatype;
  start?: HeaderValue;
  end?: HeaderValue;
  extras?: Record<string, JsonValue>;
}

export interface ReadOptions {
  /** Name used in error messages (defaults to the path) */
  source?: string;
  legacy?: LegacyDefaults;
}

/** One line of a section, with its 1-based position in the file. */
export interface RawLine {
  text: string;
  lineNo: number;
}

/** A section whose record lines have not been decoded yet. */
export interface RawSection {
  index: number;
  header: SectionHeader;
  lines: RawLine[];
}

// =============================================================================
// SECTION BOUNDARIES
// =============================================================================

function legacyHeader(defaults: LegacyDefaults): SectionHeader {
  return {
    start: defaults.start ?? 'unknown',
    end: defaults.end ?? 'unknown',
    interface: defaults.interface,
    datatype: defaults.datatype,
    extras: defaults.extras ?? {},
  };
}

/**
 * Split lines into sections by their header lines, without decoding
 * records. Sections are yielded as soon as the next header is seen.
 *
 * @throws TruncatedFileError for an empty file, a header without records,
 *   or headerless records in a file that also has headers
 */
export function* splitSections(
  lines: Iterable<string>,
  source: string,
  legacy?: LegacyDefaults
): Generator<RawSection> {
  let current: RawSection | null = null;
  const headerless: RawLine[] = [];
  let lineNo = 0;

  const closeCurrent = (section: RawSection): RawSection => {
    if (section.lines.length === 0) {
      throw new TruncatedFileError(
        source,
        `section ${section.index} (${section.header.interface}) has a header but no records`,
        { section: section.index, interface: section.header.interface }
      );
    }
    return section;
  };

  for (const text of lines) {
    lineNo++;
    if (text.trim() === '') {
      continue;
    }

    if (isHeaderLine(text)) {
      if (headerless.length > 0) {
        throw new TruncatedFileError(
          source,
          `records at line ${headerless[0].lineNo} precede the first section header (line ${lineNo})`,
          { line: headerless[0].lineNo }
        );
      }
      const index: number = current ? current.index + 1 : 0;
      const header = decodeHeader(text, { line: lineNo, section: index });
      if (current) {
        yield closeCurrent(current);
      }
      current = { index, header, lines: [] };
      continue;
    }

    if (current) {
      current.lines.push({ text, lineNo });
    } else {
      headerless.push({ text, lineNo });
    }
  }

  if (current) {
    yield closeCurrent(current);
    return;
  }

  if (headerless.length === 0) {
    throw new TruncatedFileError(source, 'file contains no sections');
  }
  if (!legacy) {
    throw new TruncatedFileError(
      source,
      'records without a section header (legacy file read without defaults)',
      { line: headerless[0].lineNo }
    );
  }
  yield { index: 0, header: legacyHeader(legacy), lines: headerless };
}

// =============================================================================
// RECORD DECODING
// =============================================================================

function decodeLines<D extends Datatype>(
  header: HeaderOf<D>,
  index: number,
  lines: readonly RawLine[]
): SectionOf<D> & { index: number } {
  const records: RecordOf<D>[] = lines.map(({ text, lineNo }) => {
    try {
      return decodeRecord(header.datatype, text);
    } catch (err) {
      if (err instanceof MalformedRecordError) {
        throw err.at({ line: lineNo, section: index, interface: header.interface });
      }
      throw err;
    }
  });
  return { index, header, records };
}

/**
 * Decode the record lines of a raw section.
 *
 * @throws MalformedRecordError naming the line, section index and interface
 */
export function decodeSection(raw: RawSection): IndexedSection {
  const { header, index, lines } = raw;
  switch (header.datatype) {
    case 'point':
      return decodeLines(header, index, lines);
    case 'event':
      return decodeLines(header, index, lines);
    case 'stack':
      return decodeLines(header, index, lines);
  }
}

// =============================================================================
// READING
// =============================================================================

/**
 * Lazily decode the sections of a sequence of lines.
 */
export function* parseSections(lines: Iterable<string>, options: ReadOptions = {}): Generator<IndexedSection> {
  for (const raw of splitSections(lines, options.source ?? '<input>', options.legacy)) {
    yield decodeSection(raw);
  }
}

/**
 * Lazily read the sections of a data file. Only the section being decoded
 * is held in memory.
 */
export function readSections(path: string, options: ReadOptions = {}): Generator<IndexedSection> {
  return parseSections(readLinesSync(path), { ...options, source: options.source ?? path });
}

/**
 * Decode every section of in-memory file content.
 */
export function parseDataFile(text: string, options: ReadOptions = {}): IndexedSection[] {
  return [...parseSections(splitLines(text), options)];
}

/**
 * Read and decode every section of a data file. Any decode error aborts
 * the whole load.
 */
export function loadDataFile(path: string, options: ReadOptions = {}): IndexedSection[] {
  return [...readSections(path, options)];
}
