/**
 * Data File Writer
 *
 * Sequential, single-owner writer for data files. Sections are appended in
 * the order they are completed; a section's header line (whose `end` time
 * is only known at completion) is written together with its records when
 * the section completes.
 *
 * Precondition: the writer owns the file exclusively while open. Nothing
 * enforces this; reading a file that is still being written is undefined.
 *
 * @example
 * ```typescript
 * const writer = new DataFileWriter('/tmp/run.tlens');
 * const section = writer.beginSection({ interface: 'memtime', datatype: 'point' });
 * section.write(point(0, 512, 'firefox'));
 * section.complete();
 * writer.close();
 * ```
 */

import { closeSync, mkdirSync, openSync, writeSync } from 'node:fs';
import { dirname } from 'node:path';
import { ErrorCategory, MalformedRecordError, TracelensError } from '../errors/index.js';
import { encodeRecord } from '../records/codec.js';
import type { DataRecord, Datatype } from '../records/types.js';
import { encodeHeader, type HeaderValue, type JsonValue, type SectionHeader } from '../sections/header.js';
import type { Section } from '../sections/section.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * What a collection backend declares about a section before its records arrive.
 */
export interface HeaderIntent {
  interface: string;
  datatype: Datatype;
  /** Defaults to the time the section is begun */
  start?: HeaderValue;
  /** Passthrough header keys such as data options */
  extras?: Record<string, JsonValue>;
}

/**
 * One collection run: the header intent and the records it emits, in order.
 * Exhausting `records` is the explicit completion signal.
 */
export interface CollectionRun {
  intent: HeaderIntent;
  records: Iterable<DataRecord>;
}

export interface DataFileWriterOptions {
  /** Clock for `start`/`end` stamps */
  now?: () => Date;
  logger?: StructuredLogger;
  /** Called with the file path once the writer is closed */
  onClose?: (path: string) => void;
}

export interface WrittenSection {
  index: number;
  interface: string;
  datatype: Datatype;
  records: number;
}

// =============================================================================
// FORMATTING
// =============================================================================

function formatSection(header: SectionHeader, lines: readonly string[]): string {
  return [encodeHeader(header), ...lines].join('\n') + '\n';
}

/**
 * The exact file content the writer produces for these sections.
 */
export function formatDataFile(sections: readonly Section[]): string {
  return sections
    .map(section => {
      const records: readonly DataRecord[] = section.records;
      return formatSection(section.header, records.map(encodeRecord));
    })
    .join('');
}

// =============================================================================
// SECTION WRITER
// =============================================================================

export class SectionWriter {
  private lines: string[] = [];
  private completed = false;

  constructor(
    private readonly owner: DataFileWriter,
    readonly intent: HeaderIntent,
    readonly start: HeaderValue
  ) {}

  get recordCount(): number {
    return this.lines.length;
  }

  get isComplete(): boolean {
    return this.completed;
  }

  /**
   * Append one record.
   *
   * @throws MalformedRecordError when the record's kind differs from the
   *   section datatype or the record cannot be encoded
   */
  write(record: DataRecord): void {
    if (this.completed) {
      throw new TracelensError(
        `Section '${this.intent.interface}' is already complete`,
        ErrorCategory.INTERNAL,
        { interface: this.intent.interface }
      );
    }
    if (record.kind !== this.intent.datatype) {
      throw new MalformedRecordError(
        JSON.stringify(record),
        `record kind '${record.kind}' does not match section datatype '${this.intent.datatype}'`,
        { interface: this.intent.interface }
      );
    }
    this.lines.push(encodeRecord(record));
  }

  /**
   * Flush the header and the buffered records. Idempotent.
   */
  complete(end?: HeaderValue): WrittenSection | undefined {
    if (this.completed) {
      return undefined;
    }
    this.completed = true;
    return this.owner.flushSection(this, this.lines, end);
  }
}

// =============================================================================
// FILE WRITER
// =============================================================================

export class DataFileWriter {
  readonly path: string;
  private fd: number | null;
  private now: () => Date;
  private logger: StructuredLogger;
  private onClose?: (path: string) => void;
  private open: SectionWriter | null = null;
  private written: WrittenSection[] = [];

  constructor(path: string, options: DataFileWriterOptions = {}) {
    this.path = path;
    this.now = options.now ?? (() => new Date());
    this.logger = (options.logger ?? createComponentLogger('DataFileWriter')).child({ file: path });
    this.onClose = options.onClose;

    mkdirSync(dirname(path), { recursive: true });
    this.fd = openSync(path, 'w');
  }

  get sections(): readonly WrittenSection[] {
    return this.written;
  }

  /**
   * Begin a new section. A section still open is completed first, so that
   * sections land in the order they were begun.
   */
  beginSection(intent: HeaderIntent): SectionWriter {
    this.assertOpen();
    this.open?.complete();
    this.open = new SectionWriter(this, intent, intent.start ?? this.now().toISOString());
    return this.open;
  }

  /**
   * Write one collection run as one section. The section is completed even
   * when the record source fails part-way; the failure is then rethrown.
   */
  collect(run: CollectionRun): WrittenSection | undefined {
    const section = this.beginSection(run.intent);
    try {
      for (const record of run.records) {
        section.write(record);
      }
    } catch (err) {
      section.complete();
      throw err;
    }
    return section.complete();
  }

  /**
   * Complete any open section and close the file.
   */
  close(): void {
    if (this.fd === null) {
      return;
    }
    this.open?.complete();
    this.open = null;
    closeSync(this.fd);
    this.fd = null;
    this.logger.debug('Data file closed', { sections: this.written.length });
    this.onClose?.(this.path);
  }

  /**
   * Write a complete section, header included, as read from another file.
   */
  writeSection(section: Section): WrittenSection | undefined {
    this.assertOpen();
    this.open?.complete();
    const records: readonly DataRecord[] = section.records;
    return this.appendSection(section.header, records.map(encodeRecord));
  }

  /** @internal called by {@link SectionWriter.complete} */
  flushSection(section: SectionWriter, lines: readonly string[], end?: HeaderValue): WrittenSection | undefined {
    if (this.open === section) {
      this.open = null;
    }
    const { intent } = section;
    const header: SectionHeader = {
      start: section.start,
      end: end ?? this.now().toISOString(),
      interface: intent.interface,
      datatype: intent.datatype,
      extras: intent.extras ?? {},
    };
    return this.appendSection(header, lines);
  }

  private appendSection(header: SectionHeader, lines: readonly string[]): WrittenSection | undefined {
    const fd = this.assertOpen();

    if (lines.length === 0) {
      this.logger.warn('Skipping section without records', { interface: header.interface });
      return undefined;
    }

    writeSync(fd, formatSection(header, lines));

    const written: WrittenSection = {
      index: this.written.length,
      interface: header.interface,
      datatype: header.datatype,
      records: lines.length,
    };
    this.written.push(written);
    this.logger.debug('Section written', { ...written });
    return written;
  }

  private assertOpen(): number {
    if (this.fd === null) {
      throw new TracelensError(`Data file ${this.path} is closed`, ErrorCategory.IO, { path: this.path });
    }
    return this.fd;
  }
}
