/**
 * Data File Codec
 *
 * Entry point for reading and writing data files. Owns the output
 * directory (where bare file names resolve and new files are created) and
 * the state directory (where the path of the last written file is kept).
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';
import { ConfigError } from '../errors/index.js';
import type { IndexedSection } from '../sections/section.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import { listSections, type SectionSummary } from './listing.js';
import { loadDataFile, type LegacyDefaults, type ReadOptions } from './reader.js';
import { DataFileWriter } from './writer.js';

export const DATA_FILE_EXTENSION = '.tlens';

const LAST_FILE_POINTER = 'last-file';

export interface DataFileCodecOptions {
  /** Directory for new data files and for bare file names */
  outputDir: string;
  /** Directory holding the last-written-file pointer */
  stateDir: string;
  now?: () => Date;
  logger?: StructuredLogger;
}

export class DataFileCodec {
  readonly outputDir: string;
  readonly stateDir: string;
  private now: () => Date;
  private logger: StructuredLogger;

  constructor(options: DataFileCodecOptions) {
    this.outputDir = options.outputDir;
    this.stateDir = options.stateDir;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createComponentLogger('DataFileCodec');
  }

  /**
   * Resolve a file name: paths with a directory component are taken as
   * given, bare names live in the output directory, and no name at all
   * yields a new timestamped name.
   */
  resolvePath(name?: string): string {
    if (name === undefined) {
      const stamp = this.now().toISOString().replace(/:/g, '-');
      return join(this.outputDir, `${stamp}${DATA_FILE_EXTENSION}`);
    }
    if (name === '') {
      throw new ConfigError('Data file name must not be empty');
    }
    if (isAbsolute(name) || name.includes('/')) {
      return resolve(name);
    }
    return join(this.outputDir, name);
  }

  /**
   * Open a writer. Closing it records the file as the last written one.
   */
  createWriter(name?: string): DataFileWriter {
    const path = this.resolvePath(name);
    this.logger.child({ file: path }).info('Writing data file');
    return new DataFileWriter(path, {
      now: this.now,
      logger: this.logger,
      onClose: written => this.rememberLastFile(written),
    });
  }

  /**
   * The path of the last data file a writer closed, if any.
   */
  lastFile(): string | undefined {
    const pointer = join(this.stateDir, LAST_FILE_POINTER);
    if (!existsSync(pointer)) {
      return undefined;
    }
    const path = readFileSync(pointer, 'utf-8').trim();
    return path === '' ? undefined : path;
  }

  /**
   * The file to display or list: the named one, else the last written one.
   *
   * @throws ConfigError when no name is given and nothing was written yet
   */
  resolveInput(name?: string): string {
    if (name !== undefined) {
      return this.resolvePath(name);
    }
    const last = this.lastFile();
    if (last === undefined) {
      throw new ConfigError('No input file given and no previously written data file is recorded');
    }
    return last;
  }

  load(path: string, options: ReadOptions = {}): IndexedSection[] {
    const sections = loadDataFile(path, options);
    this.logger.child({ file: path }).debug('Data file loaded', { sections: sections.length });
    return sections;
  }

  list(path: string, legacy?: LegacyDefaults): SectionSummary[] {
    return listSections(path, legacy);
  }

  private rememberLastFile(path: string): void {
    mkdirSync(this.stateDir, { recursive: true });
    writeFileSync(join(this.stateDir, LAST_FILE_POINTER), path + '\n');
  }
}
