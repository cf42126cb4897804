/**
 * Tests for the structured logger and its sinks.
 */

import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  ConsoleSink,
  FileSink,
  MemorySink,
  StructuredLogger,
  configureLogger,
  createComponentLogger,
  type LogSink,
} from '../../src/utilities/logger.js';

describe('StructuredLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops entries below the minimum level', () => {
    const sink = new MemorySink();
    const log = new StructuredLogger({ level: 'warn', sinks: [sink] });

    log.info('hidden');
    log.warn('shown');

    expect(sink.getEntries().map(e => e.message)).toEqual(['shown']);
  });

  it('tags entries with the component and the file of a child logger', () => {
    const sink = new MemorySink();
    configureLogger({ sinks: [sink] });
    const log = createComponentLogger('DataFileWriter').child({ file: '/data/run.tlens' });

    log.info('Section written', { index: 0, records: 3 });

    const [entry] = sink.getEntries();
    expect(entry.component).toBe('DataFileWriter');
    expect(entry.data).toEqual({ file: '/data/run.tlens', index: 0, records: 3 });
  });

  it('filters entries by level', () => {
    const sink = new MemorySink();
    const log = new StructuredLogger({ level: 'debug', sinks: [sink] });

    log.debug('one');
    log.warn('two');
    log.error('three');

    expect(sink.getEntries({ level: 'warn' }).map(e => e.message)).toEqual(['two', 'three']);
  });

  it('keeps writing to other sinks when one fails', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const broken: LogSink = {
      write() {
        throw new Error('disk full');
      },
    };
    const sink = new MemorySink();
    const log = new StructuredLogger({ sinks: [broken, sink] });

    log.info('still logged');

    expect(sink.getEntries()).toHaveLength(1);
    expect(stderr).toHaveBeenCalledWith('[logger] sink Object failed: disk full\n');
  });

  it('writes console entries to stderr', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    new ConsoleSink().write({ timestamp: 'T', level: 'info', component: 'DisplayController', message: 'hello', data: { a: 1 } });
    expect(stderr).toHaveBeenCalledWith('[T] [INFO] [DisplayController] hello {"a":1}\n');
  });
});

describe('FileSink', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'tracelens-log-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(testDir, { recursive: true, force: true });
  });

  it('appends JSON lines, creating the directory', () => {
    const path = join(testDir, 'logs', 'tracelens.log');
    const sink = new FileSink(path);
    sink.write({ timestamp: 'T1', level: 'info', message: 'first' });
    sink.write({ timestamp: 'T2', level: 'warn', component: 'DataFileCodec', message: 'second' });

    expect(readFileSync(path, 'utf-8')).toBe(
      '{"timestamp":"T1","level":"info","message":"first"}\n' +
        '{"timestamp":"T2","level":"warn","component":"DataFileCodec","message":"second"}\n'
    );
  });

  it('reports an unwritable path once and stops writing', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const blocker = join(testDir, 'not-a-dir');
    writeFileSync(blocker, '');
    const sink = new FileSink(join(blocker, 'tracelens.log'));

    sink.write({ timestamp: 'T1', level: 'info', message: 'first' });
    sink.write({ timestamp: 'T2', level: 'info', message: 'second' });

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0][0])).toMatch(
      new RegExp(`^\\[logger\\] cannot write ${join(blocker, 'tracelens.log')}, file logging disabled: `)
    );
  });
});
