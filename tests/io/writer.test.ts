/**
 * Tests for writing data files.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { DataFileWriter, formatDataFile, loadDataFile, parseDataFile } from '../../src/io/index.js';
import { event, point, stack, type DataRecord } from '../../src/records/index.js';
import { MalformedRecordError, TracelensError } from '../../src/errors/index.js';
import { MemorySink, StructuredLogger } from '../../src/utilities/logger.js';

function fixedClock(...stamps: string[]): () => Date {
  let i = 0;
  return () => new Date(stamps[Math.min(i++, stamps.length - 1)]);
}

describe('DataFileWriter', () => {
  let testDir: string;
  let path: string;
  let sink: MemorySink;
  let logger: StructuredLogger;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'tracelens-writer-'));
    path = join(testDir, 'out', 'run.tlens');
    sink = new MemorySink();
    logger = new StructuredLogger({ level: 'debug', sinks: [sink] });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  // ─── Section lifecycle ──────────────────────────────────────────────

  it('writes the header stamped at completion, then records in arrival order', () => {
    const writer = new DataFileWriter(path, {
      now: fixedClock('2024-05-01T10:00:00.000Z', '2024-05-01T10:00:05.000Z'),
      logger,
    });
    const section = writer.beginSection({ interface: 'memtime', datatype: 'point', extras: { y_units: 'MB' } });
    section.write(point(0, 512, 'firefox'));
    section.write(point(1, 128, 'bash'));
    expect(section.complete()).toEqual({ index: 0, interface: 'memtime', datatype: 'point', records: 2 });
    writer.close();

    expect(readFileSync(path, 'utf-8')).toBe(
      '{"start":"2024-05-01T10:00:00.000Z","end":"2024-05-01T10:00:05.000Z","interface":"memtime","datatype":"point","y_units":"MB"}\n' +
        '0,512,firefox\n' +
        '1,128,bash\n'
    );
  });

  it('completes an open section when the next one begins and on close', () => {
    const writer = new DataFileWriter(path, { logger });
    writer.beginSection({ interface: 'cpusched', datatype: 'event', start: 1 }).write(event(1, 'cpu0', 'switch'));
    writer.beginSection({ interface: 'lib', datatype: 'stack', start: 2 }).write(stack(4, ['ld.so', 'libc']));
    writer.close();

    expect(writer.sections.map(s => s.interface)).toEqual(['cpusched', 'lib']);
    expect(loadDataFile(path).map(s => s.header.interface)).toEqual(['cpusched', 'lib']);
  });

  it('skips sections that received no records', () => {
    const writer = new DataFileWriter(path, { logger });
    writer.beginSection({ interface: 'ipc', datatype: 'event' }).complete();
    writer.collect({ intent: { interface: 'memtime', datatype: 'point', start: 0 }, records: [point(0, 1, 'a')] });
    writer.close();

    expect(writer.sections).toEqual([{ index: 0, interface: 'memtime', datatype: 'point', records: 1 }]);
    expect(sink.getEntries({ level: 'warn' }).map(e => e.message)).toEqual(['Skipping section without records']);
    expect(sink.getEntries({ level: 'warn' })[0].data).toEqual({ file: path, interface: 'ipc' });
  });

  it('rejects a record of the wrong kind', () => {
    const writer = new DataFileWriter(path, { logger });
    const section = writer.beginSection({ interface: 'memtime', datatype: 'point' });
    expect(() => section.write(stack(1, ['a']))).toThrow(MalformedRecordError);
    writer.close();
  });

  it('rejects writes to a completed section and to a closed file', () => {
    const writer = new DataFileWriter(path, { logger });
    const section = writer.beginSection({ interface: 'memtime', datatype: 'point' });
    section.write(point(0, 1, 'a'));
    section.complete();
    expect(() => section.write(point(1, 1, 'a'))).toThrow("Section 'memtime' is already complete");

    writer.close();
    expect(() => writer.beginSection({ interface: 'memtime', datatype: 'point' })).toThrow(TracelensError);
  });

  // ─── Collection runs ────────────────────────────────────────────────

  it('completes the section when the record source fails part-way', () => {
    function* failing(): Generator<DataRecord> {
      yield point(0, 1, 'a');
      yield point(1, 2, 'b');
      throw new Error('collector crashed');
    }

    const writer = new DataFileWriter(path, { logger });
    expect(() => writer.collect({ intent: { interface: 'memtime', datatype: 'point', start: 0 }, records: failing() })).toThrow(
      'collector crashed'
    );
    writer.close();

    const [section] = loadDataFile(path);
    expect(section.records).toHaveLength(2);
  });

  it('calls onClose once with the path', () => {
    const closed: string[] = [];
    const writer = new DataFileWriter(path, { logger, onClose: p => closed.push(p) });
    writer.collect({ intent: { interface: 'memtime', datatype: 'point' }, records: [point(0, 1, 'a')] });
    writer.close();
    writer.close();
    expect(closed).toEqual([path]);
  });

  // ─── Round trip ─────────────────────────────────────────────────────

  it('reproduces a file byte for byte after read then write', () => {
    const original =
      '{"start":"t0","end":"t1","interface":"cpusched","datatype":"event","cpus":[0,1]}\n' +
      '10,cpu0,switch\n' +
      '12,cpu1,wakeup\n' +
      '{"start":5,"end":9,"interface":"ipc","datatype":"event"}\n' +
      '5,100,send,c1\n' +
      '6,200,recv,c1\n' +
      '{"start":"t0","end":"t1","interface":"memleak","datatype":"stack","weight_units":"kB"}\n' +
      '3#main;a%3Bb\n' +
      '1#main\n';

    expect(formatDataFile(parseDataFile(original))).toBe(original);

    const writer = new DataFileWriter(path, { logger });
    for (const section of parseDataFile(original)) {
      writer.writeSection(section);
    }
    writer.close();
    expect(readFileSync(path, 'utf-8')).toBe(original);
  });

  it('refuses tick counts it could not write back unchanged', () => {
    const text = '{"start":0,"end":1,"interface":"cpusched","datatype":"event"}\n1700000000123456789,cpu0,switch\n';
    expect(() => parseDataFile(text)).toThrow(
      "Malformed record '1700000000123456789,cpu0,switch': time is out of safe integer range: '1700000000123456789'"
    );

    const writer = new DataFileWriter(path, { logger });
    const section = writer.beginSection({ interface: 'cpusched', datatype: 'event' });
    expect(() => section.write(event(2 ** 60, 'cpu0', 'switch'))).toThrow(MalformedRecordError);
    writer.close();
  });

  it('reproduces the largest exact tick count and negative zero', () => {
    const original =
      '{"start":0,"end":1,"interface":"cpusched","datatype":"event"}\n' +
      '9007199254740991,cpu0,switch\n' +
      '{"start":0,"end":1,"interface":"memtime","datatype":"point"}\n' +
      '-0,1,a\n';

    expect(formatDataFile(parseDataFile(original))).toBe(original);
  });
});
