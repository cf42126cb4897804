/**
 * Canonical text encoding of records.
 *
 * One record per line:
 * - point: `x,y,info`
 * - event: `time,track,datum[,connection]`
 * - stack: `weight#frame1;frame2;...` (root-to-leaf)
 *
 * Free-text fields are escaped with {@link escapeField}, so
 * `decodeRecord(r.kind, encodeRecord(r))` reproduces `r` exactly.
 */

import { MalformedRecordError } from '../errors/index.js';
import { escapeField, unescapeField } from './escape.js';
import {
  assertNever,
  type DataRecord,
  type Datatype,
  type EventRecord,
  type PointRecord,
  type RecordOf,
  type StackRecord,
} from './types.js';

const FIELD_SEPARATOR = ',';
const WEIGHT_SEPARATOR = '#';
const FRAME_SEPARATOR = ';';

const NUMBER_LITERAL = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

// =============================================================================
// FIELD HELPERS
// =============================================================================

// Beyond this magnitude a number no longer holds every integer exactly,
// so a tick count read from a file could not be written back unchanged.
function isInSafeRange(value: number): boolean {
  return Math.abs(value) <= Number.MAX_SAFE_INTEGER;
}

function encodeNumber(value: number, field: string, record: DataRecord): string {
  if (!Number.isFinite(value)) {
    throw new MalformedRecordError(describe(record), `${field} must be a finite number, got ${value}`);
  }
  if (!isInSafeRange(value)) {
    throw new MalformedRecordError(describe(record), `${field} is out of safe integer range: ${value}`);
  }
  return Object.is(value, -0) ? '-0' : String(value);
}

function decodeNumber(text: string, field: string, line: string): number {
  if (!NUMBER_LITERAL.test(text)) {
    throw new MalformedRecordError(line, `${field} is not a number: '${text}'`);
  }
  const value = Number(text);
  if (!Number.isFinite(value) || !isInSafeRange(value)) {
    throw new MalformedRecordError(line, `${field} is out of safe integer range: '${text}'`);
  }
  return value;
}

function decodeText(text: string, field: string, line: string): string {
  const value = unescapeField(text);
  if (value === null) {
    throw new MalformedRecordError(line, `${field} contains an invalid escape sequence`);
  }
  return value;
}

function describe(record: DataRecord): string {
  return JSON.stringify(record);
}

// =============================================================================
// PER-VARIANT CODECS
// =============================================================================

export function encodePoint(record: PointRecord): string {
  return [
    encodeNumber(record.x, 'x', record),
    encodeNumber(record.y, 'y', record),
    escapeField(record.info),
  ].join(FIELD_SEPARATOR);
}

export function decodePoint(line: string): PointRecord {
  const fields = line.split(FIELD_SEPARATOR);
  if (fields.length !== 3) {
    throw new MalformedRecordError(line, `point expects 3 fields (x,y,info), got ${fields.length}`);
  }
  const [x, y, info] = fields;
  return {
    kind: 'point',
    x: decodeNumber(x, 'x', line),
    y: decodeNumber(y, 'y', line),
    info: decodeText(info, 'info', line),
  };
}

export function encodeEvent(record: EventRecord): string {
  const fields = [
    encodeNumber(record.time, 'time', record),
    escapeField(record.track),
    escapeField(record.datum),
  ];
  if (record.connection !== undefined) {
    if (record.connection === '') {
      throw new MalformedRecordError(describe(record), 'connection reference must not be empty');
    }
    fields.push(escapeField(record.connection));
  }
  return fields.join(FIELD_SEPARATOR);
}

export function decodeEvent(line: string): EventRecord {
  const fields = line.split(FIELD_SEPARATOR);
  if (fields.length !== 3 && fields.length !== 4) {
    throw new MalformedRecordError(
      line,
      `event expects 3 or 4 fields (time,track,datum[,connection]), got ${fields.length}`
    );
  }
  const [time, track, datum, connection] = fields;
  const base = {
    kind: 'event' as const,
    time: decodeNumber(time, 'time', line),
    track: decodeText(track, 'track', line),
    datum: decodeText(datum, 'datum', line),
  };
  if (connection === undefined) {
    return base;
  }
  if (connection === '') {
    throw new MalformedRecordError(line, 'connection reference must not be empty');
  }
  return { ...base, connection: decodeText(connection, 'connection', line) };
}

export function encodeStack(record: StackRecord): string {
  if (record.stack.length === 0) {
    throw new MalformedRecordError(describe(record), 'stack must have at least one frame');
  }
  const weight = encodeNumber(record.weight, 'weight', record);
  return `${weight}${WEIGHT_SEPARATOR}${record.stack.map(escapeField).join(FRAME_SEPARATOR)}`;
}

export function decodeStack(line: string): StackRecord {
  const parts = line.split(WEIGHT_SEPARATOR);
  if (parts.length !== 2) {
    throw new MalformedRecordError(line, `stack expects 'weight#frames', found ${parts.length - 1} '#' separators`);
  }
  const [weight, frames] = parts;
  return {
    kind: 'stack',
    weight: decodeNumber(weight, 'weight', line),
    stack: frames.split(FRAME_SEPARATOR).map((frame, i) => decodeText(frame, `frame ${i}`, line)),
  };
}

// =============================================================================
// DISPATCH
// =============================================================================

export function encodeRecord(record: DataRecord): string {
  switch (record.kind) {
    case 'point':
      return encodePoint(record);
    case 'event':
      return encodeEvent(record);
    case 'stack':
      return encodeStack(record);
    default:
      return assertNever(record, 'record kind');
  }
}

/**
 * Decode one line as a record of the given datatype. A trailing line
 * break is ignored; any other whitespace belongs to the fields.
 *
 * @throws MalformedRecordError when the line does not match the encoding
 */
export function decodeRecord<D extends Datatype>(datatype: D, line: string): RecordOf<D>;
export function decodeRecord(datatype: Datatype, line: string): DataRecord {
  const body = line.replace(/\r?\n$/, '');
  switch (datatype) {
    case 'point':
      return decodePoint(body);
    case 'event':
      return decodeEvent(body);
    case 'stack':
      return decodeStack(body);
    default:
      return assertNever(datatype, 'datatype');
  }
}
