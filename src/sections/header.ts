/**
 * Section headers.
 *
 * A header is a single-line JSON object. The recognised keys come first
 * (`start`, `end`, `interface`, `datatype`); every other key is passthrough
 * and is written back unchanged, in the order it was read.
 */

import { z } from 'zod';
import { MalformedHeaderError, UnknownDatatypeError } from '../errors/index.js';
import { isDatatype, type Datatype } from '../records/types.js';

// =============================================================================
// TYPES
// =============================================================================

export type HeaderValue = string | number;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface HeaderOf<D extends Datatype> {
  /** Collection start time */
  readonly start: HeaderValue;
  /** Collection end time */
  readonly end: HeaderValue;
  /** Name of the backend that produced the section */
  readonly interface: string;
  readonly datatype: D;
  /** Passthrough keys (data options such as `weight_units`, `x_label`) */
  readonly extras: Readonly<Record<string, JsonValue>>;
}

/** A header of any datatype; `datatype` discriminates the union. */
export type SectionHeader = { [D in Datatype]: HeaderOf<D> }[Datatype];

export const RECOGNISED_KEYS = ['start', 'end', 'interface', 'datatype'] as const;

// =============================================================================
// SCHEMAS
// =============================================================================

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

const HeaderObjectSchema = z.record(JsonValueSchema);

const HeaderValueSchema = z.union([z.string(), z.number()]);

const RecognisedSchema = z.object({
  start: HeaderValueSchema,
  end: HeaderValueSchema,
  interface: z.string().min(1),
});

// =============================================================================
// CONSTRUCTION
// =============================================================================

const RECOGNISED: ReadonlySet<string> = new Set(RECOGNISED_KEYS);

function isRecognisedKey(key: string): boolean {
  return RECOGNISED.has(key);
}

/**
 * Build a header, dropping passthrough keys that collide with recognised ones.
 */
export function createHeader<D extends Datatype>(fields: {
  start: HeaderValue;
  end: HeaderValue;
  interface: string;
  datatype: D;
  extras?: Record<string, JsonValue>;
}): HeaderOf<D> {
  const extras: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(fields.extras ?? {})) {
    if (!isRecognisedKey(key)) {
      extras[key] = value;
    }
  }
  return {
    start: fields.start,
    end: fields.end,
    interface: fields.interface,
    datatype: fields.datatype,
    extras,
  };
}

// =============================================================================
// ENCODING
// =============================================================================

/**
 * Header lines are JSON objects; record lines never start with `{`.
 */
export function isHeaderLine(line: string): boolean {
  return line.trimStart().startsWith('{');
}

export function encodeHeader(header: SectionHeader): string {
  const object: Record<string, JsonValue> = {
    start: header.start,
    end: header.end,
    interface: header.interface,
    datatype: header.datatype,
  };
  for (const [key, value] of Object.entries(header.extras)) {
    if (!isRecognisedKey(key)) {
      object[key] = value;
    }
  }
  return JSON.stringify(object);
}

/**
 * Decode a header line.
 *
 * @throws UnknownDatatypeError when `datatype` is not a record variant
 * @throws MalformedHeaderError for invalid JSON or missing recognised keys
 */
export function decodeHeader(line: string, context: Record<string, unknown> = {}): SectionHeader {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    throw new MalformedHeaderError(line, `not valid JSON (${err instanceof Error ? err.message : String(err)})`, context);
  }

  const object = HeaderObjectSchema.safeParse(raw);
  if (!object.success) {
    throw new MalformedHeaderError(line, 'expected a JSON object', context);
  }
  const fields = object.data;

  const datatype = fields.datatype;
  if (datatype === undefined) {
    throw new MalformedHeaderError(line, "missing 'datatype'", context);
  }
  if (!isDatatype(datatype)) {
    throw new UnknownDatatypeError(String(datatype), { ...context, interface: fields.interface });
  }

  const recognised = RecognisedSchema.safeParse(fields);
  if (!recognised.success) {
    const issues = recognised.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new MalformedHeaderError(line, issues.join(', '), context);
  }

  const extras: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (!isRecognisedKey(key)) {
      extras[key] = value;
    }
  }

  return {
    start: recognised.data.start,
    end: recognised.data.end,
    interface: recognised.data.interface,
    datatype,
    extras,
  };
}
