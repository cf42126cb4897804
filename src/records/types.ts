/**
 * Record Model
 *
 * The three record variants written by collection backends and read back
 * for display. `kind` doubles as the section header's `datatype`.
 */

// =============================================================================
// RECORD VARIANTS
// =============================================================================

/**
 * A 2-D sample, e.g. memory usage of a process at a point in time.
 */
export interface PointRecord {
  readonly kind: 'point';
  readonly x: number;
  readonly y: number;
  /** Series label (process name, device, ...) */
  readonly info: string;
}

/**
 * A timestamped event on a track (PID, event kind, ...).
 */
export interface EventRecord {
  readonly kind: 'event';
  readonly time: number;
  readonly track: string;
  readonly datum: string;
  /**
   * Reference shared by the two partners of a paired event
   * (e.g. an IPC send and its receive). Absent for standalone events.
   */
  readonly connection?: string;
}

/**
 * A weighted call stack.
 */
export interface StackRecord {
  readonly kind: 'stack';
  readonly weight: number;
  /** Frames ordered root-to-leaf: the outermost caller comes first. */
  readonly stack: readonly string[];
}

export type DataRecord = PointRecord | EventRecord | StackRecord;

export type Datatype = DataRecord['kind'];

/** Narrow a record union to one variant by its datatype. */
export type RecordOf<D extends Datatype> = Extract<DataRecord, { kind: D }>;

export const DATATYPES: readonly Datatype[] = ['point', 'event', 'stack'] as const;

export function isDatatype(value: unknown): value is Datatype {
  return value === 'point' || value === 'event' || value === 'stack';
}

// =============================================================================
// CONSTRUCTORS
// =============================================================================

export function point(x: number, y: number, info: string): PointRecord {
  return { kind: 'point', x, y, info };
}

export function event(time: number, track: string, datum: string, connection?: string): EventRecord {
  return connection === undefined
    ? { kind: 'event', time, track, datum }
    : { kind: 'event', time, track, datum, connection };
}

export function stack(weight: number, frames: readonly string[]): StackRecord {
  return { kind: 'stack', weight, stack: [...frames] };
}

/**
 * Exhaustiveness guard for switches over record kinds.
 */
export function assertNever(value: never, what = 'value'): never {
  throw new Error(`Unexpected ${what}: ${JSON.stringify(value)}`);
}
