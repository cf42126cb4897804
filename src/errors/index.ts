/**
 * Centralized Error Types
 *
 * Typed, categorized errors for reading, aggregating and displaying
 * tracelens data files.
 *
 * Error Categories:
 * - FORMAT: a data file line or header cannot be decoded
 * - SELECTION: a requested section does not exist
 * - AGGREGATION: sections cannot be combined
 * - VISUALIZER: a visualizer cannot render a section
 * - CONFIG: invalid configuration or command-line usage
 *
 * @example
 * ```typescript
 * throw new MalformedRecordError('1,2', 'expected 3 fields, got 2', { line: 4 });
 * ```
 */

import type { Datatype } from '../records/types.js';

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

/**
 * Categories of errors, used for exit codes and log formatting.
 */
export enum ErrorCategory {
  /** Bad line syntax or header content in a data file */
  FORMAT = 'FORMAT',

  /** Selection by index or interface matched nothing */
  SELECTION = 'SELECTION',

  /** Sections cannot be aggregated together */
  AGGREGATION = 'AGGREGATION',

  /** Resolved visualizer cannot render the data */
  VISUALIZER = 'VISUALIZER',

  /** Invalid configuration or arguments */
  CONFIG = 'CONFIG',

  /** File system failures */
  IO = 'IO',

  /** Unexpected internal failures */
  INTERNAL = 'INTERNAL',
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all tracelens errors.
 */
export class TracelensError extends Error {
  readonly category: ErrorCategory;

  readonly timestamp: Date;

  /** Section index, interface, line number and similar details */
  readonly context: Record<string, unknown>;

  readonly cause?: Error;

  constructor(
    message: string,
    category: ErrorCategory,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = 'TracelensError';
    this.category = category;
    this.timestamp = new Date();
    this.context = context ?? {};
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      cause: this.cause?.message,
      stack: this.stack,
    };
  }

  /**
   * Format error for logging.
   */
  toLogString(): string {
    const parts = [`[${this.name}]`, `(${this.category})`, this.message];

    if (Object.keys(this.context).length > 0) {
      parts.push(`context=${JSON.stringify(this.context)}`);
    }

    return parts.join(' ');
  }
}

// =============================================================================
// DATA FILE ERRORS
// =============================================================================

/**
 * A record line does not match its variant's canonical encoding.
 */
export class MalformedRecordError extends TracelensError {
  /** The offending line (or a rendering of the offending record on encode) */
  readonly line: string;

  readonly reason: string;

  constructor(line: string, reason: string, context?: Record<string, unknown>) {
    super(`Malformed record '${line}': ${reason}`, ErrorCategory.FORMAT, { ...context, reason });
    this.name = 'MalformedRecordError';
    this.line = line;
    this.reason = reason;
  }

  /**
   * Re-raise with the position of the line in a file.
   */
  at(context: Record<string, unknown>): MalformedRecordError {
    return new MalformedRecordError(this.line, this.reason, { ...this.context, ...context });
  }
}

/**
 * A header line is not a JSON object or lacks a recognised key.
 */
export class MalformedHeaderError extends TracelensError {
  readonly line: string;

  constructor(line: string, reason: string, context?: Record<string, unknown>) {
    super(`Malformed section header: ${reason}`, ErrorCategory.FORMAT, { ...context, header: line });
    this.name = 'MalformedHeaderError';
    this.line = line;
  }
}

/**
 * A header declares a datatype that is not one of the record variants.
 */
export class UnknownDatatypeError extends TracelensError {
  readonly datatype: string;

  constructor(datatype: string, context?: Record<string, unknown>) {
    super(
      `Unknown datatype '${datatype}' (expected one of: point, event, stack)`,
      ErrorCategory.FORMAT,
      { ...context, datatype }
    );
    this.name = 'UnknownDatatypeError';
    this.datatype = datatype;
  }
}

/**
 * The file ends in an incomplete section, or has no section at all.
 */
export class TruncatedFileError extends TracelensError {
  readonly path: string;

  constructor(path: string, reason: string, context?: Record<string, unknown>) {
    super(`Truncated data file ${path}: ${reason}`, ErrorCategory.FORMAT, { ...context, path });
    this.name = 'TruncatedFileError';
    this.path = path;
  }
}

// =============================================================================
// SELECTION / AGGREGATION / DISPLAY ERRORS
// =============================================================================

/**
 * A selector (index or interface name) matched no section.
 */
export class SectionNotFoundError extends TracelensError {
  readonly selector: string;

  constructor(selector: string, available: number) {
    super(
      `No section matches '${selector}' (file has ${available} section${available === 1 ? '' : 's'})`,
      ErrorCategory.SELECTION,
      { selector, available }
    );
    this.name = 'SectionNotFoundError';
    this.selector = selector;
  }
}

/**
 * Sections of different record variants were asked to be aggregated together.
 */
export class IncompatibleAggregationError extends TracelensError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCategory.AGGREGATION, context);
    this.name = 'IncompatibleAggregationError';
  }

  static mixedDatatypes(
    expected: Datatype,
    found: Datatype,
    section: { index: number; interface: string }
  ): IncompatibleAggregationError {
    return new IncompatibleAggregationError(
      `Cannot aggregate section ${section.index} (${section.interface}, ${found}) with ${expected} data`,
      { expected, found, section: section.index, interface: section.interface }
    );
  }
}

/**
 * The resolved visualizer cannot render the section's datatype.
 */
export class IncompatibleVisualizerError extends TracelensError {
  readonly visualizer: string;

  constructor(
    visualizer: string,
    datatype: Datatype,
    section?: { index: number; interface: string },
    detail?: string
  ) {
    const where = section ? `section ${section.index} (${section.interface})` : `${datatype} data`;
    super(
      `Visualizer '${visualizer}' cannot render ${where}: ${detail ?? `it does not accept ${datatype} data`}`,
      ErrorCategory.VISUALIZER,
      { visualizer, datatype, section: section?.index, interface: section?.interface }
    );
    this.name = 'IncompatibleVisualizerError';
    this.visualizer = visualizer;
  }
}

// =============================================================================
// CONFIGURATION ERRORS
// =============================================================================

/**
 * Invalid configuration file content or command-line usage.
 */
export class ConfigError extends TracelensError {
  readonly fields?: string[];

  constructor(message: string, fields?: string[], context?: Record<string, unknown>) {
    super(message, ErrorCategory.CONFIG, { ...context, fields });
    this.name = 'ConfigError';
    this.fields = fields;
  }

  /**
   * Create error from a Zod validation result.
   */
  static fromZodError(
    error: { issues: Array<{ path: (string | number)[]; message: string }> },
    source?: string
  ): ConfigError {
    const fields = error.issues.map(i => i.path.join('.'));
    const messages = error.issues.map(i => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`);
    return new ConfigError(
      `Invalid configuration${source ? ` in ${source}` : ''}: ${messages.join(', ')}`,
      fields
    );
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

/**
 * Wrap an unknown error as a TracelensError.
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): TracelensError {
  if (error instanceof TracelensError) {
    return error;
  }

  const err = error instanceof Error ? error : new Error(String(error));
  const category = 'code' in err && typeof err.code === 'string' && err.code.startsWith('E')
    ? ErrorCategory.IO
    : ErrorCategory.INTERNAL;

  return new TracelensError(err.message, category, context, err);
}

export function isTracelensError(error: unknown): error is TracelensError {
  return error instanceof TracelensError;
}

/**
 * Format error for display to user.
 */
export function formatError(error: unknown): string {
  if (error instanceof TracelensError) {
    return `${error.name}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Format error for logging with full details.
 */
export function formatErrorForLog(error: unknown): string {
  if (error instanceof TracelensError) {
    return error.toLogString();
  }
  if (error instanceof Error) {
    return `[Error] ${error.message}`;
  }
  return `[Unknown] ${String(error)}`;
}
