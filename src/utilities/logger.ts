/**
 * Structured Logger
 *
 * Leveled logging for the codec, the display controller and the backends.
 * Diagnostics go to stderr so that stdout carries only command output
 * (section listings, rendered sections).
 *
 * Every entry names the component that wrote it. A component logger can be
 * narrowed to one data file with {@link StructuredLogger.child}, so entries
 * about sections carry the file they came from:
 *
 *   const log = createComponentLogger('DataFileWriter').child({ file: path });
 *   log.debug('Section written', { index: 0, interface: 'cpusched', records: 120 });
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

// ─── Types ───────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Context carried by every entry of a logger */
export interface LogContext {
  /** Data file being read, written or displayed */
  file?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component?: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: LogSink[];
  component?: string;
  context?: LogContext;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function describeFailure(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ─── Sinks ───────────────────────────────────────────────────────────

/** Human-readable lines on stderr */
export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    const component = entry.component ? ` [${entry.component}]` : '';
    const data = entry.data && Object.keys(entry.data).length > 0 ? ' ' + JSON.stringify(entry.data) : '';
    process.stderr.write(`[${entry.timestamp}] [${entry.level.toUpperCase()}]${component} ${entry.message}${data}\n`);
  }
}

/** Keeps entries in memory; tests read them back */
export class MemorySink implements LogSink {
  private entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  /** Entries at `level` or above, oldest first */
  getEntries(filter: { level?: LogLevel } = {}): LogEntry[] {
    const min = LEVEL_PRIORITY[filter.level ?? 'debug'];
    return this.entries.filter(entry => LEVEL_PRIORITY[entry.level] >= min);
  }
}

/**
 * Appends JSON lines to the configured `logging.file`. The first failed
 * write is reported on stderr and turns the sink off; a bad log path
 * never fails a command.
 */
export class FileSink implements LogSink {
  private prepared = false;
  private disabled = false;

  constructor(readonly path: string) {}

  write(entry: LogEntry): void {
    if (this.disabled) {
      return;
    }
    try {
      if (!this.prepared) {
        mkdirSync(dirname(this.path), { recursive: true });
        this.prepared = true;
      }
      appendFileSync(this.path, JSON.stringify(entry) + '\n');
    } catch (err) {
      this.disabled = true;
      process.stderr.write(`[logger] cannot write ${this.path}, file logging disabled: ${describeFailure(err)}\n`);
    }
  }
}

// ─── Logger ──────────────────────────────────────────────────────────

export class StructuredLogger {
  private readonly minLevel: LogLevel;
  private readonly sinks: readonly LogSink[];
  private readonly component?: string;
  private readonly context: LogContext;

  constructor(config: LoggerConfig = {}) {
    this.minLevel = config.level ?? 'info';
    this.sinks = config.sinks ?? [new ConsoleSink()];
    this.component = config.component;
    this.context = config.context ?? {};
  }

  /** Same sinks and level, with `context` added to every entry */
  child(context: LogContext): StructuredLogger {
    return new StructuredLogger({
      level: this.minLevel,
      sinks: [...this.sinks],
      component: this.component,
      context: { ...this.context, ...context },
    });
  }

  forComponent(component: string): StructuredLogger {
    return new StructuredLogger({ level: this.minLevel, sinks: [...this.sinks], component, context: this.context });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const merged = { ...this.context, ...data };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      ...(this.component !== undefined ? { component: this.component } : {}),
      message,
      ...(Object.keys(merged).length > 0 ? { data: merged } : {}),
    };

    for (const sink of this.sinks) {
      try {
        sink.write(entry);
      } catch (err) {
        // A failing sink must not abort the operation being logged
        process.stderr.write(`[logger] sink ${sink.constructor.name} failed: ${describeFailure(err)}\n`);
      }
    }
  }
}

// ─── Global logger ───────────────────────────────────────────────────

/**
 * Process-wide logger, console at 'info' until `configureLogger()` runs.
 */
export let logger = new StructuredLogger();

export function configureLogger(config: LoggerConfig): void {
  logger = new StructuredLogger(config);
}

/**
 * Logger for one component, taken from the global logger at call time.
 */
export function createComponentLogger(component: string): StructuredLogger {
  return logger.forComponent(component);
}
