/**
 * tracelens: data interchange and display selection for performance traces.
 */

export * from './records/index.js';
export * from './sections/index.js';
export * from './io/index.js';
export * from './aggregate/index.js';
export * from './display/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export { findInterface, interfaceDatatype, KNOWN_INTERFACES, type InterfaceInfo } from './interfaces.js';
export {
  ConsoleSink,
  FileSink,
  MemorySink,
  StructuredLogger,
  configureLogger,
  createComponentLogger,
  type LogContext,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type LoggerConfig,
} from './utilities/logger.js';
export { run, type RunOptions } from './run.js';
