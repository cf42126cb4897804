/**
 * Tests for the centralized error types.
 */

import { describe, it, expect } from 'vitest';
import {
  ErrorCategory,
  TracelensError,
  MalformedRecordError,
  TruncatedFileError,
  SectionNotFoundError,
  IncompatibleAggregationError,
  IncompatibleVisualizerError,
  ConfigError,
  wrapError,
  isTracelensError,
  formatError,
  formatErrorForLog,
} from '../src/errors/index.js';

describe('Error Types', () => {
  describe('TracelensError', () => {
    it('should create error with all properties', () => {
      const error = new TracelensError('Something went wrong', ErrorCategory.IO, { path: '/tmp/x' });

      expect(error.message).toBe('Something went wrong');
      expect(error.category).toBe(ErrorCategory.IO);
      expect(error.context).toEqual({ path: '/tmp/x' });
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it('should serialize to JSON', () => {
      const json = new TracelensError('Test error', ErrorCategory.INTERNAL, { foo: 'bar' }).toJSON();

      expect(json.name).toBe('TracelensError');
      expect(json.message).toBe('Test error');
      expect(json.category).toBe('INTERNAL');
      expect(json.context).toEqual({ foo: 'bar' });
    });

    it('should format for logging', () => {
      const error = new TracelensError('Test error', ErrorCategory.FORMAT, { line: 3 });
      expect(error.toLogString()).toBe('[TracelensError] (FORMAT) Test error context={"line":3}');
    });
  });

  describe('taxonomy', () => {
    it('should name the offending section in messages', () => {
      expect(new TruncatedFileError('run.tlens', 'file contains no sections').message).toBe(
        'Truncated data file run.tlens: file contains no sections'
      );
      expect(new SectionNotFoundError('4', 1).message).toBe("No section matches '4' (file has 1 section)");
      expect(
        IncompatibleAggregationError.mixedDatatypes('event', 'stack', { index: 2, interface: 'lib' }).message
      ).toBe('Cannot aggregate section 2 (lib, stack) with event data');
      expect(new IncompatibleVisualizerError('heatmap', 'event').message).toBe(
        "Visualizer 'heatmap' cannot render event data: it does not accept event data"
      );
    });

    it('should assign categories', () => {
      expect(new MalformedRecordError('x', 'bad').category).toBe(ErrorCategory.FORMAT);
      expect(new SectionNotFoundError('x', 0).category).toBe(ErrorCategory.SELECTION);
      expect(new IncompatibleAggregationError('x').category).toBe(ErrorCategory.AGGREGATION);
      expect(new ConfigError('x').category).toBe(ErrorCategory.CONFIG);
    });

    it('should add position context to a record error', () => {
      const error = new MalformedRecordError('1,2', 'too few fields').at({ line: 7, section: 0 });
      expect(error.context).toEqual({ reason: 'too few fields', line: 7, section: 0 });
      expect(error.line).toBe('1,2');
    });
  });

  describe('ConfigError.fromZodError', () => {
    it('should list every issue with its path', () => {
      const error = ConfigError.fromZodError(
        {
          issues: [
            { path: ['topN'], message: 'Number must be greater than or equal to 0' },
            { path: [], message: 'Expected object' },
          ],
        },
        'config.json'
      );

      expect(error.message).toBe(
        'Invalid configuration in config.json: topN: Number must be greater than or equal to 0, (root): Expected object'
      );
      expect(error.fields).toEqual(['topN', '']);
    });
  });

  describe('utilities', () => {
    it('wrapError should keep tracelens errors and wrap others', () => {
      const original = new ConfigError('bad');
      expect(wrapError(original)).toBe(original);

      const wrapped = wrapError(new Error('boom'), { step: 'load' });
      expect(wrapped.category).toBe(ErrorCategory.INTERNAL);
      expect(wrapped.cause?.message).toBe('boom');
      expect(wrapped.context).toEqual({ step: 'load' });
    });

    it('wrapError should classify file system errors as IO', () => {
      const enoent = Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' });
      expect(wrapError(enoent).category).toBe(ErrorCategory.IO);
    });

    it('should format errors', () => {
      expect(isTracelensError(new ConfigError('x'))).toBe(true);
      expect(isTracelensError(new Error('x'))).toBe(false);
      expect(formatError(new ConfigError('bad flag'))).toBe('ConfigError: bad flag');
      expect(formatError(new Error('plain'))).toBe('plain');
      expect(formatError('text')).toBe('text');
      expect(formatErrorForLog(new Error('plain'))).toBe('[Error] plain');
    });
  });
});
