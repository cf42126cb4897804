/**
 * Tests for the canonical record encoding.
 */

import { describe, it, expect } from 'vitest';
import {
  decodeRecord,
  encodeRecord,
  event,
  point,
  stack,
  type DataRecord,
} from '../../src/records/index.js';
import { MalformedRecordError } from '../../src/errors/index.js';

describe('record codec', () => {
  // ─── Encoding ───────────────────────────────────────────────────────

  describe('encodeRecord', () => {
    it('encodes a point as x,y,info', () => {
      expect(encodeRecord(point(1.5, 512, 'firefox'))).toBe('1.5,512,firefox');
    });

    it('encodes an event without and with a connection', () => {
      expect(encodeRecord(event(10, 'cpu0', 'switch'))).toBe('10,cpu0,switch');
      expect(encodeRecord(event(12, '4242', 'send', 'conn-1'))).toBe('12,4242,send,conn-1');
    });

    it('encodes a stack root-to-leaf', () => {
      expect(encodeRecord(stack(3, ['main', 'parse', 'read']))).toBe('3#main;parse;read');
    });

    it('escapes delimiters inside free text', () => {
      expect(encodeRecord(point(0, 1, 'a,b#c;d%'))).toBe('0,1,a%2Cb%23c%3Bd%25');
      expect(encodeRecord(stack(1, ['ns::f;g', 'h']))).toBe('1#ns::f%3Bg;h');
    });

    it('rejects non-finite numbers', () => {
      expect(() => encodeRecord(point(Number.NaN, 1, 'x'))).toThrow(MalformedRecordError);
      expect(() => encodeRecord(stack(Number.POSITIVE_INFINITY, ['a']))).toThrow(/finite/);
    });

    it('rejects numbers beyond the safe integer range', () => {
      expect(() => encodeRecord(event(2 ** 60, 'cpu0', 'switch'))).toThrow(
        'time is out of safe integer range: 1152921504606846976'
      );
    });

    it('keeps the sign of negative zero', () => {
      expect(encodeRecord(point(-0, 1, 'a'))).toBe('-0,1,a');
    });

    it('rejects an empty stack and an empty connection', () => {
      expect(() => encodeRecord(stack(1, []))).toThrow(/at least one frame/);
      expect(() => encodeRecord(event(1, 't', 'd', ''))).toThrow(/must not be empty/);
    });
  });

  // ─── Decoding ───────────────────────────────────────────────────────

  describe('decodeRecord', () => {
    it('decodes each variant', () => {
      expect(decodeRecord('point', '0,512,firefox')).toEqual({ kind: 'point', x: 0, y: 512, info: 'firefox' });
      expect(decodeRecord('event', '12,4242,send,conn-1')).toEqual({
        kind: 'event',
        time: 12,
        track: '4242',
        datum: 'send',
        connection: 'conn-1',
      });
      expect(decodeRecord('stack', '3#a;b')).toEqual({ kind: 'stack', weight: 3, stack: ['a', 'b'] });
    });

    it('keeps surrounding spaces in free text and drops only the line break', () => {
      expect(decodeRecord('point', '1,2, padded \n')).toEqual({ kind: 'point', x: 1, y: 2, info: ' padded ' });
    });

    it('accepts exponent and signed literals', () => {
      expect(decodeRecord('point', '-1e3,+.5,x')).toEqual({ kind: 'point', x: -1000, y: 0.5, info: 'x' });
    });

    it.each([
      ['point', '1,2', /expects 3 fields/],
      ['point', '1,2,a,b', /expects 3 fields/],
      ['point', 'one,2,a', /x is not a number/],
      ['point', '1,0x10,a', /y is not a number/],
      ['point', '1,2,bad%zz', /invalid escape/],
      ['event', '1,cpu0', /expects 3 or 4 fields/],
      ['event', '1,cpu0,switch,', /must not be empty/],
      ['stack', '3', /found 0 '#' separators/],
      ['stack', '3#a#b', /found 2 '#' separators/],
      ['stack', '#a;b', /weight is not a number/],
      ['event', '1700000000123456789,cpu0,switch', /time is out of safe integer range/],
      ['event', '9007199254740993,cpu0,switch', /time is out of safe integer range/],
      ['point', '1e400,1,a', /x is out of safe integer range/],
    ] as const)('rejects %s line %j', (datatype, line, reason) => {
      expect(() => decodeRecord(datatype, line)).toThrow(reason);
    });

    it('carries the offending line and reason', () => {
      try {
        decodeRecord('point', '1,2');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(MalformedRecordError);
        if (err instanceof MalformedRecordError) {
          expect(err.line).toBe('1,2');
          expect(err.reason).toBe('point expects 3 fields (x,y,info), got 2');
          expect(err.message).toBe("Malformed record '1,2': point expects 3 fields (x,y,info), got 2");
        }
      }
    });
  });

  // ─── Round trip ─────────────────────────────────────────────────────

  describe('round trip', () => {
    it('decodes negative zero as negative zero', () => {
      expect(Object.is(decodeRecord('point', '-0,1,a').x, -0)).toBe(true);
    });

    const records: DataRecord[] = [
      point(0.25, -3, 'web server, worker #2'),
      point(Number.MAX_SAFE_INTEGER, -Number.MAX_SAFE_INTEGER, ''),
      point(-0, 1, 'a'),
      event(1.5, 'pid 10', 'write;flush', 'tcp:1,2'),
      event(0, '%', '\n'),
      stack(7, ['main', 'a;b', 'c#d', '50%']),
      stack(0.5, ['leaf only']),
    ];

    it.each(records.map(r => [r.kind, r] as const))('reproduces a %s record', (_kind, record) => {
      expect(decodeRecord(record.kind, encodeRecord(record))).toEqual(record);
    });
  });
});
