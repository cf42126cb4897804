/**
 * Synchronous line iteration over a file, one chunk at a time, so that a
 * large data file is never held in memory as a whole.
 *
 * Lines are split on raw `\n` bytes and each one is decoded as strict UTF-8.
 * A line that is not valid UTF-8 is a MalformedRecordError: decoding it with
 * replacement characters would change the file on rewrite.
 */

import { closeSync, openSync, readSync } from 'node:fs';
import { MalformedRecordError } from '../errors/index.js';

const CHUNK_SIZE = 64 * 1024;
const NEWLINE = 0x0a;

// ignoreBOM keeps a leading U+FEFF in the text instead of dropping it
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

function decodeLine(bytes: Uint8Array, path: string, line: number): string {
  try {
    return stripCarriageReturn(utf8.decode(bytes));
  } catch (err) {
    if (!(err instanceof TypeError)) {
      throw err;
    }
    throw new MalformedRecordError(Buffer.from(bytes).toString('utf8'), 'line is not valid UTF-8', {
      path,
      line,
    });
  }
}

export function* readLinesSync(path: string, chunkSize = CHUNK_SIZE): Generator<string> {
  const fd = openSync(path, 'r');
  const buffer = Buffer.alloc(chunkSize);
  let pending: Buffer = Buffer.alloc(0);
  let line = 0;

  try {
    for (;;) {
      const bytesRead = readSync(fd, buffer, 0, chunkSize, null);
      if (bytesRead === 0) {
        break;
      }
      // concat copies, so `buffer` can be reused by the next read
      pending = Buffer.concat([pending, buffer.subarray(0, bytesRead)]);

      let start = 0;
      let newline = pending.indexOf(NEWLINE, start);
      while (newline !== -1) {
        yield decodeLine(pending.subarray(start, newline), path, ++line);
        start = newline + 1;
        newline = pending.indexOf(NEWLINE, start);
      }
      pending = pending.subarray(start);
    }

    if (pending.length > 0) {
      yield decodeLine(pending, path, ++line);
    }
  } finally {
    closeSync(fd);
  }
}

/**
 * Split in-memory text the same way {@link readLinesSync} splits a file.
 */
export function splitLines(text: string): string[] {
  const lines = text.split('\n').map(stripCarriageReturn);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}
