/**
 * Section listing: scans header lines and counts record lines without
 * decoding any record.
 */

import type { Datatype } from '../records/types.js';
import type { HeaderValue } from '../sections/header.js';
import type { SectionRef } from '../sections/section.js';
import { readLinesSync, splitLines } from './lines.js';
import { splitSections, type LegacyDefaults } from './reader.js';

export interface SectionSummary extends SectionRef {
  datatype: Datatype;
  records: number;
  start: HeaderValue;
  end: HeaderValue;
}

export function summarizeSections(
  lines: Iterable<string>,
  source: string,
  legacy?: LegacyDefaults
): SectionSummary[] {
  const summaries: SectionSummary[] = [];
  for (const raw of splitSections(lines, source, legacy)) {
    summaries.push({
      index: raw.index,
      interface: raw.header.interface,
      datatype: raw.header.datatype,
      records: raw.lines.length,
      start: raw.header.start,
      end: raw.header.end,
    });
  }
  return summaries;
}

export function listSections(path: string, legacy?: LegacyDefaults): SectionSummary[] {
  return summarizeSections(readLinesSync(path), path, legacy);
}

export function listDataFile(text: string, legacy?: LegacyDefaults): SectionSummary[] {
  return summarizeSections(splitLines(text), '<input>', legacy);
}

function cell(value: string | number, width: number, align: 'left' | 'right' = 'left'): string {
  const text = String(value).slice(0, width);
  return align === 'right' ? text.padStart(width) : text.padEnd(width);
}

/**
 * Render summaries as a fixed-width table, header row first.
 */
export function formatSectionTable(summaries: readonly SectionSummary[]): string[] {
  const row = (cells: readonly [string | number, string, string, string | number, HeaderValue, HeaderValue]) =>
    [
      cell(cells[0], 5, 'right'),
      cell(cells[1], 14),
      cell(cells[2], 8),
      cell(cells[3], 8, 'right'),
      cell(cells[4], 26),
      cell(cells[5], 26),
    ].join('  ').trimEnd();

  return [
    row(['Entry', 'Interface', 'Datatype', 'Records', 'Start', 'End']),
    ...summaries.map(s => row([s.index, s.interface, s.datatype, s.records, s.start, s.end])),
  ];
}
