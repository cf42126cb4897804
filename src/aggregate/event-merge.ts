/**
 * Event merge
 *
 * Combines event sections from several sources into one timeline so that a
 * renderer can draw standalone events (scheduler switches, block requests)
 * as markers and paired events (an IPC send and its receive) as lines
 * between their two partners.
 */

import { IncompatibleAggregationError } from '../errors/index.js';
import type { EventRecord } from '../records/types.js';
import { isSectionOf, sectionRef, type IndexedSection, type SectionRef } from '../sections/section.js';

// =============================================================================
// TYPES
// =============================================================================

export interface TimelineEvent {
  readonly time: number;
  readonly track: string;
  readonly datum: string;
  /** Section the event was read from */
  readonly source: number;
  readonly connection?: string;
  /** Position in {@link Timeline.events} of the connection partner */
  readonly partner?: number;
}

export interface TimelineLink {
  readonly connection: string;
  readonly from: number;
  readonly to: number;
}

export interface Timeline {
  readonly sources: readonly SectionRef[];
  /** Ordered by time; events at the same time keep their input order */
  readonly events: readonly TimelineEvent[];
  /** Track names in order of first appearance on the timeline */
  readonly tracks: readonly string[];
  readonly links: readonly TimelineLink[];
}

// =============================================================================
// MERGE
// =============================================================================

/**
 * Merge event sections into a single timeline.
 *
 * Events sharing a connection reference are paired in time order: the
 * first with the second, the third with the fourth. A reference seen an odd
 * number of times leaves its last event unlinked.
 *
 * @throws IncompatibleAggregationError when a section does not hold events,
 *   or when there is nothing to merge
 */
export function mergeEvents(sections: readonly IndexedSection[]): Timeline {
  if (sections.length === 0) {
    throw new IncompatibleAggregationError('No event sections to merge');
  }

  const collected: Array<{ record: EventRecord; source: number }> = [];
  for (const section of sections) {
    if (!isSectionOf(section, 'event')) {
      throw IncompatibleAggregationError.mixedDatatypes('event', section.header.datatype, sectionRef(section));
    }
    for (const record of section.records) {
      collected.push({ record, source: section.index });
    }
  }

  collected.sort((a, b) => a.record.time - b.record.time);

  const partners = new Map<number, number>();
  const links: TimelineLink[] = [];
  const waiting = new Map<string, number>();
  collected.forEach(({ record }, position) => {
    if (record.connection === undefined) {
      return;
    }
    const first = waiting.get(record.connection);
    if (first === undefined) {
      waiting.set(record.connection, position);
      return;
    }
    waiting.delete(record.connection);
    partners.set(first, position);
    partners.set(position, first);
    links.push({ connection: record.connection, from: first, to: position });
  });

  const tracks = new Set<string>();
  const events = collected.map(({ record, source }, position): TimelineEvent => {
    tracks.add(record.track);
    const partner = partners.get(position);
    return {
      time: record.time,
      track: record.track,
      datum: record.datum,
      source,
      ...(record.connection !== undefined ? { connection: record.connection } : {}),
      ...(partner !== undefined ? { partner } : {}),
    };
  });

  return { sources: sections.map(sectionRef), events, tracks: [...tracks], links };
}

/**
 * Events without a linked partner.
 */
export function standaloneEvents(timeline: Timeline): TimelineEvent[] {
  return timeline.events.filter(event => event.partner === undefined);
}
