/**
 * Payload preparation
 *
 * Turns one section (or a merged group of event sections) into the shape a
 * visualizer consumes. Nothing here renders anything; the payload is handed
 * to a visualizer backend as is.
 */

import { IncompatibleVisualizerError } from '../errors/index.js';
import type { PointRecord, StackRecord } from '../records/types.js';
import type { JsonValue } from '../sections/header.js';
import { isSectionOf, sectionRef, type IndexedSection, type Section, type SectionRef } from '../sections/section.js';
import { isCompatible, supportsMerged, type Visualizer } from '../display/visualizers.js';
import { mergeEvents, type Timeline } from './event-merge.js';
import { buildStackedSeries, type StackedSeries } from './padding.js';
import { aggregateStacks, collapseStacks, groupStacks, isOtherGroup, OTHER_KEY } from './top-n.js';

// =============================================================================
// TYPES
// =============================================================================

export interface AggregationParams {
  /** Groups kept by top-N aggregation */
  readonly topN: number;
  /** Frames kept per stack in a treemap */
  readonly treemapDepth: number;
}

export interface TreeNode {
  readonly name: string;
  readonly value: number;
  readonly children: readonly TreeNode[];
}

export type PayloadData =
  | { readonly shape: 'collapsed'; readonly lines: readonly string[]; readonly total: number }
  | { readonly shape: 'tree'; readonly root: TreeNode }
  | { readonly shape: 'stacked'; readonly series: StackedSeries }
  | { readonly shape: 'points'; readonly points: readonly PointRecord[] }
  | { readonly shape: 'timeline'; readonly timeline: Timeline }
  | { readonly shape: 'raw'; readonly sections: readonly Section[] };

export interface DisplayPayload {
  readonly visualizer: Visualizer;
  readonly sections: readonly SectionRef[];
  /** Passthrough header keys (axis labels, units) of the first section */
  readonly options: Readonly<Record<string, JsonValue>>;
  readonly data: PayloadData;
}

// =============================================================================
// HELPERS
// =============================================================================

function stackRecords(section: IndexedSection, visualizer: Visualizer): readonly StackRecord[] {
  if (isSectionOf(section, 'stack')) {
    return section.records;
  }
  throw new IncompatibleVisualizerError(visualizer, section.header.datatype, sectionRef(section));
}

function pointRecords(section: IndexedSection, visualizer: Visualizer): readonly PointRecord[] {
  if (isSectionOf(section, 'point')) {
    return section.records;
  }
  throw new IncompatibleVisualizerError(visualizer, section.header.datatype, sectionRef(section));
}

interface MutableNode {
  name: string;
  value: number;
  children: MutableNode[];
}

/**
 * Build a call tree from weighted stacks, each node's value being the total
 * weight of the stacks passing through it.
 */
export function buildTree(groups: ReadonlyArray<{ frames: readonly string[]; weight: number }>): TreeNode {
  const root: MutableNode = { name: 'root', value: 0, children: [] };
  for (const { frames, weight } of groups) {
    root.value += weight;
    let node = root;
    for (const frame of frames) {
      let child = node.children.find(candidate => candidate.name === frame);
      if (!child) {
        child = { name: frame, value: 0, children: [] };
        node.children.push(child);
      }
      child.value += weight;
      node = child;
    }
  }
  return root;
}

/**
 * Keep the outermost `depth` frames of every stack.
 */
export function truncateStacks(records: readonly StackRecord[], depth: number): StackRecord[] {
  return records.map(record =>
    record.stack.length > depth ? { ...record, stack: record.stack.slice(0, depth) } : record
  );
}

// =============================================================================
// PREPARATION
// =============================================================================

function prepareData(section: IndexedSection, visualizer: Visualizer, params: AggregationParams): PayloadData {
  switch (visualizer) {
    case 'flamegraph': {
      const groups = groupStacks(stackRecords(section, visualizer));
      const total = groups.reduce((sum, group) => sum + group.weight, 0);
      return { shape: 'collapsed', lines: collapseStacks(groups), total };
    }
    case 'treemap': {
      const records = truncateStacks(stackRecords(section, visualizer), params.treemapDepth);
      const groups = aggregateStacks(records, params.topN).map(group =>
        isOtherGroup(group) ? { frames: [OTHER_KEY], weight: group.weight } : group
      );
      return { shape: 'tree', root: buildTree(groups) };
    }
    case 'stackplot':
      return { shape: 'stacked', series: buildStackedSeries(pointRecords(section, visualizer), params.topN) };
    case 'heatmap':
      return { shape: 'points', points: pointRecords(section, visualizer) };
    case 'g2':
    case 'tcpplot':
      return { shape: 'timeline', timeline: mergeEvents([section]) };
  }
}

/**
 * Prepare one section for a visualizer. With `aggregate` off the payload
 * carries the section unchanged.
 *
 * @throws IncompatibleVisualizerError when the visualizer cannot render the
 *   section's datatype
 */
export function preparePayload(
  section: IndexedSection,
  visualizer: Visualizer,
  params: AggregationParams,
  aggregate = true
): DisplayPayload {
  if (!isCompatible(visualizer, section.header.datatype)) {
    throw new IncompatibleVisualizerError(visualizer, section.header.datatype, sectionRef(section));
  }
  return {
    visualizer,
    sections: [sectionRef(section)],
    options: section.header.extras,
    data: aggregate ? prepareData(section, visualizer, params) : { shape: 'raw', sections: [section] },
  };
}

/**
 * Prepare a group of event sections as one merged timeline.
 *
 * @throws IncompatibleVisualizerError when the visualizer does not take
 *   merged timelines
 * @throws IncompatibleAggregationError when a section does not hold events
 */
export function prepareMergedPayload(sections: readonly IndexedSection[], visualizer: Visualizer): DisplayPayload {
  if (!supportsMerged(visualizer)) {
    throw new IncompatibleVisualizerError(visualizer, 'event', undefined, 'it does not render merged timelines');
  }
  const timeline = mergeEvents(sections);
  return {
    visualizer,
    sections: timeline.sources,
    options: sections[0]?.header.extras ?? {},
    data: { shape: 'timeline', timeline },
  };
}
