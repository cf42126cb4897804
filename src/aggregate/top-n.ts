/**
 * Top-N + Other
 *
 * Keeps the `k` heaviest groups of a section and sums everything else into
 * one synthetic "other" group. Running it again on its own output with the
 * same `k` returns the same groups: the synthetic group is recognised by its
 * flag and is never split up again.
 *
 * A real group whose key happens to be "other" (a frame or label with that
 * name) is ranked like any other group and may appear next to the synthetic
 * one in the output.
 */

import { ConfigError } from '../errors/index.js';
import { escapeField } from '../records/escape.js';
import type { PointRecord, StackRecord } from '../records/types.js';

// =============================================================================
// TYPES
// =============================================================================

export const OTHER_KEY = 'other';

export interface WeightedGroup {
  readonly key: string;
  readonly weight: number;
  /** Set only on the synthetic group holding everything outside the top N */
  readonly other?: boolean;
}

export interface OtherGroup extends WeightedGroup {
  readonly key: typeof OTHER_KEY;
  readonly other: true;
}

/** Identical stacks collapsed into one group. */
export interface StackGroup extends WeightedGroup {
  readonly frames: readonly string[];
}

export function isOtherGroup(group: WeightedGroup): group is OtherGroup {
  return group.other === true;
}

export function assertTopN(k: number): void {
  if (!Number.isInteger(k) || k < 0) {
    throw new ConfigError(`Top-N count must be a non-negative integer, got ${k}`, ['topN']);
  }
}

// =============================================================================
// TOP-N
// =============================================================================

/**
 * Select the `k` highest-weighted groups, then a synthetic "other" group
 * holding the sum of the rest.
 *
 * Ranking is by descending weight; equal weights keep their input order.
 * The "other" group comes last and only exists when something was folded
 * into it. The output has at most `k + 1` groups and the same total weight
 * as the input.
 */
export function topNWithOther<G extends WeightedGroup>(groups: readonly G[], k: number): Array<G | OtherGroup> {
  assertTopN(k);

  const ranked: G[] = [];
  let otherWeight = 0;
  let folded = false;

  for (const group of groups) {
    if (isOtherGroup(group)) {
      otherWeight += group.weight;
      folded = true;
    } else {
      ranked.push(group);
    }
  }

  // Array.prototype.sort is stable, so ties stay in first-seen order
  ranked.sort((a, b) => b.weight - a.weight);

  const top: Array<G | OtherGroup> = ranked.slice(0, k);
  for (const group of ranked.slice(k)) {
    otherWeight += group.weight;
    folded = true;
  }

  if (folded) {
    top.push({ key: OTHER_KEY, weight: otherWeight, other: true });
  }
  return top;
}

// =============================================================================
// GROUPING
// =============================================================================

/**
 * Key of a stack: its frames escaped and joined with `;`, which is also the
 * collapsed-stack notation.
 */
export function stackKey(frames: readonly string[]): string {
  return frames.map(escapeField).join(';');
}

/**
 * Collapse identical stacks, summing their weights, in first-seen order.
 */
export function groupStacks(records: readonly StackRecord[]): StackGroup[] {
  const groups = new Map<string, { frames: readonly string[]; weight: number }>();
  for (const record of records) {
    const key = stackKey(record.stack);
    const group = groups.get(key);
    if (group) {
      group.weight += record.weight;
    } else {
      groups.set(key, { frames: record.stack, weight: record.weight });
    }
  }
  return [...groups].map(([key, { frames, weight }]) => ({ key, weight, frames }));
}

/**
 * Sum point values by label, in first-seen order.
 */
export function groupPoints(records: readonly PointRecord[]): WeightedGroup[] {
  const groups = new Map<string, number>();
  for (const record of records) {
    groups.set(record.info, (groups.get(record.info) ?? 0) + record.y);
  }
  return [...groups].map(([key, weight]) => ({ key, weight }));
}

export function aggregateStacks(records: readonly StackRecord[], k: number): Array<StackGroup | OtherGroup> {
  return topNWithOther(groupStacks(records), k);
}

export function aggregatePoints(records: readonly PointRecord[], k: number): WeightedGroup[] {
  return topNWithOther(groupPoints(records), k);
}

/**
 * Render groups as collapsed-stack lines (`a;b;c 42`), the input format of
 * flame graph generators.
 */
export function collapseStacks(groups: readonly WeightedGroup[]): string[] {
  return groups.map(group => `${group.key} ${group.weight}`);
}
