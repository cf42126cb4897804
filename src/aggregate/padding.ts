/**
 * Stacked series
 *
 * A stacked plot draws, at every x, one band per category on top of the
 * previous ones. Bands only line up when every x bucket carries the same
 * categories in the same order, so buckets missing a category get a zero
 * entry for it.
 *
 * Stacking order (bottom to top) is "other" first, then the remaining
 * categories in order of first appearance, scanning buckets by ascending x.
 * The legend lists the same categories top to bottom.
 */

import type { PointRecord } from '../records/types.js';
import { assertTopN, OTHER_KEY, topNWithOther } from './top-n.js';

// =============================================================================
// TYPES
// =============================================================================

export interface SeriesEntry {
  readonly category: string;
  readonly value: number;
  /** Zero entry injected by padding */
  readonly padded?: boolean;
}

export interface SeriesBucket {
  readonly x: number;
  readonly entries: readonly SeriesEntry[];
}

export interface StackedSeries {
  /** Stacking order, bottom to top */
  readonly categories: readonly string[];
  /** Legend order, the reverse of the stacking order */
  readonly legend: readonly string[];
  readonly buckets: readonly SeriesBucket[];
}

// =============================================================================
// PADDING
// =============================================================================

function stackingOrder(buckets: readonly SeriesBucket[]): string[] {
  const seen = new Set<string>();
  let hasOther = false;
  for (const bucket of buckets) {
    for (const { category } of bucket.entries) {
      if (category === OTHER_KEY) {
        hasOther = true;
      } else {
        seen.add(category);
      }
    }
  }
  return hasOther ? [OTHER_KEY, ...seen] : [...seen];
}

/**
 * Give every bucket the union of all categories, in one fixed stacking
 * order. Buckets are ordered by ascending x; repeated categories within a
 * bucket are summed.
 */
export function padCategories(buckets: readonly SeriesBucket[]): StackedSeries {
  const sorted = [...buckets].sort((a, b) => a.x - b.x);
  const categories = stackingOrder(sorted);

  const padded = sorted.map(bucket => {
    const present = new Map<string, SeriesEntry>();
    for (const entry of bucket.entries) {
      const previous = present.get(entry.category);
      present.set(
        entry.category,
        previous ? { category: entry.category, value: previous.value + entry.value } : entry
      );
    }
    const entries = categories.map(
      (category): SeriesEntry => present.get(category) ?? { category, value: 0, padded: true }
    );
    return { x: bucket.x, entries };
  });

  return { categories, legend: [...categories].reverse(), buckets: padded };
}

/**
 * Build a stacked series from point records: `x` is the bucket, `info` the
 * category and `y` the value. Equal labels within a bucket are summed, then
 * each bucket keeps its `k` largest categories plus "other".
 */
export function buildStackedSeries(points: readonly PointRecord[], k: number): StackedSeries {
  assertTopN(k);
  const buckets = new Map<number, Map<string, number>>();
  for (const { x, y, info } of points) {
    let bucket = buckets.get(x);
    if (!bucket) {
      bucket = new Map();
      buckets.set(x, bucket);
    }
    bucket.set(info, (bucket.get(info) ?? 0) + y);
  }

  const raw: SeriesBucket[] = [...buckets].map(([x, values]) => {
    const groups = [...values].map(([key, weight]) => ({ key, weight }));
    const entries = topNWithOther(groups, k).map(group => ({ category: group.key, value: group.weight }));
    return { x, entries };
  });

  return padCategories(raw);
}

/**
 * Number of zero entries padding injected across all buckets.
 */
export function countPadding(series: StackedSeries): number {
  return series.buckets.reduce(
    (total, bucket) => total + bucket.entries.filter(entry => entry.padded === true).length,
    0
  );
}
