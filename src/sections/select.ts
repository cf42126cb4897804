/**
 * Section selection by index or interface name.
 */

import { SectionNotFoundError } from '../errors/index.js';
import type { SectionRef } from './section.js';

/** A section index, or the interface name of one or more sections. */
export type SectionSelector = number | string;

/**
 * Parse a command-line entry: digits select by index, anything else by interface.
 */
export function parseSelector(text: string): SectionSelector {
  return /^\d+$/.test(text) ? Number(text) : text;
}

/**
 * Positions (into `refs`) of the sections matched by one selector.
 *
 * @throws SectionNotFoundError when nothing matches
 */
export function resolveSelector(refs: readonly SectionRef[], selector: SectionSelector): number[] {
  const matches: number[] = [];
  refs.forEach((ref, position) => {
    const hit = typeof selector === 'number' ? ref.index === selector : ref.interface === selector;
    if (hit) {
      matches.push(position);
    }
  });
  if (matches.length === 0) {
    throw new SectionNotFoundError(String(selector), refs.length);
  }
  return matches;
}

/**
 * Select the items matched by any of the selectors, in file order and
 * without duplicates.
 *
 * @throws SectionNotFoundError for the first selector that matches nothing
 */
export function selectSections<T>(
  items: readonly T[],
  selectors: readonly SectionSelector[],
  refOf: (item: T) => SectionRef
): T[] {
  const refs = items.map(refOf);
  const chosen = new Set<number>();
  for (const selector of selectors) {
    for (const position of resolveSelector(refs, selector)) {
      chosen.add(position);
    }
  }
  return items.filter((_, position) => chosen.has(position));
}
