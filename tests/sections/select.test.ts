/**
 * Tests for section selection by index and interface.
 */

import { describe, it, expect } from 'vitest';
import { parseSelector, resolveSelector, selectSections, type SectionRef } from '../../src/sections/index.js';
import { SectionNotFoundError } from '../../src/errors/index.js';

const refs: SectionRef[] = [
  { index: 0, interface: 'cpusched' },
  { index: 1, interface: 'ipc' },
  { index: 2, interface: 'cpusched' },
];

describe('parseSelector', () => {
  it('reads digits as an index and anything else as an interface', () => {
    expect(parseSelector('2')).toBe(2);
    expect(parseSelector('memtime')).toBe('memtime');
    expect(parseSelector('2a')).toBe('2a');
  });
});

describe('resolveSelector', () => {
  it('matches every section of an interface', () => {
    expect(resolveSelector(refs, 'cpusched')).toEqual([0, 2]);
  });

  it('matches a single index', () => {
    expect(resolveSelector(refs, 1)).toEqual([1]);
  });

  it('throws when nothing matches', () => {
    expect(() => resolveSelector(refs, 7)).toThrow(SectionNotFoundError);
    expect(() => resolveSelector(refs, 'memtime')).toThrow("No section matches 'memtime' (file has 3 sections)");
  });
});

describe('selectSections', () => {
  it('returns matches in file order without duplicates', () => {
    const picked = selectSections(refs, [2, 'ipc', 'cpusched'], ref => ref);
    expect(picked.map(ref => ref.index)).toEqual([0, 1, 2]);
  });
});
