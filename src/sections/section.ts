/**
 * Sections: a header plus the ordered records it describes.
 */

import type { Datatype, RecordOf } from '../records/types.js';
import type { HeaderOf } from './header.js';

export interface SectionOf<D extends Datatype> {
  readonly header: HeaderOf<D>;
  readonly records: readonly RecordOf<D>[];
}

/** A section whose records all have the variant its header declares. */
export type Section = { [D in Datatype]: SectionOf<D> }[Datatype];

/** A section read from a data file, addressed by its position. */
export type IndexedSection = Section & { readonly index: number };

/** The identity of a section used for listing, selection and error messages. */
export interface SectionRef {
  readonly index: number;
  readonly interface: string;
}

export function isSectionOf<D extends Datatype>(
  section: Section,
  datatype: D
): section is Extract<Section, SectionOf<D>> {
  return section.header.datatype === datatype;
}

export function sectionRef(section: IndexedSection): SectionRef {
  return { index: section.index, interface: section.header.interface };
}
