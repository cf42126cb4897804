export {
  createHeader,
  encodeHeader,
  decodeHeader,
  isHeaderLine,
  RECOGNISED_KEYS,
  type SectionHeader,
  type HeaderOf,
  type HeaderValue,
  type JsonValue,
} from './header.js';
export {
  isSectionOf,
  sectionRef,
  type Section,
  type SectionOf,
  type IndexedSection,
  type SectionRef,
} from './section.js';
export {
  parseSelector,
  resolveSelector,
  selectSections,
  type SectionSelector,
} from './select.js';
