export {
  point,
  event,
  stack,
  isDatatype,
  assertNever,
  DATATYPES,
  type PointRecord,
  type EventRecord,
  type StackRecord,
  type DataRecord,
  type Datatype,
  type RecordOf,
} from './types.js';
export {
  encodeRecord,
  decodeRecord,
  encodePoint,
  decodePoint,
  encodeEvent,
  decodeEvent,
  encodeStack,
  decodeStack,
} from './codec.js';
export { escapeField, unescapeField } from './escape.js';
