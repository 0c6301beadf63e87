export { AbstractTranslator, sameKind, expectType } from './translator.js';
export type { Translator } from './translator.js';
export {
  StringTranslator,
  IntegerTranslator,
  FloatTranslator,
  BooleanTranslator,
  DataTranslator
} from './primitives.js';
export { ListTranslator, SetTranslator, MapTranslator } from './collections.js';
export { StorableTranslator } from './storable.js';
export type { Storable } from './storable.js';
export { encodeList, decodeList } from './list-encoding.js';
