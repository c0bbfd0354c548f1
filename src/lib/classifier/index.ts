/**
 * Value classifier - decides how each runtime value is displayed.
 */

export {
  INSPECT_FIELDS,
  INSPECT_SIGNATURE,
  DO_NOT_INVOKE,
  DO_NOT_CALL_IN_TEMPLATES,
  markDoNotInvoke,
  isDoNotInvoke,
  isLazyCollection
} from './capabilities.js';
export type { FieldSource, FieldAdapter, FieldEnumerable, LazyCollection } from './capabilities.js';
export { partial, isPartialCall, PARTIAL } from './partial.js';
export type { PartialBinding, PartialCall } from './partial.js';
export { getParameterNames, isClass, isNativeFunction, isBoundFunction } from './signature.js';
export type { Callable } from './signature.js';
export { isScalar, formatScalar, typeNameOf } from './scalar.js';
export type { ScalarType } from './scalar.js';
export { collectAttributes } from './attributes.js';
export type { AttributeEntry, FieldAdapters } from './attributes.js';
export { classify, classifyValue, isBoundMethod, isMapping, isSequence, DECORATIONS } from './classify.js';
export type { ClassifiedValue, MappingValue, SequenceValue } from './classify.js';
export { DUPLICATED_TEXT, COMPLEX_TEXT } from './variants.js';
