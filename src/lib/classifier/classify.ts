/**
 * Variant dispatch: which display variant a runtime value belongs to.
 *
 * The variants form a closed set checked in a fixed order, first match wins.
 * Scalars come first so that types which also look like something broader (a
 * match result is also an array) are never expanded.
 */

import type { NodeKind, ValueKind } from '../core/types.js';
import { isLazyCollection, type LazyCollection } from './capabilities.js';
import { isPartialCall, type PartialCall } from './partial.js';
import { isScalar, type ScalarType } from './scalar.js';
import { isCallable, isClass, type Callable } from './signature.js';

/**
 * Key-to-value collections.
 */
export type MappingValue = Map<unknown, unknown> | Readonly<Record<string, unknown>>;

/**
 * Ordered collections, addressed by position.
 */
export type SequenceValue = readonly unknown[] | Set<unknown> | ArrayLike<unknown>;

// =============================================================================
// Shape Predicates
// =============================================================================

/**
 * Any plain function, method or bound function. Classes and partial calls are
 * callables too but belong to other variants.
 */
export function isBoundMethod(value: unknown): value is Callable {
  return isCallable(value) && !isPartialCall(value) && !isClass(value);
}

/**
 * A Map, or a plain object literal (Object.prototype or null prototype).
 */
export function isMapping(value: unknown): value is MappingValue {
  if (value instanceof Map) {
    return true;
  }
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * An array, a Set or a typed array.
 */
export function isSequence(value: unknown): value is SequenceValue {
  return (
    Array.isArray(value) ||
    value instanceof Set ||
    (ArrayBuffer.isView(value) && !(value instanceof DataView))
  );
}

// =============================================================================
// Dispatch
// =============================================================================

/**
 * A value tagged with its variant, narrowed to the shape that variant handles.
 */
export type ClassifiedValue =
  | { readonly kind: 'scalar'; readonly value: unknown }
  | { readonly kind: 'boundMethod'; readonly value: Callable }
  | { readonly kind: 'partialCall'; readonly value: PartialCall }
  | { readonly kind: 'mapping'; readonly value: MappingValue }
  | { readonly kind: 'sequence'; readonly value: SequenceValue }
  | { readonly kind: 'lazyCollection'; readonly value: LazyCollection }
  | { readonly kind: 'composite'; readonly value: unknown };

/**
 * Classify a value into its display variant. The checks below are the complete,
 * ordered list of variants; the first match wins and anything else is a
 * composite.
 *
 * @param scalarTypes - Additional constructors whose instances are scalars
 *
 * @example
 * classify('abc').kind            // 'scalar'
 * classify({ a: 1 }).kind         // 'mapping'
 * classify(new Set([1, 2])).kind  // 'sequence'
 * classify(new URL('a:b')).kind   // 'composite'
 */
export function classify(value: unknown, scalarTypes: readonly ScalarType[] = []): ClassifiedValue {
  if (isScalar(value, scalarTypes)) {
    return { kind: 'scalar', value };
  }
  if (isBoundMethod(value)) {
    return { kind: 'boundMethod', value };
  }
  if (isPartialCall(value)) {
    return { kind: 'partialCall', value };
  }
  if (isMapping(value)) {
    return { kind: 'mapping', value };
  }
  if (isSequence(value)) {
    return { kind: 'sequence', value };
  }
  if (isLazyCollection(value)) {
    return { kind: 'lazyCollection', value };
  }
  return { kind: 'composite', value };
}

/**
 * Just the variant of a value.
 */
export function classifyValue(value: unknown, scalarTypes: readonly ScalarType[] = []): ValueKind {
  return classify(value, scalarTypes).kind;
}

/**
 * Text framing each variant's value or children.
 */
export const DECORATIONS: Readonly<Record<NodeKind, { readonly prefix: string; readonly postfix: string }>> = {
  scalar: { prefix: '=', postfix: '' },
  boundMethod: { prefix: '(', postfix: ')' },
  partialCall: { prefix: '(', postfix: ')' },
  mapping: { prefix: '{', postfix: '}' },
  sequence: { prefix: '[', postfix: ']' },
  lazyCollection: { prefix: '[', postfix: ']' },
  composite: { prefix: '{', postfix: '}' },
  duplicate: { prefix: '', postfix: '' },
};
