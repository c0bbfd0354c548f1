/**
 * Capabilities a value can expose to control how it is inspected.
 *
 * None of these are required: values without them are classified by shape. They
 * exist for types whose interesting structure is not visible through plain
 * property reflection.
 */

import { hasIdentity } from '../core/identity.js';

// =============================================================================
// Markers
// =============================================================================

/**
 * Method returning the named fields to show for a composite object, in place of
 * reflected properties.
 *
 * @example
 * ```typescript
 * class Account {
 *   constructor(private readonly store: Store, readonly id: string) {}
 *   [INSPECT_FIELDS]() {
 *     return { id: this.id, owner: this.store.ownerOf(this.id) };
 *   }
 * }
 * ```
 */
export const INSPECT_FIELDS: unique symbol = Symbol('inspectree.fields');

/**
 * Array of parameter names to report for a function, in place of the names found
 * in its source text.
 */
export const INSPECT_SIGNATURE: unique symbol = Symbol('inspectree.signature');

/**
 * Flag excluding a value from composite expansion.
 */
export const DO_NOT_INVOKE: unique symbol = Symbol('inspectree.doNotInvoke');

/**
 * Property name templating engines use for the same purpose as DO_NOT_INVOKE.
 */
export const DO_NOT_CALL_IN_TEMPLATES = 'doNotCallInTemplates';

/**
 * Named fields: either [name, value] pairs or a plain record.
 */
export type FieldSource = Iterable<readonly [string, unknown]> | Readonly<Record<string, unknown>>;

/**
 * Produces the named fields of objects built by a given constructor.
 */
export type FieldAdapter = (value: object) => FieldSource;

/**
 * A value that exposes its own field list.
 */
export interface FieldEnumerable {
  [INSPECT_FIELDS](): FieldSource;
}

/**
 * Mark a value so composite expansion skips it.
 *
 * @returns The same value, for chaining
 */
export function markDoNotInvoke<T extends object>(value: T): T {
  Object.defineProperty(value, DO_NOT_INVOKE, { value: true, enumerable: false });
  return value;
}

/**
 * Check for either do-not-invoke marker.
 */
export function isDoNotInvoke(value: unknown): boolean {
  if (!hasIdentity(value)) {
    return false;
  }
  return (
    Reflect.get(value, DO_NOT_INVOKE) === true ||
    Boolean(Reflect.get(value, DO_NOT_CALL_IN_TEMPLATES))
  );
}

export function isFieldEnumerable(value: object): value is FieldEnumerable {
  return typeof Reflect.get(value, INSPECT_FIELDS) === 'function';
}

// =============================================================================
// Lazy Collections
// =============================================================================

/**
 * A collection whose size is known without loading it and whose elements are
 * fetched on demand, such as a database query.
 *
 * The inspector calls count() once and take() at most once per collection, and
 * never asks for more than its item budget.
 */
export interface LazyCollection<T = unknown> {
  count(): number;
  take(limit: number): Iterable<T>;
}

/**
 * Type guard for lazy collections, by shape.
 */
export function isLazyCollection(value: unknown): value is LazyCollection {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    typeof Reflect.get(value, 'count') === 'function' &&
    typeof Reflect.get(value, 'take') === 'function'
  );
}
