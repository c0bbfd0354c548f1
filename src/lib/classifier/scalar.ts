/**
 * Scalar values: everything shown as a single printable value.
 */

import { safeString } from '../core/errors.js';

/**
 * Constructor of a type to treat as a scalar, such as a money or decimal class.
 */
export type ScalarType = abstract new (...args: never[]) => object;

/**
 * Whether an array is the result of RegExp.prototype.exec() or String.prototype.match().
 */
export function isRegExpMatch(value: unknown): value is RegExpMatchArray {
  return (
    Array.isArray(value) &&
    typeof Reflect.get(value, 'index') === 'number' &&
    typeof Reflect.get(value, 'input') === 'string'
  );
}

/**
 * Whether a value is shown as a scalar rather than expanded.
 *
 * @param scalarTypes - Additional constructors whose instances are scalars
 */
export function isScalar(value: unknown, scalarTypes: readonly ScalarType[] = []): boolean {
  if (value === null || value === undefined) {
    return true;
  }
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'bigint':
    case 'boolean':
    case 'symbol':
      return true;
    case 'object':
      return (
        value instanceof Date ||
        value instanceof RegExp ||
        isRegExpMatch(value) ||
        scalarTypes.some((type) => value instanceof type)
      );
    default:
      return false;
  }
}

/**
 * The plain string form of a scalar, before quoting or masking.
 */
export function scalarToString(value: unknown): string {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  if (isRegExpMatch(value)) {
    return value[0];
  }
  return safeString(value);
}

/**
 * Format a scalar for display under the given field name.
 *
 * Strings and match results are double-quoted. When the field name contains
 * "password" (any case) the value is replaced by a quoted run of asterisks of the
 * same length.
 *
 * @example
 * formatScalar('count', 3)          // '3'
 * formatScalar('label', 'abc')      // '"abc"'
 * formatScalar('dbPassword', 'abc') // '"***"'
 */
export function formatScalar(name: string, value: unknown): string {
  const text = scalarToString(value);
  if (name.toLowerCase().includes('password')) {
    return `"${'*'.repeat(text.length)}"`;
  }
  if (typeof value === 'string' || isRegExpMatch(value)) {
    return `"${text}"`;
  }
  return text;
}

/**
 * Runtime type name of any value.
 */
export function typeNameOf(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value !== 'object' && typeof value !== 'function') {
    return typeof value;
  }
  if (isRegExpMatch(value)) {
    return 'RegExpMatchArray';
  }
  if (typeof value === 'function') {
    return 'function';
  }
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null) {
    return 'Object';
  }
  const ctor: unknown = Reflect.get(value, 'constructor');
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'Object';
}
