/**
 * Named attribute enumeration for composite objects.
 */

import { describeError } from '../core/errors.js';
import {
  isDoNotInvoke,
  isFieldEnumerable,
  INSPECT_FIELDS,
  type FieldAdapter,
  type FieldSource,
} from './capabilities.js';
import { isCallable, isClass, isNativeFunction } from './signature.js';

/**
 * One attribute of a composite: its value, or the error raised reading it.
 */
export type AttributeEntry =
  | { readonly name: string; readonly value: unknown }
  | { readonly name: string; readonly error: string };

/**
 * Field adapters keyed by the constructor of the objects they describe.
 */
export type FieldAdapters = ReadonlyMap<abstract new (...args: never[]) => object, FieldAdapter>;

export function isAttributeError(
  entry: AttributeEntry
): entry is { readonly name: string; readonly error: string } {
  return 'error' in entry;
}

/**
 * Collect the attributes of an object that are worth showing.
 *
 * Fields come from the object's INSPECT_FIELDS method, else from a field adapter
 * registered for its class, else from every property name along its prototype
 * chain (sorted). Dropped: names starting with '_' or '#', native functions,
 * classes, and values marked do-not-invoke. A getter that throws is kept as an
 * error entry.
 */
export function collectAttributes(obj: object, adapters: FieldAdapters = new Map()): AttributeEntry[] {
  const raw = explicitFields(obj, adapters) ?? reflectedFields(obj);
  const entries: AttributeEntry[] = [];

  for (const entry of raw) {
    if (entry.name.startsWith('_') || entry.name.startsWith('#')) {
      continue;
    }
    if (isAttributeError(entry) || isShown(entry.value)) {
      entries.push(entry);
    }
  }

  return entries;
}

/**
 * Whether an attribute value survives filtering.
 */
function isShown(value: unknown): boolean {
  if (isCallable(value) && (isNativeFunction(value) || isClass(value))) {
    return false;
  }
  try {
    return !isDoNotInvoke(value);
  } catch {
    // A hostile marker lookup (e.g. a throwing proxy) cannot carry the marker.
    return true;
  }
}

/**
 * Fields from INSPECT_FIELDS or a matching adapter, or undefined when neither applies.
 */
function explicitFields(obj: object, adapters: FieldAdapters): AttributeEntry[] | undefined {
  let source: FieldSource;
  try {
    if (isFieldEnumerable(obj)) {
      source = obj[INSPECT_FIELDS]();
    } else {
      const adapter = findAdapter(obj, adapters);
      if (adapter === undefined) {
        return undefined;
      }
      source = adapter(obj);
    }
  } catch (error) {
    return [{ name: 'fields', error: describeError(error) }];
  }

  return isIterableFields(source)
    ? Array.from(source, ([name, value]) => ({ name, value }))
    : Object.entries(source).map(([name, value]) => ({ name, value }));
}

function isIterableFields(source: FieldSource): source is Iterable<readonly [string, unknown]> {
  return typeof Reflect.get(source, Symbol.iterator) === 'function';
}

/**
 * Adapter for the nearest class on the prototype chain that has one.
 */
function findAdapter(obj: object, adapters: FieldAdapters): FieldAdapter | undefined {
  let proto: object | null = adapters.size > 0 ? Object.getPrototypeOf(obj) : null;
  while (proto !== null) {
    for (const [type, adapter] of adapters) {
      if (type.prototype === proto) {
        return adapter;
      }
    }
    proto = Object.getPrototypeOf(proto);
  }
  return undefined;
}

/**
 * Every property name on the object and its prototypes, read through the object.
 */
function reflectedFields(obj: object): AttributeEntry[] {
  const names = new Set<string>();
  let proto: object | null = obj;
  while (proto !== null && proto !== Object.prototype && proto !== Function.prototype) {
    for (const name of Object.getOwnPropertyNames(proto)) {
      if (name !== 'constructor') {
        names.add(name);
      }
    }
    proto = Object.getPrototypeOf(proto);
  }

  return [...names].sort().map((name): AttributeEntry => {
    try {
      const value: unknown = Reflect.get(obj, name);
      return { name, value };
    } catch (error) {
      return { name, error: describeError(error) };
    }
  });
}
