/**
 * Keyed lookups for templates, tolerant of missing collections.
 */

import type { InspectConfig } from '../config/config.js';
import { safeString } from '../core/errors.js';
import { scrub } from './scrub.js';

export type Properties = Readonly<Record<string, unknown>> | ReadonlyMap<string, unknown> | null | undefined;

function lookup(properties: Properties, key: string): unknown {
  if (properties === null || properties === undefined) {
    return undefined;
  }
  if (properties instanceof Map) {
    return properties.get(key);
  }
  return Object.hasOwn(properties, key) ? Reflect.get(properties, key) : undefined;
}

/**
 * The entry under `key`, or '' when there is none.
 */
export function getValue(properties: Properties, key: string): unknown {
  return lookup(properties, key) ?? '';
}

/**
 * The entry under `key` scrubbed with the rule set of the same name, or '' when
 * the entry is missing or empty.
 */
export function getItem(properties: Properties, key: string, config?: InspectConfig): string {
  const entry = lookup(properties, key);
  if (entry === undefined || entry === null || entry === '' || entry === false || entry === 0) {
    return '';
  }
  return scrub(safeString(entry), key, config);
}
