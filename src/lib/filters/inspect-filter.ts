/**
 * The diagnostic filter: inspect a value and render it in one step.
 */

import type { InspectConfig } from '../config/config.js';
import { DEFAULT_MAX_DEPTH, DEFAULT_MAX_ITEMS, inspect, type InspectOptions } from '../inspector/manager.js';
import { DEFAULT_STYLE, formatInspection } from '../render/format.js';
import { configOrMessage } from './scrub.js';

export const DEFAULT_ROOT_NAME = 'object';

/**
 * @property name - Title of the root node (default 'object')
 * @property style - Style name (default from configuration, else 'text')
 * @property config - Configuration to take defaults from (default loadConfig())
 */
export interface InspectValueOptions extends InspectOptions {
  readonly name?: string;
  readonly style?: string;
  readonly config?: InspectConfig;
}

/**
 * Inspect a value and format the result.
 *
 * Budgets and style come from the options, then from the configuration's
 * `inspect` section, then from the built-in defaults. An unusable configuration
 * is skipped in favour of the defaults.
 *
 * @example
 * ```typescript
 * inspectValue({ a: 1 }, { config: { inspect: {} } });
 * // object: Object {
 * //   a=1
 * // }
 * ```
 */
export function inspectValue(value: unknown, options: InspectValueOptions = {}): string {
  const loaded = configOrMessage(options.config);
  const defaults = typeof loaded === 'string' ? {} : loaded.inspect;

  const tree = inspect(options.name ?? DEFAULT_ROOT_NAME, value, {
    maxDepth: options.maxDepth ?? defaults.maxDepth ?? DEFAULT_MAX_DEPTH,
    maxItems: options.maxItems ?? defaults.maxItems ?? DEFAULT_MAX_ITEMS,
    scalarTypes: options.scalarTypes,
    fieldAdapters: options.fieldAdapters,
  });
  return formatInspection(tree, options.style ?? defaults.style ?? DEFAULT_STYLE);
}
