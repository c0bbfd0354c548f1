/**
 * Configuration loading.
 *
 * Configuration is a hand-edited JSON5 file (comments, unquoted keys and trailing
 * commas allowed). It is re-read at most every CACHE_TIMEOUT_MS so edits take
 * effect without a restart.
 *
 * @example
 * ```json5
 * {
 *   inspect: { maxDepth: 3, maxItems: 10, style: 'text' },
 *   filters: {
 *     _GLOBAL: [{ pattern: '\\s+', replacement: ' ' }],
 *     'Package Type': [{ pattern: '^(\\w+) package$', replacement: '$1' }],
 *   },
 * }
 * ```
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import JSON5 from 'json5';
import { describeError } from '../core/errors.js';

export const CONFIG_ENV_VAR = 'INSPECT_CONFIG_FILE';
export const CONFIG_FILE_NAME = 'inspect.config.json5';
export const CACHE_TIMEOUT_MS = 3000;

// =============================================================================
// Types
// =============================================================================

/**
 * One scrub rule. Either field may be absent in the file; the filter reports it.
 */
export interface FilterRule {
  readonly pattern?: string;
  readonly replacement?: string;
}

export interface InspectDefaults {
  readonly maxDepth?: number;
  readonly maxItems?: number;
  readonly style?: string;
}

export interface InspectConfig {
  readonly inspect: InspectDefaults;
  /** Rule sets by name; undefined when the file has no filters section */
  readonly filters?: Readonly<Record<string, readonly FilterRule[]>>;
}

/**
 * Why a configuration could not be used.
 *
 * - missing: the file could not be read
 * - syntax: the file is not valid JSON5
 * - shape: the file parsed but is not a configuration object
 */
export type ConfigErrorReason = 'missing' | 'syntax' | 'shape';

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly file: string,
    readonly reason: ConfigErrorReason
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

// =============================================================================
// Location
// =============================================================================

export function defaultConfigPath(): string {
  return fileURLToPath(new URL(`./${CONFIG_FILE_NAME}`, import.meta.url));
}

/**
 * Path of the configuration file: the environment override, else the default.
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[CONFIG_ENV_VAR];
  return override !== undefined && override !== '' ? override : defaultConfigPath();
}

// =============================================================================
// Parsing
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseBudget(raw: Record<string, unknown>, key: 'maxDepth' | 'maxItems', file: string): number | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    console.warn(`Ignoring inspect.${key} in ${file}: expected a non-negative integer, got ${JSON.stringify(value)}`);
    return undefined;
  }
  return value;
}

function parseInspect(raw: unknown, file: string): InspectDefaults {
  if (raw === undefined) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`"inspect" in ${file} must be an object`, file, 'shape');
  }
  const style = raw.style;
  if (style !== undefined && typeof style !== 'string') {
    throw new ConfigError(`"inspect.style" in ${file} must be a string`, file, 'shape');
  }
  return {
    maxDepth: parseBudget(raw, 'maxDepth', file),
    maxItems: parseBudget(raw, 'maxItems', file),
    style,
  };
}

function parseRule(raw: unknown): FilterRule {
  if (!isRecord(raw)) {
    return {};
  }
  return {
    pattern: typeof raw.pattern === 'string' ? raw.pattern : undefined,
    replacement: typeof raw.replacement === 'string' ? raw.replacement : undefined,
  };
}

function parseFilters(raw: unknown, file: string): Record<string, readonly FilterRule[]> | undefined {
  if (raw === undefined) {
    return undefined;
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`"filters" in ${file} must be an object`, file, 'shape');
  }
  const filters: Record<string, readonly FilterRule[]> = {};
  for (const [name, rules] of Object.entries(raw)) {
    if (!Array.isArray(rules)) {
      throw new ConfigError(`filter "${name}" in ${file} must be a list of rules`, file, 'shape');
    }
    filters[name] = rules.map(parseRule);
  }
  return filters;
}

/**
 * Parse configuration text.
 *
 * @param file - Path used in error messages
 * @throws ConfigError if the text is not JSON5 or not a configuration object
 */
export function parseConfig(text: string, file: string): InspectConfig {
  let raw: unknown;
  try {
    raw = JSON5.parse(text);
  } catch (e) {
    throw new ConfigError(describeError(e), file, 'syntax');
  }

  if (!isRecord(raw)) {
    throw new ConfigError(`Expected an object at the top of ${file}`, file, 'shape');
  }

  return {
    inspect: parseInspect(raw.inspect, file),
    filters: parseFilters(raw.filters, file),
  };
}

// =============================================================================
// Loading
// =============================================================================

let cache: { file: string; config: InspectConfig; loadedAt: number } | null = null;

/**
 * Load configuration, reusing the last load of the same file for CACHE_TIMEOUT_MS.
 *
 * @param file - Defaults to resolveConfigPath()
 * @param now - Current time in milliseconds
 * @throws ConfigError if the file is unreadable or malformed
 */
export function loadConfig(file: string = resolveConfigPath(), now: number = Date.now()): InspectConfig {
  if (cache !== null && cache.file === file && now - cache.loadedAt < CACHE_TIMEOUT_MS) {
    return cache.config;
  }

  let text: string;
  try {
    text = readFileSync(file, 'utf8');
  } catch (e) {
    throw new ConfigError(describeError(e), file, 'missing');
  }

  const config = parseConfig(text, file);
  cache = { file, config, loadedAt: now };
  return config;
}

export function clearConfigCache(): void {
  cache = null;
}
