/**
 * Rule-based text cleanup for display.
 *
 * Filters never throw: problems are returned in place of the text as a
 * bracketed message, so a broken rule shows up where its output would have.
 */

import { CONFIG_FILE_NAME, ConfigError, loadConfig, type FilterRule, type InspectConfig } from '../config/config.js';
import { describeError } from '../core/errors.js';

/**
 * Rule set applied after every named set.
 */
export const GLOBAL_FILTER = '_GLOBAL';

type RuleOutcome = { readonly ok: true; readonly text: string } | { readonly ok: false; readonly message: string };

/**
 * The configuration, or the bracketed message explaining why it is unavailable.
 */
export function configOrMessage(config: InspectConfig | undefined): InspectConfig | string {
  if (config !== undefined) {
    return config;
  }
  try {
    return loadConfig();
  } catch (e) {
    if (e instanceof ConfigError && e.reason === 'syntax') {
      return `[Error in configuration file: ${e.message}]`;
    }
    if (e instanceof ConfigError) {
      return `["${CONFIG_FILE_NAME}" not found or invalid: ${e.message}]`;
    }
    throw e;
  }
}

function applyRules(text: string, setName: string, rules: readonly FilterRule[]): RuleOutcome {
  let result = text;
  for (const rule of rules) {
    if (rule.pattern === undefined) {
      return { ok: false, message: `["pattern" not found in "${setName}" in "${CONFIG_FILE_NAME}"]` };
    }
    if (rule.replacement === undefined) {
      return { ok: false, message: `["replacement" not found in "${setName}" in "${CONFIG_FILE_NAME}"]` };
    }
    let regex: RegExp;
    try {
      regex = new RegExp(rule.pattern, 'g');
    } catch (e) {
      return { ok: false, message: `["${setName}" regex error on ${rule.pattern}: ${describeError(e)}]` };
    }
    result = result.replace(regex, rule.replacement);
  }
  return { ok: true, text: result };
}

/**
 * Apply the named rule set, then the global one.
 *
 * When no set has that name the text is returned unchanged and the global set
 * is not applied either.
 *
 * @param config - Defaults to loadConfig()
 *
 * @example
 * ```typescript
 * scrub('  SOT-23   package ', 'Package Type'); // 'SOT-23 package'
 * scrub('QFN package', 'Package Type');         // 'QFN'
 * ```
 */
export function scrub(text: string, name: string, config?: InspectConfig): string {
  if (!name) {
    return '[scrub missing required :name]';
  }

  const loaded = configOrMessage(config);
  if (typeof loaded === 'string') {
    return loaded;
  }
  if (loaded.filters === undefined) {
    return `["filters" not found in "${CONFIG_FILE_NAME}"]`;
  }

  const rules = loaded.filters[name];
  if (rules === undefined) {
    return text;
  }

  const named = applyRules(text, name, rules);
  if (!named.ok) {
    return named.message;
  }

  const globalRules = loaded.filters[GLOBAL_FILTER];
  if (globalRules === undefined || name === GLOBAL_FILTER) {
    return named.text;
  }
  const global = applyRules(named.text, GLOBAL_FILTER, globalRules);
  return global.ok ? global.text : global.message;
}
