/**
 * Tests for the text filters.
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { clearConfigCache, type InspectConfig } from '../config/config.js';
import { scrub } from './scrub.js';
import { replace } from './replace.js';
import { getItem, getValue } from './lookup.js';
import { inspectValue } from './inspect-filter.js';

const config: InspectConfig = {
  inspect: {},
  filters: {
    _GLOBAL: [{ pattern: '\\s+', replacement: ' ' }],
    'Package Type': [{ pattern: '^(\\w+) package$', replacement: '$1' }],
    Broken: [{ pattern: '(', replacement: '' }],
    NoPattern: [{ replacement: 'x' }],
    NoReplacement: [{ pattern: 'x' }],
  },
};

afterEach(() => {
  vi.unstubAllEnvs();
  clearConfigCache();
});

describe('scrub', () => {
  it('applies the named rules, then the global rules', () => {
    expect(scrub('QFN package', 'Package Type', config)).toBe('QFN');
    expect(scrub('QFN  package', 'Package Type', config)).toBe('QFN package');
  });

  it('leaves text alone when no rule set has the name', () => {
    expect(scrub('a  b', 'Colour', config)).toBe('a  b');
  });

  it('requires a name', () => {
    expect(scrub('a', '', config)).toBe('[scrub missing required :name]');
  });

  it('reports incomplete rules', () => {
    expect(scrub('a', 'NoPattern', config)).toBe('["pattern" not found in "NoPattern" in "inspect.config.json5"]');
    expect(scrub('a', 'NoReplacement', config)).toBe(
      '["replacement" not found in "NoReplacement" in "inspect.config.json5"]'
    );
  });

  it('reports invalid patterns', () => {
    expect(scrub('a', 'Broken', config)).toMatch(/^\["Broken" regex error on \(: Invalid regular expression/);

    const brokenGlobal: InspectConfig = { inspect: {}, filters: { _GLOBAL: [{ pattern: '[', replacement: '' }], A: [] } };
    expect(scrub('a', 'A', brokenGlobal)).toMatch(/^\["_GLOBAL" regex error on \[: /);
  });

  it('reports a configuration without filters', () => {
    expect(scrub('a', 'A', { inspect: {} })).toBe('["filters" not found in "inspect.config.json5"]');
  });

  it('reports an unreadable configuration file', () => {
    vi.stubEnv('INSPECT_CONFIG_FILE', join(tmpdir(), 'no-such-dir-for-inspect', 'absent.json5'));
    expect(scrub('a', 'A')).toMatch(/^\["inspect\.config\.json5" not found or invalid: /);
  });
});

describe('replace', () => {
  it('replaces every literal occurrence', () => {
    expect(replace('a-b-c', '-|+')).toBe('a+b+c');
    expect(replace('cost', 'cost|$5')).toBe('$5');
  });

  it('treats an escaped pipe as literal', () => {
    expect(replace('a|b', '\\||/')).toBe('a/b');
  });

  it('supports regex replacement with back-references', () => {
    expect(replace('v1.2', 'regex:(\\d+)|<$1>')).toBe('v<1>.<2>');
    expect(replace('a', 'regex:(|x')).toMatch(/^\[replace regex error on \(: /);
  });

  it('requires exactly two parts', () => {
    expect(replace('x', 'a|b|c')).toBe('[replace:"a|b|c" must have two parameters separated by "|"]');
    expect(replace('x', 'abc')).toBe('[replace:"abc" must have two parameters separated by "|"]');
  });
});

describe('getValue and getItem', () => {
  it('looks up records and maps', () => {
    expect(getValue({ a: 1 }, 'a')).toBe(1);
    expect(getValue({ a: 0 }, 'a')).toBe(0);
    expect(getValue(new Map([['a', 'x']]), 'a')).toBe('x');
  });

  it('returns an empty string for anything missing', () => {
    expect(getValue({ a: 1 }, 'b')).toBe('');
    expect(getValue(null, 'a')).toBe('');
    expect(getValue({}, 'toString')).toBe('');
    expect(getItem(undefined, 'a', config)).toBe('');
    expect(getItem({ a: '' }, 'a', config)).toBe('');
  });

  it('scrubs items with the rule set named by the key', () => {
    expect(getItem({ 'Package Type': 'SOIC package' }, 'Package Type', config)).toBe('SOIC');
  });
});

describe('inspectValue', () => {
  it('renders with the default budgets and style', () => {
    expect(inspectValue({ a: 1 }, { config: { inspect: {} } })).toBe('object: Object {\n  a=1\n}');
  });

  it('takes defaults from the configuration', () => {
    expect(inspectValue({ a: 1 }, { config: { inspect: { maxDepth: 0 } } })).toBe('object: Object { ... } (1 item)');
    expect(inspectValue(1, { config: { inspect: { style: 'html' } } })).toBe(
      '<ul class="inspect"><li id="inspect-1" class="inspect-scalar"><span class="inspect-title">object</span>=' +
        '<span class="inspect-value">1</span></li></ul>'
    );
  });

  it('lets options override the configuration', () => {
    const text = inspectValue([1, 2], { name: 'xs', maxDepth: 1, config: { inspect: { maxDepth: 0 } } });
    expect(text).toBe('xs: Array [\n  0=1\n  1=2\n]');
  });

  it('falls back to the defaults when the configuration is unusable', () => {
    vi.stubEnv('INSPECT_CONFIG_FILE', join(tmpdir(), 'no-such-dir-for-inspect', 'absent.json5'));
    expect(inspectValue('hi')).toBe('object="hi"');
  });
});
