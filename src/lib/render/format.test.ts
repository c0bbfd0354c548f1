/**
 * Tests for styles and the render entry point.
 */

import { describe, it, expect } from 'vitest';
import { formatInspection, getStyle, listStyles, registerStyle } from './format.js';
import type { InspectStyle } from './style.js';
import { inspect } from '../inspector/manager.js';
import { partial } from '../classifier/partial.js';

function format(value: number, radix: number, pad: number): string {
  return value.toString(radix).padStart(pad, '0');
}

describe('text style', () => {
  it('renders unexpanded containers with their totals', () => {
    const text = formatInspection(inspect('cfg', { a: 1, b: [1, 2, 3] }, { maxDepth: 1 }));

    expect(text).toBe(['cfg: Object {', '  a=1', '  b: Array [ ... ] (3 items)', '}'].join('\n'));
  });

  it('renders nested containers indented', () => {
    const text = formatInspection(inspect('cfg', { a: 1, b: [1, 2, 3] }));

    expect(text).toBe(
      ['cfg: Object {', '  a=1', '  b: Array [', '    0=1', '    1=2', '    2=3', '  ]', '}'].join('\n')
    );
  });

  it('renders duplicates as links', () => {
    const x: Record<string, unknown> = { name: 'x' };
    x.self = x;

    expect(formatInspection(inspect('x', x))).toBe(
      ['x: Object {', '  name="x"', '  self (duplicated) -> #1', '}'].join('\n')
    );
  });

  it('notes entries beyond the item budget', () => {
    const text = formatInspection(inspect('list', [10, 20, 30, 40], { maxItems: 2 }));

    expect(text).toBe(['list: Array [', '  0=10', '  1=20', '  ... 2 more', ']'].join('\n'));
  });

  it('renders empty containers on one line', () => {
    expect(formatInspection(inspect('e', {}))).toBe('e: Object {}');
  });

  it('renders callables with their parameters', () => {
    const text = formatInspection(inspect('api', { toHex: partial(format, [], { radix: 16 }) }));

    expect(text.split('\n')[1]).toBe('  toHex(...) -> format(value, radix=16, pad)');
  });

  it('renders a scalar root alone', () => {
    expect(formatInspection(inspect('n', 'hi'))).toBe('n="hi"');
  });
});

describe('html style', () => {
  it('escapes text and anchors expanded nodes', () => {
    const html = formatInspection(inspect('x', { a: '<b>' }), 'html');

    expect(html).toBe(
      '<ul class="inspect">' +
        '<li id="inspect-1" class="inspect-mapping"><span class="inspect-title">x</span>: ' +
        '<span class="inspect-type">Object</span> {<ul class="inspect">' +
        '<li id="inspect-2" class="inspect-scalar"><span class="inspect-title">a</span>=' +
        '<span class="inspect-value">&quot;&lt;b&gt;&quot;</span></li>' +
        '</ul>}</li>' +
        '</ul>'
    );
  });

  it('links duplicates to the first occurrence', () => {
    const x: Record<string, unknown> = {};
    x.self = x;
    const html = formatInspection(inspect('x', x), 'html');

    expect(html).toContain(
      '<li class="inspect-duplicate"><span class="inspect-title">self</span> <a href="#inspect-1">(duplicated)</a></li>'
    );
  });

  it('renders truncation and unexpanded counts', () => {
    const truncated = formatInspection(inspect('l', [1, 2, 3], { maxItems: 1 }), 'html');
    const unexpanded = formatInspection(inspect('l', [1, 2, 3], { maxDepth: 0 }), 'html');

    expect(truncated).toContain('<li class="inspect-more">... 2 more</li></ul>]</li>');
    expect(unexpanded).toBe(
      '<ul class="inspect"><li id="inspect-1" class="inspect-sequence"><span class="inspect-title">l</span>: ' +
        '<span class="inspect-type">Array</span> [ ... ] <span class="inspect-count">(3 items)</span></li></ul>'
    );
  });
});

describe('style registry', () => {
  it('lists the built-in styles', () => {
    expect(listStyles()).toEqual(expect.arrayContaining(['text', 'html']));
  });

  it('rejects unknown styles', () => {
    expect(() => getStyle('yaml')).toThrow("Unknown inspect style 'yaml'");
  });

  it('renders with a registered style', () => {
    const titles: InspectStyle = {
      name: 'titles',
      renderObject: (context, children) => [context.title, ...(children ?? [])].join(','),
      renderFrame: (body) => `<${body}>`,
    };
    registerStyle(titles);

    expect(formatInspection(inspect('r', { a: 1, b: { c: 2 } }), 'titles')).toBe('<r,a,b,c>');
  });
});
