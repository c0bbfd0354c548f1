/**
 * Tests for variant classification.
 */

import { describe, it, expect } from 'vitest';
import { classifyValue } from './classify.js';
import { partial } from './partial.js';

class Temperature {
  constructor(readonly celsius: number) {}
}

const lazy = {
  count: () => 3,
  take: (limit: number) => [1, 2, 3].slice(0, limit),
};

describe('classifyValue', () => {
  it('classifies scalars first', () => {
    expect(classifyValue('abc')).toBe('scalar');
    expect(classifyValue(null)).toBe('scalar');
    expect(classifyValue('a1'.match(/\d/))).toBe('scalar');
  });

  it('classifies callables', () => {
    expect(classifyValue(function area(w: number) { return w; })).toBe('boundMethod');
    expect(classifyValue(Math.max)).toBe('boundMethod');
    expect(classifyValue(partial(Math.max, [1]))).toBe('partialCall');
  });

  it('classifies mappings', () => {
    expect(classifyValue({ a: 1 })).toBe('mapping');
    expect(classifyValue(Object.create(null))).toBe('mapping');
    expect(classifyValue(new Map())).toBe('mapping');
  });

  it('classifies sequences', () => {
    expect(classifyValue([1, 2])).toBe('sequence');
    expect(classifyValue(new Set([1]))).toBe('sequence');
    expect(classifyValue(new Uint8Array(2))).toBe('sequence');
  });

  it('classifies lazy collections by shape', () => {
    expect(classifyValue(lazy)).toBe('mapping');
    expect(classifyValue(Object.assign(new Temperature(1), lazy))).toBe('lazyCollection');
  });

  it('falls back to composite', () => {
    expect(classifyValue(new Temperature(20))).toBe('composite');
    expect(classifyValue(new URL('https://example.com/'))).toBe('composite');
    expect(classifyValue(class Thing {})).toBe('composite');
  });

  it('honours extra scalar types', () => {
    expect(classifyValue(new Temperature(20), [Temperature])).toBe('scalar');
  });
});
