/**
 * Tests for composite attribute enumeration.
 */

import { describe, it, expect } from 'vitest';
import { collectAttributes } from './attributes.js';
import { DO_NOT_CALL_IN_TEMPLATES, INSPECT_FIELDS, markDoNotInvoke } from './capabilities.js';

class Widget {
  _cache = 1;
  label = 'knob';
  size = 3;
  readonly kind = Widget;
  readonly deleteAll = markDoNotInvoke(() => 'gone');
  readonly legacy = Object.assign(() => 'old', { [DO_NOT_CALL_IN_TEMPLATES]: true });
  readonly max = Math.max;

  get area(): number {
    return this.size * this.size;
  }

  get broken(): number {
    throw new Error('sensor offline');
  }

  rotate(degrees: number): number {
    return degrees;
  }
}

describe('collectAttributes', () => {
  it('reflects own and inherited members in sorted order, filtered', () => {
    const names = collectAttributes(new Widget()).map((entry) => entry.name);
    expect(names).toEqual(['area', 'broken', 'label', 'rotate', 'size']);
  });

  it('reads values through getters', () => {
    const area = collectAttributes(new Widget()).find((entry) => entry.name === 'area');
    expect(area).toEqual({ name: 'area', value: 9 });
  });

  it('keeps a failing getter as an error entry', () => {
    const broken = collectAttributes(new Widget()).find((entry) => entry.name === 'broken');
    expect(broken).toEqual({ name: 'broken', error: 'sensor offline' });
  });

  it('uses the fields an object declares', () => {
    const account = {
      secret: 'x',
      [INSPECT_FIELDS]: () => ({ id: 7, _hidden: 1, owner: 'ann' }),
    };
    expect(collectAttributes(account)).toEqual([
      { name: 'id', value: 7 },
      { name: 'owner', value: 'ann' },
    ]);
  });

  it('uses a field adapter registered for a base class', () => {
    class Shape {
      constructor(readonly sides: number) {}
    }
    class Square extends Shape {
      constructor() {
        super(4);
      }
    }
    const adapters = new Map([[Shape, (value: object) => ({ sides: value instanceof Shape ? value.sides : 0 })]]);
    expect(collectAttributes(new Square(), adapters)).toEqual([{ name: 'sides', value: 4 }]);
  });

  it('reports a failing field list as a single error entry', () => {
    const value = {
      [INSPECT_FIELDS]: (): Record<string, unknown> => {
        throw new Error('not loaded');
      },
    };
    expect(collectAttributes(value)).toEqual([{ name: 'fields', error: 'not loaded' }]);
  });
});
