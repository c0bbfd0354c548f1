/**
 * Scenario tests for whole inspections: budgets, cycles and filtering across
 * nested values.
 */

import { describe, it, expect } from 'vitest';
import {
  formatInspection,
  inspect,
  isDuplicateNode,
  markDoNotInvoke,
  type InspectNode,
} from '../../src/index.js';

/**
 * Paths (child titles from the root) of every node whose children were expanded.
 */
function expandedPaths(node: InspectNode, path = ''): string[] {
  if (node.children === null) {
    return [];
  }
  return [path, ...node.children.flatMap((child) => expandedPaths(child, `${path}/${child.title}`))];
}

function deepestExpanded(node: InspectNode, level = 0): number {
  if (node.children === null) {
    return -1;
  }
  return Math.max(level, ...node.children.map((child) => deepestExpanded(child, level + 1)));
}

function nested(): Record<string, unknown> {
  return {
    name: 'root',
    items: [{ id: 1, tags: new Set(['a', 'b']) }, { id: 2, tags: new Set() }],
    meta: new Map<string, unknown>([['owner', { name: 'ann', groups: ['admin'] }]]),
  };
}

describe('mapping example', () => {
  const value = { a: 1, b: { c: 2, d: 3 } };

  it('expands both levels at depth 2', () => {
    const tree = inspect('v', value, { maxDepth: 2, maxItems: 10 });

    expect(formatInspection(tree)).toBe(
      ['v: Object {', '  a=1', '  b: Object {', '    c=2', '    d=3', '  }', '}'].join('\n')
    );
  });

  it('stops at the nested mapping at depth 1', () => {
    const tree = inspect('v', value, { maxDepth: 1, maxItems: 10 });
    const b = tree.children?.[1];

    expect(b?.kind).toBe('mapping');
    expect(b?.declaredChildCount).toBe(2);
    expect(b?.children).toBeNull();
  });
});

describe('self reference', () => {
  it('links the only child back to the root', () => {
    const x: Record<string, unknown> = {};
    x.self = x;
    const tree = inspect('x', x);

    expect(tree.children).toHaveLength(1);
    const self = tree.children?.[0];
    expect(self !== undefined && isDuplicateNode(self)).toBe(true);
    expect(self?.linkTo).toBe(tree.identity);
  });

  it('terminates on a cycle through a sequence at any depth', () => {
    const node: { next: unknown[] } = { next: [] };
    node.next.push({ back: node });
    const tree = inspect('n', node, { maxDepth: 50, maxItems: 50 });

    expect(formatInspection(tree)).toBe(
      ['n: Object {', '  next: Array [', '    0: Object {', '      back (duplicated) -> #1', '    }', '  ]', '}'].join('\n')
    );
  });
});

describe('depth monotonicity', () => {
  it('only ever extends the expanded part of the tree', () => {
    for (let depth = 0; depth < 5; depth++) {
      const shallow = inspect('v', nested(), { maxDepth: depth, maxItems: 3 });
      const deep = inspect('v', nested(), { maxDepth: depth + 1, maxItems: 3 });

      expect(deepestExpanded(deep)).toBeGreaterThanOrEqual(deepestExpanded(shallow));
      expect(expandedPaths(deep)).toEqual(expect.arrayContaining(expandedPaths(shallow)));
    }
  });

  it('expands exactly maxDepth generations', () => {
    expect(deepestExpanded(inspect('v', nested(), { maxDepth: 0 }))).toBe(-1);
    expect(deepestExpanded(inspect('v', nested(), { maxDepth: 1 }))).toBe(0);
    expect(deepestExpanded(inspect('v', nested(), { maxDepth: 3 }))).toBe(2);
  });
});

describe('breadth truncation', () => {
  it('keeps the true totals of every truncated container', () => {
    const tree = inspect('v', { list: [1, 2, 3, 4], map: new Map([[1, 'a'], [2, 'b'], [3, 'c']]) }, { maxItems: 2 });
    const [list, map] = tree.children ?? [];

    expect(list.children).toHaveLength(2);
    expect(list.declaredChildCount).toBe(4);
    expect(map.children).toHaveLength(2);
    expect(map.declaredChildCount).toBe(3);
  });
});

describe('composite objects', () => {
  class Account {
    _token = 'x';
    owner = 'ann';
    password = 'letmein';
    readonly Type = Account;
    readonly close = markDoNotInvoke(() => undefined);
    readonly round = Math.round;

    get balance(): number {
      throw new Error('ledger unavailable');
    }

    deposit(amount: number, memo = ''): string {
      return `${amount}${memo}`;
    }
  }

  it('shows public attributes with masking and getter failures', () => {
    expect(formatInspection(inspect('acct', new Account()))).toBe(
      [
        'acct: Account {',
        '  balance=[Error: ledger unavailable]',
        '  deposit(amount, memo)',
        '  owner="ann"',
        '  password="*******"',
        '}',
      ].join('\n')
    );
  });
});
