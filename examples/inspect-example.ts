/**
 * Example demonstrating inspection and rendering.
 *
 * This shows how to:
 * 1. Inspect a nested value and render it as text
 * 2. Tighten the depth and item budgets
 * 3. Give a class an explicit field list and a lazy collection
 * 4. Render the same tree as HTML
 */

import {
  INSPECT_FIELDS,
  formatInspection,
  inspect,
  partial,
  type LazyCollection,
} from '../src/index.js';

// Example 1: Nested configuration
console.log('=== Example 1: Nested Configuration ===\n');

const settings: Record<string, unknown> = {
  host: 'localhost',
  port: 8080,
  dbPassword: 'test-secret',
  replicas: ['a', 'b', 'c', 'd', 'e', 'f', 'g'],
  started: new Date(Date.UTC(2024, 4, 1)),
};
settings.parent = settings;

console.log(formatInspection(inspect('settings', settings)));

// Example 2: Tight budgets
console.log('\n\n=== Example 2: Tight Budgets ===\n');

console.log(formatInspection(inspect('settings', settings, { maxDepth: 1, maxItems: 2 })));

// Example 3: Explicit fields and lazy collections
console.log('\n\n=== Example 3: Explicit Fields ===\n');

class Orders implements LazyCollection<{ id: number }> {
  count(): number {
    return 1_000_000;
  }

  take(limit: number): { id: number }[] {
    console.log(`  (fetching ${limit} orders)`);
    return Array.from({ length: limit }, (_, i) => ({ id: i + 1 }));
  }
}

function price(amount: number, currency: string, rounding: number): string {
  return `${amount.toFixed(rounding)} ${currency}`;
}

class Customer {
  constructor(private readonly store: Map<string, string>, readonly id: string) {}

  [INSPECT_FIELDS]() {
    return {
      id: this.id,
      name: this.store.get(this.id) ?? '(unknown)',
      orders: new Orders(),
      formatPrice: partial(price, [], { currency: 'EUR' }),
    };
  }
}

const customer = new Customer(new Map([['c1', 'Ann']]), 'c1');
console.log(formatInspection(inspect('customer', customer, { maxItems: 3 })));

// Example 4: HTML
console.log('\n\n=== Example 4: HTML ===\n');

console.log(formatInspection(inspect('customer', customer, { maxDepth: 1 }), 'html'));
