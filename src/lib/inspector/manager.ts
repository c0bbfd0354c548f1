/**
 * Inspection manager - builds an InspectNode tree from any value.
 *
 * This implements the "inspect" phase of the two-phase display pipeline:
 * 1. Inspect: bounded DFS traversal with identity tracking -> InspectNode tree
 * 2. Render: project the tree into a context and hand it to a style
 *
 * Key features:
 * - Depth budget: maxDepth generations of children below the root
 * - Breadth budget: maxItems entries per mapping, sequence or lazy collection,
 *   with the true total always kept in declaredChildCount
 * - Cycle safety: each object is expanded once per inspection; later sightings
 *   become duplicate nodes linking back to the first
 * - Failure isolation: a value that throws while being read becomes an error
 *   value; its siblings are still shown
 */

import { classify, type ClassifiedValue } from '../classifier/classify.js';
import type { FieldAdapters } from '../classifier/attributes.js';
import { isScalar, type ScalarType } from '../classifier/scalar.js';
import { buildNode, duplicateNode, errorNode, type VariantContext } from '../classifier/variants.js';
import { InspectionError, describeError } from '../core/errors.js';
import { IdentityTracker } from '../core/identity.js';
import type { InspectNode } from '../core/types.js';

export const DEFAULT_MAX_DEPTH = 2;
export const DEFAULT_MAX_ITEMS = 5;

/**
 * Options for an inspection.
 *
 * @property maxDepth - Generations of children to expand (0 = root only)
 * @property maxItems - Entries expanded per mapping, sequence or lazy collection
 * @property scalarTypes - Extra constructors whose instances print as scalars
 * @property fieldAdapters - Field lists for composite classes, by constructor
 */
export interface InspectOptions {
  readonly maxDepth?: number;
  readonly maxItems?: number;
  readonly scalarTypes?: readonly ScalarType[];
  readonly fieldAdapters?: FieldAdapters;
}

function checkBudget(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
  return value;
}

/**
 * Inspector for arbitrary values.
 *
 * A manager only holds configuration. Every call to inspect() runs with its own
 * identity tracker, created at the start of the call and dropped at the end, so
 * objects seen while inspecting one root never affect another.
 */
export class InspectionManager {
  readonly maxDepth: number;
  readonly maxItems: number;

  private readonly scalarTypes: readonly ScalarType[];
  private readonly fieldAdapters: FieldAdapters;

  constructor(options: InspectOptions = {}) {
    this.maxDepth = checkBudget('maxDepth', options.maxDepth ?? DEFAULT_MAX_DEPTH);
    this.maxItems = checkBudget('maxItems', options.maxItems ?? DEFAULT_MAX_ITEMS);
    this.scalarTypes = options.scalarTypes ?? [];
    this.fieldAdapters = options.fieldAdapters ?? new Map();
  }

  /**
   * Build the inspection tree of a value.
   *
   * @param name - Title of the root node
   * @param value - Value to inspect; it is only read, never modified
   *
   * @example
   * ```typescript
   * const tree = new InspectionManager({ maxDepth: 1 }).inspect('order', { id: 7, lines: [1, 2] });
   * // tree is a mapping node with children id (scalar) and lines (sequence, children null)
   * ```
   */
  inspect(name: string, value: unknown): InspectNode {
    const tracker = new IdentityTracker();
    return this.guarded(tracker, name, () => {
      if (!isScalar(value, this.scalarTypes)) {
        tracker.seenBefore(value);
      }
      // Depth units count the root itself, so the root is classified with one more.
      return this.classify(tracker, name, value, this.maxDepth + 1);
    });
  }

  /**
   * Classify a value and build its node, with `depth` units left including this node.
   */
  private classify(tracker: IdentityTracker, name: string, value: unknown, depth: number): InspectNode {
    if (depth <= 0) {
      throw new InspectionError('depth exceeded');
    }
    const remaining = depth - 1;
    const classified: ClassifiedValue = classify(value, this.scalarTypes);

    const ctx: VariantContext = {
      identity: tracker.identify(value),
      remaining,
      maxItems: this.maxItems,
      scalarTypes: this.scalarTypes,
      fieldAdapters: this.fieldAdapters,
      createChild: (childName, childValue) => this.createChild(tracker, childName, childValue, remaining),
      createFailedChild: (childName, message) => errorNode(childName, message, tracker.identify(undefined)),
    };

    return buildNode(name, classified, ctx);
  }

  /**
   * Build a child node, substituting a duplicate for an object already registered.
   */
  private createChild(tracker: IdentityTracker, name: string, value: unknown, depth: number): InspectNode {
    return this.guarded(tracker, name, () => {
      if (!isScalar(value, this.scalarTypes) && tracker.seenBefore(value)) {
        return duplicateNode(name, value, tracker.identify(undefined), tracker.identify(value));
      }
      return this.classify(tracker, name, value, depth);
    });
  }

  /**
   * Build one node, turning anything the value throws while it is read (a
   * hostile proxy, a failing count() or take()) into an error value in its
   * place. Internal errors still abort the inspection.
   */
  private guarded(tracker: IdentityTracker, name: string, build: () => InspectNode): InspectNode {
    try {
      return build();
    } catch (error) {
      if (error instanceof InspectionError) {
        throw error;
      }
      return errorNode(name, describeError(error), tracker.identify(undefined));
    }
  }
}

/**
 * Inspect a value with a one-off manager.
 *
 * @example
 * ```typescript
 * const x: Record<string, unknown> = {};
 * x.self = x;
 * const tree = inspect('x', x);
 * // tree.children[0] is a duplicate node with linkTo === tree.identity
 * ```
 */
export function inspect(name: string, value: unknown, options?: InspectOptions): InspectNode {
  return new InspectionManager(options).inspect(name, value);
}
