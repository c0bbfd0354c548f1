/**
 * Node construction for each variant.
 *
 * Builders turn one value into one node. They never recurse themselves: every
 * child goes back through the context's createChild hook, which is where the
 * inspector applies cycle detection and depth accounting.
 */

import type {
  BoundMethodNode,
  ContainerKind,
  ContainerNode,
  DuplicateNode,
  InspectNode,
  PartialCallNode,
  PartialParameter,
  ScalarNode,
} from '../core/types.js';
import { describeError, safeString } from '../core/errors.js';
import { hasIdentity } from '../core/identity.js';
import { collectAttributes, isAttributeError, type FieldAdapters } from './attributes.js';
import type { LazyCollection } from './capabilities.js';
import { DECORATIONS, type ClassifiedValue, type MappingValue, type SequenceValue } from './classify.js';
import { PARTIAL, type PartialCall } from './partial.js';
import { formatScalar, isScalar, scalarToString, typeNameOf, type ScalarType } from './scalar.js';
import { getParameterNames, type Callable } from './signature.js';

/**
 * Marker text of a duplicate node.
 */
export const DUPLICATED_TEXT = '(duplicated)';

/**
 * Shown for a pre-bound argument that has no scalar form.
 */
export const COMPLEX_TEXT = '(complex)';

/**
 * What a builder needs from the traversal driving it.
 */
export interface VariantContext {
  /** Handle of the value being built */
  readonly identity: number;

  /** Generations of children that may still be expanded below this node */
  readonly remaining: number;

  /** Most entries expanded per mapping, sequence or lazy collection */
  readonly maxItems: number;

  readonly scalarTypes: readonly ScalarType[];
  readonly fieldAdapters: FieldAdapters;

  /** Build the node for a child value (may yield a duplicate) */
  createChild(name: string, value: unknown): InspectNode;

  /** Build the node for a child whose value could not be read */
  createFailedChild(name: string, message: string): InspectNode;
}

/**
 * Build the node for a classified value.
 */
export function buildNode(name: string, classified: ClassifiedValue, ctx: VariantContext): InspectNode {
  switch (classified.kind) {
    case 'scalar':
      return scalarNode(name, classified.value, ctx.identity);
    case 'boundMethod':
      return boundMethodNode(name, classified.value, ctx.identity);
    case 'partialCall':
      return partialCallNode(name, classified.value, ctx);
    case 'mapping':
      return mappingNode(name, classified.value, ctx);
    case 'sequence':
      return sequenceNode(name, classified.value, ctx);
    case 'lazyCollection':
      return lazyCollectionNode(name, classified.value, ctx);
    case 'composite':
      return compositeNode(name, classified.value, ctx);
  }
}

// =============================================================================
// Value-Only Variants
// =============================================================================

export function scalarNode(name: string, value: unknown, identity: number): ScalarNode {
  return Object.freeze({
    kind: 'scalar',
    identity,
    title: name,
    typeName: typeNameOf(value),
    valueText: formatScalar(name, value),
    ...DECORATIONS.scalar,
    declaredChildCount: null,
    children: null,
    linkTo: null,
  });
}

/**
 * Scalar standing in for a value that raised an error when read.
 */
export function errorNode(name: string, message: string, identity: number): ScalarNode {
  return Object.freeze({
    kind: 'scalar',
    identity,
    title: name,
    typeName: 'Error',
    valueText: `[Error: ${message}]`,
    ...DECORATIONS.scalar,
    declaredChildCount: null,
    children: null,
    linkTo: null,
  });
}

export function boundMethodNode(name: string, fn: Callable, identity: number): BoundMethodNode {
  const parameters = Object.freeze(getParameterNames(fn));
  return Object.freeze({
    kind: 'boundMethod',
    identity,
    title: name,
    typeName: 'function',
    valueText: parameters.join(', '),
    parameters,
    ...DECORATIONS.boundMethod,
    declaredChildCount: null,
    children: null,
    linkTo: null,
  });
}

/**
 * A partial call, titled `name(...) -> target` with each parameter of the target
 * shown bare, as `param=value`, or as `param=(complex)`.
 */
export function partialCallNode(name: string, call: PartialCall, ctx: VariantContext): PartialCallNode {
  const { func, args, keywords } = call[PARTIAL];
  const target = func.name || '(anonymous)';

  const parameters = getParameterNames(func).map((param, index): PartialParameter => {
    const keyword = param.replace(/^\.\.\./, '');
    if (index < args.length) {
      return boundParameter(param, args[index], ctx.scalarTypes);
    }
    if (Object.hasOwn(keywords, keyword)) {
      return boundParameter(param, keywords[keyword], ctx.scalarTypes);
    }
    return { name: param, bound: false, valueText: '' };
  });

  return Object.freeze({
    kind: 'partialCall',
    identity: ctx.identity,
    title: `${name}(...) -> ${target}`,
    typeName: 'partial',
    valueText: parameters.map((p) => (p.bound ? `${p.name}=${p.valueText}` : p.name)).join(', '),
    target,
    parameters: Object.freeze(parameters),
    ...DECORATIONS.partialCall,
    declaredChildCount: null,
    children: null,
    linkTo: null,
  });
}

function boundParameter(name: string, value: unknown, scalarTypes: readonly ScalarType[]): PartialParameter {
  return {
    name,
    bound: true,
    valueText: isScalar(value, scalarTypes) ? scalarToString(value) : COMPLEX_TEXT,
  };
}

/**
 * Stand-in for an object already shown in this inspection.
 *
 * @param identity - Handle of this node, distinct from the original's
 * @param linkTo - Handle of the node where the object was first shown
 */
export function duplicateNode(name: string, value: unknown, identity: number, linkTo: number): DuplicateNode {
  return Object.freeze({
    kind: 'duplicate',
    identity,
    title: name,
    typeName: typeNameOf(value),
    valueText: DUPLICATED_TEXT,
    ...DECORATIONS.duplicate,
    declaredChildCount: null,
    children: null,
    linkTo,
  });
}

// =============================================================================
// Container Variants
// =============================================================================

function containerNode(
  kind: ContainerKind,
  name: string,
  value: unknown,
  ctx: VariantContext,
  declaredChildCount: number,
  children: InspectNode[] | null
): ContainerNode {
  return Object.freeze({
    kind,
    identity: ctx.identity,
    title: name,
    typeName: typeNameOf(value),
    valueText: '',
    ...DECORATIONS[kind],
    declaredChildCount,
    children: children === null ? null : Object.freeze(children),
    linkTo: null,
  });
}

/**
 * Turn up to maxItems items into children, in iteration order, without pulling
 * more items from the iterable than are used.
 */
function expand<T>(
  items: Iterable<T>,
  ctx: VariantContext,
  toChild: (item: T, index: number) => InspectNode
): InspectNode[] {
  const children: InspectNode[] = [];
  if (ctx.maxItems === 0) {
    return children;
  }
  for (const item of items) {
    children.push(toChild(item, children.length));
    if (children.length >= ctx.maxItems) {
      break;
    }
  }
  return children;
}

export function mappingNode(name: string, mapping: MappingValue, ctx: VariantContext): ContainerNode {
  if (mapping instanceof Map) {
    const children =
      ctx.remaining > 0
        ? expand(mapping, ctx, ([key, value]) => ctx.createChild(safeString(key), value))
        : null;
    return containerNode('mapping', name, mapping, ctx, mapping.size, children);
  }

  const keys = Object.keys(mapping);
  const children =
    ctx.remaining > 0
      ? expand(keys, ctx, (key) => {
          let value: unknown;
          try {
            value = mapping[key];
          } catch (error) {
            return ctx.createFailedChild(key, describeError(error));
          }
          return ctx.createChild(key, value);
        })
      : null;
  return containerNode('mapping', name, mapping, ctx, keys.length, children);
}

export function sequenceNode(name: string, sequence: SequenceValue, ctx: VariantContext): ContainerNode {
  const total = sequence instanceof Set ? sequence.size : sequence.length;
  const children =
    ctx.remaining > 0
      ? expand(sequenceItems(sequence, ctx.maxItems), ctx, (item, index) => ctx.createChild(String(index), item))
      : null;
  return containerNode('sequence', name, sequence, ctx, total, children);
}

function sequenceItems(sequence: SequenceValue, limit: number): Iterable<unknown> {
  if (sequence instanceof Set) {
    return sequence;
  }
  const indexed = sequence;
  return Array.from({ length: Math.min(indexed.length, limit) }, (_, index) => indexed[index]);
}

/**
 * Counts the collection, then fetches only the first maxItems elements, and only
 * when there is depth left to show them.
 */
export function lazyCollectionNode(name: string, collection: LazyCollection, ctx: VariantContext): ContainerNode {
  const total = collection.count();

  let children: InspectNode[] | null = null;
  if (ctx.remaining > 0) {
    const limit = Math.min(ctx.maxItems, total);
    children =
      limit > 0
        ? expand(collection.take(limit), ctx, (item, index) => ctx.createChild(String(index), item))
        : [];
  }
  return containerNode('lazyCollection', name, collection, ctx, total, children);
}

/**
 * Every qualifying attribute becomes a child; composites have no item budget.
 */
export function compositeNode(name: string, value: unknown, ctx: VariantContext): ContainerNode {
  if (!hasIdentity(value)) {
    return containerNode('composite', name, value, ctx, 0, ctx.remaining > 0 ? [] : null);
  }

  const attributes = collectAttributes(value, ctx.fieldAdapters);
  const children =
    ctx.remaining > 0
      ? attributes.map((entry) =>
          isAttributeError(entry)
            ? ctx.createFailedChild(entry.name, entry.error)
            : ctx.createChild(entry.name, entry.value)
        )
      : null;
  return containerNode('composite', name, value, ctx, attributes.length, children);
}
