/**
 * Inspection tree node types - result of the inspect phase.
 *
 * The inspector performs a depth-first traversal of an arbitrary value, classifying
 * each reachable value into one of a fixed set of variants. The resulting tree is
 * then projected into a plain context and handed to a style for display.
 */

// =============================================================================
// Variant Tags
// =============================================================================

/**
 * Variants chosen by the classifier, in priority order.
 */
export type ValueKind =
  | 'scalar'
  | 'boundMethod'
  | 'partialCall'
  | 'mapping'
  | 'sequence'
  | 'lazyCollection'
  | 'composite';

/**
 * All node variants, including the synthetic duplicate marker substituted by the
 * inspector when an object is reached a second time.
 */
export type NodeKind = ValueKind | 'duplicate';

/**
 * Variants whose nodes may hold children.
 */
export type ContainerKind = 'mapping' | 'sequence' | 'lazyCollection' | 'composite';

// =============================================================================
// Node Types
// =============================================================================

/**
 * Fields shared by every node.
 */
interface NodeBase {
  readonly identity: number;  // Per-inspection handle of the underlying value
  readonly title: string;     // Field, key or index name supplied by the parent
  readonly typeName: string;  // Runtime type of the underlying value
  readonly valueText: string;
  readonly prefix: string;
  readonly postfix: string;
}

/**
 * A value with a printable form: strings, numbers, dates, patterns and the like.
 */
export interface ScalarNode extends NodeBase {
  readonly kind: 'scalar';
  readonly declaredChildCount: null;
  readonly children: null;
  readonly linkTo: null;
}

/**
 * A callable; valueText lists its formal parameter names.
 */
export interface BoundMethodNode extends NodeBase {
  readonly kind: 'boundMethod';
  readonly parameters: readonly string[];
  readonly declaredChildCount: null;
  readonly children: null;
  readonly linkTo: null;
}

/**
 * One formal parameter of a partial call's target.
 *
 * @property bound - Whether the partial supplies this parameter
 * @property valueText - Printable pre-bound value, '(complex)' for non-scalars, '' when unbound
 */
export interface PartialParameter {
  readonly name: string;
  readonly bound: boolean;
  readonly valueText: string;
}

/**
 * A callable with some arguments pre-bound.
 */
export interface PartialCallNode extends NodeBase {
  readonly kind: 'partialCall';
  readonly target: string;
  readonly parameters: readonly PartialParameter[];
  readonly declaredChildCount: null;
  readonly children: null;
  readonly linkTo: null;
}

/**
 * A node that can hold children.
 *
 * children is null when expansion was not attempted (no depth left), which is a
 * different state from an expanded container with zero children.
 */
export interface ContainerNode extends NodeBase {
  readonly kind: ContainerKind;
  readonly declaredChildCount: number;
  readonly children: readonly InspectNode[] | null;
  readonly linkTo: null;
}

/**
 * Stand-in for an object already shown earlier in the same inspection.
 */
export interface DuplicateNode extends NodeBase {
  readonly kind: 'duplicate';
  readonly declaredChildCount: null;
  readonly children: null;
  readonly linkTo: number;
}

/**
 * Union type for all node variants.
 */
export type InspectNode =
  | ScalarNode
  | BoundMethodNode
  | PartialCallNode
  | ContainerNode
  | DuplicateNode;

// =============================================================================
// Type Guards
// =============================================================================

export function isScalarNode(node: InspectNode): node is ScalarNode {
  return node.kind === 'scalar';
}

export function isBoundMethodNode(node: InspectNode): node is BoundMethodNode {
  return node.kind === 'boundMethod';
}

export function isPartialCallNode(node: InspectNode): node is PartialCallNode {
  return node.kind === 'partialCall';
}

export function isContainerNode(node: InspectNode): node is ContainerNode {
  return (
    node.kind === 'mapping' ||
    node.kind === 'sequence' ||
    node.kind === 'lazyCollection' ||
    node.kind === 'composite'
  );
}

export function isDuplicateNode(node: InspectNode): node is DuplicateNode {
  return node.kind === 'duplicate';
}

/**
 * Whether a container node holds fewer children than its underlying value.
 */
export function isTruncated(node: InspectNode): boolean {
  return (
    node.children !== null &&
    node.declaredChildCount !== null &&
    node.declaredChildCount > node.children.length
  );
}
