/**
 * Tree context projection - the plain structure handed to styles.
 */

import type { InspectNode } from '../core/types.js';

/**
 * One node of the render context.
 *
 * children is null when the node was not expanded, [] when it was expanded and
 * is empty. totalChildren is the true count and may exceed children.length.
 */
export interface InspectContext {
  readonly title: string;
  readonly id: number;
  readonly type: string;
  readonly prefix: string;
  readonly linkTo: number | null;
  readonly value: string;
  readonly postfix: string;
  readonly totalChildren: number | null;
  /** Variant tag, for troubleshooting the inspector itself */
  readonly inspectType: string;
  readonly children: readonly InspectContext[] | null;
}

/**
 * Project an inspection tree into its render context.
 */
export function buildContext(node: InspectNode): InspectContext {
  return {
    title: node.title,
    id: node.identity,
    type: node.typeName,
    prefix: node.prefix,
    linkTo: node.linkTo,
    value: node.valueText,
    postfix: node.postfix,
    totalChildren: node.declaredChildCount,
    inspectType: node.kind,
    children: node.children === null ? null : node.children.map(buildContext),
  };
}
