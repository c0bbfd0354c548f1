/**
 * Inspection styles - named presentations of an inspection context.
 */

import type { InspectContext } from '../inspector/context.js';

/**
 * A named way of turning an inspection context into text.
 *
 * Rendering is bottom-up: renderObject receives each node's children already
 * rendered (null when the node was not expanded), and renderFrame wraps the
 * rendered root.
 */
export interface InspectStyle {
  readonly name: string;
  renderObject(context: InspectContext, children: readonly string[] | null, level: number): string;
  renderFrame(body: string, root: InspectContext): string;
}

/**
 * Number of children a container holds beyond those rendered.
 */
export function hiddenCount(context: InspectContext): number {
  if (context.totalChildren === null || context.children === null) {
    return 0;
  }
  return Math.max(0, context.totalChildren - context.children.length);
}

export function pluralizeItems(count: number): string {
  return `${count} ${count === 1 ? 'item' : 'items'}`;
}
