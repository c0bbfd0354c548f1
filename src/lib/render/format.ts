/**
 * Style registry and the render entry point.
 */

import type { InspectNode } from '../core/types.js';
import { buildContext, type InspectContext } from '../inspector/context.js';
import { htmlStyle } from './html-style.js';
import type { InspectStyle } from './style.js';
import { textStyle } from './text-style.js';

export const DEFAULT_STYLE = 'text';

const styles = new Map<string, InspectStyle>([
  [textStyle.name, textStyle],
  [htmlStyle.name, htmlStyle],
]);

/**
 * Add a style, replacing any style of the same name.
 */
export function registerStyle(style: InspectStyle): void {
  styles.set(style.name, style);
}

/**
 * Look up a style by name.
 *
 * @throws Error if no style has that name
 */
export function getStyle(name: string): InspectStyle {
  const style = styles.get(name);
  if (!style) {
    throw new Error(`Unknown inspect style '${name}' (available: ${listStyles().join(', ')})`);
  }
  return style;
}

export function listStyles(): string[] {
  return [...styles.keys()];
}

function renderContext(style: InspectStyle, context: InspectContext, level: number): string {
  const children =
    context.children === null
      ? null
      : context.children.map((child) => renderContext(style, child, level + 1));
  return style.renderObject(context, children, level);
}

/**
 * Render an inspection tree in the named style.
 *
 * @example
 * ```typescript
 * formatInspection(inspect('point', { x: 1, y: 2 }));
 * // point: Object {
 * //   x=1
 * //   y=2
 * // }
 * ```
 */
export function formatInspection(node: InspectNode, styleName: string = DEFAULT_STYLE): string {
  const style = getStyle(styleName);
  const root = buildContext(node);
  return style.renderFrame(renderContext(style, root, 0), root);
}
