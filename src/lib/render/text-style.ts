/**
 * Plain text style: one line per node, indented two spaces per level.
 *
 * @example
 * ```
 * order: Object {
 *   id=7
 *   lines: Array [ ... ] (2 items)
 *   total(currency)
 * }
 * ```
 */

import type { InspectContext } from '../inspector/context.js';
import { hiddenCount, pluralizeItems, type InspectStyle } from './style.js';

const INDENT = '  ';

export const textStyle: InspectStyle = {
  name: 'text',

  renderObject(context: InspectContext, children: readonly string[] | null, level: number): string {
    const pad = INDENT.repeat(level);
    const { title, type, prefix, value, postfix } = context;

    if (context.linkTo !== null) {
      return `${pad}${title} ${value} -> #${context.linkTo}`;
    }
    if (context.totalChildren === null) {
      return `${pad}${title}${prefix}${value}${postfix}`;
    }
    if (children === null) {
      return `${pad}${title}: ${type} ${prefix} ... ${postfix} (${pluralizeItems(context.totalChildren)})`;
    }
    if (context.totalChildren === 0) {
      return `${pad}${title}: ${type} ${prefix}${postfix}`;
    }

    const lines = [`${pad}${title}: ${type} ${prefix}`, ...children];
    const hidden = hiddenCount(context);
    if (hidden > 0) {
      lines.push(`${pad}${INDENT}... ${hidden} more`);
    }
    lines.push(`${pad}${postfix}`);
    return lines.join('\n');
  },

  renderFrame(body: string): string {
    return body;
  },
};
