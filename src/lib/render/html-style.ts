/**
 * HTML style: nested lists, one <li> per node.
 *
 * Expanded nodes carry id="inspect-<id>" and duplicates link back to them with
 * href="#inspect-<linkTo>". All text is escaped.
 */

import escapeHtml from 'escape-html';
import type { InspectContext } from '../inspector/context.js';
import { hiddenCount, pluralizeItems, type InspectStyle } from './style.js';

export const ANCHOR_PREFIX = 'inspect-';

function titleOf(context: InspectContext): string {
  return `<span class="inspect-title">${escapeHtml(context.title)}</span>`;
}

export const htmlStyle: InspectStyle = {
  name: 'html',

  renderObject(context: InspectContext, children: readonly string[] | null): string {
    const prefix = escapeHtml(context.prefix);
    const postfix = escapeHtml(context.postfix);
    const type = `<span class="inspect-type">${escapeHtml(context.type)}</span>`;

    if (context.linkTo !== null) {
      return (
        `<li class="inspect-duplicate">${titleOf(context)} ` +
        `<a href="#${ANCHOR_PREFIX}${context.linkTo}">${escapeHtml(context.value)}</a></li>`
      );
    }

    const open = `<li id="${ANCHOR_PREFIX}${context.id}" class="inspect-${context.inspectType}">`;
    if (context.totalChildren === null) {
      const value = `<span class="inspect-value">${escapeHtml(context.value)}</span>`;
      return `${open}${titleOf(context)}${prefix}${value}${postfix}</li>`;
    }
    if (children === null) {
      const count = `<span class="inspect-count">(${pluralizeItems(context.totalChildren)})</span>`;
      return `${open}${titleOf(context)}: ${type} ${prefix} ... ${postfix} ${count}</li>`;
    }

    const hidden = hiddenCount(context);
    const more = hidden > 0 ? `<li class="inspect-more">... ${hidden} more</li>` : '';
    return `${open}${titleOf(context)}: ${type} ${prefix}<ul class="inspect">${children.join('')}${more}</ul>${postfix}</li>`;
  },

  renderFrame(body: string): string {
    return `<ul class="inspect">${body}</ul>`;
  },
};
