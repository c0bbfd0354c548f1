export { formatInspection, registerStyle, getStyle, listStyles, DEFAULT_STYLE } from './format.js';
export { textStyle } from './text-style.js';
export { htmlStyle, ANCHOR_PREFIX } from './html-style.js';
export type { InspectStyle } from './style.js';
