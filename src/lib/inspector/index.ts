/**
 * Inspector - builds an InspectNode tree from any value and projects it for rendering.
 *
 * Two-phase display pipeline:
 * 1. Inspect: bounded DFS traversal with identity tracking -> InspectNode tree
 * 2. Render: project the tree into an InspectContext and hand it to a style
 */

export { InspectionManager, inspect, DEFAULT_MAX_DEPTH, DEFAULT_MAX_ITEMS } from './manager.js';
export type { InspectOptions } from './manager.js';
export { buildContext } from './context.js';
export type { InspectContext } from './context.js';
