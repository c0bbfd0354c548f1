/**
 * inspectree - bounded, cycle-safe introspection of arbitrary values for display.
 */

export * from './lib/core/index.js';
export * from './lib/classifier/index.js';
export * from './lib/inspector/index.js';
export * from './lib/render/index.js';
export * from './lib/filters/index.js';
export * from './lib/config/index.js';
