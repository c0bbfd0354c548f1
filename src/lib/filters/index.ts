export { scrub, GLOBAL_FILTER } from './scrub.js';
export { replace, splitReplaceArg, REGEX_PREFIX } from './replace.js';
export { getValue, getItem } from './lookup.js';
export type { Properties } from './lookup.js';
export { inspectValue, DEFAULT_ROOT_NAME } from './inspect-filter.js';
export type { InspectValueOptions } from './inspect-filter.js';
