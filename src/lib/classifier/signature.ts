/**
 * Formal parameter discovery for functions.
 *
 * JavaScript keeps no parameter metadata at runtime, so names are read from the
 * function's source text. Functions without source (native or produced by
 * bind()) report positional placeholders instead.
 */

import { INSPECT_SIGNATURE } from './capabilities.js';

/**
 * Any callable value.
 */
export type Callable = (...args: never[]) => unknown;

/**
 * Type guard for callables.
 */
export function isCallable(value: unknown): value is Callable {
  return typeof value === 'function';
}

const sourceOf = (fn: Callable): string => Function.prototype.toString.call(fn);

/**
 * Whether a function was produced by Function.prototype.bind().
 */
export function isBoundFunction(fn: Callable): boolean {
  return fn.name.startsWith('bound ') && !Object.hasOwn(fn, 'prototype');
}

/**
 * Whether a function is implemented natively (a built-in such as Math.max).
 */
export function isNativeFunction(fn: Callable): boolean {
  return !isBoundFunction(fn) && /\{\s*\[native code\]\s*\}\s*$/.test(sourceOf(fn));
}

/**
 * Whether a function is a class constructor declared with class syntax.
 */
export function isClass(fn: Callable): boolean {
  return /^class[\s{]/.test(sourceOf(fn));
}

/**
 * Get the formal parameter names of a function.
 *
 * @example
 * getParameterNames(function area(width, height = 1) {}) // ['width', 'height']
 * getParameterNames(async ({ id }, ...rest) => {})        // ['{ id }', '...rest']
 * getParameterNames(Math.max.bind(null, 1))               // ['arg0']
 */
export function getParameterNames(fn: Callable): string[] {
  const declared: unknown = Reflect.get(fn, INSPECT_SIGNATURE);
  if (Array.isArray(declared)) {
    return declared.map((name) => String(name));
  }

  if (isBoundFunction(fn) || isNativeFunction(fn)) {
    return placeholders(fn);
  }

  const list = extractParameterList(sourceOf(fn));
  if (list === null) {
    return placeholders(fn);
  }
  return splitTopLevel(list)
    .map((param) => stripDefault(param).replace(/\s+/g, ' ').trim())
    .filter((param) => param.length > 0);
}

function placeholders(fn: Callable): string[] {
  return Array.from({ length: fn.length }, (_, i) => `arg${i}`);
}

// =============================================================================
// Source Scanning
// =============================================================================

const OPENERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' };

/**
 * Characters after which a `/` opens a regex literal rather than dividing.
 */
const REGEX_PRECEDERS = new Set('=(,:[!&|?{};+-*%<>~^');

/**
 * Remove comments, keeping string and template literals intact.
 */
function stripComments(source: string): string {
  let out = '';
  let i = 0;
  while (i < source.length) {
    const ch = source[i];
    const next = source[i + 1];
    if (ch === '/' && next === '*') {
      const end = source.indexOf('*/', i + 2);
      i = end === -1 ? source.length : end + 2;
      out += ' ';
    } else if (ch === '/' && next === '/') {
      const end = source.indexOf('\n', i + 2);
      i = end === -1 ? source.length : end;
    } else if (startsLiteral(source, i)) {
      const end = skipLiteral(source, i);
      out += source.slice(i, end);
      i = end;
    } else {
      out += ch;
      i++;
    }
  }
  return out;
}

/**
 * Whether a string, template or regex literal starts at `i`.
 */
function startsLiteral(source: string, i: number): boolean {
  const ch = source[i];
  if (ch === '"' || ch === "'" || ch === '`') {
    return true;
  }
  if (ch !== '/' || source[i + 1] === '/' || source[i + 1] === '*') {
    return false;
  }
  let j = i - 1;
  while (j >= 0 && /\s/.test(source[j])) {
    j--;
  }
  return j < 0 || REGEX_PRECEDERS.has(source[j]);
}

/**
 * Index just past the literal starting at `start` (see startsLiteral).
 */
function skipLiteral(source: string, start: number): number {
  return source[start] === '/' ? skipRegex(source, start) : skipString(source, start);
}

/**
 * Index just past the regex literal starting at `start`. A `/` inside a
 * character class does not end it.
 */
function skipRegex(source: string, start: number): number {
  let inClass = false;
  let i = start + 1;
  while (i < source.length) {
    const ch = source[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === '[') {
      inClass = true;
    } else if (ch === ']') {
      inClass = false;
    } else if (ch === '/' && !inClass) {
      return i + 1;
    }
    i++;
  }
  return i;
}

/**
 * Index just past the string literal starting at `start`.
 */
function skipString(source: string, start: number): number {
  const quote = source[start];
  let i = start + 1;
  while (i < source.length) {
    if (source[i] === '\\') {
      i += 2;
    } else if (source[i] === quote) {
      return i + 1;
    } else {
      i++;
    }
  }
  return i;
}

/**
 * Find the text between the parentheses of the parameter list, or the single
 * bare parameter of an arrow function such as `x => x * 2`.
 */
function extractParameterList(rawSource: string): string | null {
  const source = stripComments(rawSource).trim();

  const bareArrow = /^(?:async\s+)?([A-Za-z_$][\w$]*)\s*=>/.exec(source);
  if (bareArrow) {
    return bareArrow[1];
  }

  const open = findTopLevel(source, '(');
  if (open === -1) {
    return null;
  }
  const close = findClosing(source, open);
  return close === -1 ? null : source.slice(open + 1, close);
}

/**
 * Index of the first `target` outside any brackets or literal.
 */
function findTopLevel(source: string, target: string): number {
  let depth = 0;
  let i = 0;
  while (i < source.length) {
    const ch = source[i];
    if (startsLiteral(source, i)) {
      i = skipLiteral(source, i);
      continue;
    }
    if (depth === 0 && ch === target) {
      return i;
    }
    if (ch in OPENERS) {
      depth++;
    } else if (ch === ')' || ch === ']' || ch === '}') {
      depth--;
    }
    i++;
  }
  return -1;
}

/**
 * Index of the bracket closing the one at `open`.
 */
function findClosing(source: string, open: number): number {
  const stack: string[] = [];
  let i = open;
  while (i < source.length) {
    const ch = source[i];
    if (startsLiteral(source, i)) {
      i = skipLiteral(source, i);
      continue;
    }
    const closer = OPENERS[ch];
    if (closer !== undefined) {
      stack.push(closer);
    } else if (ch === stack[stack.length - 1]) {
      stack.pop();
      if (stack.length === 0) {
        return i;
      }
    }
    i++;
  }
  return -1;
}

/**
 * Split on commas that are not nested in brackets or literals.
 */
function splitTopLevel(list: string): string[] {
  const parts: string[] = [];
  let rest = list;
  let cut = findTopLevel(rest, ',');
  while (cut !== -1) {
    parts.push(rest.slice(0, cut));
    rest = rest.slice(cut + 1);
    cut = findTopLevel(rest, ',');
  }
  parts.push(rest);
  return parts;
}

/**
 * Drop a default value: `a = 1` -> `a`.
 */
function stripDefault(param: string): string {
  let depth = 0;
  for (let i = 0; i < param.length; i++) {
    const ch = param[i];
    if (ch in OPENERS) {
      depth++;
    } else if (ch === ')' || ch === ']' || ch === '}') {
      depth--;
    } else if (depth === 0 && ch === '=' && param[i + 1] !== '>' && param[i + 1] !== '=') {
      return param.slice(0, i);
    }
  }
  return param;
}
