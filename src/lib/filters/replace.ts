/**
 * Literal or regex substitution driven by a single `match|replacement` argument.
 */

import { describeError } from '../core/errors.js';

export const REGEX_PREFIX = 'regex:';

const ESCAPED_PIPE = '\u0000';

/**
 * Split `match|replacement` on the unescaped pipe; `\|` stands for a literal pipe.
 */
export function splitReplaceArg(arg: string): string[] {
  return arg
    .replaceAll('\\|', ESCAPED_PIPE)
    .split('|')
    .map((part) => part.replaceAll(ESCAPED_PIPE, '|'));
}

/**
 * Replace every occurrence of the match side of `arg` with its replacement side.
 *
 * A match side starting with `regex:` is a regular expression and the
 * replacement may use `$1` back-references.
 *
 * @example
 * ```typescript
 * replace('a-b-c', '-|+');              // 'a+b+c'
 * replace('a|b', '\\||/');              // 'a/b'
 * replace('v1.2', 'regex:(\\d+)|<$1>'); // 'v<1>.<2>'
 * ```
 */
export function replace(text: string, arg: string): string {
  const parts = splitReplaceArg(arg);
  if (parts.length !== 2) {
    return `[replace:${JSON.stringify(arg)} must have two parameters separated by "|"]`;
  }

  const [match, replacement] = parts;
  if (!match.startsWith(REGEX_PREFIX)) {
    return text.replaceAll(match, () => replacement);
  }

  const pattern = match.slice(REGEX_PREFIX.length);
  let regex: RegExp;
  try {
    regex = new RegExp(pattern, 'g');
  } catch (e) {
    return `[replace regex error on ${pattern}: ${describeError(e)}]`;
  }
  return text.replace(regex, replacement);
}
