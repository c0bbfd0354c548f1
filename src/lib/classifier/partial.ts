/**
 * Partial application with inspectable bindings.
 *
 * Function.prototype.bind() hides the arguments it pre-binds. A function made by
 * partial() keeps them, so the inspector can show which parameters of the target
 * are already supplied.
 */

import { getParameterNames, type Callable } from './signature.js';

/**
 * Key of the binding record on a partial call.
 */
export const PARTIAL: unique symbol = Symbol('inspectree.partial');

/**
 * What a partial call pre-binds.
 *
 * @property args - Leading positional arguments
 * @property keywords - Arguments for later parameters, by parameter name
 */
export interface PartialBinding {
  readonly func: Callable;
  readonly args: readonly unknown[];
  readonly keywords: Readonly<Record<string, unknown>>;
}

/**
 * A callable produced by partial().
 */
export type PartialCall = ((...rest: unknown[]) => unknown) & {
  readonly [PARTIAL]: PartialBinding;
};

/**
 * Pre-bind arguments of a function.
 *
 * Calling the result passes `args` first, then for each following parameter the
 * keyword of the same name if given, otherwise the next argument of the call.
 * Leftover call arguments are appended.
 *
 * @example
 * ```typescript
 * const toHex = partial(formatNumber, [], { radix: 16 });
 * toHex(255); // formatNumber(255, 16)
 * ```
 */
export function partial(
  func: Callable,
  args: readonly unknown[] = [],
  keywords: Readonly<Record<string, unknown>> = {}
): PartialCall {
  const binding: PartialBinding = Object.freeze({
    func,
    args: Object.freeze([...args]),
    keywords: Object.freeze({ ...keywords }),
  });
  const names = getParameterNames(func);

  function call(this: unknown, ...rest: unknown[]): unknown {
    const finalArgs = [...binding.args];
    let next = 0;
    for (let i = finalArgs.length; i < names.length; i++) {
      const name = names[i];
      if (Object.hasOwn(binding.keywords, name)) {
        finalArgs.push(binding.keywords[name]);
      } else if (next < rest.length) {
        finalArgs.push(rest[next++]);
      } else if (names.slice(i + 1).some((later) => Object.hasOwn(binding.keywords, later))) {
        finalArgs.push(undefined);
      } else {
        break;
      }
    }
    finalArgs.push(...rest.slice(next));
    return Reflect.apply(func, this, finalArgs);
  }

  return Object.assign(call, { [PARTIAL]: binding });
}

/**
 * Type guard for values produced by partial().
 */
export function isPartialCall(value: unknown): value is PartialCall {
  return typeof value === 'function' && Object.hasOwn(value, PARTIAL);
}
