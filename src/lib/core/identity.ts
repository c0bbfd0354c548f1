/**
 * Identity handles and the visited set for a single inspection.
 */

/**
 * Whether a value has reference identity (as opposed to being a primitive).
 */
export function hasIdentity(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

/**
 * Assigns opaque numeric handles to the values met during one inspection and
 * remembers which of them have already been expanded.
 *
 * Handles are sequential from 1 in order of first sight. Objects keep their handle
 * for the lifetime of the tracker; primitives get a fresh handle on every call,
 * since equal primitives are not "the same object".
 *
 * A tracker belongs to exactly one inspection call and must not be reused for
 * another root value.
 */
export class IdentityTracker {
  /** Handles assigned to objects so far */
  private readonly handles = new WeakMap<object, number>();

  /** Handles of objects already expanded */
  private readonly visited = new Set<number>();

  private nextHandle = 1;

  /**
   * Get the handle for a value, assigning one on first sight.
   */
  identify(value: unknown): number {
    if (!hasIdentity(value)) {
      return this.nextHandle++;
    }

    const existing = this.handles.get(value);
    if (existing !== undefined) {
      return existing;
    }

    const handle = this.nextHandle++;
    this.handles.set(value, handle);
    return handle;
  }

  /**
   * Check whether a value was registered before, registering it if not.
   *
   * @returns true if the value was already registered
   */
  seenBefore(value: unknown): boolean {
    const handle = this.identify(value);
    if (this.visited.has(handle)) {
      return true;
    }
    this.visited.add(handle);
    return false;
  }
}
