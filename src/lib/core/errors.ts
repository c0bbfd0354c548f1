/**
 * Inspection failure information.
 */

/**
 * Raised when the inspector itself breaks one of its own invariants, such as
 * classifying a value with no depth left. Never caused by the inspected data;
 * the current inspection is abandoned.
 */
export class InspectionError extends Error {
  constructor(message: string) {
    super(`Internal error in InspectionManager: ${message}`);
    this.name = 'InspectionError';
  }
}

/**
 * String form of any value, without throwing.
 *
 * Falls back to the `[object Tag]` form for objects that cannot be converted
 * (null prototype, or a throwing toString or Symbol.toPrimitive).
 */
export function safeString(value: unknown): string {
  try {
    return String(value);
  } catch {
    return tagOf(value);
  }
}

function tagOf(value: unknown): string {
  try {
    return Object.prototype.toString.call(value);
  } catch {
    // A proxy whose Symbol.toStringTag read throws
    return `[object ${typeof value}]`;
  }
}

/**
 * Describe a thrown value for embedding in output.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? safeString(error.message) : safeString(error);
}
