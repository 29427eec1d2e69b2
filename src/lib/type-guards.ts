/**
 * Type guard for thenables (anything with a callable `then`).
 */
export function isPromise(value: unknown): value is PromiseLike<unknown> {
  if (value === null) {
    return false;
  }

  if (typeof value !== 'object' && typeof value !== 'function') {
    return false;
  }

  return 'then' in value && typeof value.then === 'function';
}

export function isFunction(
  value: unknown,
): value is (...args: unknown[]) => unknown {
  return typeof value === 'function';
}

/**
 * Type guard for plain records (non-null, non-array objects)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Type guard to check if a value is a finite number.
 *
 * @example
 * ```typescript
 * isFiniteNumber(42);        // true
 * isFiniteNumber(Infinity);  // false
 * isFiniteNumber(NaN);       // false
 * isFiniteNumber('123');     // false
 * ```
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Throws a TypeError unless `value` is a finite number >= 0.
 * Used for every `...MS` option so a bad config fails at construction.
 */
export function assertTimeoutMS(name: string, value: number): void {
  if (!isFiniteNumber(value) || value < 0) {
    throw new TypeError(
      `Invalid ${name}: expected a finite number >= 0, got ${String(value)}`,
    );
  }
}
