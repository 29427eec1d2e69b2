/**
 * Returns the current unix time in milliseconds
 *
 *  ```typescript
 * const time = ms();
 * ```
 */
export function ms(): number {
  return Date.now();
}

/**
 * Milliseconds left until `deadline` (a unix ms timestamp), never negative.
 *
 * ```typescript
 * msUntil(ms() + 500); // ~500
 * msUntil(ms() - 10);  // 0
 * ```
 */
export function msUntil(deadline: number): number {
  return Math.max(0, deadline - ms());
}
