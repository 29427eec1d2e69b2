import { v7 as UUIDv7 } from 'uuid';
import { ulid } from 'ulid';

/**
 * Supported identifier types:
 *
 * - **`uuid7`**: timestamp-based UUID, used for load boundaries so ids sort by creation
 * - **`ulid`**: 26 character Crockford base32, used for pipeline context ids
 */
export type IdentifierType = 'uuid7' | 'ulid';

export const IDENTIFIER_TYPES = ['uuid7', 'ulid'] as const;

/**
 * Generates a unique identifier of the specified type.
 *
 * @param seedTime - Optional timestamp in milliseconds
 *
 * @example
 * ```typescript
 * generateID('ulid'); // "01J9ZQ3W7T8R5N2K4M6P8Q0S1V"
 * generateID('uuid7', 1700000000000);
 * ```
 */
export function generateID(type: IdentifierType, seedTime?: number): string {
  if (seedTime !== undefined && (!Number.isFinite(seedTime) || seedTime < 0)) {
    throw new TypeError(
      `Invalid seedTime: expected a non-negative finite number, got ${String(seedTime)}`,
    );
  }

  switch (type) {
    case 'uuid7':
      return seedTime === undefined ? UUIDv7() : UUIDv7({ msecs: seedTime });
    case 'ulid':
      return ulid(seedTime);
  }
}
