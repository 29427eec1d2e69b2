/**
 * - `none`: no restriction, everything comes from the host
 * - `standard`: parent-last, a module found in the component's private
 *   location wins over the host's copy (default)
 * - `strict`: block/allow lists apply, private copies are not preferred
 */
export type IsolationLevel = 'none' | 'standard' | 'strict';

export const ISOLATION_LEVELS = ['none', 'standard', 'strict'] as const;

export interface IsolationRequirements {
  readonly level: IsolationLevel;
  /** Empty means no allow-list restriction */
  readonly allowedModules: ReadonlySet<string>;
  readonly blockedModules: ReadonlySet<string>;
}

export interface IsolationRequirementsInput {
  level?: IsolationLevel;
  allowedModules?: Iterable<string>;
  blockedModules?: Iterable<string>;
}

export function isIsolationLevel(value: unknown): value is IsolationLevel {
  return ISOLATION_LEVELS.some((level) => level === value);
}

/**
 * Builds an immutable requirements record; the module sets are copies, so
 * later changes to the input do not leak into a constructed boundary.
 */
export function createIsolationRequirements(
  input: IsolationRequirementsInput = {},
): IsolationRequirements {
  const level = input.level ?? 'standard';

  if (!isIsolationLevel(level)) {
    throw new TypeError(`Invalid isolation level: "${String(level)}"`);
  }

  return Object.freeze({
    level,
    allowedModules: new Set(input.allowedModules ?? []),
    blockedModules: new Set(input.blockedModules ?? []),
  });
}

export function standardIsolation(
  blockedModules: Iterable<string> = [],
): IsolationRequirements {
  return createIsolationRequirements({ level: 'standard', blockedModules });
}

export function strictIsolation(
  allowedModules: Iterable<string> = [],
  blockedModules: Iterable<string> = [],
): IsolationRequirements {
  return createIsolationRequirements({
    level: 'strict',
    allowedModules,
    blockedModules,
  });
}

export function noIsolation(): IsolationRequirements {
  return createIsolationRequirements({ level: 'none' });
}
