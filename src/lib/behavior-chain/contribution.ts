import type {
  Behavior,
  BehaviorErrorHandler,
  BehaviorFunction,
  Constraint,
} from './behavior';

export const DEFAULT_PRIORITY = 1000;

/**
 * A behavior as contributed by a component, with everything the chain needs
 * to place and gate it. Lower priority runs earlier.
 */
export interface BehaviorContribution<TMessage = unknown> {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly behavior: Behavior<TMessage>;
  readonly priority: number;
  /** Absent means always run */
  readonly constraint?: Constraint<TMessage>;
  readonly tags: ReadonlySet<string>;
  readonly enabled: boolean;
  readonly errorHandler?: BehaviorErrorHandler<TMessage>;
}

export interface ContributionInput<TMessage = unknown> {
  id: string;
  /** Defaults to the id */
  name?: string;
  description?: string;
  behavior: Behavior<TMessage> | BehaviorFunction<TMessage>;
  /** Default 1000 */
  priority?: number;
  constraint?: Constraint<TMessage>;
  tags?: Iterable<string>;
  /** Default true */
  enabled?: boolean;
  errorHandler?: BehaviorErrorHandler<TMessage>;
}

/**
 * Builds a frozen contribution, filling in defaults.
 *
 * @example
 * ```typescript
 * createContribution({
 *   id: 'auth.check-token',
 *   priority: 10,
 *   constraint: (context) => context.hasProperty('Authorization'),
 *   behavior: async (context, next) => {
 *     await verify(context.getProperty('Authorization'));
 *     return next();
 *   },
 * });
 * ```
 */
export function createContribution<TMessage = unknown>(
  input: ContributionInput<TMessage>,
): BehaviorContribution<TMessage> {
  if (input.id.length === 0) {
    throw new TypeError('Contribution id must not be empty');
  }

  const priority = input.priority ?? DEFAULT_PRIORITY;
  if (!Number.isInteger(priority)) {
    throw new TypeError(
      `Contribution "${input.id}" priority must be an integer, got ${String(priority)}`,
    );
  }

  const behavior: Behavior<TMessage> =
    typeof input.behavior === 'function'
      ? { execute: input.behavior }
      : input.behavior;

  return Object.freeze({
    id: input.id,
    name: input.name ?? input.id,
    description: input.description,
    behavior,
    priority,
    constraint: input.constraint,
    tags: new Set(input.tags ?? []),
    enabled: input.enabled ?? true,
    errorHandler: input.errorHandler,
  });
}
