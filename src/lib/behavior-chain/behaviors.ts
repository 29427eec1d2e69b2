import { executeWithErrorHandler } from './behavior';
import type {
  Behavior,
  BehaviorErrorHandler,
  BehaviorFunction,
  Constraint,
  Next,
} from './behavior';
import type { PipelineContext } from './pipeline-context';

export function fromFunction<TMessage = unknown>(
  execute: BehaviorFunction<TMessage>,
): Behavior<TMessage> {
  return { execute };
}

export function passThrough<TMessage = unknown>(): Behavior<TMessage> {
  return { execute: (_context, next) => next() };
}

/**
 * Runs `behavior` only when `predicate` holds, otherwise continues the chain
 */
export function conditional<TMessage = unknown>(
  predicate: Constraint<TMessage>,
  behavior: Behavior<TMessage>,
): Behavior<TMessage> {
  return {
    execute: (context, next) =>
      predicate(context) ? behavior.execute(context, next) : next(),
  };
}

export function withErrorHandling<TMessage = unknown>(
  behavior: Behavior<TMessage>,
  errorHandler: BehaviorErrorHandler<TMessage>,
): Behavior<TMessage> {
  return {
    execute: (context, next) =>
      executeWithErrorHandler(behavior, errorHandler, context, next),
  };
}

/**
 * Gives everything `behavior` runs (downstream behaviors it reaches through
 * `next()` included) a deadline of `timeoutMS`. Expiry times out the whole
 * run; an earlier outer deadline still wins.
 */
export function timeoutBehavior<TMessage = unknown>(
  timeoutMS: number,
  behavior: Behavior<TMessage>,
): Behavior<TMessage> {
  return {
    execute: async (context, next) => {
      const restore = context.narrowDeadline(timeoutMS);

      try {
        return await behavior.execute(context, next);
      } finally {
        restore();
      }
    },
  };
}

/**
 * Runs behaviors as one sub-chain: each one's `next` is the following
 * behavior, the last one's is the outer `next`
 */
export function sequence<TMessage = unknown>(
  ...behaviors: Behavior<TMessage>[]
): Behavior<TMessage> {
  return {
    execute: (context: PipelineContext<TMessage>, next: Next) => {
      const dispatch = async (i: number): Promise<unknown> => {
        const behavior = behaviors[i];

        if (!behavior) {
          return next();
        }

        context.throwIfCancelled();
        return behavior.execute(context, () => dispatch(i + 1));
      };

      return dispatch(0);
    },
  };
}
