import { isChainFailure } from './errors';
import { LAST_ERROR_PROPERTY } from './pipeline-context';
import type { PipelineContext } from './pipeline-context';

/**
 * Continuation into the rest of the chain
 */
export type Next = () => Promise<unknown>;

/**
 * One step of request processing. Call `next()` to continue the chain; return
 * without calling it to short-circuit, in which case the chain's result is
 * whatever this returns.
 */
export interface Behavior<TMessage = unknown> {
  execute(context: PipelineContext<TMessage>, next: Next): unknown;
}

export type BehaviorFunction<TMessage = unknown> = (
  context: PipelineContext<TMessage>,
  next: Next,
) => unknown;

/**
 * Pure predicate over the context, evaluated right before the behavior runs
 */
export type Constraint<TMessage = unknown> = (
  context: PipelineContext<TMessage>,
) => boolean;

/**
 * Converts a behavior's own fault into a result value
 */
export type BehaviorErrorHandler<TMessage = unknown> = (
  error: unknown,
  context: PipelineContext<TMessage>,
) => unknown;

/**
 * Runs a behavior with an error handler that sees only faults raised by the
 * behavior itself. Faults coming back out of `next()`, timeouts and
 * cancellations pass through untouched. A handled fault is stored on the
 * context as `LastError`.
 */
export async function executeWithErrorHandler<TMessage>(
  behavior: Behavior<TMessage>,
  errorHandler: BehaviorErrorHandler<TMessage>,
  context: PipelineContext<TMessage>,
  next: Next,
): Promise<unknown> {
  let downstreamFault: { error: unknown } | undefined;

  const guardedNext: Next = async () => {
    try {
      return await next();
    } catch (error) {
      downstreamFault = { error };
      throw error;
    }
  };

  try {
    return await behavior.execute(context, guardedNext);
  } catch (error) {
    if (
      (downstreamFault !== undefined && downstreamFault.error === error) ||
      isChainFailure(error)
    ) {
      throw error;
    }

    context.setProperty(LAST_ERROR_PROPERTY, error);
    return await errorHandler(error, context);
  }
}
