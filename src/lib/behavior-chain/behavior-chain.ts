import { compareIds } from '../dependency-resolver';
import { assertTimeoutMS } from '../type-guards';
import { ms } from '../unix-time-helpers';
import { executeWithErrorHandler } from './behavior';
import type { Behavior, BehaviorErrorHandler, Constraint } from './behavior';
import type { BehaviorContribution } from './contribution';
import {
  CancelledFailure,
  NextCalledMultipleTimesError,
  TimeoutFailure,
} from './errors';
import type { PipelineContext } from './pipeline-context';

/**
 * What runs after the last behavior. The default returns `context.result`.
 */
export type Terminal<TMessage = unknown> = (
  context: PipelineContext<TMessage>,
) => unknown;

export interface ChainStep<TMessage = unknown> {
  readonly id: string;
  readonly name: string;
  readonly priority: number;
  readonly behavior: Behavior<TMessage>;
  readonly constraint?: Constraint<TMessage>;
  readonly errorHandler?: BehaviorErrorHandler<TMessage>;
  readonly tags: readonly string[];
}

export interface ChainStepDescription {
  id: string;
  name: string;
  priority: number;
  tags: string[];
  conditional: boolean;
  handlesErrors: boolean;
}

export interface BuildChainOptions<TMessage = unknown> {
  terminal?: Terminal<TMessage>;
  /** Deadline for every run of this chain */
  timeoutMS?: number;
  /** Set by ActiveChain so callers can tell snapshots apart */
  version?: number;
}

export type ChainRunResult =
  | {
      success: true;
      contextId: string;
      result: unknown;
      durationMS: number;
    }
  | {
      success: false;
      contextId: string;
      code: 'timeout';
      error: TimeoutFailure;
      durationMS: number;
    }
  | {
      success: false;
      contextId: string;
      code: 'cancelled';
      error: CancelledFailure;
      durationMS: number;
    };

const defaultTerminal: Terminal = (context) => context.result;

function compareSteps<TMessage>(
  a: ChainStep<TMessage>,
  b: ChainStep<TMessage>,
): number {
  return a.priority - b.priority || compareIds(a.id, b.id);
}

/**
 * Immutable, ordered snapshot of enabled behaviors plus a terminal.
 *
 * Steps are kept as a frozen array and executed by one index-based
 * dispatcher: step `i` receives a continuation that dispatches `i + 1`, and
 * the continuation past the last step is the terminal. Before every step the
 * dispatcher checks the context for cancellation, then the step's
 * constraint. Rebuilding produces a new chain; a run never sees another.
 */
export class BehaviorChain<TMessage = unknown> {
  public readonly steps: readonly ChainStep<TMessage>[];
  public readonly version: number;
  public readonly timeoutMS?: number;
  private readonly terminal: Terminal<TMessage>;

  constructor(
    steps: readonly ChainStep<TMessage>[],
    options: BuildChainOptions<TMessage> = {},
  ) {
    if (options.timeoutMS !== undefined) {
      assertTimeoutMS('timeoutMS', options.timeoutMS);
    }

    this.steps = Object.freeze([...steps]);
    this.version = options.version ?? 0;
    this.timeoutMS = options.timeoutMS;
    this.terminal = options.terminal ?? defaultTerminal;
  }

  /**
   * Keeps enabled contributions, ordered by priority then id
   */
  public static build<TMessage>(
    contributions: Iterable<BehaviorContribution<TMessage>>,
    options: BuildChainOptions<TMessage> = {},
  ): BehaviorChain<TMessage> {
    const steps: ChainStep<TMessage>[] = [];

    for (const contribution of contributions) {
      if (!contribution.enabled) {
        continue;
      }

      steps.push({
        id: contribution.id,
        name: contribution.name,
        priority: contribution.priority,
        behavior: contribution.behavior,
        constraint: contribution.constraint,
        errorHandler: contribution.errorHandler,
        tags: [...contribution.tags],
      });
    }

    return new BehaviorChain(steps.sort(compareSteps), options);
  }

  public get length(): number {
    return this.steps.length;
  }

  public get ids(): string[] {
    return this.steps.map((step) => step.id);
  }

  public describe(): ChainStepDescription[] {
    return this.steps.map((step) => ({
      id: step.id,
      name: step.name,
      priority: step.priority,
      tags: [...step.tags],
      conditional: step.constraint !== undefined,
      handlesErrors: step.errorHandler !== undefined,
    }));
  }

  /**
   * Same steps and terminal, different deadline
   */
  public withTimeout(timeoutMS: number | undefined): BehaviorChain<TMessage> {
    return new BehaviorChain(this.steps, {
      terminal: this.terminal,
      timeoutMS,
      version: this.version,
    });
  }

  public withTerminal(terminal: Terminal<TMessage>): BehaviorChain<TMessage> {
    return new BehaviorChain(this.steps, {
      terminal,
      timeoutMS: this.timeoutMS,
      version: this.version,
    });
  }

  /**
   * Runs the chain and reports one terminal outcome: the result, a timeout or
   * a cancellation. Once the context is cancelled or its deadline passes, the
   * run settles with that failure right away; whatever the in-flight behavior
   * later produces is discarded. Unhandled behavior faults reject.
   */
  public async run(context: PipelineContext<TMessage>): Promise<ChainRunResult> {
    const startedAt = ms();
    const restoreDeadline =
      this.timeoutMS !== undefined
        ? context.narrowDeadline(this.timeoutMS)
        : undefined;

    context.markStart();

    try {
      return await new Promise<ChainRunResult>((resolve, reject) => {
        const signal = context.signal;
        const settleWithFailure = (): void => {
          resolve(this.failureResult(context, ms() - startedAt));
        };

        if (signal.aborted) {
          settleWithFailure();
          return;
        }

        signal.addEventListener('abort', settleWithFailure, { once: true });

        this.execute(context).then(
          (result) => {
            signal.removeEventListener('abort', settleWithFailure);

            if (signal.aborted) {
              settleWithFailure();
            } else {
              resolve({
                success: true,
                contextId: context.contextId,
                result,
                durationMS: ms() - startedAt,
              });
            }
          },
          (error: unknown) => {
            signal.removeEventListener('abort', settleWithFailure);

            if (signal.aborted) {
              settleWithFailure();
            } else {
              reject(error);
            }
          },
        );
      });
    } finally {
      restoreDeadline?.();
      context.markEnd();
    }
  }

  /**
   * Raw dispatch without the watchdog: resolves with the first behavior's
   * return value, rejects with faults, and with the context's failure when a
   * step is reached after cancellation
   */
  public execute(context: PipelineContext<TMessage>): Promise<unknown> {
    let index = -1;

    const dispatch = async (i: number): Promise<unknown> => {
      if (i <= index) {
        throw new NextCalledMultipleTimesError({
          contributionId: this.steps[i - 1]?.id ?? 'unknown',
        });
      }
      index = i;

      context.throwIfCancelled();

      const step = this.steps[i];
      if (!step) {
        return this.terminal(context);
      }

      const next = (): Promise<unknown> => dispatch(i + 1);

      if (step.constraint && !step.constraint(context)) {
        return next();
      }

      if (step.errorHandler) {
        return executeWithErrorHandler(
          step.behavior,
          step.errorHandler,
          context,
          next,
        );
      }

      return step.behavior.execute(context, next);
    };

    return dispatch(0);
  }

  private failureResult(
    context: PipelineContext<TMessage>,
    durationMS: number,
  ): ChainRunResult {
    const failure =
      context.failure ?? new CancelledFailure({ contextId: context.contextId });

    return failure instanceof TimeoutFailure
      ? {
          success: false,
          contextId: context.contextId,
          code: 'timeout',
          error: failure,
          durationMS,
        }
      : {
          success: false,
          contextId: context.contextId,
          code: 'cancelled',
          error: failure,
          durationMS,
        };
  }
}

export function buildChain<TMessage>(
  contributions: Iterable<BehaviorContribution<TMessage>>,
  options: BuildChainOptions<TMessage> = {},
): BehaviorChain<TMessage> {
  return BehaviorChain.build(contributions, options);
}
