import { generateID } from '../id-helpers';
import { assertTimeoutMS } from '../type-guards';
import { ms, msUntil } from '../unix-time-helpers';
import { CancelledFailure, TimeoutFailure } from './errors';
import type { ChainFailure } from './errors';

/** Property set by error-handling wrappers to the fault they converted */
export const LAST_ERROR_PROPERTY = 'LastError';

/** Property set by `cancel()` to the unix ms of cancellation */
export const CANCELLED_AT_PROPERTY = 'CancelledAt';

export interface PipelineContextOptions<TMessage> {
  message: TMessage;
  properties?: Record<string, unknown>;
  /** Cancels the context when it aborts */
  signal?: AbortSignal;
}

interface Deadline {
  at: number;
  timeoutMS: number;
}

/**
 * Request-scoped state for one chain execution.
 *
 * Cancellation is cooperative: `cancel()` and an expired deadline both abort
 * `signal` and record a typed `failure`; the chain checks before every
 * behavior, long-running behaviors can listen to `signal`.
 *
 * Deadlines nest. `narrowDeadline()` only ever moves the effective deadline
 * earlier, and one watchdog timer per context tracks whichever is current.
 */
export class PipelineContext<TMessage = unknown> {
  public readonly contextId = generateID('ulid');
  public readonly createdAt = ms();
  public readonly message: TMessage;
  public result: unknown = undefined;

  private readonly properties = new Map<string, { key: string; value: unknown }>();
  private readonly controller = new AbortController();
  private readonly parentSignal?: AbortSignal;
  private readonly onParentAbort = (): void => {
    const reason: unknown = this.parentSignal?.reason;
    this.cancel(
      typeof reason === 'string'
        ? reason
        : reason instanceof Error
          ? reason.message
          : undefined,
    );
  };

  private _failure?: ChainFailure;
  private deadline?: Deadline;
  private watchdog?: NodeJS.Timeout;
  private startedAt?: number;
  private endedAt?: number;

  constructor(options: PipelineContextOptions<TMessage>) {
    this.message = options.message;

    for (const [key, value] of Object.entries(options.properties ?? {})) {
      this.setProperty(key, value);
    }

    if (options.signal) {
      this.parentSignal = options.signal;

      if (options.signal.aborted) {
        this.onParentAbort();
      } else {
        options.signal.addEventListener('abort', this.onParentAbort, {
          once: true,
        });
      }
    }
  }

  public get signal(): AbortSignal {
    return this.controller.signal;
  }

  public get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Why the context stopped: cancellation or an expired deadline
   */
  public get failure(): ChainFailure | undefined {
    return this._failure;
  }

  /** Effective deadline as unix ms, if any */
  public get deadlineAt(): number | undefined {
    return this.deadline?.at;
  }

  public get remainingMS(): number | undefined {
    return this.deadline ? msUntil(this.deadline.at) : undefined;
  }

  // Properties (keys are case-insensitive, the first spelling is kept)

  public setProperty(key: string, value: unknown): void {
    const normalized = key.toLowerCase();
    const existing = this.properties.get(normalized);
    this.properties.set(normalized, { key: existing?.key ?? key, value });
  }

  public getProperty(key: string): unknown {
    return this.properties.get(key.toLowerCase())?.value;
  }

  public hasProperty(key: string): boolean {
    return this.properties.has(key.toLowerCase());
  }

  public removeProperty(key: string): boolean {
    return this.properties.delete(key.toLowerCase());
  }

  public propertyKeys(): string[] {
    return [...this.properties.values()].map((entry) => entry.key);
  }

  // Cancellation

  /**
   * Returns false when the context was already cancelled or timed out
   */
  public cancel(reason?: string): boolean {
    if (this.isCancelled) {
      return false;
    }

    this.setProperty(CANCELLED_AT_PROPERTY, ms());
    this.abort(new CancelledFailure({ contextId: this.contextId, reason }));
    return true;
  }

  public throwIfCancelled(): void {
    if (this.isCancelled) {
      throw this.failure ?? new CancelledFailure({ contextId: this.contextId });
    }
  }

  /**
   * Moves the deadline to `timeoutMS` from now if that is earlier than the
   * current one. Call the returned function to put the previous deadline back.
   */
  public narrowDeadline(timeoutMS: number): () => void {
    assertTimeoutMS('timeoutMS', timeoutMS);

    const previous = this.deadline;
    const at = ms() + timeoutMS;

    if (previous === undefined || at < previous.at) {
      this.deadline = { at, timeoutMS };
      this.armWatchdog();
    }

    let restored = false;

    return () => {
      if (restored) {
        return;
      }

      restored = true;
      this.deadline = previous;
      this.armWatchdog();
    };
  }

  // Timing

  public markStart(): void {
    this.startedAt = ms();
    this.endedAt = undefined;
  }

  public markEnd(): void {
    this.endedAt = ms();
  }

  public get elapsedMS(): number {
    if (this.startedAt === undefined) {
      return 0;
    }

    return (this.endedAt ?? ms()) - this.startedAt;
  }

  /**
   * Stops the watchdog and detaches from the parent signal
   */
  public dispose(): void {
    this.clearWatchdog();
    this.parentSignal?.removeEventListener('abort', this.onParentAbort);
  }

  private abort(failure: ChainFailure): void {
    this._failure = failure;
    this.clearWatchdog();
    this.controller.abort(failure);
  }

  private armWatchdog(): void {
    this.clearWatchdog();

    const deadline = this.deadline;
    if (!deadline || this.isCancelled) {
      return;
    }

    this.watchdog = setTimeout(
      () => {
        this.watchdog = undefined;
        this.abort(
          new TimeoutFailure({
            contextId: this.contextId,
            timeoutMS: deadline.timeoutMS,
            elapsedMS: ms() - (this.startedAt ?? this.createdAt),
          }),
        );
      },
      msUntil(deadline.at),
    );
  }

  private clearWatchdog(): void {
    if (this.watchdog) {
      clearTimeout(this.watchdog);
      this.watchdog = undefined;
    }
  }
}
