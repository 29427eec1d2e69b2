/**
 * Typed event emitter with a protected `emit`, so only the owning class can
 * raise its events. Extend `EventEmitter` instead when emitting from outside
 * should be allowed.
 *
 * Listener failures never reach the emitter; they are handed to
 * `onListenerError` (the owning class usually routes that into its logger).
 */

import {
  type CallbackErrorHandler,
  reportCallbackErrorToConsole,
  safeHandleCallback,
} from './safe-handle-callback';

export type EventCallback<T> = (data: T) => void | Promise<void>;

/**
 * Maps event names to their payload types.
 */
export type EventMap = Record<string, unknown>;

export interface EventEmitterOptions {
  onListenerError?: CallbackErrorHandler;
}

type ListenerTable<TEvents extends EventMap> = {
  [K in keyof TEvents]?: Set<EventCallback<TEvents[K]>>;
};

export class EventEmitterProtected<TEvents extends EventMap> {
  private events: ListenerTable<TEvents> = {};
  private onListenerError: CallbackErrorHandler;

  constructor(options: EventEmitterOptions = {}) {
    this.onListenerError =
      options.onListenerError ?? reportCallbackErrorToConsole;
  }

  /**
   * Subscribe to an event
   * @returns A function to unsubscribe from the event
   */
  public on<K extends keyof TEvents>(
    event: K,
    callback: EventCallback<TEvents[K]>,
  ): () => void {
    const callbacks = this.events[event] ?? new Set<EventCallback<TEvents[K]>>();
    callbacks.add(callback);
    this.events[event] = callbacks;

    return () => {
      const current = this.events[event];
      if (current) {
        current.delete(callback);

        if (current.size === 0) {
          delete this.events[event];
        }
      }
    };
  }

  /**
   * Subscribe to an event once - automatically unsubscribes after first emission
   */
  public once<K extends keyof TEvents>(
    event: K,
    callback: EventCallback<TEvents[K]>,
  ): () => void {
    const unsubscribe = this.on(event, (data) => {
      unsubscribe();
      return callback(data);
    });

    return unsubscribe;
  }

  public hasListeners(event: keyof TEvents): boolean {
    return (this.events[event]?.size ?? 0) > 0;
  }

  public listenerCount(event: keyof TEvents): number {
    return this.events[event]?.size ?? 0;
  }

  /**
   * Remove all listeners, or only those of one event
   */
  public clear(event?: keyof TEvents): void {
    if (event === undefined) {
      this.events = {};
    } else {
      delete this.events[event];
    }
  }

  protected emit<K extends keyof TEvents>(event: K, data: TEvents[K]): void {
    const callbacks = this.events[event];
    if (!callbacks) {
      return;
    }

    // Copy so listeners that unsubscribe (once) don't disturb iteration
    for (const callback of [...callbacks]) {
      safeHandleCallback(
        `event handler for ${String(event)}`,
        callback,
        this.onListenerError,
        data,
      );
    }
  }
}

/**
 * Event emitter with a public `emit`.
 */
export class EventEmitter<
  TEvents extends EventMap,
> extends EventEmitterProtected<TEvents> {
  public emit<K extends keyof TEvents>(event: K, data: TEvents[K]): void {
    super.emit(event, data);
  }
}
