/**
 * Sleeps for the specified number of milliseconds.
 *
 * When a signal is given the sleep ends early as soon as it aborts. It resolves
 * rather than rejects so callers check `signal.aborted` (or the pipeline
 * context) themselves.
 *
 * ```typescript
 * await sleep(1000);
 * await sleep(1000, context.signal);
 * ```
 */
export async function sleep(time: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return;
  }

  return new Promise<void>((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, time);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
