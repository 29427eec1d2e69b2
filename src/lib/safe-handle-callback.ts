import { errorToString, toError } from './error-to-string';
import { isPromise } from './type-guards';
import { DOUBLE_EOL } from './constants';

/**
 * Receives failures from callbacks run through `safeHandleCallback`.
 */
export type CallbackErrorHandler = (error: Error, callbackName: string) => void;

/**
 * Fallback used when the owner of a callback has no logger to report into.
 */
export const reportCallbackErrorToConsole: CallbackErrorHandler = (
  error,
  callbackName,
) => {
  // eslint-disable-next-line no-console
  console.error(
    `Error in a callback ${callbackName}: ${DOUBLE_EOL}${errorToString(error)}`,
  );
};

/**
 * Runs a callback without letting it throw into the caller.
 *
 * Sync throws and async rejections both end up in `onError`. This is
 * fire-and-forget: nothing is awaited.
 */
export function safeHandleCallback<TArgs extends unknown[]>(
  callbackName: string,
  callback: (...args: TArgs) => unknown,
  onError: CallbackErrorHandler,
  ...args: TArgs
): void {
  const handleError = (error: unknown): void => {
    try {
      onError(toError(error), callbackName);
    } catch (handlerError) {
      reportCallbackErrorToConsole(toError(handlerError), callbackName);
    }
  };

  try {
    const result = callback(...args);

    if (isPromise(result)) {
      result.then(undefined, handleError);
    }
  } catch (error) {
    handleError(error);
  }
}
