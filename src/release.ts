/**
 * @module
 * The escape hatch from the guarantee. Releasing a guarded callback takes it
 * out of automatic tracking for every decoration level that shares its guard,
 * and returns the original function so it can be handed to code that does not
 * take part in the guarantee (an event emitter, a timer, a third-party API).
 * From then on, calling it is the holder's responsibility.
 */

import { type Result, err } from "neverthrow";
import {
  type AlreadyInvokedError,
  type AlreadyReleasedError,
  NotAGuardedCallbackError,
} from "./errors";
import { guardOf } from "./guard";
import type { GuardedCallback, PlainCallback, AnyFunction } from "./types";

/**
 * Releases a guarded callback and returns the untracked original.
 *
 * @throws {NotAGuardedCallbackError} If `callback` is not a guarded proxy.
 * @throws {AlreadyReleasedError} If it was released before.
 * @throws {AlreadyInvokedError} If it already fired.
 *
 * @example
 * ```typescript
 * const upload = ensureCallback('done', new Error('aborted'))(
 *   ['file', 'done'],
 *   (file: File, done: (error?: Error) => void) => {
 *     const plain = releaseCallback(done);
 *     uploader.on('finish', () => plain());
 *     uploader.start(file);
 *   },
 * );
 * ```
 */
export function releaseCallback<F extends AnyFunction>(
  callback: GuardedCallback<F> | F,
): PlainCallback<F> {
  return tryReleaseCallback(callback).match(
    (plain) => plain,
    (error) => {
      throw error;
    },
  );
}

/**
 * Like `releaseCallback`, but returns the outcome as a `Result` instead of
 * throwing.
 */
export function tryReleaseCallback<F extends AnyFunction>(
  callback: GuardedCallback<F> | F,
): Result<
  PlainCallback<F>,
  NotAGuardedCallbackError | AlreadyReleasedError | AlreadyInvokedError
> {
  const guard = guardOf(callback);
  if (!guard) return err(new NotAGuardedCallbackError(callback));
  return guard
    .release()
    .map<PlainCallback<F>>((plain) => plain)
    .mapErr<
      NotAGuardedCallbackError | AlreadyReleasedError | AlreadyInvokedError
    >((error) => error);
}
