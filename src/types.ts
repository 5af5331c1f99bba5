/**
 * Any function. Used as the constraint of decorated functions and callbacks so
 * their exact signatures survive wrapping.
 */
export type AnyFunction = (...args: any[]) => any;

/**
 * A callback after `releaseCallback`: calls the original function directly,
 * outside of any guarantee.
 */
export type PlainCallback<F extends AnyFunction> = (
  ...args: Parameters<F>
) => ReturnType<F>;

/**
 * The view a decorated body has of its guarded callback. Calling it returns the
 * callback's result, or `undefined` when the call is ignored as a repeat.
 */
export type GuardedCallback<F extends AnyFunction> = (
  ...args: Parameters<F>
) => ReturnType<F> | undefined;
