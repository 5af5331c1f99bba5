/**
 * @module
 * Enforces an `Obligation` over the lifetime of a unit of work. The shape of
 * the work is read from what the body returns:
 *
 * - a plain value: the work is over once the body returns or throws,
 * - a generator: the work is over when the generator finishes, throws, or is
 *   closed by its consumer,
 * - an async generator: the same, asynchronously,
 * - a promise: the work is over when the promise settles, or when the
 *   optional `AbortSignal` aborts first.
 *
 * On every one of these exits the obligation is discharged before control
 * reaches the caller, and the original outcome is passed on untouched.
 */

import type { Obligation } from "./guard";

// =================================================================
// Section 1: Discharge Helpers
// =================================================================

/**
 * Discharges on an error exit. The body's error is what the caller must
 * see, so a failing fallback is only logged.
 */
function dischargeAfterFailure(obligation: Obligation, cause: unknown): void {
  try {
    obligation.discharge();
  } catch (fallbackError) {
    obligation.options.logger.error(
      `[Guarantee] Fallback for '${obligation.site}' threw while the call itself was failing`,
      { error: fallbackError, cause },
    );
  }
}

/**
 * Discharges the obligation when `signal` aborts. Abort listeners have no
 * caller to report to, so a failing fallback is logged. Returns a function that
 * removes the listener.
 */
function dischargeOnAbort(
  obligation: Obligation,
  signal: AbortSignal | undefined,
): () => void {
  if (!signal) return () => {};

  const onAbort = () => {
    obligation.options.logger.debug(
      `[Guarantee] '${obligation.site}' was cancelled`,
      { reason: signal.reason },
    );
    dischargeAfterFailure(obligation, signal.reason);
  };

  if (signal.aborted) {
    onAbort();
    return () => {};
  }

  signal.addEventListener("abort", onAbort, { once: true });
  return () => signal.removeEventListener("abort", onAbort);
}

// =================================================================
// Section 2: Shape Detection
// =================================================================

/** What a guarded iterator needs from the generator it wraps. */
export interface GeneratorLike<T, TReturn, TNext> {
  next(...args: [] | [TNext]): IteratorResult<T, TReturn>;
  return(value: TReturn): IteratorResult<T, TReturn>;
  throw(error: unknown): IteratorResult<T, TReturn>;
}

export interface AsyncGeneratorLike<T, TReturn, TNext> {
  next(...args: [] | [TNext]): Promise<IteratorResult<T, TReturn>>;
  return(value: TReturn): Promise<IteratorResult<T, TReturn>>;
  throw(error: unknown): Promise<IteratorResult<T, TReturn>>;
}

// Guarded iterators carry the same tags, so a decorated level whose body
// returns another decorated generator still sees lazy work.
export function isGenerator(
  value: unknown,
): value is GeneratorLike<unknown, unknown, unknown> {
  return Object.prototype.toString.call(value) === "[object Generator]";
}

export function isAsyncGenerator(
  value: unknown,
): value is AsyncGeneratorLike<unknown, unknown, unknown> {
  return Object.prototype.toString.call(value) === "[object AsyncGenerator]";
}

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    ((typeof value === "object" && value !== null) ||
      typeof value === "function") &&
    "then" in value &&
    typeof value.then === "function"
  );
}

// =================================================================
// Section 3: Guarded Iterators
// =================================================================

/**
 * Passes a generator through unchanged and discharges the obligation when it
 * is done. Closing it with `return()` counts as done even before the first
 * `next()`, which a plain wrapping generator would not notice.
 */
export class GuardedIterator<T, TReturn = unknown, TNext = unknown>
  implements Iterator<T, TReturn, TNext>
{
  private readonly inner: GeneratorLike<T, TReturn, TNext>;
  private readonly obligation: Obligation;

  constructor(inner: GeneratorLike<T, TReturn, TNext>, obligation: Obligation) {
    this.inner = inner;
    this.obligation = obligation;
  }

  next(...args: [] | [TNext]): IteratorResult<T, TReturn> {
    return this.step(() => this.inner.next(...args));
  }

  return(value: TReturn): IteratorResult<T, TReturn> {
    return this.step(() => this.inner.return(value));
  }

  throw(error: unknown): IteratorResult<T, TReturn> {
    return this.step(() => this.inner.throw(error));
  }

  [Symbol.iterator](): this {
    return this;
  }

  get [Symbol.toStringTag](): string {
    return "Generator";
  }

  private step(
    advance: () => IteratorResult<T, TReturn>,
  ): IteratorResult<T, TReturn> {
    let result: IteratorResult<T, TReturn>;
    try {
      result = advance();
    } catch (error) {
      dischargeAfterFailure(this.obligation, error);
      throw error;
    }
    if (result.done) this.obligation.discharge();
    return result;
  }
}

/**
 * The async counterpart of `GuardedIterator`. An abort of the optional
 * signal discharges the obligation while the generator is suspended.
 *
 * The abort listener is attached on construction, since a stream that is
 * never consumed still owes its fallback when the signal aborts. It is removed
 * when the stream finishes, fails, or the signal fires.
 */
export class GuardedAsyncIterator<T, TReturn = unknown, TNext = unknown>
  implements AsyncIterator<T, TReturn, TNext>
{
  private readonly inner: AsyncGeneratorLike<T, TReturn, TNext>;
  private readonly obligation: Obligation;
  private readonly detach: () => void;

  constructor(
    inner: AsyncGeneratorLike<T, TReturn, TNext>,
    obligation: Obligation,
    signal?: AbortSignal,
  ) {
    this.inner = inner;
    this.obligation = obligation;
    this.detach = dischargeOnAbort(obligation, signal);
  }

  next(...args: [] | [TNext]): Promise<IteratorResult<T, TReturn>> {
    return this.step(() => this.inner.next(...args));
  }

  return(value: TReturn): Promise<IteratorResult<T, TReturn>> {
    return this.step(() => this.inner.return(value));
  }

  throw(error: unknown): Promise<IteratorResult<T, TReturn>> {
    return this.step(() => this.inner.throw(error));
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  get [Symbol.toStringTag](): string {
    return "AsyncGenerator";
  }

  private async step(
    advance: () => Promise<IteratorResult<T, TReturn>>,
  ): Promise<IteratorResult<T, TReturn>> {
    let result: IteratorResult<T, TReturn>;
    try {
      result = await advance();
    } catch (error) {
      this.detach();
      dischargeAfterFailure(this.obligation, error);
      throw error;
    }
    if (result.done) {
      this.detach();
      this.obligation.discharge();
    }
    return result;
  }
}

// =================================================================
// Section 4: Enforcement
// =================================================================

function settleThenDischarge<T>(
  promise: PromiseLike<T>,
  obligation: Obligation,
  signal?: AbortSignal,
): Promise<T> {
  const detach = dischargeOnAbort(obligation, signal);
  return Promise.resolve(promise).then(
    (value) => {
      detach();
      obligation.discharge();
      return value;
    },
    (error: unknown) => {
      detach();
      dischargeAfterFailure(obligation, error);
      throw error;
    },
  );
}

/**
 * Runs `body` and ties the discharge of `obligation` to the end of the work
 * it starts. Returns what the body returned, or a guarded stand-in for it when
 * the work outlives the call (generators, async generators and promises).
 *
 * @param signal Aborting it discharges the obligation of a pending promise or
 *               async generator early.
 */
export function enforceObligation(
  obligation: Obligation,
  body: () => unknown,
  signal?: AbortSignal,
): unknown {
  let result: unknown;
  try {
    result = body();
  } catch (error) {
    dischargeAfterFailure(obligation, error);
    throw error;
  }

  if (isGenerator(result)) return new GuardedIterator(result, obligation);
  if (isAsyncGenerator(result)) {
    return new GuardedAsyncIterator(result, obligation, signal);
  }
  if (isPromiseLike(result)) {
    return settleThenDischarge(result, obligation, signal);
  }

  obligation.discharge();
  return result;
}
