/**
 * @module
 * The shared state behind a guarded callback. One `CallbackGuard` exists per
 * callback handed in by an outermost caller; every decorated function the
 * callback is forwarded to shares it and registers an `Obligation` on it for the
 * duration of its own unit of work.
 */

import { type Result, ok, err } from "neverthrow";
import type { GuaranteeOptions } from "./config";
import { AlreadyInvokedError, AlreadyReleasedError } from "./errors";
import type { AnyFunction, GuardedCallback, PlainCallback } from "./types";

// =================================================================
// Section 1: Obligations
// =================================================================

/**
 * One decoration level's duty to fire the callback with its fallback
 * arguments if, when its unit of work exits, the callback has neither been
 * invoked nor released.
 *
 * Discharging is idempotent: the first call settles the obligation, later
 * calls do nothing. This matters for async work, where cancellation and
 * settlement can both arrive.
 */
export class Obligation<F extends AnyFunction = AnyFunction> {
  public readonly guard: CallbackGuard<F>;
  public readonly fallbackArgs: Parameters<F>;
  /** Name of the decorated function that took on this obligation. */
  public readonly site: string;
  public readonly options: GuaranteeOptions;
  private settled = false;

  constructor(
    guard: CallbackGuard<F>,
    fallbackArgs: Parameters<F>,
    site: string,
    options: GuaranteeOptions,
  ) {
    this.guard = guard;
    this.fallbackArgs = fallbackArgs;
    this.site = site;
    this.options = options;
  }

  get isSettled(): boolean {
    return this.settled;
  }

  /**
   * Settles this obligation, firing the fallback if it is still owed.
   * Errors thrown by the callback propagate to the caller.
   */
  discharge(): void {
    if (this.settled) return;
    this.settled = true;
    this.guard.settle(this);
  }
}

// =================================================================
// Section 2: Callback Guard
// =================================================================

/**
 * A read-only snapshot of a guard.
 */
export interface CallbackGuardState {
  readonly invoked: boolean;
  readonly released: boolean;
  /** Number of decoration levels whose unit of work has not exited yet. */
  readonly pending: number;
}

export class CallbackGuard<F extends AnyFunction = AnyFunction> {
  public readonly callback: F;
  public readonly name: string;
  private readonly options: GuaranteeOptions;
  private invokedFlag = false;
  private releasedFlag = false;
  /** Pending obligations, outermost first. */
  private readonly obligations: Obligation<F>[] = [];
  private lastEntered: Obligation<F> | undefined;

  constructor(callback: F, options: GuaranteeOptions) {
    this.callback = callback;
    this.name = callback.name || "anonymous";
    this.options = options;
  }

  get invoked(): boolean {
    return this.invokedFlag;
  }

  get released(): boolean {
    return this.releasedFlag;
  }

  /**
   * The arguments the next automatic firing would use: those of the most
   * deeply nested pending level, or of the most recently entered level once
   * none is pending.
   */
  get fallbackArgs(): Parameters<F> | undefined {
    const top = this.obligations[this.obligations.length - 1] ?? this.lastEntered;
    return top?.fallbackArgs;
  }

  get state(): CallbackGuardState {
    return {
      invoked: this.invokedFlag,
      released: this.releasedFlag,
      pending: this.obligations.length,
    };
  }

  /**
   * Registers a new decoration level. The newest level becomes responsible for
   * the fallback, since nested work finishes before the work enclosing it.
   */
  enter(
    fallbackArgs: Parameters<F>,
    site: string,
    options: GuaranteeOptions = this.options,
  ): Obligation<F> {
    const obligation = new Obligation(this, fallbackArgs, site, options);
    this.obligations.push(obligation);
    this.lastEntered = obligation;
    return obligation;
  }

  /**
   * Called by `Obligation.discharge`. Removes the obligation and fires the
   * fallback of the innermost level still pending at that moment, which is the
   * exiting level itself unless a more deeply nested one is suspended.
   */
  settle(obligation: Obligation<F>): void {
    const index = this.obligations.lastIndexOf(obligation);
    if (index < 0) return;

    const responsible = this.obligations[this.obligations.length - 1];
    this.obligations.splice(index, 1);

    if (this.releasedFlag || this.invokedFlag) return;

    this.invokedFlag = true;
    obligation.options.logger.debug(
      `[Guarantee] '${obligation.site}' exited without calling '${this.name}', firing fallback`,
      { fallbackArgs: responsible.fallbackArgs },
    );
    this.callback(...responsible.fallbackArgs);
  }

  /**
   * An explicit call through a guarded proxy. The first call goes through;
   * later calls, and calls after the guard was released, follow the
   * repeated-call policy the guard was created with.
   */
  invoke(args: Parameters<F>): ReturnType<F> | undefined {
    if (this.releasedFlag || this.invokedFlag) {
      const reason = this.releasedFlag ? "released" : "already invoked";
      if (this.options.repeatedCall === "throw") {
        throw this.releasedFlag
          ? new AlreadyReleasedError(this.name)
          : new AlreadyInvokedError(this.name);
      }
      this.options.logger.warn(
        `[Guarantee] Ignoring call to '${this.name}': callback was ${reason}`,
      );
      return undefined;
    }

    this.invokedFlag = true;
    return this.callback(...args);
  }

  /**
   * Detaches the callback from every pending and future obligation and hands
   * out the raw function. Fails if the guard was released before or the
   * callback already fired, so the callback can never be handed out twice.
   */
  release(): Result<
    PlainCallback<F>,
    AlreadyReleasedError | AlreadyInvokedError
  > {
    if (this.releasedFlag) return err(new AlreadyReleasedError(this.name));
    if (this.invokedFlag) {
      return err(
        new AlreadyInvokedError(
          this.name,
          `Callback '${this.name}' has already been invoked and cannot be released.`,
        ),
      );
    }

    this.releasedFlag = true;
    this.options.logger.debug(
      `[Guarantee] '${this.name}' released with ${this.obligations.length} pending obligation(s)`,
    );
    const callback = this.callback;
    return ok((...args: Parameters<F>): ReturnType<F> => callback(...args));
  }
}

// =================================================================
// Section 3: Guarded Proxies
// =================================================================

const proxies = new WeakMap<object, CallbackGuard>();

/**
 * What a callback argument turned out to be: a function from the outside
 * world, or a proxy installed by a decorated function further up the stack.
 */
export type CallbackValue<F extends AnyFunction = AnyFunction> =
  | { readonly kind: "raw"; readonly callback: F }
  | { readonly kind: "guarded"; readonly guard: CallbackGuard<F> };

/**
 * Creates the function a decorated body receives in place of its callback.
 */
export function createGuardedProxy(
  guard: CallbackGuard,
): GuardedCallback<AnyFunction> {
  const proxy = (...args: unknown[]): unknown => guard.invoke(args);
  Object.defineProperty(proxy, "name", {
    value: `guarded(${guard.name})`,
    configurable: true,
  });
  proxies.set(proxy, guard);
  return proxy;
}

export function classifyCallback(value: AnyFunction): CallbackValue {
  const guard = proxies.get(value);
  return guard ? { kind: "guarded", guard } : { kind: "raw", callback: value };
}

/**
 * Returns the guard behind `value`, or `undefined` for anything that is not a
 * guarded proxy.
 */
export function guardOf(value: unknown): CallbackGuard | undefined {
  return typeof value === "function" ? proxies.get(value) : undefined;
}

export function isGuardedCallback(value: unknown): boolean {
  return guardOf(value) !== undefined;
}

export type CallbackInspection =
  | { readonly kind: "raw" }
  | ({ readonly kind: "guarded" } & CallbackGuardState);

/**
 * Reports whether `value` is a guarded proxy and, if so, the state of its
 * guard. Intended for diagnostics and tests.
 */
export function inspectCallback(value: unknown): CallbackInspection {
  const guard = guardOf(value);
  return guard ? { kind: "guarded", ...guard.state } : { kind: "raw" };
}
