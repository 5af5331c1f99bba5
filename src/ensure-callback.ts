/**
 * @module
 * The decorators that put a callback argument under guarantee.
 *
 * A function decorated with `ensureCallback('done', ...fallback)` promises its
 * caller that `done` is called exactly once. The body may call it, hand it to
 * another decorated function, or release it; if none of that happens by the
 * time the body's work is over, the decorator calls it with `fallback`.
 *
 * @example
 * ```typescript
 * const save = ensureCallback('done', 'not saved')(
 *   ['record', 'done'],
 *   (record: Row, done: (status: string) => void) => {
 *     if (!record.dirty) return;
 *     db.write(record);
 *     done('saved');
 *   },
 * );
 *
 * save(cleanRow, console.log); // logs "not saved"
 * save(dirtyRow, console.log); // logs "saved"
 * ```
 */

import { getGuaranteeOptions, type GuaranteeOptions } from "./config";
import { UnknownArgumentError } from "./errors";
import {
  CallbackGuard,
  classifyCallback,
  createGuardedProxy,
} from "./guard";
import { enforceObligation } from "./obligation";
import {
  type ArgumentSlot,
  type BoundArguments,
  CallableSignature,
  type ParameterInput,
  resolveSignature,
} from "./signature";
import type { AnyFunction } from "./types";

// =================================================================
// Section 1: Type Definitions
// =================================================================

export interface EnsureCallbackOptions extends Partial<GuaranteeOptions> {
  /**
   * The parameter holding the callback, or `parameter.property` when the
   * callback is passed inside an options object.
   */
  callback: string;
  /** Arguments the callback is called with when the decorator has to call it. */
  fallback?: readonly unknown[];
  /**
   * A parameter (or `parameter.property`) holding an `AbortSignal`. Aborting it
   * while an async call or async generator is still running ends the work
   * early, so the fallback fires right away unless the callback was already
   * called or released.
   */
  cancelOn?: string;
}

/**
 * Applies the guarantee to a function. The parameter list comes first and may
 * be left out for functions declared with `defineCallable`.
 */
export interface CallbackDecorator {
  <F extends AnyFunction>(target: F): F;
  <F extends AnyFunction>(
    parameters: CallableSignature | readonly ParameterInput[],
    target: F,
  ): F;
}

// =================================================================
// Section 2: Core Wrapper
// =================================================================

function isCallable(value: unknown): value is AnyFunction {
  return typeof value === "function";
}

function locateOrThrow(
  signature: CallableSignature,
  path: string,
): ArgumentSlot {
  return signature.locate(path).match(
    (slot) => slot,
    (error) => {
      throw error;
    },
  );
}

function readSignal(
  bound: BoundArguments,
  slot: ArgumentSlot | undefined,
  site: string,
): AbortSignal | undefined {
  if (!slot) return undefined;
  const value = bound.get(slot);
  if (value === undefined || value === null) return undefined;
  if (value instanceof AbortSignal) return value;
  throw new TypeError(
    `Argument '${slot.path}' of '${site}' must be an AbortSignal, got ${typeof value}.`,
  );
}

function applyGuarantee<F extends AnyFunction>(
  target: F,
  options: EnsureCallbackOptions,
  signature: CallableSignature | undefined,
): F {
  const site = signature?.callableName ?? (target.name || "anonymous");
  const fallbackArgs = [...(options.fallback ?? [])];
  const overrides: Partial<GuaranteeOptions> = {
    logger: options.logger,
    repeatedCall: options.repeatedCall,
  };

  const guaranteedFn = function (this: unknown, ...args: unknown[]): unknown {
    // Located per call rather than at decoration time, so a misspelled name
    // surfaces on the first call and before the body runs.
    if (!signature) throw new UnknownArgumentError(site, options.callback);
    const callbackSlot = locateOrThrow(signature, options.callback);
    const signalSlot =
      options.cancelOn === undefined
        ? undefined
        : locateOrThrow(signature, options.cancelOn);

    const bound = signature.bind(args);
    const value = bound.get(callbackSlot);
    const resolved = getGuaranteeOptions(overrides);

    if (value === undefined || value === null) {
      resolved.logger.debug(
        `[Guarantee] '${site}' called without '${options.callback}', running unguarded`,
      );
      return target.apply(this, bound.toArray());
    }
    if (!isCallable(value)) {
      throw new TypeError(
        `Argument '${options.callback}' of '${site}' must be a function, got ${typeof value}.`,
      );
    }

    const signal = readSignal(bound, signalSlot, site);
    const current = classifyCallback(value);
    let guard: CallbackGuard;
    if (current.kind === "guarded") {
      guard = current.guard;
      resolved.logger.debug(
        `[Guarantee] '${site}' took over the obligation for '${guard.name}'`,
      );
    } else {
      guard = new CallbackGuard(current.callback, resolved);
      resolved.logger.debug(
        `[Guarantee] '${site}' is now guarding '${guard.name}'`,
      );
    }

    const obligation = guard.enter(fallbackArgs, site, resolved);
    bound.set(callbackSlot, createGuardedProxy(guard));

    return enforceObligation(
      obligation,
      () => target.apply(this, bound.toArray()),
      signal,
    );
  };

  Object.defineProperty(guaranteedFn, "name", {
    value: `ensureCallback(${site})`,
    configurable: true,
  });

  return guaranteedFn as F;
}

// =================================================================
// Section 3: Public Decorators
// =================================================================

/**
 * Creates a decorator guaranteeing that the argument `name` is called exactly
 * once per call of the decorated function. If the function's work ends without
 * the callback having been called or released, it is called with
 * `fallbackArgs`.
 *
 * When the callback is forwarded to another decorated function, both share
 * one guard: the callback still fires once, and the fallback of the innermost
 * level that is still running wins.
 */
export function ensureCallback(
  name: string,
  ...fallbackArgs: unknown[]
): CallbackDecorator {
  return ensureCallbackWith({ callback: name, fallback: fallbackArgs });
}

/**
 * `ensureCallback` with every setting spelled out, including cancellation and
 * per-decorator logging and repeated-call policy.
 */
export function ensureCallbackWith(
  options: EnsureCallbackOptions,
): CallbackDecorator {
  function decorate<F extends AnyFunction>(target: F): F;
  function decorate<F extends AnyFunction>(
    parameters: CallableSignature | readonly ParameterInput[],
    target: F,
  ): F;
  function decorate<F extends AnyFunction>(
    first: F | CallableSignature | readonly ParameterInput[],
    second?: F,
  ): F {
    if (typeof first === "function") {
      return applyGuarantee(first, options, resolveSignature(first));
    }
    if (second === undefined) {
      throw new TypeError(
        `ensureCallback('${options.callback}') expects the function to decorate after its parameter list.`,
      );
    }
    return applyGuarantee(second, options, resolveSignature(second, first));
  }

  return decorate;
}

/**
 * A class method decorator applying `ensureCallback` to a method. The method's
 * parameters must be listed because they cannot be read at run time.
 *
 * @example
 * ```typescript
 * class Importer {
 *   @guaranteed(['file', 'done'], 'done', new Error('import skipped'))
 *   import(file: string, done: (error?: Error) => void) { ... }
 * }
 * ```
 */
export function guaranteed(
  parameters: readonly ParameterInput[],
  name: string,
  ...fallbackArgs: unknown[]
) {
  return function <This, Args extends any[], Return>(
    target: (this: This, ...args: Args) => Return,
    context: ClassMethodDecoratorContext<
      This,
      (this: This, ...args: Args) => Return
    >,
  ): (this: This, ...args: Args) => Return {
    const signature = new CallableSignature(String(context.name), parameters);
    return applyGuarantee(
      target,
      { callback: name, fallback: fallbackArgs },
      signature,
    );
  };
}
