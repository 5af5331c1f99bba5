/**
 * @module
 * Option resolution for guarded callbacks. Options are resolved once per
 * decorated call, in this order: per-decorator options, the innermost
 * `withGuaranteeOptions` scope, the global options set through
 * `configureGuarantees`, and finally the built-in defaults.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { type Logger, noopLogger } from "./logger";

/**
 * What happens when a guarded callback that already fired is called again
 * through a proxy.
 * - `'ignore'`: the call is dropped, `undefined` is returned and a warning is logged.
 * - `'throw'`: an `AlreadyInvokedError` is thrown.
 */
export type RepeatedCallPolicy = "ignore" | "throw";

export interface GuaranteeOptions {
  /** Receives guard lifecycle events. Defaults to `noopLogger`. */
  logger: Logger;
  /** @default 'ignore' */
  repeatedCall: RepeatedCallPolicy;
}

export const defaultGuaranteeOptions: Readonly<GuaranteeOptions> = Object.freeze({
  logger: noopLogger,
  repeatedCall: "ignore",
});

let globalOptions: GuaranteeOptions = { ...defaultGuaranteeOptions };

const scopedOptions = new AsyncLocalStorage<Partial<GuaranteeOptions>>();

/**
 * Replaces parts of the process-wide options. Returns the options now in effect
 * globally.
 */
export function configureGuarantees(
  overrides: Partial<GuaranteeOptions>,
): Readonly<GuaranteeOptions> {
  globalOptions = { ...globalOptions, ...withoutUndefined(overrides) };
  return globalOptions;
}

/**
 * Restores the built-in defaults. Mostly useful between tests.
 */
export function resetGuaranteeOptions(): void {
  globalOptions = { ...defaultGuaranteeOptions };
}

/**
 * Runs `fn` with `overrides` layered over the current options. The scope
 * follows `fn` through awaits and timers started inside it, and nested scopes
 * merge with their parent.
 *
 * @example
 * ```typescript
 * await withGuaranteeOptions({ logger: pino() }, () => handleRequest(req, done));
 * ```
 */
export function withGuaranteeOptions<R>(
  overrides: Partial<GuaranteeOptions>,
  fn: () => R,
): R {
  const parent = scopedOptions.getStore() ?? {};
  return scopedOptions.run({ ...parent, ...withoutUndefined(overrides) }, fn);
}

/**
 * Resolves the options in effect for the current execution, with optional
 * per-call overrides on top.
 */
export function getGuaranteeOptions(
  overrides: Partial<GuaranteeOptions> = {},
): GuaranteeOptions {
  return {
    ...globalOptions,
    ...scopedOptions.getStore(),
    ...withoutUndefined(overrides),
  };
}

function withoutUndefined(
  overrides: Partial<GuaranteeOptions>,
): Partial<GuaranteeOptions> {
  const result: Partial<GuaranteeOptions> = {};
  if (overrides.logger !== undefined) result.logger = overrides.logger;
  if (overrides.repeatedCall !== undefined) {
    result.repeatedCall = overrides.repeatedCall;
  }
  return result;
}
