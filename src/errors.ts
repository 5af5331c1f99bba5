/**
 * @module
 * Error types raised by the guarantee machinery. Errors thrown by a guarded
 * body are never wrapped in any of these; they reach the caller unchanged.
 */

/**
 * Base class of every error this library raises, so callers can catch
 * misuse of the guarantee API with a single `instanceof` check.
 */
export class GuaranteeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GuaranteeError";
    Object.setPrototypeOf(this, GuaranteeError.prototype);
  }
}

/**
 * Thrown on the first call of a decorated function when the configured
 * callback argument does not name one of its parameters.
 */
export class UnknownArgumentError extends GuaranteeError {
  public readonly _tag = "UnknownArgumentError" as const;
  public readonly callableName: string;
  public readonly argumentName: string;

  constructor(callableName: string, argumentName: string) {
    super(`Callable '${callableName}' has no parameter '${argumentName}'.`);
    this.name = "UnknownArgumentError";
    this.callableName = callableName;
    this.argumentName = argumentName;
    Object.setPrototypeOf(this, UnknownArgumentError.prototype);
  }
}

/**
 * Thrown by `releaseCallback` when the value was never installed by a
 * decorated function.
 */
export class NotAGuardedCallbackError extends GuaranteeError {
  public readonly _tag = "NotAGuardedCallbackError" as const;
  public readonly value: unknown;

  constructor(value: unknown) {
    super(
      `Expected a guarded callback, got ${describeValue(value)}. Only callbacks received through an ensureCallback-decorated function can be released.`,
    );
    this.name = "NotAGuardedCallbackError";
    this.value = value;
    Object.setPrototypeOf(this, NotAGuardedCallbackError.prototype);
  }
}

/**
 * Thrown when a guarded callback that already fired is called again under
 * the `"throw"` repeated-call policy, or when it is released after firing.
 */
export class AlreadyInvokedError extends GuaranteeError {
  public readonly _tag = "AlreadyInvokedError" as const;
  public readonly callbackName: string;

  constructor(callbackName: string, message?: string) {
    super(message || `Callback '${callbackName}' has already been invoked.`);
    this.name = "AlreadyInvokedError";
    this.callbackName = callbackName;
    Object.setPrototypeOf(this, AlreadyInvokedError.prototype);
  }
}

/**
 * Thrown when a guarded callback is released a second time.
 */
export class AlreadyReleasedError extends GuaranteeError {
  public readonly _tag = "AlreadyReleasedError" as const;
  public readonly callbackName: string;

  constructor(callbackName: string) {
    super(`Callback '${callbackName}' has already been released.`);
    this.name = "AlreadyReleasedError";
    this.callbackName = callbackName;
    Object.setPrototypeOf(this, AlreadyReleasedError.prototype);
  }
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "function") {
    return `function '${value.name || "anonymous"}'`;
  }
  return typeof value;
}
