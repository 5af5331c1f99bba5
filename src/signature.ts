/**
 * @module
 * Explicit call signatures. JavaScript functions do not expose their parameter
 * names at run time, so a decorated function declares them once, either with
 * `defineCallable` or by passing the list to the decorator. The signature is
 * then used on every call to bind the actual arguments to names and to find the
 * slot that holds the callback.
 */

import { type Result, ok, err } from "neverthrow";
import { UnknownArgumentError } from "./errors";
import type { AnyFunction } from "./types";

// =================================================================
// Section 1: Type Definitions
// =================================================================

/**
 * A declared parameter of a callable.
 */
export interface ParameterDescriptor {
  readonly name: string;
  /**
   * An optional parameter may be omitted by the caller. Parameters with a
   * `defaultValue` are implicitly optional.
   */
  readonly optional?: boolean;
  /**
   * Produces the value bound when the caller passes `undefined` or omits the
   * argument. Evaluated on every call, like a JavaScript default parameter.
   */
  readonly defaultValue?: () => unknown;
}

/** A parameter given either by name alone (required) or as a full descriptor. */
export type ParameterInput = string | ParameterDescriptor;

/**
 * The location of one argument inside a call.
 * - `positional`: the parameter at `index` itself.
 * - `property`: the property `key` of the options object passed at `index`,
 *   addressed as `"options.onDone"`. This is how named arguments are passed in
 *   JavaScript.
 */
export type ArgumentSlot =
  | {
      readonly kind: "positional";
      readonly path: string;
      readonly index: number;
    }
  | {
      readonly kind: "property";
      readonly path: string;
      readonly index: number;
      readonly key: string;
    };

// =================================================================
// Section 2: Bound Arguments
// =================================================================

/**
 * The arguments of one call, bound to a signature. Reads and writes go through
 * `ArgumentSlot`s; the caller's own argument array and option objects are never
 * mutated.
 */
export class BoundArguments {
  private readonly values: unknown[];
  private readonly suppliedLength: number;

  constructor(values: readonly unknown[], suppliedLength: number) {
    this.values = [...values];
    this.suppliedLength = suppliedLength;
  }

  get(slot: ArgumentSlot): unknown {
    const value = this.values[slot.index];
    if (slot.kind === "positional") return value;
    return isObjectLike(value) ? Reflect.get(value, slot.key) : undefined;
  }

  set(slot: ArgumentSlot, replacement: unknown): void {
    if (slot.kind === "positional") {
      this.values[slot.index] = replacement;
      return;
    }
    const holder = this.values[slot.index];
    this.values[slot.index] = {
      ...(isObjectLike(holder) ? holder : {}),
      [slot.key]: replacement,
    };
  }

  /**
   * The argument list to call the target with. Trailing `undefined` values
   * past what the caller supplied are dropped, so `arguments.length` inside
   * the target matches the original call unless a default was filled in.
   */
  toArray(): unknown[] {
    let end = this.values.length;
    while (end > this.suppliedLength && this.values[end - 1] === undefined) {
      end--;
    }
    return this.values.slice(0, end);
  }
}

// =================================================================
// Section 3: Callable Signature
// =================================================================

/**
 * The ordered parameter list of a callable, plus its name for error messages.
 *
 * @example
 * ```typescript
 * const sig = new CallableSignature('fetchUser', [
 *   'id',
 *   { name: 'options', defaultValue: () => ({}) },
 * ]);
 * sig.locate('options.onDone'); // Ok({ kind: 'property', index: 1, key: 'onDone', ... })
 * sig.locate('callback');       // Err(UnknownArgumentError)
 * ```
 */
export class CallableSignature {
  public readonly callableName: string;
  public readonly parameters: readonly ParameterDescriptor[];

  constructor(callableName: string, parameters: readonly ParameterInput[]) {
    this.callableName = callableName;
    this.parameters = parameters.map((p) =>
      typeof p === "string" ? { name: p } : p,
    );

    const seen = new Set<string>();
    for (const { name } of this.parameters) {
      if (seen.has(name)) {
        throw new TypeError(
          `Duplicate parameter '${name}' in signature of '${callableName}'.`,
        );
      }
      seen.add(name);
    }
  }

  indexOf(name: string): number {
    return this.parameters.findIndex((p) => p.name === name);
  }

  /**
   * Finds the slot addressed by `path` (`"cb"` or `"options.cb"`).
   */
  locate(path: string): Result<ArgumentSlot, UnknownArgumentError> {
    const [name, key, ...rest] = path.split(".");
    const index = this.indexOf(name);
    if (index < 0 || key === "" || rest.length > 0) {
      return err(new UnknownArgumentError(this.callableName, path));
    }
    if (key === undefined) {
      return ok({ kind: "positional", path, index });
    }
    return ok({ kind: "property", path, index, key });
  }

  /**
   * Binds positional arguments to the declared parameters and fills in
   * defaults. Arguments beyond the declared parameters are kept as they are.
   *
   * @throws {TypeError} If a required parameter was not supplied.
   */
  bind(args: readonly unknown[]): BoundArguments {
    const values = [...args];

    this.parameters.forEach((parameter, index) => {
      if (values[index] !== undefined) return;
      if (parameter.defaultValue) {
        values[index] = parameter.defaultValue();
      } else if (!parameter.optional && index >= args.length) {
        throw new TypeError(
          `Missing required argument '${parameter.name}' in call to '${this.callableName}'.`,
        );
      }
    });

    return new BoundArguments(values, args.length);
  }
}

// =================================================================
// Section 4: Signature Registry
// =================================================================

const signatures = new WeakMap<AnyFunction, CallableSignature>();

/**
 * Declares the parameter names of `fn` so it can be decorated without
 * repeating them. Returns `fn` itself.
 *
 * @example
 * ```typescript
 * const save = defineCallable(['record', 'done'], (record: Row, done: Done) => { ... });
 * const guardedSave = ensureCallback('done', new Error('not saved'))(save);
 * ```
 */
export function defineCallable<F extends AnyFunction>(
  parameters: readonly ParameterInput[],
  fn: F,
  name: string = fn.name || "anonymous",
): F {
  signatures.set(fn, new CallableSignature(name, parameters));
  return fn;
}

/** Returns the signature registered for `fn` with `defineCallable`, if any. */
export function signatureOf(fn: AnyFunction): CallableSignature | undefined {
  return signatures.get(fn);
}

/**
 * Normalizes the different ways a signature can be supplied to a decorator.
 * Returns `undefined` when none was supplied and none is registered.
 */
export function resolveSignature(
  fn: AnyFunction,
  parameters?: CallableSignature | readonly ParameterInput[],
  name: string = fn.name || "anonymous",
): CallableSignature | undefined {
  if (parameters instanceof CallableSignature) return parameters;
  if (parameters) return new CallableSignature(name, parameters);
  return signatureOf(fn);
}

function isObjectLike(value: unknown): value is object {
  return (
    (typeof value === "object" && value !== null) || typeof value === "function"
  );
}
