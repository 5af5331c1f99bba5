/**
 * @module
 * The main entry point. Decorate a function with `ensureCallback` to guarantee
 * that one of its callback arguments is called exactly once, however many
 * decorated layers it is forwarded through.
 */

// Decorators (ensureCallback, ensureCallbackWith, guaranteed)
export * from './ensure-callback';

// Escape hatch (releaseCallback, tryReleaseCallback)
export * from './release';

// Explicit call signatures and argument binding
export * from './signature';

// Guard state and inspection
export {
  CallbackGuard,
  Obligation,
  isGuardedCallback,
  inspectCallback,
  type CallbackGuardState,
  type CallbackInspection,
  type CallbackValue,
} from './guard';

// Guarded iterators returned for generator bodies
export { GuardedIterator, GuardedAsyncIterator } from './obligation';

// Configuration and logging
export * from './config';
export * from './logger';

// Errors (UnknownArgumentError, NotAGuardedCallbackError, ...)
export * from './errors';

export type * from './types';
