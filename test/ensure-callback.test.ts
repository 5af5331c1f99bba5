import { describe, it, expect, vi } from 'vitest';
import {
  defineCallable,
  ensureCallback,
  ensureCallbackWith,
  inspectCallback,
  isGuardedCallback,
  UnknownArgumentError,
  type Logger,
} from '../src';

type Callback = (message: string) => void;

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the function to throw');
}

function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

describe('ensureCallback on plain calls', () => {
  describe('Fallback invocation', () => {
    const f = ensureCallback('cb', 'decorator')(
      ['condition', 'cb'],
      (condition: boolean, cb: Callback) => {
        if (condition) cb('x');
      },
    );

    it('should pass through the explicit call when the body makes it', () => {
      const cb = vi.fn();
      f(true, cb);

      expect(cb).toHaveBeenCalledTimes(1);
      expect(cb).toHaveBeenCalledWith('x');
    });

    it('should call the callback with the fallback arguments when the body does not', () => {
      const cb = vi.fn();
      f(false, cb);

      expect(cb).toHaveBeenCalledTimes(1);
      expect(cb).toHaveBeenCalledWith('decorator');
    });

    it('should call the callback with no arguments when no fallback is configured', () => {
      const cb = vi.fn();
      const noop = ensureCallback('cb')(['cb'], (_cb: Callback) => {});

      noop(cb);

      expect(cb).toHaveBeenCalledTimes(1);
      expect(cb).toHaveBeenCalledWith();
    });

    it('should return the body result unchanged', () => {
      const cb = vi.fn();
      const compute = ensureCallback('cb', 'fallback')(
        ['a', 'b', 'cb'],
        (a: number, b: number, _cb: Callback) => a + b,
      );

      expect(compute(2, 3, cb)).toBe(5);
      expect(cb).toHaveBeenCalledWith('fallback');
    });

    it('should guard every call independently', () => {
      const first = vi.fn();
      const second = vi.fn();

      f(false, first);
      f(true, second);

      expect(first).toHaveBeenCalledWith('decorator');
      expect(second).toHaveBeenCalledWith('x');
    });
  });

  describe('Error exits', () => {
    it('should fire the fallback before re-throwing the same error', () => {
      const events: string[] = [];
      const boom = new Error('boom');
      const failing = ensureCallback('cb', 'failed')(['cb'], (_cb: Callback) => {
        throw boom;
      });

      const error = captureError(() =>
        failing((message) => events.push(`callback: ${message}`)),
      );
      events.push('caught');

      expect(error).toBe(boom);
      expect(events).toEqual(['callback: failed', 'caught']);
    });

    it('should not fire the fallback when the callback ran before the error', () => {
      const cb = vi.fn();
      const failing = ensureCallback('cb', 'failed')(['cb'], (innerCb: Callback) => {
        innerCb('done');
        throw new RangeError('late failure');
      });

      expect(() => failing(cb)).toThrow(RangeError);
      expect(cb).toHaveBeenCalledTimes(1);
      expect(cb).toHaveBeenCalledWith('done');
    });

    it('should propagate an error thrown by the fallback on a normal exit', () => {
      const quiet = ensureCallback('cb')(['cb'], (_cb: () => void) => 42);

      expect(() =>
        quiet(() => {
          throw new Error('callback failed');
        }),
      ).toThrow('callback failed');
    });

    it('should log a failing fallback and keep the original error on an error exit', () => {
      const logger = createMockLogger();
      const boom = new Error('boom');
      const callbackError = new Error('callback failed');
      const failing = ensureCallbackWith({ callback: 'cb', logger })(
        ['cb'],
        function upload(_cb: () => void) {
          throw boom;
        },
      );

      const error = captureError(() =>
        failing(() => {
          throw callbackError;
        }),
      );

      expect(error).toBe(boom);
      expect(logger.error).toHaveBeenCalledTimes(1);
      expect(logger.error).toHaveBeenCalledWith(
        "[Guarantee] Fallback for 'upload' threw while the call itself was failing",
        { error: callbackError, cause: boom },
      );
    });
  });

  describe('Delegation chains', () => {
    it('should fire once with the innermost fallback when nobody calls the callback', () => {
      const cb = vi.fn();
      const inner = ensureCallback('cb', 'inner')(['cb'], (_cb: Callback) => {});
      const outer = ensureCallback('cb', 'outer')(['cb'], (innerCb: Callback) => {
        inner(innerCb);
      });

      outer(cb);

      expect(cb).toHaveBeenCalledTimes(1);
      expect(cb).toHaveBeenCalledWith('inner');
    });

    it('should fire once with the explicit arguments when the innermost level calls it', () => {
      const cb = vi.fn();
      const innermost = ensureCallback('done', 'innermost')(['done'], (done: Callback) => {
        done('explicit');
      });
      const middle = ensureCallback('cb', 'middle')(['cb'], (cb2: Callback) => {
        innermost(cb2);
      });
      const outer = ensureCallback('callme', 'outer')(['callme'], (callme: Callback) => {
        middle(callme);
      });

      outer(cb);

      expect(cb).toHaveBeenCalledTimes(1);
      expect(cb).toHaveBeenCalledWith('explicit');
    });

    it('should let the outer level fire when the inner level was never reached', () => {
      const cb = vi.fn();
      const inner = ensureCallback('cb', 'inner')(['cb'], (_cb: Callback) => {});
      const outer = ensureCallback('cb', 'outer')(
        ['skip', 'cb'],
        (skip: boolean, innerCb: Callback) => {
          if (!skip) inner(innerCb);
        },
      );

      outer(true, cb);

      expect(cb).toHaveBeenCalledWith('outer');
    });

    it('should fire as soon as the first inner level exits without calling it', () => {
      const cb = vi.fn();
      let fired = 0;
      const first = ensureCallback('cb', 'first')(['cb'], (_cb: Callback) => {});
      const second = ensureCallback('cb', 'second')(['cb'], (_cb: Callback) => {});
      const outer = ensureCallback('cb', 'outer')(['cb'], (innerCb: Callback) => {
        first(innerCb);
        fired = cb.mock.calls.length;
        second(innerCb);
      });

      outer(cb);

      expect(fired).toBe(1);
      expect(cb).toHaveBeenCalledTimes(1);
      expect(cb).toHaveBeenCalledWith('first');
    });

    it('should hand each level its own guarded proxy backed by one guard', () => {
      const seen: unknown[] = [];
      const inner = ensureCallback('cb')(['cb'], (innerCb: Callback) => {
        seen.push(innerCb);
        innerCb('inner');
      });
      const outer = ensureCallback('cb')(['cb'], (outerCb: Callback) => {
        seen.push(outerCb);
        inner(outerCb);
        seen.push(inspectCallback(outerCb));
      });

      outer(vi.fn());

      expect(seen).toHaveLength(3);
      expect(seen[0]).not.toBe(seen[1]);
      expect(isGuardedCallback(seen[0])).toBe(true);
      expect(isGuardedCallback(seen[1])).toBe(true);
      expect(seen[2]).toEqual({
        kind: 'guarded',
        invoked: true,
        released: false,
        pending: 1,
      });
    });
  });

  describe('Argument location', () => {
    it('should fail with UnknownArgumentError on the first call, not at decoration time', () => {
      const body = vi.fn();
      const decorate = ensureCallback('missing_name');
      const processJob = decorate(['cb'], function processJob(_cb: Callback) {
        body();
      });

      const error = captureError(() => processJob(vi.fn()));

      expect(error).toBeInstanceOf(UnknownArgumentError);
      expect(error).toMatchObject({
        callableName: 'processJob',
        argumentName: 'missing_name',
      });
      expect(body).not.toHaveBeenCalled();
    });

    it('should fail with UnknownArgumentError when no signature was declared', () => {
      const work = ensureCallback('cb')(function work(_cb: Callback) {});

      expect(() => work(vi.fn())).toThrow(
        "Callable 'work' has no parameter 'cb'.",
      );
    });

    it('should take the parameter list first and the function second', () => {
      const cb = vi.fn();
      const decorate = ensureCallback('cb', 'fallback');
      const guardedSend = decorate(['to', 'cb'], function send(_to: string, _cb: Callback) {});

      guardedSend('a', cb);

      expect(guardedSend.name).toBe('ensureCallback(send)');
      expect(cb).toHaveBeenCalledWith('fallback');
    });

    it('should reject a parameter list given without a function', () => {
      const decorate = ensureCallbackWith({ callback: 'cb' });

      expect(() => Reflect.apply(decorate, undefined, [['cb']])).toThrow(
        "ensureCallback('cb') expects the function to decorate after its parameter list.",
      );
    });

    it('should use the signature registered with defineCallable', () => {
      const save = defineCallable(
        ['record', 'done'],
        function save(record: string, done: Callback) {
          if (record) done(`saved ${record}`);
        },
      );
      const guardedSave = ensureCallback('done', 'skipped')(save);
      const skipped = vi.fn();
      const saved = vi.fn();

      guardedSave('', skipped);
      guardedSave('a', saved);

      expect(skipped).toHaveBeenCalledWith('skipped');
      expect(saved).toHaveBeenCalledWith('saved a');
      expect(guardedSave.name).toBe('ensureCallback(save)');
    });

    it('should find a callback passed inside an options object without mutating it', () => {
      let seen: { onDone?: Callback; retries: number } | undefined;
      const load = ensureCallback('options.onDone', 'fallback')(
        ['id', 'options'],
        (_id: string, options: { onDone?: Callback; retries: number }) => {
          seen = options;
        },
      );
      const onDone = vi.fn();
      const options = { onDone, retries: 2 };

      load('a', options);

      expect(options.onDone).toBe(onDone);
      expect(seen).not.toBe(options);
      expect(seen?.retries).toBe(2);
      expect(isGuardedCallback(seen?.onDone)).toBe(true);
      expect(onDone).toHaveBeenCalledWith('fallback');
    });

    it('should guard a callback supplied by a default value', () => {
      const defaultCallback = vi.fn();
      const notify = ensureCallback('cb', 'default fired')(
        [{ name: 'cb', defaultValue: () => defaultCallback }],
        (_cb?: Callback) => {},
      );

      notify();

      expect(defaultCallback).toHaveBeenCalledTimes(1);
      expect(defaultCallback).toHaveBeenCalledWith('default fired');
    });

    it('should run unguarded when an optional callback is absent', () => {
      const body = vi.fn((cb?: Callback) => (cb ? 'with' : 'without'));
      const maybeNotify = ensureCallback('cb', 'fallback')(
        [{ name: 'cb', optional: true }],
        body,
      );

      expect(maybeNotify()).toBe('without');
      expect(maybeNotify(undefined)).toBe('without');
      expect(body).toHaveBeenNthCalledWith(1);
      expect(body).toHaveBeenNthCalledWith(2, undefined);
    });

    it('should reject a callback argument that is not a function', () => {
      const body = vi.fn();
      const strict = ensureCallback('cb')(['cb'], function strict(cb: unknown) {
        body(cb);
      });

      expect(() => strict(42)).toThrow(
        "Argument 'cb' of 'strict' must be a function, got number.",
      );
      expect(body).not.toHaveBeenCalled();
    });
  });

  describe('Function identity', () => {
    it('should forward `this` to the decorated function', () => {
      const cb = vi.fn();
      const counter = { count: 0 };
      const bump = ensureCallback('done')(
        ['done'],
        function (this: { count: number }, done: () => void) {
          this.count++;
          done();
        },
      );

      bump.call(counter, cb);

      expect(counter.count).toBe(1);
      expect(cb).toHaveBeenCalledTimes(1);
    });

    it('should keep the original argument list length', () => {
      const lengths: number[] = [];
      const variadic = ensureCallback('cb')(
        ['cb', { name: 'extra', optional: true }],
        function (_cb: Callback, ..._rest: unknown[]) {
          lengths.push(arguments.length);
        },
      );

      variadic(vi.fn());
      variadic(vi.fn(), 'a', 'b');

      expect(lengths).toEqual([1, 3]);
    });
  });
});
