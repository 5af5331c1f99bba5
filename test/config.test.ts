import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  AlreadyInvokedError,
  configureGuarantees,
  consoleLogger,
  ensureCallback,
  ensureCallbackWith,
  getGuaranteeOptions,
  noopLogger,
  resetGuaranteeOptions,
  withGuaranteeOptions,
  type Logger,
} from '../src';

function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

const callTwice = (innerCb: () => void) => {
  innerCb();
  innerCb();
};

describe('Guarantee options', () => {
  afterEach(() => {
    resetGuaranteeOptions();
    vi.restoreAllMocks();
  });

  describe('Resolution', () => {
    it('should start from the built-in defaults', () => {
      expect(getGuaranteeOptions()).toEqual({
        logger: noopLogger,
        repeatedCall: 'ignore',
      });
    });

    it('should apply global options to every decorated call', () => {
      const returned = configureGuarantees({ repeatedCall: 'throw' });
      const twice = ensureCallback('cb')(['cb'], callTwice);

      expect(returned.repeatedCall).toBe('throw');
      expect(() => twice(vi.fn())).toThrow(AlreadyInvokedError);
    });

    it('should restore the defaults on reset', () => {
      configureGuarantees({ repeatedCall: 'throw' });
      resetGuaranteeOptions();

      expect(getGuaranteeOptions().repeatedCall).toBe('ignore');
    });

    it('should not let undefined overrides clobber earlier settings', () => {
      configureGuarantees({ repeatedCall: 'throw' });

      const resolved = withGuaranteeOptions({ repeatedCall: undefined }, () =>
        getGuaranteeOptions({ logger: undefined }),
      );

      expect(resolved).toEqual({ logger: noopLogger, repeatedCall: 'throw' });
    });

    it('should prefer per-decorator options over scoped and global ones', () => {
      configureGuarantees({ repeatedCall: 'throw' });
      const twice = ensureCallbackWith({ callback: 'cb', repeatedCall: 'ignore' })(
        ['cb'],
        callTwice,
      );
      const cb = vi.fn();

      withGuaranteeOptions({ repeatedCall: 'throw' }, () => twice(cb));

      expect(cb).toHaveBeenCalledTimes(1);
    });
  });

  describe('Scopes', () => {
    it('should apply scoped options only inside the scope', () => {
      const twice = ensureCallback('cb')(['cb'], callTwice);

      expect(() =>
        withGuaranteeOptions({ repeatedCall: 'throw' }, () => twice(vi.fn())),
      ).toThrow(AlreadyInvokedError);
      expect(() => twice(vi.fn())).not.toThrow();
    });

    it('should merge nested scopes with their parent', () => {
      const logger = createMockLogger();

      const resolved = withGuaranteeOptions({ logger }, () =>
        withGuaranteeOptions({ repeatedCall: 'throw' }, () => getGuaranteeOptions()),
      );

      expect(resolved.logger).toBe(logger);
      expect(resolved.repeatedCall).toBe('throw');
    });

    it('should follow the scope across awaits', async () => {
      const logger = createMockLogger();

      const seen = await withGuaranteeOptions({ logger }, async () => {
        await new Promise((resolve) => setTimeout(resolve, 1));
        return getGuaranteeOptions().logger;
      });

      expect(seen).toBe(logger);
      expect(getGuaranteeOptions().logger).toBe(noopLogger);
    });
  });

  describe('Logging', () => {
    it('should log guard lifecycle events through the configured logger', () => {
      const logger = createMockLogger();
      configureGuarantees({ logger });
      const save = ensureCallback('done', 'not saved')(
        ['record', 'done'],
        function save(_record: string, _done: (status: string) => void) {},
      );

      save('a', function onSaved() {});

      expect(logger.debug).toHaveBeenNthCalledWith(
        1,
        "[Guarantee] 'save' is now guarding 'onSaved'",
      );
      expect(logger.debug).toHaveBeenNthCalledWith(
        2,
        "[Guarantee] 'save' exited without calling 'onSaved', firing fallback",
        { fallbackArgs: ['not saved'] },
      );
    });

    it('should log when a level takes over an existing guard', () => {
      const logger = createMockLogger();
      const inner = ensureCallback('cb')(['cb'], function inner(innerCb: () => void) {
        innerCb();
      });
      const outer = ensureCallback('cb')(['cb'], function outer(innerCb: () => void) {
        inner(innerCb);
      });

      withGuaranteeOptions({ logger }, () => outer(function onReady() {}));

      expect(logger.debug).toHaveBeenCalledWith(
        "[Guarantee] 'inner' took over the obligation for 'onReady'",
      );
    });

    it('should forward consoleLogger messages to the console', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      consoleLogger.warn('careful', { attempt: 1 });

      expect(warn).toHaveBeenCalledWith('careful', { attempt: 1 });
    });
  });
});
