import {
  consoleLogger,
  defineCallable,
  ensureCallback,
  ensureCallbackWith,
  releaseCallback,
  withGuaranteeOptions,
} from '../src/index';

// === Simple Examples of Guaranteed Callbacks ===

type Done = (error: Error | null, result?: string) => void;

interface Order {
  id: string;
  paid: boolean;
}

// === Example 1: A Forgotten Callback ===

// `charge` only calls `done` for paid orders. The decorator calls it for the
// others, so the caller is never left waiting.
const charge = ensureCallback('done', new Error('order was not charged'))(
  ['order', 'done'],
  (order: Order, done: Done) => {
    if (order.paid) done(null, `charged ${order.id}`);
  },
);

// === Example 2: Delegation ===

// `checkout` forwards `done` to `charge`. Both share one guard, so `done` still
// fires once, with the fallback of the innermost level that skipped it.
const checkout = defineCallable(
  ['order', 'done'],
  (order: Order, done: Done) => {
    console.log(`Checking out ${order.id}`);
    charge(order, done);
  },
);
const guardedCheckout = ensureCallback('done', new Error('checkout failed'))(checkout);

// === Example 3: Async Work and Cancellation ===

const ship = ensureCallbackWith({
  callback: 'done',
  fallback: [new Error('shipping cancelled')],
  cancelOn: 'signal',
})(
  ['order', 'signal', 'done'],
  async (order: Order, _signal: AbortSignal, done: Done) => {
    await new Promise((resolve) => setTimeout(resolve, 100));
    done(null, `shipped ${order.id}`);
  },
);

// === Example 4: Handing the Callback to Someone Else ===

// Releasing the callback ends the guarantee. The timer now owns it.
const notifyLater = ensureCallback('done', new Error('never scheduled'))(
  ['delayMs', 'done'],
  (delayMs: number, done: Done) => {
    const plain = releaseCallback(done);
    setTimeout(() => plain(null, 'notified'), delayMs);
  },
);

const report: Done = (error, result) => {
  if (error) console.log(`  -> error: ${error.message}`);
  else console.log(`  -> ok: ${result}`);
};

async function runExamples() {
  console.log('=== Forgotten callback ===');
  charge({ id: 'a-1', paid: true }, report);
  charge({ id: 'a-2', paid: false }, report);

  console.log('\n=== Delegation ===');
  guardedCheckout({ id: 'b-1', paid: false }, report);

  console.log('\n=== Cancellation ===');
  const controller = new AbortController();
  const shipping = ship({ id: 'c-1', paid: true }, controller.signal, report);
  controller.abort();
  await shipping;

  console.log('\n=== Release ===');
  notifyLater(50, report);
  await new Promise((resolve) => setTimeout(resolve, 60));

  console.log('\n=== With logging ===');
  withGuaranteeOptions({ logger: consoleLogger }, () =>
    charge({ id: 'd-1', paid: false }, report),
  );
}

// Run examples if this file is executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  runExamples()
    .then(() => console.log('\nAll examples completed!'))
    .catch(console.error);
}

export { charge, guardedCheckout, ship, notifyLater, runExamples };
