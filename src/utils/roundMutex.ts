import { AsyncLocalStorage } from "node:async_hooks";

/**
 * Per-key FIFO mutex. Operations on the same key run one after another,
 * across awaits; different keys never wait on each other.
 *
 * A call made from inside a running operation on the same key (a callback
 * re-entering the service) would otherwise wait on itself forever, so it is
 * rejected through `onReentry` instead.
 */
export class KeyedMutex<K> {
  private readonly tails = new Map<K, Promise<void>>();
  private readonly held = new AsyncLocalStorage<ReadonlySet<K>>();

  constructor(private readonly onReentry: (key: K) => Error) {}

  async run<T>(key: K, fn: () => Promise<T>): Promise<T> {
    const outer = this.held.getStore();
    if (outer?.has(key)) {
      throw this.onReentry(key);
    }

    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      const heldNow = new Set(outer ?? []);
      heldNow.add(key);
      return await this.held.run(heldNow, fn);
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }
}
