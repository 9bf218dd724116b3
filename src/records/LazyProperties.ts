/**
 * Memoized property access for record wrappers.
 *
 * Each property is a pure extraction from the wrapped record, computed on
 * first read. A throwing extractor leaves nothing behind, so the next read
 * tries again.
 */

export type Extractors<P> = { readonly [K in keyof P]: () => P[K] };

export class LazyProperties<P extends object> {
  private readonly slots: { [K in keyof P]?: { readonly value: P[K] } } = {};

  constructor(private readonly extractors: Extractors<P>) {}

  get<K extends keyof P>(key: K): P[K] {
    const slot = this.slots[key];
    if (slot) {
      return slot.value;
    }
    const value = this.extractors[key]();
    this.slots[key] = { value };
    return value;
  }

  isComputed(key: keyof P): boolean {
    return this.slots[key] !== undefined;
  }
}

/**
 * Memoize an async loader. A rejected load is forgotten.
 */
export function memoizeAsync<T>(load: () => Promise<T>): () => Promise<T> {
  let pending: Promise<T> | undefined;
  return () => {
    if (!pending) {
      pending = load().catch((err: unknown) => {
        pending = undefined;
        throw err;
      });
    }
    return pending;
  };
}
