/**
 * Read-through cache keyed by string. The first lookup for a key starts the
 * load and stores its promise, so concurrent first lookups share one load.
 * A failed load is evicted and the next lookup retries.
 */
export class ReadThroughCache<T> {
  private readonly entries = new Map<string, Promise<T>>();

  constructor(private readonly load: (key: string) => Promise<T>) {}

  get(key: string): Promise<T> {
    const cached = this.entries.get(key);
    if (cached) return cached;

    const pending = this.load(key);
    this.entries.set(key, pending);
    pending.catch(() => {
      if (this.entries.get(key) === pending) this.entries.delete(key);
    });
    return pending;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
