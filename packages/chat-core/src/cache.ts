/**
 * Keyed lookup cache with fetch-once semantics: a value is loaded the first time
 * its key is requested and retained until explicitly invalidated. Concurrent
 * requests for the same key share one in-flight load; failed loads are not cached.
 */
export class LookupCache<T> {
  private readonly values = new Map<string, T>();
  private readonly pending = new Map<string, Promise<T>>();
  private readonly loader: (key: string) => Promise<T>;

  constructor(loader: (key: string) => Promise<T>) {
    this.loader = loader;
  }

  get(key: string): T | undefined {
    return this.values.get(key);
  }

  has(key: string) {
    return this.values.has(key);
  }

  keys() {
    return Array.from(this.values.keys());
  }

  async load(key: string): Promise<T> {
    const cached = this.values.get(key);
    if (cached !== undefined) return cached;

    const inFlight = this.pending.get(key);
    if (inFlight) return inFlight;

    const request = this.loader(key)
      .then((value) => {
        this.values.set(key, value);
        return value;
      })
      .finally(() => {
        this.pending.delete(key);
      });
    this.pending.set(key, request);
    return request;
  }

  invalidate(key?: string) {
    if (key === undefined) {
      this.values.clear();
      return;
    }
    this.values.delete(key);
  }
}
