/**
 * Process-lifetime cache of resolved schemas keyed by schema id.
 *
 * Registry schemas are immutable once published, so entries never expire.
 * Concurrent misses for one id share a single resolution; a failed
 * resolution is evicted so the next lookup asks the registry again.
 */
export class SchemaCache<T> {
  private readonly entries = new Map<number, Promise<T>>();

  getOrResolve(id: number, resolve: (id: number) => Promise<T>): Promise<T> {
    const cached = this.entries.get(id);
    if (cached) {
      return cached;
    }

    const pending = resolve(id);
    this.entries.set(id, pending);
    pending.then(undefined, () => {
      if (this.entries.get(id) === pending) {
        this.entries.delete(id);
      }
    });
    return pending;
  }

  has(id: number): boolean {
    return this.entries.has(id);
  }

  get size(): number {
    return this.entries.size;
  }
}
