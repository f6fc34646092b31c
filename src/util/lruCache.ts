// src/util/lruCache.ts
// What: Size-capped least-recently-used cache.
// How: Relies on Map insertion order; a hit re-inserts the key so the first key is always the eldest.

export class LruCache<K, V> {
  private readonly map = new Map<K, V>();

  constructor(readonly capacity: number) {}

  get size(): number {
    return this.map.size;
  }

  get(key: K): V | undefined {
    if (!this.map.has(key)) return undefined;
    const value = this.map.get(key);
    this.map.delete(key);
    if (value !== undefined) this.map.set(key, value);
    return value;
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  set(key: K, value: V): void {
    if (this.capacity <= 0) return;
    this.map.delete(key);
    this.map.set(key, value);
    while (this.map.size > this.capacity) {
      const eldest = this.map.keys().next();
      if (eldest.done) break;
      this.map.delete(eldest.value);
    }
  }

  clear(): void {
    this.map.clear();
  }
}
