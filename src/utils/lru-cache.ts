/**
 * Small LRU (Least Recently Used) cache.
 * Used for the per-process tokenizer cache, keyed by model name.
 */

export class LRUCache<K, V> {
  private cache: Map<K, V>;
  private capacity: number;

  constructor(capacity: number = 100) {
    this.capacity = Math.max(1, capacity);
    this.cache = new Map();
  }

  /**
   * Get a value and mark it as most recently used
   */
  get(key: K): V | undefined {
    if (!this.cache.has(key)) {
      return undefined;
    }

    const value = this.cache.get(key);
    if (value === undefined) {
      return undefined;
    }
    this.cache.delete(key);
    this.cache.set(key, value);
    return value;
  }

  set(key: K, value: V): void {
    if (this.cache.has(key)) {
      this.cache.delete(key);
    } else if (this.cache.size >= this.capacity) {
      // Evict least recently used (first item in Map)
      const firstKey = this.cache.keys().next().value;
      if (firstKey !== undefined) {
        this.cache.delete(firstKey);
      }
    }

    this.cache.set(key, value);
  }

  /**
   * Return the cached value for `key`, creating it on first use.
   * Two callers racing on the same key both end up with an equivalent value.
   */
  getOrCreate(key: K, factory: (key: K) => V): V {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }
    const created = factory(key);
    this.set(key, created);
    return created;
  }

  clear(): void {
    this.cache.clear();
  }

  keys(): K[] {
    return Array.from(this.cache.keys());
  }
}
