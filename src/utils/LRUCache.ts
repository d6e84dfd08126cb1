/**
 * Small LRU cache used to memoize built spatial indexes per dataset version.
 * Keeps the most recently used entries, evicts the least recently used when full.
 */
export class LRUCache<K, V> {
  private readonly maxSize: number;
  // boxed so that a stored `undefined` is still a hit
  private readonly entries = new Map<K, { value: V }>();

  constructor(maxSize: number, private readonly onEvict?: (key: K, value: V) => void) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`LRUCache size must be a positive integer, got ${maxSize}`);
    }
    this.maxSize = maxSize;
  }

  get(key: K): V | undefined {
    return this.touch(key)?.value;
  }

  set(key: K, value: V): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.maxSize) {
      const oldest = this.entries.entries().next();
      if (!oldest.done) {
        const [oldKey, oldEntry] = oldest.value;
        this.entries.delete(oldKey);
        this.onEvict?.(oldKey, oldEntry.value);
      }
    }
    this.entries.set(key, { value });
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  size(): number {
    return this.entries.size;
  }

  clear(): void {
    if (this.onEvict) {
      for (const [key, entry] of this.entries) this.onEvict(key, entry.value);
    }
    this.entries.clear();
  }

  // Move to end (most recently used)
  private touch(key: K): { value: V } | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry;
  }
}
