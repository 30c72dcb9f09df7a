/**
 * Process-lifetime cache of match results keyed by (title, author)
 */

const DEFAULT_MAX_ENTRIES = 256;

export class MatchCache<V> {
  private readonly entries = new Map<string, V>();

  constructor(private readonly maxEntries: number = DEFAULT_MAX_ENTRIES) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`MatchCache size must be a positive integer, got ${maxEntries}`);
    }
  }

  private static key(title: string, author: string): string {
    return JSON.stringify([title, author]);
  }

  get size(): number {
    return this.entries.size;
  }

  has(title: string, author: string): boolean {
    return this.entries.has(MatchCache.key(title, author));
  }

  /**
   * Get a cached value and mark it most recently used
   */
  get(title: string, author: string): V | undefined {
    const key = MatchCache.key(title, author);
    const value = this.entries.get(key);
    if (value === undefined) return undefined;

    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  /**
   * Store a value, evicting the least recently used entry when full
   */
  put(title: string, author: string, value: V): void {
    const key = MatchCache.key(title, author);
    this.entries.delete(key);

    if (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, value);
  }

  delete(title: string, author: string): boolean {
    return this.entries.delete(MatchCache.key(title, author));
  }

  clear(): void {
    this.entries.clear();
  }
}
