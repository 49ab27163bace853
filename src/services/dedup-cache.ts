/**
 * In-memory record of recently accepted event ids.
 *
 * Entries expire after the retention window; when the cache is full the
 * oldest entry is evicted first.
 */
export class DedupCache {
  private readonly seen = new Map<string, number>();

  constructor(
    private readonly retentionMs: number,
    private readonly maxEntries: number,
    private readonly clock: () => number = Date.now
  ) {}

  /**
   * Record an id. Returns false if it was already seen within the window.
   */
  register(id: string): boolean {
    this.prune();
    if (this.seen.has(id)) {
      return false;
    }
    while (this.seen.size >= this.maxEntries) {
      const oldest = this.seen.keys().next();
      if (oldest.done) break;
      this.seen.delete(oldest.value);
    }
    this.seen.set(id, this.clock());
    return true;
  }

  has(id: string): boolean {
    this.prune();
    return this.seen.has(id);
  }

  /**
   * Drop an id registered for work that did not go through
   */
  forget(id: string): void {
    this.seen.delete(id);
  }

  get size(): number {
    return this.seen.size;
  }

  clear(): void {
    this.seen.clear();
  }

  private prune(): void {
    const cutoff = this.clock() - this.retentionMs;
    // Map iteration follows insertion order, which is also time order
    for (const [id, seenAt] of this.seen) {
      if (seenAt >= cutoff) break;
      this.seen.delete(id);
    }
  }
}
