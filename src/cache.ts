export interface ResponseCache {
  get(key: string): string | undefined;
  has(key: string): boolean;
  put(key: string, answer: string): void;
  readonly size: number;
}

/**
 * Map-backed answer cache. Unbounded unless maxEntries is set, in which case
 * the least recently used answer is evicted first.
 */
export class InMemoryResponseCache implements ResponseCache {
  private readonly map = new Map<string, string>();

  constructor(private readonly maxEntries?: number) {}

  get size(): number {
    return this.map.size;
  }

  has(key: string): boolean {
    return this.map.has(key);
  }

  get(key: string): string | undefined {
    const answer = this.map.get(key);
    if (answer !== undefined && this.maxEntries !== undefined) {
      // Re-insert to mark as most recently used.
      this.map.delete(key);
      this.map.set(key, answer);
    }
    return answer;
  }

  put(key: string, answer: string): void {
    this.map.delete(key);
    this.map.set(key, answer);

    if (this.maxEntries === undefined) return;
    while (this.map.size > this.maxEntries) {
      const oldest = this.map.keys().next();
      if (oldest.done) break;
      this.map.delete(oldest.value);
    }
  }
}
