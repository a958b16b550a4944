/**
 * Set of banned tokens. Every method is synchronous, so on the single JS thread a mutation always
 * completes before any reader runs and readers never see a partial update.
 */
export class BadWordStore {
  private store = new Set<string>();

  constructor(words: Iterable<string> = []) {
    for (const word of words) {
      this.store.add(word);
    }
  }

  get size(): number {
    return this.store.size;
  }

  has(word: string): boolean {
    return this.store.has(word);
  }

  /** Returns how many of the given words were not already present. */
  add(...words: string[]): number {
    const before = this.store.size;
    for (const word of words) {
      this.store.add(word);
    }
    return this.store.size - before;
  }

  /** Returns how many of the given words were removed. */
  delete(...words: string[]): number {
    let removed = 0;
    for (const word of words) {
      if (this.store.delete(word)) removed += 1;
    }
    return removed;
  }

  list(): string[] {
    return Array.from(this.store);
  }

  [Symbol.iterator](): IterableIterator<string> {
    return this.store.values();
  }
}
