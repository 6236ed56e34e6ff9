import type { GenerationResult } from './generation.js';

/**
 * Saved generations for one session, newest first. Unbounded and in memory
 * only; entries are never removed or deduplicated.
 */
export class HistoryStore {
  // Oldest first internally so that saving is a push
  private entries: GenerationResult[] = [];

  /**
   * Insert at the front
   */
  save(result: GenerationResult): void {
    this.entries.push(result);
  }

  /**
   * All entries, newest first
   */
  all(): readonly GenerationResult[] {
    return this.entries.slice().reverse();
  }

  /**
   * Entry by newest-first position
   */
  at(index: number): GenerationResult | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.entries.length) {
      return undefined;
    }
    return this.entries[this.entries.length - 1 - index];
  }

  get size(): number {
    return this.entries.length;
  }
}
