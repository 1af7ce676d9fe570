import { LRUCache } from 'lru-cache';

export type ConversionKind = 'encode' | 'decode';

/**
 * LRU memo of encode/decode results for the API server
 */
export class ConversionCache {
  private entries: LRUCache<string, string>;
  private hits = 0;
  private misses = 0;

  constructor(capacity = 500) {
    this.entries = new LRUCache({ max: Math.max(1, Math.floor(capacity)) });
  }

  /**
   * Get a cached conversion or compute and store it.
   * Key is the operation, its system ('' for decode) and the input text.
   */
  getOrCompute(kind: ConversionKind, variant: string, text: string, compute: () => string): string {
    const key = `${kind}|${variant}|${text}`;

    let value = this.entries.get(key);
    if (value === undefined) {
      value = compute();
      this.entries.set(key, value);
      this.misses++;
    } else {
      this.hits++;
    }

    return value;
  }

  /**
   * Get cache statistics for the /health endpoint.
   */
  getStats(): { size: number; hits: number; misses: number } {
    return { size: this.entries.size, hits: this.hits, misses: this.misses };
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }
}
