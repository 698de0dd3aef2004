/**
 * Response cache shared by the upstream service clients
 *
 * Entries hold the raw JSON body; callers validate on every read.
 */

import { LRUCache } from 'lru-cache';
import { createHash } from 'node:crypto';
import type { QueryParams } from './types.js';

export interface CacheConfig {
  maxSize: number;
  ttlMs: number;
}

export interface CacheEntry {
  body: unknown;
  storedAt: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
}

export class ResponseCache {
  private readonly entries: LRUCache<string, CacheEntry>;
  private hits = 0;
  private misses = 0;

  constructor({ maxSize = 500, ttlMs = 300000 }: Partial<CacheConfig> = {}) {
    this.entries = new LRUCache({ max: maxSize, ttl: ttlMs, updateAgeOnGet: false });
  }

  /**
   * `<endpoint>:<hash>`. Parameter names are sorted; values of a repeated
   * name keep their order, since `curie=A&curie=B` is not `curie=B&curie=A`
   * for the report built from it.
   */
  static keyFor(endpoint: string, params: QueryParams = []): string {
    const ordered = [...params].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const digest = createHash('sha256').update(endpoint).update(JSON.stringify(ordered)).digest('hex');
    return `${endpoint}:${digest.slice(0, 12)}`;
  }

  lookup(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (entry) {
      this.hits++;
    } else {
      this.misses++;
    }
    return entry;
  }

  store(key: string, body: unknown): void {
    this.entries.set(key, { body, storedAt: Date.now() });
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }
}

/** Whole seconds since the entry was stored */
export function entryAge(entry: CacheEntry, now: number = Date.now()): number {
  return Math.floor((now - entry.storedAt) / 1000);
}
