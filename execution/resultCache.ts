import crypto from "node:crypto";
import { logger } from "../config/logger.js";
import { DEFAULT_CACHE_CONFIG, type CacheConfig } from "../config/routerConfig.js";

export type CacheLookup<T> = { readonly hit: true; readonly value: T } | { readonly hit: false };

export interface CacheStats {
  readonly size: number;
  readonly capacity: number;
  readonly hits: number;
  readonly misses: number;
  readonly evictions: number;
  readonly hitRate: number;
}

interface CacheEntry<T> {
  readonly fingerprint: string;
  readonly value: T;
  readonly expiresAt: number;
}

const MISS = { hit: false } as const;

export function fingerprintFor(normalizedInput: string, handlerName: string): string {
  return crypto.createHash("sha256").update(`${handlerName}\u0000${normalizedInput}`).digest("hex");
}

/**
 * LRU cache with per-entry TTL. Map insertion order doubles as recency order:
 * a hit re-inserts the entry at the tail, eviction takes from the head.
 */
export class ResultCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(
    private readonly config: CacheConfig = DEFAULT_CACHE_CONFIG,
    private readonly now: () => number = Date.now,
  ) {}

  get(fingerprint: string): CacheLookup<T> {
    const entry = this.entries.get(fingerprint);
    if (!entry) {
      this.misses++;
      return MISS;
    }

    this.entries.delete(fingerprint);
    if (entry.expiresAt <= this.now()) {
      this.misses++;
      return MISS;
    }

    this.entries.set(fingerprint, entry);
    this.hits++;
    return { hit: true, value: entry.value };
  }

  put(fingerprint: string, value: T, ttlMs: number = this.config.ttlMs): void {
    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, { fingerprint, value, expiresAt: this.now() + ttlMs });

    while (this.entries.size > this.config.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
      logger.debug({ fingerprint: oldest.value.slice(0, 12) }, "Cache entry evicted");
    }
  }

  delete(fingerprint: string): boolean {
    return this.entries.delete(fingerprint);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Drops every expired entry. Returns the number removed. */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [fingerprint, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(fingerprint);
        removed++;
      }
    }
    return removed;
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      capacity: this.config.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }
}
