/**
 * hoststate — TTL Cache Layer
 *
 * カテゴリ単位で System Observer のスキャン結果をメモ化する。
 * プロセスローカルで永続化はしない。TTL を過ぎたエントリは必ず再スキャンされる。
 */

import type { CacheEntry, CategoryTtls, ScanCategory } from '../types/state.js';
import { SCAN_CATEGORIES } from '../types/state.js';
import type { StateMap } from '../types/value.js';

export interface Clock {
  /** Epoch milliseconds. */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/** Default TTLs in milliseconds. */
export const DEFAULT_TTLS: CategoryTtls = {
  system: 30_000,
  hardware: 300_000,
  network: 60_000,
  software: 300_000,
  services: 30_000,
  gaming: 300_000,
};

export interface CacheStats {
  hits: number;
  misses: number;
  entries: number;
}

export interface CacheEntryStatus {
  category: ScanCategory;
  ttlMs: number;
  cached: boolean;
  capturedAt?: string;
  expiresInMs?: number;
}

export type ScanFn = () => Promise<StateMap>;

export class ScanCache {
  private readonly ttls: CategoryTtls;
  private readonly clock: Clock;
  private readonly entries = new Map<ScanCategory, CacheEntry>();
  private readonly inFlight = new Map<ScanCategory, Promise<StateMap>>();
  private hits = 0;
  private misses = 0;

  constructor(options: { ttls?: Partial<CategoryTtls>; clock?: Clock } = {}) {
    this.ttls = { ...DEFAULT_TTLS, ...options.ttls };
    this.clock = options.clock ?? systemClock;
  }

  ttlFor(category: ScanCategory): number {
    return this.ttls[category];
  }

  private isExpired(entry: CacheEntry): boolean {
    return entry.ttlMs <= 0 || this.clock.now() - entry.capturedAt >= entry.ttlMs;
  }

  /** Fresh entry for `category`, or undefined. Expired entries are dropped. */
  peek(category: ScanCategory): CacheEntry | undefined {
    const entry = this.entries.get(category);
    if (entry === undefined) return undefined;
    if (this.isExpired(entry)) {
      this.entries.delete(category);
      return undefined;
    }
    return entry;
  }

  isFresh(category: ScanCategory): boolean {
    return this.peek(category) !== undefined;
  }

  /**
   * Return the cached payload for `category` if it is within its TTL,
   * otherwise run `scan`, cache its result and return it.
   *
   * A failed scan rejects with the scan's error and leaves no entry behind.
   * Callers racing on the same category share one scan.
   */
  async getOrScan(category: ScanCategory, scan: ScanFn): Promise<StateMap> {
    const entry = this.peek(category);
    if (entry !== undefined) {
      this.hits++;
      return entry.payload;
    }

    const pending = this.inFlight.get(category);
    if (pending !== undefined) {
      return pending;
    }

    this.misses++;
    const run = (async () => {
      try {
        const payload = await scan();
        this.entries.set(category, {
          category,
          payload,
          capturedAt: this.clock.now(),
          ttlMs: this.ttls[category],
        });
        return payload;
      } finally {
        this.inFlight.delete(category);
      }
    })();
    this.inFlight.set(category, run);
    return run;
  }

  invalidate(category?: ScanCategory): void {
    if (category === undefined) {
      this.entries.clear();
    } else {
      this.entries.delete(category);
    }
  }

  stats(): CacheStats {
    for (const category of SCAN_CATEGORIES) {
      this.peek(category);
    }
    return { hits: this.hits, misses: this.misses, entries: this.entries.size };
  }

  status(): CacheEntryStatus[] {
    return SCAN_CATEGORIES.map((category) => {
      const entry = this.peek(category);
      const ttlMs = this.ttls[category];
      if (entry === undefined) {
        return { category, ttlMs, cached: false };
      }
      return {
        category,
        ttlMs,
        cached: true,
        capturedAt: new Date(entry.capturedAt).toISOString(),
        expiresInMs: entry.capturedAt + entry.ttlMs - this.clock.now(),
      };
    });
  }
}
