/**
 * @fileoverview ResolutionCache - Time-bounded instance cache
 *
 * @packageDocumentation
 * @module @kindling/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Holds lazily produced, non-singleton instances for a fixed TTL so that
 * repeated lookups within that window return the same object.
 *
 * Expiry is lazy: a read of an entry older than the TTL is a miss and evicts
 * it. {@link ResolutionCache.invalidateExpired} sweeps the rest.
 *
 * @version 1.0.0
 */

import { type Clock, type ServiceIdentifier } from '../../domain/di';

interface CacheEntry {
  instance: unknown;
  createdAt: number;
}

export interface ResolutionCacheOptions {
  /**
   * Default: 300000 (five minutes)
   */
  ttlMs?: number;
  enabled?: boolean;
  clock?: Clock;
}

/**
 * Cache statistics. Counters are observational only.
 */
export interface ResolutionCacheStats {
  size: number;
  hits: number;
  misses: number;
  hitRate: number;
  ttlMs: number;
  enabled: boolean;
}

/**
 * ResolutionCache - TTL cache keyed by component type.
 *
 * @remarks
 * Callers must not insert a type that already has a singleton instance;
 * the cache does not know about singletons.
 *
 * @example
 * ```typescript
 * const cache = new ResolutionCache({ ttlMs: 60_000 });
 *
 * cache.put(PathfindingJob, job);
 * cache.tryGet(PathfindingJob); // job, for the next minute
 * ```
 */
export class ResolutionCache {
  private readonly entries = new Map<ServiceIdentifier, CacheEntry>();
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private enabled: boolean;
  private hits = 0;
  private misses = 0;

  constructor(options: ResolutionCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? 300_000;
    this.enabled = options.enabled ?? true;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Get a live cached instance, or `null`.
   */
  tryGet<T>(type: ServiceIdentifier<T>): T | null {
    const entry = this.entries.get(type);

    if (!entry) {
      this.misses++;
      return null;
    }

    if (this.isExpired(entry, this.clock())) {
      this.entries.delete(type);
      this.misses++;
      return null;
    }

    this.hits++;
    return entry.instance as T;
  }

  /**
   * Insert or replace an entry. No-op while disabled.
   */
  put<T>(type: ServiceIdentifier<T>, instance: T): void {
    if (!this.enabled) {
      return;
    }
    this.entries.set(type, { instance, createdAt: this.clock() });
  }

  /**
   * Remove every expired entry.
   *
   * @returns number of entries removed
   */
  invalidateExpired(): number {
    const now = this.clock();
    let removed = 0;

    for (const [type, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(type);
        removed++;
      }
    }

    return removed;
  }

  /**
   * Disabling drops every entry.
   */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled) {
      this.entries.clear();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  has(type: ServiceIdentifier): boolean {
    const entry = this.entries.get(type);
    return entry !== undefined && !this.isExpired(entry, this.clock());
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  getStats(): ResolutionCacheStats {
    const total = this.hits + this.misses;
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
      ttlMs: this.ttlMs,
      enabled: this.enabled,
    };
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return now - entry.createdAt > this.ttlMs;
  }
}
