/**
 * @fileoverview ResolutionCache Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { ResolutionCache } from '../../../src/infrastructure/di';

class PathfindingJob {}
class BuildJob {}

describe('ResolutionCache', () => {
  let now: number;
  let cache: ResolutionCache;

  beforeEach(() => {
    now = 0;
    cache = new ResolutionCache({ ttlMs: 1000, clock: () => now });
  });

  describe('tryGet / put', () => {
    it('should return a stored instance within the TTL', () => {
      const job = new PathfindingJob();
      cache.put(PathfindingJob, job);
      now = 1000;

      expect(cache.tryGet(PathfindingJob)).toBe(job);
    });

    it('should miss and evict once the TTL has passed', () => {
      cache.put(PathfindingJob, new PathfindingJob());
      now = 1001;

      expect(cache.tryGet(PathfindingJob)).toBeNull();
      expect(cache.size).toBe(0);
    });

    it('should miss for unknown types', () => {
      expect(cache.tryGet(BuildJob)).toBeNull();
    });

    it('should replace an entry and restart its TTL', () => {
      cache.put(PathfindingJob, new PathfindingJob());
      now = 800;
      const fresh = new PathfindingJob();
      cache.put(PathfindingJob, fresh);
      now = 1500;

      expect(cache.tryGet(PathfindingJob)).toBe(fresh);
    });

    it('should default the TTL to five minutes', () => {
      const defaults = new ResolutionCache({ clock: () => now });
      defaults.put(PathfindingJob, new PathfindingJob());

      now = 300_000;
      expect(defaults.tryGet(PathfindingJob)).not.toBeNull();
      now = 300_001;
      expect(defaults.tryGet(PathfindingJob)).toBeNull();
    });
  });

  describe('invalidateExpired', () => {
    it('should remove only expired entries', () => {
      cache.put(PathfindingJob, new PathfindingJob());
      now = 600;
      cache.put(BuildJob, new BuildJob());
      now = 1200;

      expect(cache.invalidateExpired()).toBe(1);
      expect(cache.has(PathfindingJob)).toBe(false);
      expect(cache.has(BuildJob)).toBe(true);
    });
  });

  describe('setEnabled', () => {
    it('should drop entries and ignore puts while disabled', () => {
      cache.put(PathfindingJob, new PathfindingJob());

      cache.setEnabled(false);
      cache.put(BuildJob, new BuildJob());

      expect(cache.size).toBe(0);
      expect(cache.isEnabled()).toBe(false);
    });

    it('should accept puts again once re-enabled', () => {
      cache.setEnabled(false);
      cache.setEnabled(true);
      cache.put(BuildJob, new BuildJob());

      expect(cache.size).toBe(1);
    });
  });

  describe('getStats', () => {
    it('should count hits and misses', () => {
      cache.put(PathfindingJob, new PathfindingJob());
      cache.tryGet(PathfindingJob);
      cache.tryGet(PathfindingJob);
      cache.tryGet(BuildJob);

      expect(cache.getStats()).toEqual({
        size: 1,
        hits: 2,
        misses: 1,
        hitRate: 2 / 3,
        ttlMs: 1000,
        enabled: true,
      });
    });

    it('should reset counters on clear', () => {
      cache.put(PathfindingJob, new PathfindingJob());
      cache.tryGet(PathfindingJob);

      cache.clear();

      expect(cache.getStats()).toMatchObject({ size: 0, hits: 0, misses: 0, hitRate: 0 });
    });
  });
});
