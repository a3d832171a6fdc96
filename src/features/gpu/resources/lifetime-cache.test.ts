import { describe, it, expect, beforeEach } from 'vitest';
import { LifetimeCache, compareEvictionEntries } from './lifetime-cache';
import { ReferenceUnderflowError, UnknownResourceError } from './errors';

describe('LifetimeCache', () => {
  let now: number;
  let cache: LifetimeCache;

  beforeEach(() => {
    now = 1_000;
    cache = new LifetimeCache({ destroyPerUpkeep: 3, now: () => now });
  });

  describe('reference counting', () => {
    it('should count N activations minus M deactivations', () => {
      cache.create(1, 'short');
      cache.activate(1);
      cache.activate(1);
      cache.deactivate(1);

      expect(cache.referenceCount(1)).toBe(2);
      expect(cache.isActive(1)).toBe(true);
    });

    it('should treat re-creating a known handle as an activation', () => {
      cache.create(1, 'short');
      cache.create(1, 'long');

      expect(cache.referenceCount(1)).toBe(2);
    });

    it('should schedule exactly one eviction at now + delay when reaching zero', () => {
      cache.create(1, 'short');
      cache.activate(1);
      cache.deactivate(1);
      expect(cache.pendingCount).toBe(0);

      now = 2_500;
      cache.deactivate(1);

      expect(cache.isActive(1)).toBe(false);
      expect(cache.pendingCount).toBe(1);
      expect(cache.deletionTime(1)).toBe(5_500);
    });

    it('should throw when activating or deactivating an unregistered handle', () => {
      expect(() => cache.activate(42)).toThrow(UnknownResourceError);
      expect(() => cache.deactivate(42)).toThrow(UnknownResourceError);
    });

    it('should never let the count go negative', () => {
      cache.create(1, 'none');
      cache.deactivate(1);

      expect(() => cache.deactivate(1)).toThrow(ReferenceUnderflowError);
      expect(cache.referenceCount(1)).toBe(0);
    });

    it('should start a new generation when cleared', () => {
      cache.create(1, 'short');
      const before = cache.generation;

      cache.clear();

      expect(cache.generation).toBe(before + 1);
      expect(cache.has(1)).toBe(false);
    });
  });

  describe('upkeep', () => {
    it('should return handles whose deletion time has elapsed', () => {
      cache.create(1, 'short');
      cache.deactivate(1);

      expect(cache.upkeep(3_999)).toEqual([]);
      expect(cache.upkeep(4_000)).toEqual([1]);
      expect(cache.has(1)).toBe(false);
    });

    it('should evict lifetime none at the next upkeep', () => {
      cache.create(1, 'none');
      cache.deactivate(1);

      expect(cache.upkeep()).toEqual([1]);
    });

    it('should never evict forever resources', () => {
      cache.create(1, 'forever');
      cache.deactivate(1);

      expect(cache.upkeep(Number.MAX_SAFE_INTEGER)).toEqual([]);
      expect(cache.has(1)).toBe(true);
      expect(cache.deletionTime(1)).toBeNull();
    });

    it('should not queue forever resources across repeated release and reacquire', () => {
      cache.create(1, 'forever');
      cache.deactivate(1);

      for (let round = 0; round < 10_000; round++) {
        cache.activate(1);
        cache.deactivate(1);
        expect(cache.upkeep(1e12)).toEqual([]);
      }

      expect(cache.pendingCount).toBe(0);
      expect(cache.has(1)).toBe(true);
      expect(cache.referenceCount(1)).toBe(0);
    });

    it('should not destroy a handle reactivated after it was queued', () => {
      cache.create(1, 'short');
      cache.deactivate(1);
      cache.activate(1);

      expect(cache.upkeep(10_000)).toEqual([]);
      expect(cache.has(1)).toBe(true);
      expect(cache.referenceCount(1)).toBe(1);
    });

    it('should honour the latest deletion time after a release, reacquire, release cycle', () => {
      cache.create(1, 'short');
      cache.deactivate(1);
      now = 3_000;
      cache.activate(1);
      cache.deactivate(1);

      // First entry expires at 4000 but is stale
      expect(cache.upkeep(4_000)).toEqual([]);
      expect(cache.upkeep(6_000)).toEqual([1]);
    });

    it('should not destroy more than the quota per call', () => {
      for (let handle = 1; handle <= 7; handle++) {
        cache.create(handle, 'none');
        cache.deactivate(handle);
      }

      expect(cache.upkeep()).toEqual([1, 2, 3]);
      expect(cache.pendingCount).toBe(4);
      expect(cache.upkeep()).toEqual([4, 5, 6]);
      expect(cache.upkeep()).toEqual([7]);
      expect(cache.upkeep()).toEqual([]);
    });

    it('should keep a buffered handle that is reactivated before draining', () => {
      for (let handle = 1; handle <= 4; handle++) {
        cache.create(handle, 'none');
        cache.deactivate(handle);
      }

      expect(cache.upkeep()).toEqual([1, 2, 3]);
      cache.activate(4);

      expect(cache.upkeep()).toEqual([]);
      expect(cache.has(4)).toBe(true);
    });

    it('should evict in deletion time order across lifetime classes', () => {
      cache.create(1, 'medium');
      cache.create(2, 'short');
      cache.create(3, 'none');
      cache.deactivate(1);
      cache.deactivate(2);
      cache.deactivate(3);

      expect(cache.upkeep(1_000_000)).toEqual([3, 2, 1]);
    });
  });

  describe('compareEvictionEntries', () => {
    it('should sort entries without a deletion time last', () => {
      const forever = { handle: 1, deletionTime: null, sequence: 0 };
      const soon = { handle: 2, deletionTime: 5, sequence: 1 };
      const sooner = { handle: 3, deletionTime: 2, sequence: 2 };

      expect(compareEvictionEntries(forever, soon)).toBe(1);
      expect(compareEvictionEntries(soon, forever)).toBe(-1);
      expect(compareEvictionEntries(sooner, soon)).toBeLessThan(0);
    });

    it('should break ties by release order', () => {
      const first = { handle: 9, deletionTime: 5, sequence: 0 };
      const second = { handle: 1, deletionTime: 5, sequence: 1 };

      expect(compareEvictionEntries(first, second)).toBeLessThan(0);
    });
  });

  it('should reject an invalid quota', () => {
    expect(() => new LifetimeCache({ destroyPerUpkeep: 0 })).toThrow(RangeError);
  });
});
