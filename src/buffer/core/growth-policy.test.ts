/**
 * Tests for the growth policy and slot primitives.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  MAX_CAPACITY,
  DEFAULT_INITIAL_CAPACITY,
  nextCapacity,
  resolveInitialCapacity,
  allocateStorage,
  ensureCapacity,
  clearRange,
  copyRange,
} from './growth-policy.ts';
import { CapacityExceededError } from './errors.ts';
import { EMPTY_SLOT, type Slot } from '../../types/slot.ts';

function storageOf<A>(elems: A[], capacity: number): Slot<A>[] {
  const storage = allocateStorage<A>(capacity);
  elems.forEach((elem, i) => {
    storage[i] = elem;
  });
  return storage;
}

describe('Growth Policy', () => {
  describe('nextCapacity', () => {
    it('should keep the current capacity when it suffices', () => {
      expect(nextCapacity(16, 10)).toBe(16);
      expect(nextCapacity(16, 16)).toBe(16);
    });

    it('should double until the request fits', () => {
      expect(nextCapacity(16, 17)).toBe(32);
      expect(nextCapacity(16, 100)).toBe(128);
      expect(nextCapacity(3, 7)).toBe(12);
    });

    it('should start a zero capacity at 1', () => {
      expect(nextCapacity(0, 1)).toBe(1);
      expect(nextCapacity(0, 3)).toBe(4);
    });

    it('should clamp to MAX_CAPACITY', () => {
      expect(nextCapacity(2 ** 31, 2 ** 31 + 1)).toBe(MAX_CAPACITY);
      expect(nextCapacity(16, MAX_CAPACITY)).toBe(MAX_CAPACITY);
    });

    it('should throw when the request exceeds MAX_CAPACITY', () => {
      expect(() => nextCapacity(16, MAX_CAPACITY + 1)).toThrow(CapacityExceededError);
    });

    it('should report requested and maximum sizes', () => {
      let caught: unknown;
      try {
        nextCapacity(MAX_CAPACITY, MAX_CAPACITY + 5);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(CapacityExceededError);
      expect(caught).toHaveProperty('name', 'CapacityExceededError');
      expect(caught).toHaveProperty('requested', MAX_CAPACITY + 5);
      expect(caught).toHaveProperty('maxCapacity', MAX_CAPACITY);
    });
  });

  describe('resolveInitialCapacity', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should default to 16', () => {
      expect(DEFAULT_INITIAL_CAPACITY).toBe(16);
      expect(resolveInitialCapacity({})).toBe(16);
    });

    it('should accept a positive integer', () => {
      expect(resolveInitialCapacity({ initialCapacity: 4 })).toBe(4);
    });

    it('should warn and fall back on invalid values', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      expect(resolveInitialCapacity({ initialCapacity: 0 })).toBe(16);
      expect(resolveInitialCapacity({ initialCapacity: 2.5 })).toBe(16);
      expect(resolveInitialCapacity({ initialCapacity: MAX_CAPACITY + 1 })).toBe(16);

      expect(warn).toHaveBeenCalledTimes(3);
      expect(warn).toHaveBeenNthCalledWith(1, 'Invalid initialCapacity: 0, defaulting to 16');
    });
  });

  describe('allocateStorage', () => {
    it('should fill every slot with the empty sentinel', () => {
      expect(allocateStorage<number>(3)).toEqual([EMPTY_SLOT, EMPTY_SLOT, EMPTY_SLOT]);
    });

    it('should allow zero capacity', () => {
      expect(allocateStorage<number>(0)).toEqual([]);
    });
  });

  describe('ensureCapacity', () => {
    it('should return the same block when large enough', () => {
      const storage = storageOf([1, 2], 4);
      expect(ensureCapacity(storage, 2, 4)).toBe(storage);
    });

    it('should grow and copy only the live prefix', () => {
      const storage = storageOf([1, 2, 3, 99], 4);
      const grown = ensureCapacity(storage, 3, 5);

      expect(grown).not.toBe(storage);
      expect(grown.length).toBe(8);
      expect(grown.slice(0, 4)).toEqual([1, 2, 3, EMPTY_SLOT]);
      expect(grown.slice(4)).toEqual([EMPTY_SLOT, EMPTY_SLOT, EMPTY_SLOT, EMPTY_SLOT]);
    });

    it('should leave the block untouched when growth is impossible', () => {
      const storage = storageOf([1, 2], 2);
      expect(() => ensureCapacity(storage, 2, MAX_CAPACITY + 1)).toThrow(CapacityExceededError);
      expect(storage).toEqual([1, 2]);
    });
  });

  describe('clearRange', () => {
    it('should clear the given range', () => {
      const storage = storageOf(['a', 'b', 'c', 'd'], 4);
      clearRange(storage, 1, 3);
      expect(storage).toEqual(['a', EMPTY_SLOT, EMPTY_SLOT, 'd']);
    });

    it('should do nothing for an empty or inverted range', () => {
      const storage = storageOf(['a', 'b'], 2);
      clearRange(storage, 1, 1);
      clearRange(storage, 2, 0);
      expect(storage).toEqual(['a', 'b']);
    });

    it('should not write past the end of the block', () => {
      const storage = storageOf(['a', 'b'], 2);
      clearRange(storage, 1, 10);
      expect(storage).toEqual(['a', EMPTY_SLOT]);
    });
  });

  describe('copyRange', () => {
    it('should copy between blocks', () => {
      const src = storageOf([1, 2, 3], 3);
      const dest = allocateStorage<number>(5);
      copyRange(src, 1, dest, 2, 2);
      expect(dest).toEqual([EMPTY_SLOT, EMPTY_SLOT, 2, 3, EMPTY_SLOT]);
    });

    it('should shift right within a block without clobbering', () => {
      const storage = storageOf([1, 2, 3, 4], 6);
      copyRange(storage, 1, storage, 2, 3);
      expect(storage).toEqual([1, 2, 2, 3, 4, EMPTY_SLOT]);
    });

    it('should shift left within a block without clobbering', () => {
      const storage = storageOf([1, 2, 3, 4, 5], 5);
      copyRange(storage, 2, storage, 0, 3);
      expect(storage).toEqual([3, 4, 5, 4, 5]);
    });

    it('should ignore non-positive counts', () => {
      const storage = storageOf([1, 2], 2);
      copyRange(storage, 0, storage, 1, 0);
      expect(storage).toEqual([1, 2]);
    });
  });
});
