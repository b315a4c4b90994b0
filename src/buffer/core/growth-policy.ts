/**
 * Growth policy for contiguous slot storage.
 *
 * Stateless helpers that decide when a storage block is reallocated and to
 * what size, plus the copy and clear primitives the buffer is built on.
 * Capacity grows by doubling and never shrinks.
 */

import { EMPTY_SLOT, type Slot } from '../../types/slot.ts';
import type { GrowableBufferConfig } from '../../types/buffer.ts';
import { CapacityExceededError } from './errors.ts';

// =============================================================================
// Constants
// =============================================================================

/** Largest length a JS array can take. */
export const MAX_CAPACITY = 2 ** 32 - 1;

export const DEFAULT_INITIAL_CAPACITY = 16;

// =============================================================================
// Capacity
// =============================================================================

/**
 * Capacity needed to hold `minRequired` slots, starting from `current`.
 *
 * Returns `current` when it already suffices. Otherwise doubles until the
 * request fits (a zero capacity starts at 1) and clamps to MAX_CAPACITY.
 *
 * @throws CapacityExceededError when `minRequired` exceeds MAX_CAPACITY
 */
export function nextCapacity(current: number, minRequired: number): number {
  if (minRequired <= current) {
    return current;
  }
  if (minRequired > MAX_CAPACITY) {
    throw new CapacityExceededError(minRequired, MAX_CAPACITY);
  }

  // Doubles are exact well past 2^32, so this cannot overflow before the clamp.
  let capacity = current > 0 ? current * 2 : 1;
  while (capacity < minRequired) {
    capacity *= 2;
  }
  return Math.min(capacity, MAX_CAPACITY);
}

/**
 * Initial capacity for an empty buffer.
 * Invalid values fall back to DEFAULT_INITIAL_CAPACITY with a warning.
 */
export function resolveInitialCapacity(config: GrowableBufferConfig): number {
  const requested = config.initialCapacity;
  if (requested === undefined) {
    return DEFAULT_INITIAL_CAPACITY;
  }
  if (!Number.isInteger(requested) || requested < 1 || requested > MAX_CAPACITY) {
    console.warn(`Invalid initialCapacity: ${requested}, defaulting to ${DEFAULT_INITIAL_CAPACITY}`);
    return DEFAULT_INITIAL_CAPACITY;
  }
  return requested;
}

// =============================================================================
// Storage Blocks
// =============================================================================

/**
 * Allocate a block of `capacity` cleared slots.
 */
export function allocateStorage<A>(capacity: number): Slot<A>[] {
  return new Array<Slot<A>>(capacity).fill(EMPTY_SLOT);
}

/**
 * Return a block with at least `minRequired` slots.
 *
 * The same block is returned when it is already large enough. Otherwise a
 * new block is allocated and the first `currentLength` slots are copied
 * into it at the same indices.
 *
 * @throws CapacityExceededError when the block cannot grow that far
 */
export function ensureCapacity<A>(
  storage: Slot<A>[],
  currentLength: number,
  minRequired: number
): Slot<A>[] {
  if (minRequired <= storage.length) {
    return storage;
  }
  const grown = allocateStorage<A>(nextCapacity(storage.length, minRequired));
  copyRange(storage, 0, grown, 0, currentLength);
  return grown;
}

/**
 * Clear slots in [from, to). Bounds are clamped to the block.
 */
export function clearRange<A>(storage: Slot<A>[], from: number, to: number): void {
  const start = Math.max(from, 0);
  const end = Math.min(to, storage.length);
  if (start >= end) {
    return;
  }
  storage.fill(EMPTY_SLOT, start, end);
}

/**
 * Copy `count` slots from `src[srcPos..]` to `dest[destPos..]`.
 *
 * Safe for overlapping ranges within one block (memmove semantics).
 * The destination must already have room for the copied range.
 */
export function copyRange<A>(
  src: readonly Slot<A>[],
  srcPos: number,
  dest: Slot<A>[],
  destPos: number,
  count: number
): void {
  if (count <= 0) {
    return;
  }
  if (src === dest) {
    dest.copyWithin(destPos, srcPos, srcPos + count);
    return;
  }
  for (let i = 0; i < count; i++) {
    dest[destPos + i] = src[srcPos + i];
  }
}
