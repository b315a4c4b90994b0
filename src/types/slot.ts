/**
 * Slot representation for contiguous element storage.
 *
 * A storage block is a plain array of slots. Slots inside the logical
 * length hold live elements; every other slot holds `EMPTY_SLOT` so the
 * block never keeps a reference to an element that was removed.
 */

/**
 * Cleared-slot sentinel. A symbol rather than `undefined`, so buffers of
 * `undefined`-able elements still tell a live slot from a cleared one.
 */
export const EMPTY_SLOT: unique symbol = Symbol('growable-seq.empty-slot');

export type EmptySlot = typeof EMPTY_SLOT;

/**
 * A single storage cell: either a live element or the cleared sentinel.
 */
export type Slot<A> = A | EmptySlot;

/**
 * Type guard for slots holding a live element.
 */
export function isLiveSlot<A>(slot: Slot<A>): slot is A {
  return slot !== EMPTY_SLOT;
}

/**
 * Read the element at `index`. Callers bound-check first; an empty slot
 * here means the storage and its logical length disagree.
 */
export function readSlot<A>(storage: readonly Slot<A>[], index: number): A {
  const slot = storage[index];
  if (!isLiveSlot(slot)) {
    throw new Error(`Slot ${index} is empty`);
  }
  return slot;
}
