/**
 * Public contracts for growable buffers: element sources, indexed views,
 * builders, configuration and diagnostics.
 */

import type { Slot } from './slot.ts';
import type { GrowableBuffer } from '../buffer/core/growable-buffer.ts';

// =============================================================================
// Element Sources
// =============================================================================

/**
 * Anything that produces elements in order. May be one-shot (a generator)
 * or restartable (an array, a buffer).
 */
export type Source<A> = Iterable<A>;

/**
 * A source that reports its size up front.
 * `knownSize` is -1 when the size is not known without iterating.
 */
export interface SizedSource<A> extends Iterable<A> {
  readonly knownSize: number;
}

/**
 * A source backed by contiguous slot storage.
 * Buffers check for this capability to bulk-copy instead of iterating.
 */
export interface ContiguousSource<A> extends Iterable<A> {
  /** Number of live elements, starting at slot 0 */
  readonly length: number;

  /**
   * Copy the live range into `dest` starting at `destPos`.
   * `dest` must already have room for `length` slots from `destPos`.
   */
  copyTo(dest: Slot<A>[], destPos: number): void;

  /**
   * Whether this source reads from the given storage block.
   */
  sharesStorage(storage: readonly Slot<A>[]): boolean;
}

// =============================================================================
// Views and Builders
// =============================================================================

/**
 * Read-only positional access over a fixed number of elements.
 */
export interface IndexedView<A> extends Iterable<A> {
  readonly length: number;

  /**
   * Element at position `n`.
   * @throws IndexOutOfRangeError unless 0 <= n < length
   */
  apply(n: number): A;

  /**
   * A fresh forward iterator from position 0 on every call.
   */
  iterator(): IterableIterator<A>;

  toArray(): A[];
}

/**
 * Incremental construction of a collection `To` from elements of type `A`.
 */
export interface Builder<A, To> {
  addOne(elem: A): this;
  addAll(source: Source<A>): this;
  result(): To;
  clear(): void;
}

/**
 * Builds growable buffers from sources of any kind.
 */
export interface GrowableBufferFactory {
  empty<A>(config?: GrowableBufferConfig): GrowableBuffer<A>;
  from<A>(source: Source<A>): GrowableBuffer<A>;
  of<A>(...elems: A[]): GrowableBuffer<A>;
  newBuilder<A>(): Builder<A, GrowableBuffer<A>>;
}

// =============================================================================
// Configuration and Diagnostics
// =============================================================================

/**
 * Options for an empty buffer.
 */
export interface GrowableBufferConfig {
  /** Slots allocated up front (default: 16) */
  initialCapacity?: number;
}

/**
 * Snapshot of a buffer's storage usage.
 */
export interface BufferStats {
  /** Live elements */
  length: number;
  /** Allocated slots */
  capacity: number;
  /** Allocated slots holding no live element */
  unusedSlots: number;
  /** length / capacity (0-1), 0 for a zero-capacity buffer */
  utilization: number;
}
