/**
 * Growable, randomly indexable sequence backed by one contiguous block.
 *
 * Slots in [0, length) hold live elements; slots beyond hold EMPTY_SLOT.
 * The block grows by doubling (see growth-policy.ts) and is never shrunk;
 * removals only lower `length` and clear the vacated slots.
 *
 * Appends are amortized O(1), indexed reads and writes O(1), and inserts
 * and removals O(n) in the number of shifted elements. Sources that expose
 * contiguous storage (other buffers and their views) are copied as one
 * block instead of element by element.
 */

import type {
  Builder,
  ContiguousSource,
  GrowableBufferConfig,
  IndexedView,
  Source,
} from '../../types/buffer.ts';
import { readSlot, type Slot } from '../../types/slot.ts';
import { BufferView } from './buffer-view.ts';
import { IndexOutOfRangeError, checkIndex } from './errors.ts';
import {
  allocateStorage,
  clearRange,
  copyRange,
  ensureCapacity,
  resolveInitialCapacity,
} from './growth-policy.ts';
import { isContiguousSource, knownSizeOf } from './sources.ts';

export class GrowableBuffer<A>
  implements IndexedView<A>, ContiguousSource<A>, Builder<A, GrowableBuffer<A>>
{
  /** Backing storage (capacity = storage.length) */
  private storage: Slot<A>[];
  /** Number of live elements */
  private end: number;

  private constructor(storage: Slot<A>[], length: number) {
    this.storage = storage;
    this.end = length;
  }

  // ---------------------------------------------------------------------------
  // Construction
  // ---------------------------------------------------------------------------

  /**
   * Create an empty buffer (16 slots unless configured otherwise).
   */
  static empty<A>(config: GrowableBufferConfig = {}): GrowableBuffer<A> {
    return new GrowableBuffer<A>(allocateStorage<A>(resolveInitialCapacity(config)), 0);
  }

  /**
   * Create a buffer holding the elements of `source` in order.
   *
   * A source of known size is copied into storage of exactly that size.
   * Any other source is appended to an empty buffer.
   */
  static from<A>(source: Source<A>): GrowableBuffer<A> {
    const size = knownSizeOf(source);
    if (size < 0) {
      return GrowableBuffer.empty<A>().addAll(source);
    }

    const storage = allocateStorage<A>(size);
    if (isContiguousSource(source)) {
      source.copyTo(storage, 0);
      return new GrowableBuffer<A>(storage, size);
    }

    // The hint only sizes storage; the length is whatever the source yields.
    return new GrowableBuffer<A>(storage, 0).addAll(source);
  }

  static of<A>(...elems: A[]): GrowableBuffer<A> {
    return GrowableBuffer.from(elems);
  }

  // ---------------------------------------------------------------------------
  // Size
  // ---------------------------------------------------------------------------

  get length(): number {
    return this.end;
  }

  get knownSize(): number {
    return this.end;
  }

  get capacity(): number {
    return this.storage.length;
  }

  get isEmpty(): boolean {
    return this.end === 0;
  }

  // ---------------------------------------------------------------------------
  // Indexed access
  // ---------------------------------------------------------------------------

  apply(n: number): A {
    checkIndex(n, this.end, this.end);
    return readSlot(this.storage, n);
  }

  update(n: number, elem: A): void {
    checkIndex(n, this.end, this.end);
    this.storage[n] = elem;
  }

  // ---------------------------------------------------------------------------
  // Appending
  // ---------------------------------------------------------------------------

  append(elem: A): void {
    this.reserve(this.end + 1);
    this.storage[this.end] = elem;
    this.end += 1;
  }

  /**
   * Append every element of `source`.
   * Contiguous sources are copied as one block; a sized source reserves
   * its room once before the element-by-element appends. If the source
   * throws, the elements it already produced are removed again.
   */
  appendAll(source: Source<A>): void {
    if (isContiguousSource(source)) {
      const count = source.length;
      this.reserve(this.end + count);
      source.copyTo(this.storage, this.end);
      this.end += count;
      return;
    }

    const size = knownSizeOf(source);
    if (size > 0) {
      this.reserve(this.end + size);
    }
    this.appendOrRollBack(source);
  }

  // ---------------------------------------------------------------------------
  // Inserting
  // ---------------------------------------------------------------------------

  insert(idx: number, elem: A): void {
    checkIndex(idx, this.end + 1, this.end);
    this.reserve(this.end + 1);
    copyRange(this.storage, idx, this.storage, idx + 1, this.end - idx);
    this.storage[idx] = elem;
    this.end += 1;
  }

  /**
   * Insert the elements of `source` before position `idx`.
   *
   * Sources of unknown size, and sources reading this buffer's own
   * storage, are copied into a temporary buffer first. Other sources are
   * staged past the live range, so the number of elements inserted is the
   * number the source yields and a throwing source leaves no trace.
   */
  insertAll(idx: number, source: Source<A>): void {
    checkIndex(idx, this.end + 1, this.end);

    if (isContiguousSource(source) && source.sharesStorage(this.storage)) {
      this.insertAll(idx, GrowableBuffer.from(source));
      return;
    }
    const size = knownSizeOf(source);
    if (size < 0) {
      this.insertAll(idx, GrowableBuffer.from(source));
      return;
    }

    this.reserve(this.end + size);

    if (isContiguousSource(source)) {
      copyRange(this.storage, idx, this.storage, idx + size, this.end - idx);
      source.copyTo(this.storage, idx);
      this.end += size;
      return;
    }

    // Stage past the live range first: the source may yield more or fewer
    // elements than its hint, or throw, before anything live has moved.
    const start = this.end;
    this.appendOrRollBack(source);
    const count = this.end - start;
    const staged = this.storage.slice(start, this.end);
    copyRange(this.storage, idx, this.storage, idx + count, start - idx);
    copyRange(staged, 0, this.storage, idx, count);
  }

  // ---------------------------------------------------------------------------
  // Removing
  // ---------------------------------------------------------------------------

  /**
   * Remove and return the element at `idx`.
   */
  remove(idx: number): A {
    checkIndex(idx, this.end, this.end);
    const removed = readSlot(this.storage, idx);
    copyRange(this.storage, idx + 1, this.storage, idx, this.end - (idx + 1));
    this.reduceToSize(this.end - 1);
    return removed;
  }

  /**
   * Remove `n` elements starting at `from`. No-op when `n <= 0`.
   */
  removeRange(from: number, n: number): void {
    if (n <= 0) {
      return;
    }
    if (!Number.isInteger(from) || !Number.isInteger(n) || from < 0 || from + n > this.end) {
      throw new IndexOutOfRangeError(
        from,
        this.end,
        `Range [${from}, ${from + n}) out of range for length ${this.end}`
      );
    }
    copyRange(this.storage, from + n, this.storage, from, this.end - (from + n));
    this.reduceToSize(this.end - n);
  }

  /**
   * Remove every element. Capacity is kept; all live slots are cleared.
   */
  clear(): void {
    this.reduceToSize(0);
  }

  // ---------------------------------------------------------------------------
  // Reading in bulk
  // ---------------------------------------------------------------------------

  view(): BufferView<A> {
    return new BufferView(this.storage, this.end);
  }

  iterator(): IterableIterator<A> {
    return this.view().iterator();
  }

  [Symbol.iterator](): IterableIterator<A> {
    return this.iterator();
  }

  toArray(): A[] {
    return this.view().toArray();
  }

  copyTo(dest: Slot<A>[], destPos: number): void {
    copyRange(this.storage, 0, dest, destPos, this.end);
  }

  sharesStorage(storage: readonly Slot<A>[]): boolean {
    return this.storage === storage;
  }

  // ---------------------------------------------------------------------------
  // Builder
  // ---------------------------------------------------------------------------

  addOne(elem: A): this {
    this.append(elem);
    return this;
  }

  addAll(source: Source<A>): this {
    this.appendAll(source);
    return this;
  }

  result(): this {
    return this;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /** Append each element; on a throwing source, drop what was appended and rethrow. */
  private appendOrRollBack(source: Source<A>): void {
    const start = this.end;
    try {
      for (const elem of source) {
        this.append(elem);
      }
    } catch (error) {
      this.reduceToSize(start);
      throw error;
    }
  }

  private reserve(minRequired: number): void {
    this.storage = ensureCapacity(this.storage, this.end, minRequired);
  }

  /** Lower the length to `n`, clearing the dropped slots. */
  private reduceToSize(n: number): void {
    clearRange(this.storage, n, this.end);
    this.end = n;
  }
}
