/**
 * Point-in-time read window over a buffer's storage.
 *
 * A view captures the storage block and the logical length when it is
 * created and never copies. It does not see later appends, but it does
 * alias the block: writes the buffer makes in place (update, insert,
 * remove, clear) without reallocating are visible through the view.
 * Do not mutate a buffer while a view or iterator over it is in use.
 */

import type { ContiguousSource, IndexedView } from '../../types/buffer.ts';
import { readSlot, type Slot } from '../../types/slot.ts';
import { checkIndex } from './errors.ts';
import { copyRange } from './growth-policy.ts';

export class BufferView<A> implements IndexedView<A>, ContiguousSource<A> {
  private readonly storage: readonly Slot<A>[];
  readonly length: number;

  constructor(storage: readonly Slot<A>[], length: number) {
    this.storage = storage;
    this.length = length;
  }

  apply(n: number): A {
    checkIndex(n, this.length, this.length);
    return readSlot(this.storage, n);
  }

  *iterator(): IterableIterator<A> {
    for (let i = 0; i < this.length; i++) {
      yield readSlot(this.storage, i);
    }
  }

  [Symbol.iterator](): IterableIterator<A> {
    return this.iterator();
  }

  toArray(): A[] {
    return Array.from(this.iterator());
  }

  copyTo(dest: Slot<A>[], destPos: number): void {
    copyRange(this.storage, 0, dest, destPos, this.length);
  }

  sharesStorage(storage: readonly Slot<A>[]): boolean {
    return this.storage === storage;
  }
}
