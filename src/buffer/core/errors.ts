/**
 * Errors raised by buffer operations. Both are contract violations by the
 * caller and are thrown before any state changes.
 */

/**
 * Thrown when an index or range falls outside the valid bound.
 */
export class IndexOutOfRangeError extends RangeError {
  /** Offending index (range start for range operations) */
  readonly index: number;
  /** Logical length of the buffer or view at the time of the call */
  readonly length: number;

  constructor(index: number, length: number, message?: string) {
    super(message ?? `Index ${index} out of range for length ${length}`);
    this.name = 'IndexOutOfRangeError';
    this.index = index;
    this.length = length;
  }
}

/**
 * Thrown when storage cannot grow to the requested number of slots.
 */
export class CapacityExceededError extends RangeError {
  readonly requested: number;
  readonly maxCapacity: number;

  constructor(requested: number, maxCapacity: number) {
    super(`Cannot grow storage to ${requested} slots (maximum is ${maxCapacity})`);
    this.name = 'CapacityExceededError';
    this.requested = requested;
    this.maxCapacity = maxCapacity;
  }
}

/**
 * Require an integer `index` with 0 <= index < bound.
 * `bound` is `length` for reads and removals, `length + 1` for insertions.
 */
export function checkIndex(index: number, bound: number, length: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= bound) {
    throw new IndexOutOfRangeError(index, length);
  }
}
