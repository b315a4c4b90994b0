/**
 * Capability queries over element sources.
 */

import type { ContiguousSource, Source } from '../../types/buffer.ts';

/**
 * Check whether a source can be bulk-copied slot by slot.
 */
export function isContiguousSource<A>(source: Source<A>): source is ContiguousSource<A> {
  if (typeof source !== 'object' || source === null) {
    return false;
  }
  return (
    'copyTo' in source &&
    typeof source.copyTo === 'function' &&
    'sharesStorage' in source &&
    typeof source.sharesStorage === 'function' &&
    'length' in source &&
    typeof source.length === 'number'
  );
}

/**
 * Number of elements a source will produce, or -1 if that is only known
 * by iterating it. A `knownSize` hint that is not a non-negative integer
 * counts as unknown.
 */
export function knownSizeOf<A>(source: Source<A>): number {
  if (typeof source !== 'object' || source === null) {
    return -1;
  }
  if (Array.isArray(source)) {
    return source.length;
  }
  if (source instanceof Set || source instanceof Map) {
    return source.size;
  }
  if (isContiguousSource(source)) {
    return source.length;
  }
  if ('knownSize' in source && typeof source.knownSize === 'number') {
    const hint = source.knownSize;
    return Number.isInteger(hint) && hint >= 0 ? hint : -1;
  }
  return -1;
}
