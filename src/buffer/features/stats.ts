import type { BufferStats } from '../../types/buffer.ts';
import type { GrowableBuffer } from '../core/growable-buffer.ts';

/**
 * Get statistics about storage usage.
 * Useful for spotting buffers that grew far past their current length.
 */
export function getBufferStats<A>(buffer: GrowableBuffer<A>): BufferStats {
  const { length, capacity } = buffer;
  return {
    length,
    capacity,
    unusedSlots: capacity - length,
    utilization: capacity > 0 ? length / capacity : 0,
  };
}
