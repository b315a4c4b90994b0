/**
 * Type exports for growable buffers.
 */

export type {
  Source,
  SizedSource,
  ContiguousSource,
  IndexedView,
  Builder,
  GrowableBufferFactory,
  GrowableBufferConfig,
  BufferStats,
} from './buffer.ts';

export type { EmptySlot, Slot } from './slot.ts';
export { EMPTY_SLOT, isLiveSlot, readSlot } from './slot.ts';
