/**
 * growable-seq - Growable, randomly indexable sequences over contiguous storage
 *
 * Main entry point exporting the buffer, its view, the growth policy and
 * the source contracts.
 */

// =============================================================================
// Types
// =============================================================================

export type {
  Source,
  SizedSource,
  ContiguousSource,
  IndexedView,
  Builder,
  GrowableBufferFactory,
  GrowableBufferConfig,
  BufferStats,
  EmptySlot,
  Slot,
} from './types/index.ts';

export { EMPTY_SLOT, isLiveSlot } from './types/index.ts';

// =============================================================================
// Buffer
// =============================================================================

export { GrowableBuffer, BufferView, growableBufferFactory } from './buffer/index.ts';

// =============================================================================
// Errors
// =============================================================================

export { IndexOutOfRangeError, CapacityExceededError } from './buffer/index.ts';

// =============================================================================
// Growth Policy
// =============================================================================

export {
  MAX_CAPACITY,
  DEFAULT_INITIAL_CAPACITY,
  nextCapacity,
  ensureCapacity,
  clearRange,
} from './buffer/index.ts';

// =============================================================================
// Sources and Diagnostics
// =============================================================================

export { isContiguousSource, knownSizeOf, getBufferStats } from './buffer/index.ts';
