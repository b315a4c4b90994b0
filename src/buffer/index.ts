/**
 * Buffer exports.
 */

// Core container and view
export { GrowableBuffer } from './core/growable-buffer.ts';
export { BufferView } from './core/buffer-view.ts';

// Errors
export { IndexOutOfRangeError, CapacityExceededError } from './core/errors.ts';

// Growth policy
export {
  MAX_CAPACITY,
  DEFAULT_INITIAL_CAPACITY,
  nextCapacity,
  ensureCapacity,
  clearRange,
} from './core/growth-policy.ts';

// Source capabilities
export { isContiguousSource, knownSizeOf } from './core/sources.ts';

// Factory and diagnostics
export { growableBufferFactory } from './features/factory.ts';
export { getBufferStats } from './features/stats.ts';
