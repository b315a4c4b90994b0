/**
 * Factory for building growable buffers from arbitrary sources.
 * Lets code that works against `GrowableBufferFactory` produce buffers
 * without depending on the class directly.
 */

import type {
  Builder,
  GrowableBufferConfig,
  GrowableBufferFactory,
  Source,
} from '../../types/buffer.ts';
import { GrowableBuffer } from '../core/growable-buffer.ts';

export const growableBufferFactory: GrowableBufferFactory = {
  empty<A>(config?: GrowableBufferConfig): GrowableBuffer<A> {
    return GrowableBuffer.empty<A>(config);
  },

  from<A>(source: Source<A>): GrowableBuffer<A> {
    return GrowableBuffer.from(source);
  },

  of<A>(...elems: A[]): GrowableBuffer<A> {
    return GrowableBuffer.from(elems);
  },

  // The buffer is its own builder: result() returns it as-is.
  newBuilder<A>(): Builder<A, GrowableBuffer<A>> {
    return GrowableBuffer.empty<A>();
  },
};
