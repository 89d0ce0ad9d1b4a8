/**
 * Buffer Pool — Process-wide Free List
 * Layer: Infrastructure
 *
 * Every log entry needs two buffers (the encoder's field buffer and the
 * assembly buffer writeEntry() builds the line in). Allocating 4 KiB twice
 * per log call adds up, so buffers are borrowed from here and handed back
 * when the entry is done.
 *
 * Contract:
 *   - acquire() always returns a buffer with length 0.
 *   - release() gives ownership back; the caller must not touch the buffer
 *     again. Double release or use-after-release is NOT detected.
 *   - A buffer that is never released is simply garbage collected.
 *
 * JavaScript runs one thread per isolate, so acquire/release never interleave
 * and need no locking. Worker threads load their own copy of this module and
 * therefore their own pool.
 *
 * `bufferPool` is the singleton the rest of the code uses by default; tests
 * call reset() between cases to start from a known state.
 */
import { ByteBuffer } from '@infrastructure/buffer/ByteBuffer';
import { DEFAULT_POOL_MAX_IDLE, INITIAL_BUFFER_SIZE } from '@shared/constants';
import type { PoolStats } from '@shared/types';

export interface BufferPoolOptions {
  maxIdle?: number;
  initialCapacity?: number;
}

export class BufferPool {
  private readonly free: ByteBuffer[] = [];
  private readonly initialCapacity: number;
  private maxIdle: number;
  private counters = { allocated: 0, reused: 0, released: 0 };

  constructor(options: BufferPoolOptions = {}) {
    this.maxIdle = options.maxIdle ?? DEFAULT_POOL_MAX_IDLE;
    this.initialCapacity = options.initialCapacity ?? INITIAL_BUFFER_SIZE;
  }

  acquire(): ByteBuffer {
    const recycled = this.free.pop();
    if (recycled) {
      this.counters.reused++;
      recycled.truncate();
      return recycled;
    }
    this.counters.allocated++;
    return new ByteBuffer(this.initialCapacity);
  }

  release(buffer: ByteBuffer): void {
    this.counters.released++;
    if (this.free.length < this.maxIdle) {
      this.free.push(buffer);
    }
  }

  /** Changes the idle cap, dropping surplus idle buffers immediately. */
  setMaxIdle(maxIdle: number): void {
    this.maxIdle = maxIdle;
    if (this.free.length > maxIdle) this.free.length = maxIdle;
  }

  stats(): PoolStats {
    return { ...this.counters, idle: this.free.length };
  }

  reset(): void {
    this.free.length = 0;
    this.counters = { allocated: 0, reused: 0, released: 0 };
  }
}

export const bufferPool = new BufferPool();
