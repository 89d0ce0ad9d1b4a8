/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * PoolStats is what BufferPool.stats() reports; tests read it to prove the
 * renderer hands its assembly buffer back on every path. EncoderSettings is
 * the slice of configuration the encoder factory consumes.
 */
export interface PoolStats {
  /** Buffers created because the free list was empty. */
  allocated: number;
  /** Acquisitions served from the free list. */
  reused: number;
  /** Buffers handed back, including ones dropped past the idle cap. */
  released: number;
  /** Buffers currently waiting on the free list. */
  idle: number;
}

export interface EncoderSettings {
  timeFormat: string;
  noTime: boolean;
}

/** Integral values accepted by the integer field kinds. */
export type IntegerLike = number | bigint;
