/**
 * Stream Sink
 * Layer: Infrastructure
 *
 * Adapts a Node Writable to ISink. Streams queue chunks and write them later,
 * so the line is copied out of the pooled buffer first. A stream cannot
 * report a partial write, so the full length is returned once the stream has
 * taken the chunk.
 *
 * Backpressure is NOT honoured: the `false` that write() returns past the
 * high-water mark is ignored and the stream keeps buffering in memory. ISink
 * is synchronous, so there is no way to wait for 'drain' here. `drained`
 * tells a caller that cares whether the last write went over the mark; use
 * FdSink when log volume can outrun the consumer.
 */
import type { ISink } from '@domain/interfaces/ISink';
import type { Writable } from 'stream';

export class StreamSink implements ISink {
  /** False once the stream has buffered past its high-water mark. */
  drained = true;

  constructor(private readonly stream: Writable) {}

  write(bytes: Uint8Array): number {
    this.drained = this.stream.write(Buffer.from(bytes));
    return bytes.length;
  }
}
