/**
 * Growable Byte Buffer
 * Layer: Infrastructure
 *
 * An append-only byte array over a Node Buffer. Capacity doubles whenever an
 * append would overflow it and is kept across truncate(), which is what
 * makes pooling worthwhile: a recycled buffer that has already grown to fit
 * a typical line never reallocates again.
 */
import { INITIAL_BUFFER_SIZE } from '@shared/constants';

export class ByteBuffer {
  private data: Buffer;
  private used = 0;

  constructor(initialCapacity = INITIAL_BUFFER_SIZE) {
    this.data = Buffer.allocUnsafe(Math.max(1, initialCapacity));
  }

  get length(): number {
    return this.used;
  }

  get capacity(): number {
    return this.data.length;
  }

  appendString(value: string): void {
    if (value.length === 0) return;
    this.reserve(Buffer.byteLength(value, 'utf8'));
    this.used += this.data.write(value, this.used, 'utf8');
  }

  appendByte(byte: number): void {
    this.reserve(1);
    this.data[this.used++] = byte;
  }

  appendBytes(bytes: Uint8Array): void {
    this.reserve(bytes.length);
    this.data.set(bytes, this.used);
    this.used += bytes.length;
  }

  truncate(): void {
    this.used = 0;
  }

  /** View of the written region. Invalidated by the next append or release. */
  bytes(): Buffer {
    return this.data.subarray(0, this.used);
  }

  toString(): string {
    return this.data.toString('utf8', 0, this.used);
  }

  private reserve(extra: number): void {
    const needed = this.used + extra;
    if (needed <= this.data.length) return;

    let size = this.data.length * 2;
    while (size < needed) size *= 2;

    const grown = Buffer.allocUnsafe(size);
    this.data.copy(grown, 0, 0, this.used);
    this.data = grown;
  }
}
