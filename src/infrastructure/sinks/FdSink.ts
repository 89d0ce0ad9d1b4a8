/**
 * File Descriptor Sink
 * Layer: Infrastructure
 *
 * Writes synchronously with fs.writeSync, so the count it reports is the
 * count the kernel actually accepted. Use `new FdSink(1)` for stdout and
 * `new FdSink(2)` for stderr.
 */
import type { ISink } from '@domain/interfaces/ISink';
import fs from 'fs';

export class FdSink implements ISink {
  constructor(private readonly fd: number) {}

  write(bytes: Uint8Array): number {
    return fs.writeSync(this.fd, bytes);
  }
}
