/**
 * Unit Tests — FdSink and StreamSink
 *
 * FdSink must report what fs.writeSync reports (so short writes surface);
 * StreamSink must copy, because the encoder reuses the bytes right after.
 */
import { FdSink } from '@infrastructure/sinks/FdSink';
import { StreamSink } from '@infrastructure/sinks/StreamSink';
import fs from 'fs';
import { PassThrough } from 'stream';

describe('FdSink', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should write to its descriptor and return the kernel count', () => {
    const writeSync = jest.spyOn(fs, 'writeSync').mockReturnValue(3);
    const bytes = Buffer.from('hello');

    const written = new FdSink(2).write(bytes);

    expect(written).toBe(3);
    expect(writeSync).toHaveBeenCalledWith(2, bytes);
  });
});

describe('StreamSink', () => {
  it('should pass a copy of the bytes to the stream and report the full length', () => {
    const stream = new PassThrough();
    const bytes = Buffer.from('line\n');

    const written = new StreamSink(stream).write(bytes);
    bytes.fill(0x78);

    expect(written).toBe(5);
    expect(stream.read()?.toString()).toBe('line\n');
  });

  it('should flag a write that went past the high-water mark', () => {
    const stream = new PassThrough({ highWaterMark: 4 });
    const sink = new StreamSink(stream);

    expect(sink.drained).toBe(true);
    expect(sink.write(Buffer.from('0123456789'))).toBe(10);
    expect(sink.drained).toBe(false);
  });
});
