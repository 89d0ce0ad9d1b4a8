/**
 * Color Encoder — Field Accumulation + Line Rendering
 * Layer: Application
 *
 * One instance per log entry. The host reports fields through the add*()
 * methods; each lands in a pooled byte buffer as
 *
 *     ESC[3<c>;1m key ESC[0m = value
 *
 * separated by single spaces, where <c> is the key's palette color. Nested
 * objects are framed as `key={a=1 b=2}`. writeEntry() then builds the final
 *
 *     [LEVL] <time> <message padded to 25> <fields>\n
 *
 * in a second pooled buffer, writes it in one sink call and checks the
 * reported byte count.
 *
 * `firstNested` is a single flag, not a stack: it is set when a frame opens
 * and consumed by the first key written after it, which is all recursive
 * nesting needs since every frame's first key comes right after its `{`.
 *
 * Instances are not safe to share between concurrent log calls; take a
 * clone() instead.
 */
import { DEFAULT_TIME_FORMAT, timeFormat } from '@application/encoders/options';
import type { TextOption, TextOptionTarget } from '@application/encoders/options';
import { colorizeKey, levelTag } from '@application/encoders/palette';
import type { LevelValue } from '@domain/entities/Level';
import type { IEncoder } from '@domain/interfaces/IEncoder';
import type { ILogMarshaler } from '@domain/interfaces/ILogMarshaler';
import type { ISink } from '@domain/interfaces/ISink';
import { bufferPool } from '@infrastructure/buffer/BufferPool';
import type { BufferPool } from '@infrastructure/buffer/BufferPool';
import type { ByteBuffer } from '@infrastructure/buffer/ByteBuffer';
import { MESSAGE_PAD_WIDTH } from '@shared/constants';
import { InvalidSinkError, ShortWriteError } from '@shared/errors/EncoderError';
import type { IntegerLike } from '@shared/types';
import { formatFloat, formatHex, formatInt, formatUint } from '@shared/utils/formatNumber';
import { format, isValid } from 'date-fns';
import { inspect } from 'util';

const SPACE = 0x20;
const EQUALS = 0x3d;
const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;
const NEWLINE = 0x0a;

/** Stands in for the timestamp when writeEntry() is handed an invalid Date. */
const INVALID_TIME = 'Invalid Date';

export class ColorEncoder implements IEncoder {
  private readonly buffer: ByteBuffer;
  private readonly timeFormat: string;
  private firstNested = false;

  constructor(
    options: readonly TextOption[] = [],
    private readonly pool: BufferPool = bufferPool,
  ) {
    this.buffer = pool.acquire();

    const settings: TextOptionTarget = { timeFormat: DEFAULT_TIME_FORMAT };
    for (const option of options) {
      option.apply(settings);
    }
    this.timeFormat = settings.timeFormat;
  }

  addString(key: string, value: string): void {
    this.addKey(key);
    this.buffer.appendString(value);
  }

  addBool(key: string, value: boolean): void {
    this.addKey(key);
    this.buffer.appendString(value ? 'true' : 'false');
  }

  addInt(key: string, value: IntegerLike): void {
    this.addKey(key);
    this.buffer.appendString(formatInt(value));
  }

  addUint(key: string, value: IntegerLike): void {
    this.addKey(key);
    this.buffer.appendString(formatUint(value));
  }

  addUintptr(key: string, value: IntegerLike): void {
    this.addKey(key);
    this.buffer.appendString(formatHex(value));
  }

  addFloat(key: string, value: number): void {
    this.addKey(key);
    this.buffer.appendString(formatFloat(value));
  }

  addMarshaler(key: string, value: ILogMarshaler): void {
    this.addKey(key);
    this.firstNested = true;
    this.buffer.appendByte(OPEN_BRACE);
    try {
      value.marshalLog(this);
    } finally {
      this.buffer.appendByte(CLOSE_BRACE);
      this.firstNested = false;
    }
  }

  addObject(key: string, value: unknown): void {
    this.addString(
      key,
      typeof value === 'string' ? value : inspect(value, { breakLength: Infinity, compact: true }),
    );
  }

  clone(): ColorEncoder {
    const copy = new ColorEncoder([timeFormat(this.timeFormat)], this.pool);
    copy.buffer.appendBytes(this.buffer.bytes());
    copy.firstNested = this.firstNested;
    return copy;
  }

  writeEntry(sink: ISink | null | undefined, message: string, level: LevelValue, time: Date): void {
    if (sink == null) {
      throw new InvalidSinkError();
    }

    const line = this.pool.acquire();
    try {
      line.appendString(levelTag(level));

      if (this.timeFormat !== '') {
        line.appendByte(SPACE);
        line.appendString(isValid(time) ? format(time, this.timeFormat) : INVALID_TIME);
      }

      if (message !== '') {
        line.appendByte(SPACE);
        line.appendString(padMessage(message));
      }

      if (this.buffer.length > 0) {
        line.appendByte(SPACE);
        line.appendBytes(this.buffer.bytes());
      }
      line.appendByte(NEWLINE);

      const expected = line.length;
      const written = sink.write(line.bytes());
      if (written !== expected) {
        throw new ShortWriteError(written, expected);
      }
    } finally {
      this.pool.release(line);
    }
  }

  free(): void {
    this.pool.release(this.buffer);
  }

  /** The accumulated fields as text, escapes included. */
  fields(): string {
    return this.buffer.toString();
  }

  private addKey(key: string): void {
    if (this.buffer.length > 0 && !this.firstNested) {
      this.buffer.appendByte(SPACE);
    } else {
      this.firstNested = false;
    }
    this.buffer.appendString(colorizeKey(key));
    this.buffer.appendByte(EQUALS);
  }
}

/** Left-justify to MESSAGE_PAD_WIDTH code points; never truncates. */
function padMessage(message: string): string {
  const width = [...message].length;
  return width >= MESSAGE_PAD_WIDTH ? message : message + ' '.repeat(MESSAGE_PAD_WIDTH - width);
}

export function newColorEncoder(...options: TextOption[]): ColorEncoder {
  return new ColorEncoder(options);
}
