/**
 * pino Destination — Render pino Records as Colored Lines
 * Layer: Interfaces (host framework adapter)
 *
 * pino serialises every record to one JSON line and hands it to a
 * DestinationStream. This adapter is such a stream: it parses the line,
 * replays its properties onto a fresh encoder and lets writeEntry() put the
 * colored result on the sink. Same idea as pino-pretty, but synchronous and
 * in-process.
 *
 * Mapping:
 *   level    10/20 → Debug, 30 → Info, 40 → Warn, 50 → Error, 60 → Fatal,
 *            other numbers pass through and render as bare decimals;
 *            string labels (custom level formatter) map by name.
 *   time     epoch ms or ISO string → timestamp column.
 *   msg      message column.
 *   ignore   dropped keys, `pid` and `hostname` unless overridden.
 *   the rest fields, in the order pino wrote them; plain objects nest.
 *
 * Lines that are not JSON objects go to the sink untouched.
 */
import { ColorEncoder } from '@application/encoders/ColorEncoder';
import type { TextOption } from '@application/encoders/options';
import { Level } from '@domain/entities/Level';
import type { LevelValue } from '@domain/entities/Level';
import type { IEncoder } from '@domain/interfaces/IEncoder';
import type { IFieldEncoder } from '@domain/interfaces/IFieldEncoder';
import type { ILogMarshaler } from '@domain/interfaces/ILogMarshaler';
import type { ISink } from '@domain/interfaces/ISink';
import { DEFAULT_IGNORED_KEYS, PINO_LEVELS } from '@shared/constants';
import type { DestinationStream } from 'pino';

export interface EncoderSource {
  create(): IEncoder;
}

export interface ColorDestinationOptions {
  sink: ISink;
  /** Where encoders come from; defaults to `new ColorEncoder(textOptions)`. */
  encoders?: EncoderSource;
  textOptions?: readonly TextOption[];
  ignore?: readonly string[];
  onError?: (err: unknown) => void;
}

const RESERVED_KEYS = new Set(['level', 'time', 'msg']);

const LEVEL_LABELS: ReadonlyMap<string, Level> = new Map([
  ['trace', Level.Debug],
  ['debug', Level.Debug],
  ['info', Level.Info],
  ['warn', Level.Warn],
  ['error', Level.Error],
  ['fatal', Level.Fatal],
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function toLevel(raw: unknown): LevelValue {
  if (typeof raw === 'string') return LEVEL_LABELS.get(raw) ?? Level.Info;
  if (typeof raw !== 'number') return Level.Info;

  switch (raw) {
    case PINO_LEVELS.TRACE:
    case PINO_LEVELS.DEBUG:
      return Level.Debug;
    case PINO_LEVELS.INFO:
      return Level.Info;
    case PINO_LEVELS.WARN:
      return Level.Warn;
    case PINO_LEVELS.ERROR:
      return Level.Error;
    case PINO_LEVELS.FATAL:
      return Level.Fatal;
    default:
      return raw;
  }
}

function toDate(raw: unknown): Date {
  if (typeof raw === 'number' || typeof raw === 'string') {
    const parsed = new Date(raw);
    if (!Number.isNaN(parsed.getTime())) return parsed;
  }
  return new Date();
}

export function addField(encoder: IFieldEncoder, key: string, value: unknown): void {
  switch (typeof value) {
    case 'string':
      encoder.addString(key, value);
      return;
    case 'boolean':
      encoder.addBool(key, value);
      return;
    case 'bigint':
      encoder.addInt(key, value);
      return;
    case 'number':
      if (Number.isSafeInteger(value)) encoder.addInt(key, value);
      else encoder.addFloat(key, value);
      return;
    default:
      if (isRecord(value)) encoder.addMarshaler(key, new RecordMarshaler(value));
      else encoder.addObject(key, value);
  }
}

/** Replays a parsed JSON object as a nested frame. */
export class RecordMarshaler implements ILogMarshaler {
  constructor(private readonly record: Record<string, unknown>) {}

  marshalLog(encoder: IFieldEncoder): void {
    for (const [key, value] of Object.entries(this.record)) {
      addField(encoder, key, value);
    }
  }
}

export function createColorDestination(options: ColorDestinationOptions): DestinationStream {
  const { sink } = options;
  const textOptions = options.textOptions ?? [];
  const encoders: EncoderSource = options.encoders ?? {
    create: () => new ColorEncoder(textOptions),
  };
  const skip = new Set([...RESERVED_KEYS, ...(options.ignore ?? DEFAULT_IGNORED_KEYS)]);
  const onError =
    options.onError ??
    ((err: unknown) => {
      throw err;
    });

  function render(record: Record<string, unknown>): void {
    const encoder = encoders.create();
    try {
      for (const [key, value] of Object.entries(record)) {
        if (!skip.has(key)) addField(encoder, key, value);
      }
      const message = typeof record.msg === 'string' ? record.msg : '';
      encoder.writeEntry(sink, message, toLevel(record.level), toDate(record.time));
    } finally {
      encoder.free();
    }
  }

  return {
    write(line: string): void {
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        parsed = undefined;
      }

      try {
        if (isRecord(parsed)) render(parsed);
        else sink.write(Buffer.from(line, 'utf8'));
      } catch (err) {
        onError(err);
      }
    },
  };
}
