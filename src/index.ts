/**
 * Public entry point.
 *
 * A host framework needs three things: an encoder per entry
 * (newColorEncoder or EncoderFactory), a sink, and the Level enum. pino users
 * can skip all of that and pass createColorDestination() to pino().
 */
import 'reflect-metadata';

export { ColorEncoder, newColorEncoder } from '@application/encoders/ColorEncoder';
export { noTime, optionsFromConfig, timeFormat } from '@application/encoders/options';
export type { TextOption } from '@application/encoders/options';
export { keyColor } from '@application/encoders/palette';
export { EncoderFactory } from '@application/factories/EncoderFactory';
export { Level } from '@domain/entities/Level';
export type { LevelValue } from '@domain/entities/Level';
export type { IEncoder } from '@domain/interfaces/IEncoder';
export type { IFieldEncoder } from '@domain/interfaces/IFieldEncoder';
export type { ILogMarshaler } from '@domain/interfaces/ILogMarshaler';
export type { ISink } from '@domain/interfaces/ISink';
export { BufferPool, bufferPool } from '@infrastructure/buffer/BufferPool';
export { FdSink } from '@infrastructure/sinks/FdSink';
export { StreamSink } from '@infrastructure/sinks/StreamSink';
export { createColorDestination } from '@interfaces/pino/colorDestination';
export type { ColorDestinationOptions } from '@interfaces/pino/colorDestination';
export {
  EncoderError,
  InvalidSinkError,
  ShortWriteError,
} from '@shared/errors/EncoderError';
