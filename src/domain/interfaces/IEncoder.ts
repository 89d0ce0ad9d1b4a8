/**
 * Encoder Interface
 * Layer: Domain
 *
 * What a host framework holds per log entry: an IFieldEncoder it can
 * accumulate context into, plus the operations that copy, render and give
 * back the instance.
 */
import type { LevelValue } from '@domain/entities/Level';
import type { IFieldEncoder } from '@domain/interfaces/IFieldEncoder';
import type { ISink } from '@domain/interfaces/ISink';

export interface IEncoder extends IFieldEncoder {
  /** Independent copy; shares no buffer memory with the original. */
  clone(): IEncoder;
  /**
   * Render one line and write it to `sink`. Does not reset this encoder.
   * An invalid `time` renders as `Invalid Date` rather than failing the line.
   */
  writeEntry(sink: ISink | null | undefined, message: string, level: LevelValue, time: Date): void;
  /** Return the field buffer to the pool. The encoder must not be used afterwards. */
  free(): void;
}
