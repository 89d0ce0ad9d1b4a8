/**
 * Encoder Factory
 * Layer: Application
 * Pattern: Factory
 *
 * Hands out encoders that share the process pool and the configured time
 * layout. Per-call options are applied after the configured ones, so
 * `create(noTime())` drops the timestamp regardless of configuration.
 */
import { ColorEncoder } from '@application/encoders/ColorEncoder';
import { optionsFromConfig } from '@application/encoders/options';
import type { TextOption } from '@application/encoders/options';
import { TOKENS } from '@core/types';
import type { Logger } from '@core/logger';
import type { BufferPool } from '@infrastructure/buffer/BufferPool';
import type { EncoderSettings } from '@shared/types';
import { inject, injectable } from 'tsyringe';

@injectable()
export class EncoderFactory {
  private readonly baseOptions: readonly TextOption[];

  constructor(
    @inject(TOKENS.BufferPool) private readonly pool: BufferPool,
    @inject(TOKENS.EncoderSettings) settings: EncoderSettings,
    @inject(TOKENS.Logger) logger: Logger,
  ) {
    this.baseOptions = optionsFromConfig(settings);
    logger.debug(
      { timeFormat: settings.noTime ? null : settings.timeFormat },
      'Color encoder factory configured',
    );
  }

  create(...extra: TextOption[]): ColorEncoder {
    return new ColorEncoder([...this.baseOptions, ...extra], this.pool);
  }
}
