/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The one place the pieces are wired together: the process-wide buffer pool
 * (sized from config), the encoder settings, the logger, and the factory that
 * combines them. `reflect-metadata` must load before any decorated class so
 * tsyringe can read constructor parameter metadata.
 */
import 'reflect-metadata';
import { container } from 'tsyringe';

import { config } from './config';
import { logger } from './logger';
import { TOKENS } from './types';

import { EncoderFactory } from '@application/factories/EncoderFactory';
import { bufferPool } from '@infrastructure/buffer/BufferPool';

bufferPool.setMaxIdle(config.pool.maxIdle);

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.BufferPool, { useValue: bufferPool });
container.register(TOKENS.EncoderSettings, { useValue: config.encoder });
container.registerSingleton(TOKENS.EncoderFactory, EncoderFactory);

export { container };
