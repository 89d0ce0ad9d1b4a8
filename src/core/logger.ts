/**
 * Structured Logger (pino)
 * Layer: Core
 *
 * pino emits one JSON object per line, which is what production log shippers
 * want. In development the same records go through this package's own color
 * destination instead, so a developer sees exactly what the encoder produces
 * for real traffic.
 *
 * The exported `Logger` type lets other modules declare "I need a logger"
 * without coupling to pino directly; tests hand in a mock.
 */
import { optionsFromConfig } from '@application/encoders/options';
import { FdSink } from '@infrastructure/sinks/FdSink';
import { createColorDestination } from '@interfaces/pino/colorDestination';
import pino from 'pino';

import { config } from './config';

const destination = config.isDev
  ? createColorDestination({ sink: new FdSink(1), textOptions: optionsFromConfig(config.encoder) })
  : pino.destination(1);

export const logger = pino({ level: config.log.level }, destination);

export type Logger = pino.Logger;
