/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * Every setting the encoder and its logger read comes through here instead of
 * process.env directly. dotenv loads .env; a Zod schema validates and coerces
 * it. loadConfig() throws a ConfigError so tests can exercise bad input; the
 * module-level `config` fails fast and exits, since a process logging with a
 * half-valid layout is worse than one that does not start.
 */
import 'dotenv/config';

import { isValidTimeLayout } from '@application/encoders/options';
import { DEFAULT_POOL_MAX_IDLE, RFC3339_LAYOUT } from '@shared/constants';
import { ConfigError } from '@shared/errors/EncoderError';
import { z } from 'zod/v4';

/** z.coerce.boolean() treats "false" as true; env flags need the string form. */
const envFlag = z
  .enum(['true', 'false', '1', '0', ''])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  /** date-fns layout for the timestamp column. */
  LOG_TIME_FORMAT: z
    .string()
    .refine(isValidTimeLayout, { message: 'not a date-fns format layout (did you mean yyyy/dd?)' })
    .default(RFC3339_LAYOUT),
  /** Drop the timestamp column entirely (overrides LOG_TIME_FORMAT). */
  LOG_NO_TIME: envFlag,

  /** Idle buffers the pool keeps around between entries. */
  ENCODER_POOL_MAX_IDLE: z.coerce.number().int().min(0).max(4096).default(DEFAULT_POOL_MAX_IDLE),
});

export function loadConfig(source: NodeJS.ProcessEnv) {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(z.treeifyError(parsed.error));
  }

  const env = parsed.data;

  return {
    nodeEnv: env.NODE_ENV,
    isDev: env.NODE_ENV === 'development',
    isProd: env.NODE_ENV === 'production',

    log: {
      level: env.LOG_LEVEL,
    },

    encoder: {
      timeFormat: env.LOG_TIME_FORMAT,
      noTime: env.LOG_NO_TIME,
    },

    pool: {
      maxIdle: env.ENCODER_POOL_MAX_IDLE,
    },
  } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;

function loadOrExit(): AppConfig {
  try {
    return loadConfig(process.env);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    // eslint-disable-next-line no-console
    console.error('Invalid environment configuration:', err.issues);
    process.exit(1);
  }
}

export const config = loadOrExit();
