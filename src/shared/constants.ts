/** Starting capacity of a freshly allocated pooled buffer. */
export const INITIAL_BUFFER_SIZE = 4096;

/** Idle buffers kept by the pool before further releases are dropped. */
export const DEFAULT_POOL_MAX_IDLE = 64;

/** Minimum width the message column is padded to. */
export const MESSAGE_PAD_WIDTH = 25;

/** RFC 3339 in date-fns layout tokens (`2026-10-19T08:30:00Z`). */
export const RFC3339_LAYOUT = "yyyy-MM-dd'T'HH:mm:ssXXX";

export const ANSI_RESET = '\x1b[0m';

/** Number of foreground colors keys are spread over (ANSI 31..37). */
export const KEY_PALETTE_SIZE = 7;

/** Keys pino adds to every record that carry nothing for a terminal reader. */
export const DEFAULT_IGNORED_KEYS = ['pid', 'hostname'] as const;

/** pino's numeric levels. */
export const PINO_LEVELS = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
} as const;
