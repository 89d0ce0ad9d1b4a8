/**
 * Shared Test Fixtures
 * Layer: Test Helpers
 *
 * FIXED_TIME renders as 2026-10-19T08:30:00Z under the default layout (the
 * setup file pins TZ to UTC). `paint` builds the escape-wrapped key the
 * encoder emits for a given palette color.
 */
import { ANSI_RESET } from '@shared/constants';

export const FIXED_TIME = new Date(Date.UTC(2026, 9, 19, 8, 30, 0));

export const FIXED_TIME_RFC3339 = '2026-10-19T08:30:00Z';

export const TAGS = {
  debug: `\x1b[32;1m[DEBG]${ANSI_RESET}`,
  info: `\x1b[34;1m[INFO]${ANSI_RESET}`,
  warn: `\x1b[33;1m[WARN]${ANSI_RESET}`,
  error: `\x1b[31;1m[ERRO]${ANSI_RESET}`,
  panic: `\x1b[31;1m[PANC]${ANSI_RESET}`,
  fatal: `\x1b[31;1m[FATA]${ANSI_RESET}`,
} as const;

export function paint(key: string, color: number): string {
  return `\x1b[3${color};1m${key}${ANSI_RESET}`;
}

export function pad(message: string, width = 25): string {
  return message + ' '.repeat(Math.max(0, width - [...message].length));
}
