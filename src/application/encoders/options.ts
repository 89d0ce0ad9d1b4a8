/**
 * Encoder Options
 * Layer: Application
 *
 * Construction-time settings, applied in the order given so a later option
 * overrides an earlier one (`timeFormat('HH:mm'), noTime()` ends with no
 * timestamp). Layouts use date-fns format tokens.
 *
 * A layout is checked when the option is created, not when a line is
 * rendered: date-fns rejects tokens like `YYYY` or a stray unescaped letter
 * with a RangeError, and finding that out on the first log call means every
 * log call fails.
 */
import { RFC3339_LAYOUT } from '@shared/constants';
import { InvalidLayoutError } from '@shared/errors/EncoderError';
import type { EncoderSettings } from '@shared/types';
import { format } from 'date-fns';

const LAYOUT_CHECK_DATE = new Date(Date.UTC(2000, 0, 2, 3, 4, 5));

export interface TextOptionTarget {
  timeFormat: string;
}

export interface TextOption {
  apply(target: TextOptionTarget): void;
}

/** True for '' (no timestamp) and for any layout date-fns can format. */
export function isValidTimeLayout(layout: string): boolean {
  if (layout === '') return true;
  try {
    format(LAYOUT_CHECK_DATE, layout);
    return true;
  } catch {
    return false;
  }
}

export function timeFormat(layout: string): TextOption {
  if (!isValidTimeLayout(layout)) {
    throw new InvalidLayoutError(layout);
  }
  return {
    apply(target) {
      target.timeFormat = layout;
    },
  };
}

/** Omit timestamps from rendered lines. */
export function noTime(): TextOption {
  return timeFormat('');
}

export const DEFAULT_TIME_FORMAT = RFC3339_LAYOUT;

/** Options equivalent to the `encoder` section of the app config. */
export function optionsFromConfig(settings: EncoderSettings): TextOption[] {
  return settings.noTime ? [noTime()] : [timeFormat(settings.timeFormat)];
}
