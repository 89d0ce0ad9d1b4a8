/**
 * Encoder Error Hierarchy
 * Layer: Shared
 *
 * Every failure the encoder reports to its caller carries a stable `code` so
 * a host framework can branch on it without matching message text:
 *
 *   - INVALID_SINK:   writeEntry() was handed no sink at all.
 *   - SHORT_WRITE:    the sink accepted the call but reported fewer bytes than
 *                     were produced. A truncated line looks complete to a log
 *                     viewer, so this is a failure in its own right.
 *   - INVALID_CONFIG: the environment did not pass schema validation.
 *   - INVALID_LAYOUT: timeFormat() was given a layout date-fns cannot format.
 *
 * Errors thrown by a nested object's marshalLog() or by the sink itself are
 * NOT wrapped in this hierarchy; they reach the caller as the same object.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses whatever the compilation target.
 */
export type EncoderErrorCode = 'INVALID_SINK' | 'SHORT_WRITE' | 'INVALID_CONFIG' | 'INVALID_LAYOUT';

export class EncoderError extends Error {
  public readonly code: EncoderErrorCode;

  constructor(message: string, code: EncoderErrorCode) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidSinkError extends EncoderError {
  constructor() {
    super('cannot write log entry: no sink was provided', 'INVALID_SINK');
  }
}

export class ShortWriteError extends EncoderError {
  public readonly written: number;
  public readonly expected: number;

  constructor(written: number, expected: number) {
    super(`incomplete write: only wrote ${written} of ${expected} bytes`, 'SHORT_WRITE');
    this.written = written;
    this.expected = expected;
  }
}

export class ConfigError extends EncoderError {
  public readonly issues: unknown;

  constructor(issues: unknown) {
    super('Invalid environment configuration', 'INVALID_CONFIG');
    this.issues = issues;
  }
}

export class InvalidLayoutError extends EncoderError {
  public readonly layout: string;

  constructor(layout: string) {
    super(`invalid time layout: ${JSON.stringify(layout)}`, 'INVALID_LAYOUT');
    this.layout = layout;
  }
}
