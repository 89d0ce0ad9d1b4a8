/**
 * Number Formatting
 * Layer: Shared
 *
 * Integers wrap to 64 bits the way a fixed-width field would. Floats use the
 * shortest digit string that parses back to the same double, but always in
 * positional notation: `1e21` is written out as `1000000000000000000000`.
 *
 * Why not just String(value)?
 *   String() switches to `1e+21` past 1e21 and below 1e-6, and a reader
 *   scanning a column of latencies should not have to spot an exponent. I
 *   keep String()'s digits (they are already the shortest round-trip ones)
 *   and only move the decimal point.
 */
import type { IntegerLike } from '@shared/types';

const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

function toBigInt(value: IntegerLike): bigint {
  return typeof value === 'bigint' ? value : BigInt(Math.trunc(value));
}

export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return '+Inf';
  if (value === -Infinity) return '-Inf';
  if (Object.is(value, -0)) return '-0';

  const shortest = String(value);
  const match = EXPONENT_FORM.exec(shortest);
  if (!match) return shortest;

  const [, sign, lead, fraction = '', exponent] = match;
  const digits = lead + fraction;
  const point = 1 + Number(exponent);

  if (point >= digits.length) {
    return sign + digits + '0'.repeat(point - digits.length);
  }
  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

export function formatInt(value: IntegerLike): string {
  if (typeof value === 'number' && !Number.isFinite(value)) return formatFloat(value);
  return BigInt.asIntN(64, toBigInt(value)).toString(10);
}

export function formatUint(value: IntegerLike): string {
  if (typeof value === 'number' && !Number.isFinite(value)) return formatFloat(value);
  return BigInt.asUintN(64, toBigInt(value)).toString(10);
}

export function formatHex(value: IntegerLike): string {
  if (typeof value === 'number' && !Number.isFinite(value)) return formatFloat(value);
  return `0x${BigInt.asUintN(64, toBigInt(value)).toString(16)}`;
}
