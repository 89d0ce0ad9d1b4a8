/**
 * Key & Level Palette
 * Layer: Application
 *
 * I pick a key's color from its bytes alone: add up the UTF-8 bytes, take the
 * sum mod 7, add 1, and that indexes ANSI foregrounds 31..37. `user` is then
 * the same color on every line, in every process, with no lookup table to
 * keep warm.
 *
 * Why not hash the key properly?
 *   A byte sum is all the spread seven colors need, and anyone reading a log
 *   can reproduce it by hand when a color looks wrong.
 *
 * Level tags are a fixed six-entry table. A level outside it is printed as
 * its bare number with no color, so a host's custom level still shows up.
 */
import { Level } from '@domain/entities/Level';
import type { LevelValue } from '@domain/entities/Level';
import { ANSI_RESET, KEY_PALETTE_SIZE } from '@shared/constants';

export type KeyColor = 1 | 2 | 3 | 4 | 5 | 6 | 7;

const KEY_COLORS: readonly KeyColor[] = [1, 2, 3, 4, 5, 6, 7];

const LEVEL_TAGS: ReadonlyMap<number, string> = new Map([
  [Level.Debug, '\x1b[32;1m[DEBG]'],
  [Level.Info, '\x1b[34;1m[INFO]'],
  [Level.Warn, '\x1b[33;1m[WARN]'],
  [Level.Error, '\x1b[31;1m[ERRO]'],
  [Level.Panic, '\x1b[31;1m[PANC]'],
  [Level.Fatal, '\x1b[31;1m[FATA]'],
]);

/** (sum of the key's UTF-8 bytes) mod 7, plus 1. */
export function keyColor(key: string): KeyColor {
  let sum = 0;
  for (const byte of Buffer.from(key, 'utf8')) {
    sum += byte;
  }
  return KEY_COLORS[sum % KEY_PALETTE_SIZE];
}

export function colorizeKey(key: string): string {
  return `\x1b[3${keyColor(key)};1m${key}${ANSI_RESET}`;
}

/** Bracketed, colored tag for known levels; bare decimal for anything else. */
export function levelTag(level: LevelValue): string {
  const tag = LEVEL_TAGS.get(level);
  return tag === undefined ? String(Math.trunc(level)) : tag + ANSI_RESET;
}
