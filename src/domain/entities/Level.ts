/**
 * Log Level
 * Layer: Domain
 *
 * Severity of an entry, ordered Debug < Info < Warn < Error < Panic < Fatal.
 * The numeric values leave room for hosts with their own scales: any number
 * outside this set is still a valid level, it just has no tag or color and is
 * rendered as its decimal value.
 */
export enum Level {
  Debug = -1,
  Info = 0,
  Warn = 1,
  Error = 2,
  Panic = 3,
  Fatal = 4,
}

/** A known level or an arbitrary numeric one. */
export type LevelValue = Level | number;
