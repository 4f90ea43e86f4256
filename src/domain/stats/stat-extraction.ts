/**
 * Turns an upstream stat line (column name -> value) into the stat map the
 * card works with (stat key -> value). Only keys from the definition table
 * are produced; a missing, null or non-finite column leaves its key out.
 *
 * No async I/O.
 */

import { StatDefinition } from './stat-definitions';

/** Raw upstream columns, e.g. { PTS: 25.7, MIN: 35.3, TS_PCT: 0.63 } */
export type RawStatLine = Readonly<Record<string, number | null | undefined>>;

/** Stat key -> value, restricted to keys in the definition table */
export type StatMap = Readonly<Record<string, number>>;

export const EMPTY_STATS: StatMap = Object.freeze<Record<string, number>>({});

const MINUTES_COLUMN = 'MIN';

function finiteOrUndefined(value: number | null | undefined): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Read one stat from a raw line. Per-36 stats need positive minutes.
 */
export function extractStatValue(
  definition: StatDefinition,
  line: RawStatLine
): number | undefined {
  const value = finiteOrUndefined(line[definition.source.column]);
  if (value === undefined) return undefined;

  if (definition.source.kind === 'per36') {
    const minutes = finiteOrUndefined(line[MINUTES_COLUMN]);
    if (minutes === undefined || minutes <= 0) return undefined;
    return (value / minutes) * 36;
  }

  return value;
}

export function extractStats(
  line: RawStatLine,
  definitions: readonly StatDefinition[]
): StatMap {
  const stats: Record<string, number> = {};
  for (const definition of definitions) {
    const value = extractStatValue(definition, line);
    if (value !== undefined) {
      stats[definition.key] = value;
    }
  }
  return Object.freeze(stats);
}
