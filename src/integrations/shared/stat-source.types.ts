/**
 * Source-agnostic DTOs produced by every stat source.
 * Keys of `stats` are stat definition keys, never upstream column names.
 */

import { StatMap } from '../../domain/stats/stat-extraction';

/** One player's season, as drawn on the card */
export interface PlayerRecord {
  readonly playerId: number;
  readonly name: string;
  /** Team abbreviation, e.g. "LAL". "FA" when unsigned. */
  readonly team: string;
  /** Full team name, e.g. "Los Angeles Lakers". Empty when unsigned. */
  readonly teamName: string;
  readonly position: string;
  /** Season label, e.g. "2023-24" */
  readonly season: string;
  readonly stats: StatMap;
}

/** Every player's stats for one season: the reference population for percentiles */
export interface LeagueSample {
  readonly season: string;
  readonly players: readonly StatMap[];
}
