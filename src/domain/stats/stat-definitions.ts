/**
 * Stat Definition Domain Types
 *
 * A stat definition says where a value comes from, how it is labelled and
 * formatted on the card, and which direction counts as "good" when ranking.
 * Definitions are plain data so the whole table can be frozen once at startup.
 *
 * No async I/O.
 */

export type StatCategory = 'basic' | 'advanced';

/** 'lower' marks stats where a smaller value ranks higher (turnovers, defensive rating). */
export type StatDirection = 'higher' | 'lower';

export type StatFormat = 'integer' | 'decimal' | 'percent' | 'signed';

/**
 * Upstream column the value is read from. `per36` scales a per-game column
 * to a per-36-minute rate using the MIN column.
 */
export type StatSourceSpec =
  | { kind: 'column'; column: string }
  | { kind: 'per36'; column: string };

export interface StatDefinition {
  readonly key: string;
  readonly label: string;
  readonly category: StatCategory;
  readonly format: StatFormat;
  readonly direction: StatDirection;
  readonly source: StatSourceSpec;
}

export const DEFAULT_STAT_DEFINITIONS: readonly StatDefinition[] = [
  // Basic (per game)
  { key: 'gamesPlayed', label: 'Games Played', category: 'basic', format: 'integer', direction: 'higher', source: { kind: 'column', column: 'GP' } },
  { key: 'points', label: 'Points', category: 'basic', format: 'decimal', direction: 'higher', source: { kind: 'column', column: 'PTS' } },
  { key: 'rebounds', label: 'Rebounds', category: 'basic', format: 'decimal', direction: 'higher', source: { kind: 'column', column: 'REB' } },
  { key: 'assists', label: 'Assists', category: 'basic', format: 'decimal', direction: 'higher', source: { kind: 'column', column: 'AST' } },
  { key: 'steals', label: 'Steals', category: 'basic', format: 'decimal', direction: 'higher', source: { kind: 'column', column: 'STL' } },
  { key: 'blocks', label: 'Blocks', category: 'basic', format: 'decimal', direction: 'higher', source: { kind: 'column', column: 'BLK' } },
  { key: 'turnovers', label: 'Turnovers', category: 'basic', format: 'decimal', direction: 'lower', source: { kind: 'column', column: 'TOV' } },
  { key: 'fieldGoalPct', label: 'FG%', category: 'basic', format: 'percent', direction: 'higher', source: { kind: 'column', column: 'FG_PCT' } },
  { key: 'threePointPct', label: '3P%', category: 'basic', format: 'percent', direction: 'higher', source: { kind: 'column', column: 'FG3_PCT' } },
  { key: 'freeThrowPct', label: 'FT%', category: 'basic', format: 'percent', direction: 'higher', source: { kind: 'column', column: 'FT_PCT' } },

  // Advanced
  { key: 'pointsPer36', label: 'PTS / 36', category: 'advanced', format: 'decimal', direction: 'higher', source: { kind: 'per36', column: 'PTS' } },
  { key: 'reboundsPer36', label: 'REB / 36', category: 'advanced', format: 'decimal', direction: 'higher', source: { kind: 'per36', column: 'REB' } },
  { key: 'assistsPer36', label: 'AST / 36', category: 'advanced', format: 'decimal', direction: 'higher', source: { kind: 'per36', column: 'AST' } },
  { key: 'trueShootingPct', label: 'TS%', category: 'advanced', format: 'percent', direction: 'higher', source: { kind: 'column', column: 'TS_PCT' } },
  { key: 'usagePct', label: 'USG%', category: 'advanced', format: 'percent', direction: 'higher', source: { kind: 'column', column: 'USG_PCT' } },
  { key: 'netRating', label: 'Net Rating', category: 'advanced', format: 'signed', direction: 'higher', source: { kind: 'column', column: 'NET_RATING' } },
  { key: 'defensiveRating', label: 'Def Rating', category: 'advanced', format: 'decimal', direction: 'lower', source: { kind: 'column', column: 'DEF_RATING' } },
  { key: 'pie', label: 'PIE', category: 'advanced', format: 'percent', direction: 'higher', source: { kind: 'column', column: 'PIE' } },
];
