import { z } from 'zod';
import { RawStatLine } from '../../domain/stats/stat-extraction';

// ========== Envelope: every stats endpoint returns named result sets ==========
export const resultSetSchema = z.object({
  name: z.string(),
  headers: z.array(z.string()),
  rowSet: z.array(z.array(z.unknown())),
});

export type NbaResultSet = z.infer<typeof resultSetSchema>;

export const nbaStatsResponseSchema = z.object({
  resultSets: z.array(resultSetSchema),
});

// ========== commonallplayers ==========
export const playerIndexRowSchema = z.object({
  PERSON_ID: z.number().int(),
  DISPLAY_FIRST_LAST: z.string(),
  // Sent as strings ("2003")
  FROM_YEAR: z.coerce.number().int(),
  TO_YEAR: z.coerce.number().int(),
});

export type PlayerIndexRow = z.infer<typeof playerIndexRowSchema>;

// ========== commonplayerinfo ==========
export const playerInfoRowSchema = z.object({
  PERSON_ID: z.number().int(),
  DISPLAY_FIRST_LAST: z.string(),
  TEAM_ABBREVIATION: z.string().nullable(),
  TEAM_CITY: z.string().nullable(),
  TEAM_NAME: z.string().nullable(),
  POSITION: z.string().nullable(),
});

export type PlayerInfoRow = z.infer<typeof playerInfoRowSchema>;

// ========== leaguedashplayerstats ==========
export const dashRowSchema = z
  .object({
    PLAYER_ID: z.number().int(),
  })
  .passthrough();

export type DashRow = z.infer<typeof dashRowSchema>;

/**
 * Zip a result set's headers onto each row.
 */
export function rowsToRecords(set: NbaResultSet): Record<string, unknown>[] {
  return set.rowSet.map((row) => {
    const record: Record<string, unknown> = {};
    set.headers.forEach((header, i) => {
      record[header] = row[i];
    });
    return record;
  });
}

/**
 * Keep only numeric columns; text columns (names, team codes) are not stats.
 */
export function toRawStatLine(row: Record<string, unknown>): RawStatLine {
  const line: Record<string, number | null> = {};
  for (const [column, value] of Object.entries(row)) {
    if (typeof value === 'number') line[column] = value;
    else if (value === null) line[column] = null;
  }
  return line;
}
