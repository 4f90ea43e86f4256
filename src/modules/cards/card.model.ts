import { logger } from '../../config/logger.config';
import { CardConfig, getStatDefinition } from '../../domain/card/card-config';
import { formatStatValue } from '../../domain/card/format';
import { PercentileRank, UNRANKED } from '../../domain/stats/percentile';
import { StatCategory } from '../../domain/stats/stat-definitions';
import { PlayerRecord } from '../../integrations/shared/stat-source.types';
import { MissingStatError, RenderError } from '../../utils/exceptions';

export interface PercentileResult {
  statKey: string;
  /** null when the stat is missing for this player and season */
  value: number | null;
  percentile: PercentileRank;
}

export interface StatRow extends PercentileResult {
  label: string;
  /** Formatted value, or "N/A" */
  display: string;
}

/**
 * Everything the renderer draws. Output depends on nothing else.
 */
export interface CardModel {
  player: PlayerRecord;
  basic: readonly StatRow[];
  advanced: readonly StatRow[];
  /** As-of date printed in the footer (yyyy-MM-dd), or null for no date */
  asOf: string | null;
  attribution: string;
}

export interface StatRanker {
  rank(statKey: string, value: number, season: string): PercentileRank;
}

export function requireStat(record: PlayerRecord, statKey: string): number {
  const value = record.stats[statKey];
  if (value === undefined) {
    throw new MissingStatError(statKey, record.name);
  }
  return value;
}

/**
 * Rank every configured stat, in table order. A missing stat becomes an
 * unranked row with a null value instead of failing the card.
 */
export function buildPercentileResults(
  record: PlayerRecord,
  config: CardConfig,
  ranker: StatRanker
): PercentileResult[] {
  const results: PercentileResult[] = [];

  for (const definition of config.statDefinitions) {
    try {
      const value = requireStat(record, definition.key);
      results.push({
        statKey: definition.key,
        value,
        percentile: ranker.rank(definition.key, value, record.season),
      });
    } catch (error) {
      if (!(error instanceof MissingStatError)) throw error;
      logger.debug('Stat missing, rendering as N/A', {
        statKey: error.statKey,
        player: error.playerName,
        season: record.season,
      });
      results.push({ statKey: definition.key, value: null, percentile: UNRANKED });
    }
  }

  return results;
}

export function buildCardModel(
  record: PlayerRecord,
  results: readonly PercentileResult[],
  config: CardConfig,
  options: { asOf: string | null; attribution: string }
): CardModel {
  const rows: Record<StatCategory, StatRow[]> = { basic: [], advanced: [] };

  for (const result of results) {
    const definition = getStatDefinition(config, result.statKey);
    if (!definition) {
      throw new RenderError(`No stat definition for "${result.statKey}"`);
    }
    rows[definition.category].push({
      ...result,
      label: definition.label,
      display: formatStatValue(definition.format, result.value),
    });
  }

  return {
    player: record,
    basic: rows.basic,
    advanced: rows.advanced,
    asOf: options.asOf,
    attribution: options.attribution,
  };
}
