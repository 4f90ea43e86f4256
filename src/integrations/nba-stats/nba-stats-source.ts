import { z } from 'zod';
import { logger } from '../../config/logger.config';
import { CardConfig } from '../../domain/card/card-config';
import { PlayerIndexEntry, resolvePlayerName } from '../../domain/players/name-resolution';
import { EMPTY_STATS, RawStatLine, StatMap, extractStats } from '../../domain/stats/stat-extraction';
import { CacheService } from '../../services/cache.service';
import { NotFoundError, UpstreamError } from '../../utils/exceptions';
import { IStatSource } from '../shared/stat-source.interface';
import { LeagueSample, PlayerRecord } from '../shared/stat-source.types';
import { NBA_STATS_SOURCE_NAME, NbaStatsApiClient } from './nba-stats-api-client';
import {
  NbaResultSet,
  dashRowSchema,
  playerIndexRowSchema,
  playerInfoRowSchema,
  rowsToRecords,
  toRawStatLine,
} from './nba-stats.schemas';

/** Player id -> merged base + advanced line */
type SeasonTable = ReadonlyMap<number, RawStatLine>;

const FREE_AGENT = 'FA';

function parseRows<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  set: NbaResultSet,
  operation: string
): T[] {
  return rowsToRecords(set).map((record, i) => {
    const parsed = schema.safeParse(record);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw UpstreamError.malformed(
        NBA_STATS_SOURCE_NAME,
        operation,
        `row ${i}${issue ? ` ${issue.path.join('.')}: ${issue.message}` : ''}`
      );
    }
    return parsed.data;
  });
}

/**
 * NBA stats implementation of IStatSource
 *
 * Wraps NbaStatsApiClient and turns result sets into PlayerRecords. The player
 * index and the season tables are reference data shared by every request, so
 * they are cached for `cacheTtlSeconds`.
 */
export class NbaStatsSource implements IStatSource {
  readonly sourceId = 'nba-stats';
  readonly attribution = 'Data via NBA Stats';

  private readonly playerIndex: CacheService<readonly PlayerIndexEntry[]>;
  private readonly seasonTables: CacheService<SeasonTable>;

  constructor(
    private readonly client: NbaStatsApiClient,
    private readonly config: CardConfig,
    cacheTtlSeconds = 3600
  ) {
    this.playerIndex = new CacheService('nba-stats:players:', cacheTtlSeconds);
    this.seasonTables = new CacheService('nba-stats:season:', cacheTtlSeconds);
  }

  async fetchPlayer(playerName: string, season: string): Promise<PlayerRecord> {
    const index = await this.loadPlayerIndex(season);
    const match = resolvePlayerName(playerName, index);
    if (!match) {
      throw NotFoundError.player(playerName);
    }

    logger.debug('Resolved player name', {
      query: playerName,
      playerId: match.player.id,
      fullName: match.player.fullName,
      matchKind: match.kind,
    });

    const infoSet = await this.client.fetchPlayerInfo(match.player.id);
    const [info] = parseRows(playerInfoRowSchema, infoSet, 'commonplayerinfo');
    if (!info) {
      throw UpstreamError.malformed(NBA_STATS_SOURCE_NAME, 'commonplayerinfo', `no row for player ${match.player.id}`);
    }

    const table = await this.loadSeasonTable(season);
    const line = table.get(match.player.id);
    if (!line) {
      logger.info('Player has no stats for season', { playerId: match.player.id, season });
    }

    return Object.freeze({
      playerId: info.PERSON_ID,
      name: info.DISPLAY_FIRST_LAST,
      team: info.TEAM_ABBREVIATION || FREE_AGENT,
      teamName: [info.TEAM_CITY, info.TEAM_NAME].filter((part) => part).join(' '),
      position: info.POSITION || '',
      season,
      stats: line ? extractStats(line, this.config.statDefinitions) : EMPTY_STATS,
    });
  }

  async fetchLeagueSample(season: string): Promise<LeagueSample> {
    const table = await this.loadSeasonTable(season);
    const players: StatMap[] = [];
    for (const line of table.values()) {
      players.push(extractStats(line, this.config.statDefinitions));
    }
    return { season, players };
  }

  private loadPlayerIndex(season: string): Promise<readonly PlayerIndexEntry[]> {
    return this.playerIndex.getOrLoad(season, async () => {
      const set = await this.client.fetchAllPlayers(season);
      return parseRows(playerIndexRowSchema, set, 'commonallplayers').map((row) => ({
        id: row.PERSON_ID,
        fullName: row.DISPLAY_FIRST_LAST,
        fromYear: row.FROM_YEAR,
        toYear: row.TO_YEAR,
      }));
    });
  }

  /**
   * Base and advanced tables are fetched one after the other and merged per
   * player; base columns win where both tables carry the same column.
   */
  private loadSeasonTable(season: string): Promise<SeasonTable> {
    return this.seasonTables.getOrLoad(season, async () => {
      const baseSet = await this.client.fetchLeagueDashStats(season, 'Base');
      const advancedSet = await this.client.fetchLeagueDashStats(season, 'Advanced');

      const table = new Map<number, RawStatLine>();
      for (const row of parseRows(dashRowSchema, advancedSet, 'leaguedashplayerstats')) {
        table.set(row.PLAYER_ID, toRawStatLine(row));
      }
      for (const row of parseRows(dashRowSchema, baseSet, 'leaguedashplayerstats')) {
        table.set(row.PLAYER_ID, { ...table.get(row.PLAYER_ID), ...toRawStatLine(row) });
      }

      logger.info('Loaded season stat table', { season, players: table.size });
      return table;
    });
  }
}
