import axios, { AxiosInstance } from 'axios';
import { logger } from '../../config/logger.config';
import { UpstreamError } from '../../utils/exceptions';
import { NbaResultSet, nbaStatsResponseSchema } from './nba-stats.schemas';

export const NBA_STATS_SOURCE_NAME = 'NBA Stats';

export type MeasureType = 'Base' | 'Advanced';

export interface NbaStatsClientOptions {
  baseUrl: string;
  timeoutMs: number;
}

/**
 * The stats API rejects requests that do not look like they come from nba.com.
 */
const NBA_STATS_HEADERS: Record<string, string> = {
  Accept: 'application/json, text/plain, */*',
  'Accept-Language': 'en-US,en;q=0.9',
  Origin: 'https://www.nba.com',
  Referer: 'https://www.nba.com/',
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36',
  'x-nba-stats-origin': 'stats',
  'x-nba-stats-token': 'true',
};

/** Error codes axios reports when the request timed out */
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

function toUpstreamError(error: unknown, operation: string): UpstreamError {
  if (axios.isAxiosError(error) && error.code && TIMEOUT_CODES.has(error.code)) {
    return UpstreamError.timeout(NBA_STATS_SOURCE_NAME, operation);
  }
  return UpstreamError.fromError(NBA_STATS_SOURCE_NAME, operation, error);
}

/**
 * Thin client over the public NBA stats endpoints.
 * One attempt per call: a failure is surfaced to the caller as UpstreamError.
 */
export class NbaStatsApiClient {
  private readonly client: AxiosInstance;

  constructor(options: NbaStatsClientOptions, client?: AxiosInstance) {
    this.client =
      client ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        headers: NBA_STATS_HEADERS,
      });
  }

  private async getResultSet(
    endpoint: string,
    params: Record<string, string | number>,
    resultSetName: string
  ): Promise<NbaResultSet> {
    let body: unknown;
    try {
      const response = await this.client.get(`/${endpoint}`, { params });
      body = response.data;
    } catch (error) {
      logger.warn('NBA stats request failed', {
        endpoint,
        errorMessage: error instanceof Error ? error.message : String(error),
        errorCode: axios.isAxiosError(error) ? error.code : undefined,
        status: axios.isAxiosError(error) ? error.response?.status : undefined,
      });
      throw toUpstreamError(error, endpoint);
    }

    const parsed = nbaStatsResponseSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw UpstreamError.malformed(
        NBA_STATS_SOURCE_NAME,
        endpoint,
        issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid body'
      );
    }

    const set = parsed.data.resultSets.find((s) => s.name === resultSetName);
    if (!set) {
      throw UpstreamError.malformed(NBA_STATS_SOURCE_NAME, endpoint, `missing result set ${resultSetName}`);
    }
    return set;
  }

  /**
   * Every player who has appeared in the league up to `season`, with first and last season played.
   */
  async fetchAllPlayers(season: string): Promise<NbaResultSet> {
    return this.getResultSet(
      'commonallplayers',
      { LeagueID: '00', Season: season, IsOnlyCurrentSeason: 0 },
      'CommonAllPlayers'
    );
  }

  async fetchPlayerInfo(playerId: number): Promise<NbaResultSet> {
    return this.getResultSet(
      'commonplayerinfo',
      { PlayerID: playerId, LeagueID: '00' },
      'CommonPlayerInfo'
    );
  }

  /**
   * Per-game stats for every player in a regular season.
   * @param measureType - 'Base' for counting stats, 'Advanced' for ratings and rates
   */
  async fetchLeagueDashStats(season: string, measureType: MeasureType): Promise<NbaResultSet> {
    return this.getResultSet(
      'leaguedashplayerstats',
      {
        College: '',
        Conference: '',
        Country: '',
        DateFrom: '',
        DateTo: '',
        Division: '',
        DraftPick: '',
        DraftYear: '',
        GameScope: '',
        GameSegment: '',
        Height: '',
        LastNGames: 0,
        LeagueID: '00',
        Location: '',
        MeasureType: measureType,
        Month: 0,
        OpponentTeamID: 0,
        Outcome: '',
        PORound: 0,
        PaceAdjust: 'N',
        PerMode: 'PerGame',
        Period: 0,
        PlayerExperience: '',
        PlayerPosition: '',
        PlusMinus: 'N',
        Rank: 'N',
        Season: season,
        SeasonSegment: '',
        SeasonType: 'Regular Season',
        ShotClockRange: '',
        StarterBench: '',
        TeamID: 0,
        TwoWay: 0,
        VsConference: '',
        VsDivision: '',
        Weight: '',
      },
      'LeagueDashPlayerStats'
    );
  }
}
