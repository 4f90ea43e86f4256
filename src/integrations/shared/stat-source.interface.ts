import { LeagueSample, PlayerRecord } from './stat-source.types';

/**
 * Stat source interface
 * Every source (live stats API, file snapshot) implements this contract so the
 * card pipeline never sees upstream-specific shapes.
 */
export interface IStatSource {
  /** Source identifier (e.g., 'nba-stats', 'snapshot') */
  readonly sourceId: string;

  /** Attribution printed in the card footer */
  readonly attribution: string;

  /**
   * Resolve a player by name and fetch their stats for a season.
   * @throws NotFoundError when no player matches the name
   * @throws UpstreamError when the source is unreachable or returns malformed data
   */
  fetchPlayer(playerName: string, season: string): Promise<PlayerRecord>;

  /**
   * Fetch every player's stats for a season (the percentile reference population).
   * @throws UpstreamError when the source is unreachable or returns malformed data
   */
  fetchLeagueSample(season: string): Promise<LeagueSample>;
}
