import { readFile } from 'fs/promises';
import { z } from 'zod';
import { logger } from '../../config/logger.config';
import { CardConfig } from '../../domain/card/card-config';
import { resolvePlayerName } from '../../domain/players/name-resolution';
import { extractStats } from '../../domain/stats/stat-extraction';
import { NotFoundError, UpstreamError } from '../../utils/exceptions';
import { IStatSource } from '../shared/stat-source.interface';
import { LeagueSample, PlayerRecord } from '../shared/stat-source.types';

const SNAPSHOT_SOURCE_NAME = 'Snapshot';

const snapshotPlayerSchema = z.object({
  id: z.number().int(),
  name: z.string().min(1),
  team: z.string().default('FA'),
  teamName: z.string().default(''),
  position: z.string().default(''),
  fromYear: z.number().int(),
  toYear: z.number().int(),
  // Upstream column names (PTS, MIN, TS_PCT...), same as the live API
  stats: z.record(z.number().nullable()).default({}),
});

export const statSnapshotSchema = z.object({
  seasons: z.record(
    z.string().regex(/^\d{4}-\d{2}$/),
    z.object({ players: z.array(snapshotPlayerSchema) })
  ),
});

export type StatSnapshot = z.infer<typeof statSnapshotSchema>;
type SnapshotPlayer = z.infer<typeof snapshotPlayerSchema>;

/**
 * File-backed implementation of IStatSource.
 *
 * Reads a JSON snapshot shaped like the live API's data (raw column names per
 * player, per season). Used offline and in tests; produces the same
 * PlayerRecords the live source would for the same numbers.
 */
export class SnapshotStatSource implements IStatSource {
  readonly sourceId = 'snapshot';
  readonly attribution: string;

  private snapshot: Promise<StatSnapshot> | null = null;

  constructor(
    private readonly snapshotPath: string,
    private readonly config: CardConfig,
    attribution = 'Data via stats snapshot'
  ) {
    this.attribution = attribution;
  }

  async fetchPlayer(playerName: string, season: string): Promise<PlayerRecord> {
    const players = await this.seasonPlayers(season, 'fetchPlayer');
    const match = resolvePlayerName(
      playerName,
      players.map((p) => ({ ...p, fullName: p.name }))
    );
    if (!match) {
      throw NotFoundError.player(playerName);
    }

    const player = match.player;
    return Object.freeze({
      playerId: player.id,
      name: player.name,
      team: player.team,
      teamName: player.teamName,
      position: player.position,
      season,
      stats: extractStats(player.stats, this.config.statDefinitions),
    });
  }

  async fetchLeagueSample(season: string): Promise<LeagueSample> {
    const players = await this.seasonPlayers(season, 'fetchLeagueSample');
    return {
      season,
      players: players.map((p) => extractStats(p.stats, this.config.statDefinitions)),
    };
  }

  private async seasonPlayers(season: string, operation: string): Promise<SnapshotPlayer[]> {
    const snapshot = await this.load();
    const entry = snapshot.seasons[season];
    if (!entry) {
      throw new UpstreamError(SNAPSHOT_SOURCE_NAME, operation, `No data for season ${season}`);
    }
    return entry.players;
  }

  private load(): Promise<StatSnapshot> {
    if (!this.snapshot) {
      this.snapshot = this.readSnapshot();
      // Let a later call retry after a failed read
      this.snapshot.catch(() => {
        this.snapshot = null;
      });
    }
    return this.snapshot;
  }

  private async readSnapshot(): Promise<StatSnapshot> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(this.snapshotPath, 'utf-8'));
    } catch (error) {
      throw UpstreamError.fromError(SNAPSHOT_SOURCE_NAME, `read ${this.snapshotPath}`, error);
    }

    const parsed = statSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw UpstreamError.malformed(
        SNAPSHOT_SOURCE_NAME,
        `read ${this.snapshotPath}`,
        issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid snapshot'
      );
    }

    logger.info('Loaded stats snapshot', {
      path: this.snapshotPath,
      seasons: Object.keys(parsed.data.seasons),
    });
    return parsed.data;
  }
}
