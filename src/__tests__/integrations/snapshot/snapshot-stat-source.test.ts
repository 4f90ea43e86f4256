import * as path from 'path';
import { createCardConfig } from '../../../domain/card/card-config';
import { SnapshotStatSource } from '../../../integrations/snapshot/snapshot-stat-source';
import { NotFoundError, UpstreamError } from '../../../utils/exceptions';

const FIXTURES = path.resolve(__dirname, '../../fixtures');
const SAMPLE_DATA = path.resolve(__dirname, '../../../../data/sample-snapshot.json');

describe('SnapshotStatSource', () => {
  const config = createCardConfig();
  const source = new SnapshotStatSource(path.join(FIXTURES, 'stats-snapshot.json'), config);

  describe('fetchPlayer', () => {
    it('should resolve the name and extract stats', async () => {
      const record = await source.fetchPlayer('lebron james', '2023-24');

      expect(record).toMatchObject({
        playerId: 2544,
        name: 'LeBron James',
        team: 'LAL',
        teamName: 'Los Angeles Lakers',
        position: 'Forward',
        season: '2023-24',
      });
      expect(record.stats).toEqual({
        gamesPlayed: 71,
        points: 27,
        turnovers: 3.5,
        threePointPct: 0.41,
        pointsPer36: 27,
      });
    });

    it('should default the team of a player without one', async () => {
      const record = await source.fetchPlayer('Rafael Ellison', '2023-24');

      expect(record.team).toBe('FA');
      expect(record.stats.threePointPct).toBeUndefined();
    });

    it('should throw NotFoundError for an unknown name', async () => {
      await expect(source.fetchPlayer('Zzyzx Nobody', '2023-24')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should throw UpstreamError for a season the snapshot does not cover', async () => {
      await expect(source.fetchPlayer('LeBron James', '1999-00')).rejects.toThrow(
        '[Snapshot] fetchPlayer: No data for season 1999-00'
      );
    });
  });

  describe('fetchLeagueSample', () => {
    it('should return every player of the season', async () => {
      const sample = await source.fetchLeagueSample('2023-24');

      expect(sample.players).toHaveLength(2);
      expect(sample.players[1]).toEqual({ gamesPlayed: 40, points: 9, turnovers: 1, pointsPer36: 18 });
    });
  });

  describe('loading', () => {
    it('should fail with UpstreamError when the file is missing', async () => {
      const missing = new SnapshotStatSource(path.join(FIXTURES, 'no-such-file.json'), config);

      await expect(missing.fetchLeagueSample('2023-24')).rejects.toBeInstanceOf(UpstreamError);
    });

    it('should fail with UpstreamError when the file does not match the schema', async () => {
      const malformed = new SnapshotStatSource(path.join(FIXTURES, 'malformed-snapshot.json'), config);

      await expect(malformed.fetchLeagueSample('2023-24')).rejects.toThrow('Malformed response');
    });

    it('should load the bundled sample data', async () => {
      const bundled = new SnapshotStatSource(SAMPLE_DATA, config);

      const record = await bundled.fetchPlayer('LeBron James', '2023-24');

      expect(record.team).toBe('LAL');
      expect(record.stats.points).toBe(25.7);
    });
  });
});
