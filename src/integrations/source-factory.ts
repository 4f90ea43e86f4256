import { IStatSource } from './shared/stat-source.interface';
import { NbaStatsApiClient } from './nba-stats/nba-stats-api-client';
import { NbaStatsSource } from './nba-stats/nba-stats-source';
import { SnapshotStatSource } from './snapshot/snapshot-stat-source';
import { CardConfig } from '../domain/card/card-config';
import { logger } from '../config/logger.config';

export type StatSourceType = 'nba-stats' | 'snapshot';

export interface StatSourceSettings {
  baseUrl: string;
  timeoutMs: number;
  cacheTtlSeconds: number;
  snapshotPath: string;
}

/**
 * Factory for stat sources
 *
 * Both sources satisfy the same contract, so the pipeline is unaware of which
 * one is configured.
 */
export class StatSourceFactory {
  static createSource(
    sourceType: StatSourceType,
    config: CardConfig,
    settings: StatSourceSettings
  ): IStatSource {
    logger.info(`Creating stat source: ${sourceType}`);

    switch (sourceType) {
      case 'nba-stats': {
        const client = new NbaStatsApiClient({
          baseUrl: settings.baseUrl,
          timeoutMs: settings.timeoutMs,
        });
        return new NbaStatsSource(client, config, settings.cacheTtlSeconds);
      }

      case 'snapshot':
        return new SnapshotStatSource(settings.snapshotPath, config);
    }
  }
}
