import { logger } from '../../config/logger.config';
import { CardConfig } from '../../domain/card/card-config';
import {
  Distribution,
  DistributionLookup,
  SeasonDistributions,
  buildSeasonDistributions,
} from '../../domain/stats/percentile';
import { IStatSource } from '../../integrations/shared/stat-source.interface';
import { CacheService } from '../../services/cache.service';

/**
 * Per-season percentile reference data, built from the source's league sample.
 *
 * `load` fetches and builds a season at most once per TTL window; concurrent
 * callers share the same load. `getDistribution` is synchronous so the
 * percentile engine can read whatever was last loaded.
 */
export class ReferenceDistributionStore implements DistributionLookup {
  private readonly cache: CacheService<SeasonDistributions>;
  private readonly latest = new Map<string, SeasonDistributions>();

  constructor(
    private readonly source: IStatSource,
    private readonly config: CardConfig,
    ttlSeconds = 3600
  ) {
    this.cache = new CacheService('distributions:', ttlSeconds);
  }

  async load(season: string): Promise<SeasonDistributions> {
    return this.cache.getOrLoad(season, async () => {
      const sample = await this.source.fetchLeagueSample(season);
      const distributions = buildSeasonDistributions(sample.players, this.config.statDefinitions);
      this.latest.set(season, distributions);

      logger.info('Built reference distributions', {
        season,
        source: this.source.sourceId,
        population: sample.players.length,
        stats: distributions.size,
      });
      return distributions;
    });
  }

  getDistribution(season: string, statKey: string): Distribution | undefined {
    return this.latest.get(season)?.get(statKey);
  }
}
