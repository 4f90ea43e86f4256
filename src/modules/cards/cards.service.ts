import { logger } from '../../config/logger.config';
import { CardConfig } from '../../domain/card/card-config';
import { PercentileEngine } from '../../domain/stats/percentile';
import { IStatSource } from '../../integrations/shared/stat-source.interface';
import { PlayerRecord } from '../../integrations/shared/stat-source.types';
import { currentSeason, formatAsOfDate } from '../../shared/utils/season.utils';
import { CardModel, buildCardModel, buildPercentileResults } from './card.model';
import { CardRenderer } from './card.renderer';
import { ReferenceDistributionStore } from './reference-distributions';

export interface CardServiceOptions {
  /** Season used when a request names none. Derived from the clock when unset. */
  defaultSeason?: string;
  /** Timezone for the as-of date and season derivation */
  timezone: string;
  /** Print the as-of date in the footer */
  showAsOfDate?: boolean;
  clock?: () => Date;
}

export interface GenerateCardOptions {
  season?: string;
}

export interface GeneratedCard {
  player: PlayerRecord;
  model: CardModel;
  png: Buffer;
}

/**
 * The card pipeline: fetch player -> rank stats -> assemble model -> render.
 * Each step runs after the previous one finishes; any fetch or render error
 * aborts the card.
 */
export class CardService {
  private readonly engine: PercentileEngine;
  private readonly clock: () => Date;

  constructor(
    private readonly source: IStatSource,
    private readonly distributions: ReferenceDistributionStore,
    private readonly renderer: CardRenderer,
    private readonly config: CardConfig,
    private readonly options: CardServiceOptions
  ) {
    this.engine = new PercentileEngine(config, distributions);
    this.clock = options.clock ?? (() => new Date());
  }

  resolveSeason(season?: string): string {
    return season ?? this.options.defaultSeason ?? currentSeason(this.options.timezone, this.clock());
  }

  async buildModel(playerName: string, options: GenerateCardOptions = {}): Promise<CardModel> {
    const season = this.resolveSeason(options.season);

    const player = await this.source.fetchPlayer(playerName, season);
    logger.info('Fetched player record', {
      query: playerName,
      player: player.name,
      team: player.team,
      season,
      stats: Object.keys(player.stats).length,
    });

    await this.distributions.load(season);
    const results = buildPercentileResults(player, this.config, this.engine);

    const showAsOf = this.options.showAsOfDate ?? true;
    return buildCardModel(player, results, this.config, {
      asOf: showAsOf ? formatAsOfDate(this.clock(), this.options.timezone) : null,
      attribution: this.source.attribution,
    });
  }

  async generateCard(playerName: string, options: GenerateCardOptions = {}): Promise<GeneratedCard> {
    const start = Date.now();
    const model = await this.buildModel(playerName, options);
    const png = await this.renderer.render(model);

    logger.info('Rendered card', {
      player: model.player.name,
      season: model.player.season,
      bytes: png.length,
      durationMs: Date.now() - start,
    });

    return { player: model.player, model, png };
  }
}
