// Ensure env is loaded before accessing process.env
import { env } from './config/env.config';

import { container, KEYS } from './container';
import { CardConfig, createCardConfig } from './domain/card/card-config';
import { StatSourceFactory } from './integrations/source-factory';
import { IStatSource } from './integrations/shared/stat-source.interface';
import { ReferenceDistributionStore } from './modules/cards/reference-distributions';
import { CardRenderer } from './modules/cards/card.renderer';
import { CardService } from './modules/cards/cards.service';

function bootstrap(): void {
  // Configuration (immutable, shared by reference)
  container.register(KEYS.CARD_CONFIG, () => createCardConfig());

  // External sources
  container.register(KEYS.STAT_SOURCE, () =>
    StatSourceFactory.createSource(env.STAT_SOURCE, container.resolve<CardConfig>(KEYS.CARD_CONFIG), {
      baseUrl: env.NBA_STATS_BASE_URL,
      timeoutMs: env.NBA_STATS_TIMEOUT_MS,
      cacheTtlSeconds: env.STATS_CACHE_TTL_SECONDS,
      snapshotPath: env.SNAPSHOT_PATH,
    })
  );

  // Services
  container.register(
    KEYS.DISTRIBUTION_STORE,
    () =>
      new ReferenceDistributionStore(
        container.resolve<IStatSource>(KEYS.STAT_SOURCE),
        container.resolve<CardConfig>(KEYS.CARD_CONFIG),
        env.STATS_CACHE_TTL_SECONDS
      )
  );

  container.register(
    KEYS.CARD_RENDERER,
    () =>
      new CardRenderer(container.resolve<CardConfig>(KEYS.CARD_CONFIG), {
        fontPath: env.CARD_FONT_PATH || undefined,
      })
  );

  container.register(
    KEYS.CARD_SERVICE,
    () =>
      new CardService(
        container.resolve<IStatSource>(KEYS.STAT_SOURCE),
        container.resolve<ReferenceDistributionStore>(KEYS.DISTRIBUTION_STORE),
        container.resolve<CardRenderer>(KEYS.CARD_RENDERER),
        container.resolve<CardConfig>(KEYS.CARD_CONFIG),
        {
          defaultSeason: env.NBA_SEASON,
          timezone: env.CARD_TIMEZONE,
        }
      )
  );
}

// Auto-run on import
bootstrap();
