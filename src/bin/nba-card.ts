#!/usr/bin/env node
import { env } from '../config/env.config';
// Bootstrap DI container (auto-runs on import)
import '../bootstrap';
import { container, KEYS } from '../container';
import { CardService } from '../modules/cards/cards.service';
import { runCli } from '../cli';

runCli(process.argv.slice(2), {
  cardService: container.resolve<CardService>(KEYS.CARD_SERVICE),
  cardsDir: env.CARDS_DIR,
}).then((code) => {
  process.exitCode = code;
});
