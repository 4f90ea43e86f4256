/**
 * Command-line card generation.
 * Usage: nba-card [player name...] [--out <file>] [--season <label>]
 */
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { logger } from './config/logger.config';
import { SEASON_LABEL_PATTERN } from './shared/utils/season.utils';
import { ValidationException } from './utils/exceptions';
import { CardService } from './modules/cards/cards.service';
import { cardFileName } from './modules/cards/card-file';

export const DEFAULT_PLAYER = 'LeBron James';

export interface CliArgs {
  playerName: string;
  out?: string;
  season?: string;
}

export interface CliDeps {
  cardService: Pick<CardService, 'generateCard'>;
  cardsDir: string;
}

function optionValue(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ValidationException(`${flag} requires a value`);
  }
  return value;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const nameParts: string[] = [];
  let out: string | undefined;
  let season: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--out') {
      out = optionValue(argv, i, arg);
      i++;
    } else if (arg === '--season') {
      season = optionValue(argv, i, arg);
      if (!SEASON_LABEL_PATTERN.test(season)) {
        throw new ValidationException('--season must look like 2023-24');
      }
      i++;
    } else if (arg.startsWith('--')) {
      throw new ValidationException(`Unknown option ${arg}`);
    } else {
      nameParts.push(arg);
    }
  }

  const playerName = nameParts.join(' ').trim() || DEFAULT_PLAYER;
  return { playerName, out, season };
}

/**
 * Generate one card and write it to disk. Resolves to the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    const card = await deps.cardService.generateCard(args.playerName, { season: args.season });

    const outPath = args.out ?? path.join(deps.cardsDir, cardFileName(card.player.name));
    await mkdir(path.dirname(outPath), { recursive: true });
    await writeFile(outPath, card.png);

    logger.info('Card saved', { player: card.player.name, path: outPath });
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Card generation failed', { error: message });
    return 1;
  }
}
