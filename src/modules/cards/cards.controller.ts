import { Request, Response } from 'express';
import { CardService } from './cards.service';
import { cardQuerySchema } from './cards.schemas';
import { cardFileName } from './card-file';
import { ValidationException } from '../../utils/exceptions';

export class CardController {
  constructor(private readonly cardService: CardService) {}

  /**
   * GET /api/cards?player=<name>&season=<label>
   * Render a player's card and return it as PNG
   */
  getCard = async (req: Request, res: Response) => {
    const parsed = cardQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw new ValidationException(parsed.error.issues[0]?.message ?? 'Invalid card query');
    }
    const { player, season } = parsed.data;

    const card = await this.cardService.generateCard(player, { season });

    res
      .status(200)
      .set({
        'Content-Type': 'image/png',
        'Content-Disposition': `inline; filename="${cardFileName(card.player.name)}"`,
        'Cache-Control': 'no-store',
      })
      .send(card.png);
  };
}
