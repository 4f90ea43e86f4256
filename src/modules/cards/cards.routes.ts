import { Router } from 'express';
import { CardController } from './cards.controller';
import { CardService } from './cards.service';
import { cardLimiter } from '../../middleware/rate-limit.middleware';
import { container, KEYS } from '../../container';
import { asyncHandler } from '../../shared/async-handler';

// Resolve dependencies from container
const cardService = container.resolve<CardService>(KEYS.CARD_SERVICE);
const cardController = new CardController(cardService);

const router = Router();

// GET /api/cards?player=<name>&season=<label>
router.get('/', cardLimiter, asyncHandler(cardController.getCard));

export default router;
