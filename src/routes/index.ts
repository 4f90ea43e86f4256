import { Router } from 'express';
import cardRoutes from '../modules/cards/cards.routes';

const router = Router();

// Card routes (the only public route)
router.use('/cards', cardRoutes);

export default router;
