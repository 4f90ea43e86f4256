import { z } from 'zod';
import { SEASON_LABEL_PATTERN } from '../../shared/utils/season.utils';

// ========== Card query: GET /api/cards?player=<name>&season=<label> ==========
export const cardQuerySchema = z.object({
  player: z
    .string({ required_error: 'player query parameter is required' })
    .trim()
    .min(2, 'player must be at least 2 characters')
    .max(64, 'player must be at most 64 characters'),
  season: z.string().regex(SEASON_LABEL_PATTERN, 'season must look like 2023-24').optional(),
});

export type CardQueryInput = z.infer<typeof cardQuerySchema>;
