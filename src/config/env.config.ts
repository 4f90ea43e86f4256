import { z } from 'zod';
import dotenv from 'dotenv';
import { ValidationException } from '../utils/exceptions';
import { isValidTimezone } from '../shared/utils/season.utils';

// Load environment variables
dotenv.config();

const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z
    .string()
    .default('5000')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().min(1).max(65535)),

  // Comma-separated list of origins allowed to embed cards. Empty allows any origin.
  CORS_ORIGINS: z.string().optional(),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Stat source
  STAT_SOURCE: z.enum(['nba-stats', 'snapshot']).default('nba-stats'),
  SNAPSHOT_PATH: z.string().default('data/sample-snapshot.json'),
  NBA_STATS_BASE_URL: z.string().url().default('https://stats.nba.com/stats'),
  NBA_STATS_TIMEOUT_MS: z
    .string()
    .default('30000')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive()),

  // How long the player index and league tables stay cached
  STATS_CACHE_TTL_SECONDS: z
    .string()
    .default('3600')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive()),

  // Season label such as "2023-24". Derived from today's date when unset.
  NBA_SEASON: z
    .string()
    .regex(/^\d{4}-\d{2}$/, 'NBA_SEASON must look like 2023-24')
    .optional()
    .or(z.literal('').transform(() => undefined)),

  // Card rendering
  CARD_TIMEZONE: z
    .string()
    .default('America/New_York')
    .refine(isValidTimezone, 'CARD_TIMEZONE must be an IANA timezone'),
  CARD_FONT_PATH: z.string().optional(),
  CARDS_DIR: z.string().default('cards'),
});

// Parse and validate environment variables
const parseEnv = () => {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Environment validation failed:');
      error.issues.forEach((issue) => {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      });
      throw new ValidationException('Invalid environment configuration');
    }
    throw error;
  }
};

// Export validated environment variables
export const env = parseEnv();

// Type for environment variables
export type Env = z.infer<typeof envSchema>;
