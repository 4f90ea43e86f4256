import { CorsOptions } from 'cors';
import { logger } from './logger.config';

/**
 * Normalize an origin by stripping trailing slashes.
 */
function normalizeOrigin(origin: string): string {
  return origin.replace(/\/+$/, '');
}

/**
 * Parse a comma-separated CORS_ORIGINS value into an allowlist.
 */
export function parseAllowlist(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((s) => normalizeOrigin(s.trim()))
    .filter(Boolean);
}

/**
 * Cards are public images, so an empty allowlist lets any origin embed them.
 */
export function buildCorsOptions(raw: string | undefined): CorsOptions {
  const allowlist = parseAllowlist(raw);

  return {
    origin: (origin, callback) => {
      // Requests without an origin (curl, server-to-server)
      if (!origin || allowlist.length === 0) return callback(null, true);

      if (allowlist.includes(normalizeOrigin(origin))) {
        return callback(null, true);
      }

      logger.warn('CORS rejected origin', { origin });
      return callback(new Error('Not allowed by CORS'));
    },
    methods: ['GET', 'OPTIONS'],
    exposedHeaders: ['X-Request-ID', 'Content-Disposition'],
  };
}
