import express from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { env } from './config/env.config';
import { buildCorsOptions } from './config/cors.config';
import { requestTimingMiddleware } from './middleware/request-timing.middleware';
import { requestIdMiddleware } from './middleware/request-id.middleware';
// Bootstrap DI container (auto-runs on import, must be before routes)
import './bootstrap';
import routes from './routes';
import { errorHandler } from './middleware/error.middleware';

export function createApp(): express.Express {
  const app = express();

  // Trust proxy for correct IP detection behind load balancers/proxies
  app.set('trust proxy', 1);

  app.use(
    helmet({
      // Disable contentSecurityPolicy for API server (no HTML served)
      contentSecurityPolicy: false,
      // Cards are meant to be embedded from other origins
      crossOriginResourcePolicy: { policy: 'cross-origin' },
      hidePoweredBy: true,
    })
  );
  app.use(cors(buildCorsOptions(env.CORS_ORIGINS)));
  app.use(express.json({ limit: '10kb' }));
  app.use(requestIdMiddleware);
  app.use(requestTimingMiddleware);

  // Routes
  app.use('/api', routes);

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
