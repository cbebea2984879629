/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Returns a new app per call: each cluster worker builds its own, and tests
 * build one per case after registering an in-memory database.
 *
 * Middleware order:
 *   1. helmet()        — security headers.
 *   2. cors()          — cross-origin access to the JSON API.
 *   3. compression()   — gzip response bodies.
 *   4. body parsers    — JSON for the API, urlencoded for the HTML forms.
 *   5. requestLogger   — pino-http line per request.
 *   6. session + flash — signed cookie session carrying flash messages.
 *   7. Routes          — /api/health, /api/banks, then the HTML pages.
 *   8. notFound + errorHandler — MUST be last.
 *
 * The `import '@core/container'` side effect registers every dependency before
 * the route factories resolve controllers.
 */
import '@core/container';

import { config } from '@core/config';
import { errorHandler, notFoundHandler } from '@interfaces/http/middleware/errorHandler';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { flash, session } from '@interfaces/http/middleware/session';
import { bankApiRoutes } from '@interfaces/http/routes/bankApiRoutes';
import { bankPageRoutes } from '@interfaces/http/routes/bankPageRoutes';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const app = express();

  // Security & compression. Plain-HTTP deployments outside production must
  // not have their form posts upgraded to https.
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: { upgradeInsecureRequests: config.isProd ? [] : null },
      },
    }),
  );
  app.use(cors());
  app.use(compression());

  // Body parsing
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  // Request logging
  app.use(requestLogger);

  // Flash messages for the HTML flow
  app.use(session);
  app.use(flash);

  // Routes
  app.use('/api', healthRoutes);
  app.use('/api/banks', bankApiRoutes());
  app.use('/', bankPageRoutes());

  // Fallback 404 and global error handler (must be registered last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
