/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Returns a fresh app each call: every cluster worker builds its own, and
 * integration tests build one after overriding container registrations.
 *
 * Middleware order:
 *   1. requestTimer   — req.requestStartTime for meta.totalTimeMs.
 *   2. helmet()       — security headers. The default CSP already allows the
 *                       page's same-origin script; `upgrade-insecure-requests`
 *                       is dropped so the page also works over plain HTTP.
 *   3. cors()
 *   4. compression()
 *   5. express.json() — req.body.
 *   6. requestLogger
 *   7. static page, health, analysis routes
 *   8. notFound, then errorHandler (must be last).
 */
import '@core/container';

import path from 'node:path';

import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { notFound } from '@interfaces/http/middleware/notFound';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { requestTimer } from '@interfaces/http/middleware/requestTimer';
import { analysisRoutes } from '@interfaces/http/routes/analysisRoutes';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

/** `public/` at the project root; same relative depth from src/ and dist/. */
export const PUBLIC_DIR = path.resolve(__dirname, '../../../public');

export function createApp(): express.Express {
  const app = express();

  // Request timing (must be first)
  app.use(requestTimer);

  // Security & compression
  app.use(
    helmet({
      contentSecurityPolicy: { directives: { upgradeInsecureRequests: null } },
    }),
  );
  app.use(cors());
  app.use(compression());

  // Body parsing
  app.use(express.json());

  // Request logging
  app.use(requestLogger);

  // Routes
  app.use(express.static(PUBLIC_DIR));
  app.use('/api/v1', healthRoutes);
  app.use('/', analysisRoutes);

  // Fallthrough + global error handler (must be registered last)
  app.use(notFound);
  app.use(errorHandler);

  return app;
}
