/**
 * HTTP Request Logger Middleware
 * Layer: Interfaces (HTTP)
 *
 * pino-http on top of the shared logger: one line per request with method,
 * URL, status and response time, in the same format as the pipeline logs.
 * The static page and its script are not logged.
 */
import { logger } from '@core/logger';
import pinoHttp from 'pino-http';

export const requestLogger = pinoHttp({
  logger,
  autoLogging: {
    ignore: (req) => req.method === 'GET' && !req.url?.startsWith('/api/'),
  },
});
