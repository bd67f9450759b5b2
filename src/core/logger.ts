/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * One JSON object per line in production; piped through `pino-pretty` in
 * development so the registry/completion diagnostics stay readable.
 *
 * Stages take the exported `Logger` type through DI rather than importing
 * this instance, so tests can hand them a silent or mock logger, and the
 * CLI can hand them one that writes to stderr.
 */
import pino from 'pino';
import { config } from './config';

const options: pino.LoggerOptions = {
  level: config.log.level,
  redact: ['req.headers.authorization'],
};

export const logger = pino({
  ...options,
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

/** Same level and redaction as `logger`, written as JSON lines to `stream`. */
export function createLogger(stream: pino.DestinationStream): Logger {
  return pino(options, stream);
}

export type Logger = pino.Logger;
