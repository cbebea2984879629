/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * One JSON object per log line in production; piped through `pino-pretty` in
 * development for coloured, human-readable output. Tests run with
 * LOG_LEVEL=silent (see jest.setup.ts).
 *
 * The exported `Logger` type lets services declare "I need a logger" without
 * coupling to Pino directly.
 */
import pino from 'pino';
import { config } from './config';

export const logger = pino({
  level: config.log.level,
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

export type Logger = pino.Logger;
