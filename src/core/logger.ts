/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * Pino writes one JSON object per log line, which keeps logs machine-parseable
 * in production. In development the stream is piped through `pino-pretty`
 * for colours and readable timestamps.
 *
 * The exported `Logger` type lets other modules declare "I need a logger"
 * without coupling to Pino directly; tests pass a silent child instead.
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
