import type { FastifyBaseLogger } from 'fastify';
import type { Logger } from '@rolodex/core';

type PinoLike = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Adapt Fastify's pino logger to the core Logger: the message goes in as
 * `msg` next to the metadata fields.
 */
export function wrapPinoLogger(pinoLogger: PinoLike): Logger {
  return {
    debug: (message: string, meta?: Record<string, unknown>) => {
      pinoLogger.debug({ msg: message, ...meta });
    },
    info: (message: string, meta?: Record<string, unknown>) => {
      pinoLogger.info({ msg: message, ...meta });
    },
    warn: (message: string, meta?: Record<string, unknown>) => {
      pinoLogger.warn({ msg: message, ...meta });
    },
    error: (message: string, meta?: Record<string, unknown>) => {
      pinoLogger.error({ msg: message, ...meta });
    },
  };
}
