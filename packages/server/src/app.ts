import Fastify, { type FastifyInstance } from 'fastify';
import FastifyCors from '@fastify/cors';
import swaggerPlugin from '@fastify/swagger';
import swaggerUiPlugin from '@fastify/swagger-ui';
import { ContactService, withStoreTracing } from '@rolodex/core';
import type { ContactStore } from '@rolodex/core';
import { registerErrorHandlers } from './errors.js';
import { wrapPinoLogger } from './logger.js';
import { registerContactRoutes } from './routes/contacts.js';
import { registerHealthRoutes } from './routes/health.js';
import type { LogLevel } from './config.js';

export interface AppOptions {
  store: ContactStore;

  /** Pino log level; omit to disable logging (tests) */
  logLevel?: LogLevel;

  /** Allowed CORS origins; omit to reflect any origin */
  corsOrigins?: string[];

  /** Log every store call with timing */
  storeTracing?: boolean;
}

/**
 * Build the Fastify application without listening.
 * The caller owns the store and closes it.
 */
export function buildApp(opts: AppOptions): FastifyInstance {
  const fastify = Fastify({
    logger: opts.logLevel ? { level: opts.logLevel } : false,
  });

  const logger = wrapPinoLogger(fastify.log);
  const store = opts.storeTracing ? withStoreTracing(opts.store, logger) : opts.store;
  const service = new ContactService({ store, logger });

  fastify.register(FastifyCors, {
    origin: opts.corsOrigins ?? true,
    credentials: true,
  });

  // Register swagger and UI before routes so the plugin hooks onRoute events
  fastify.register(swaggerPlugin, {
    openapi: {
      info: {
        title: 'Contact Manager API',
        description: 'Create, search, update and delete contacts',
        version: '0.1.0',
      },
    },
  });

  fastify.register(swaggerUiPlugin, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: false,
    },
  });

  registerErrorHandlers(fastify);

  fastify.register(registerHealthRoutes);
  fastify.register(
    async (instance) => registerContactRoutes(instance, service),
    { prefix: '/contacts' }
  );

  return fastify;
}
