import type { FastifyInstance } from 'fastify';

export async function registerHealthRoutes(fastify: FastifyInstance) {
  fastify.get('/', {
    schema: {
      description: 'Service banner',
      tags: ['Health'],
      response: {
        200: {
          type: 'object',
          properties: {
            message: { type: 'string' },
          },
        },
      },
    },
  }, async () => ({ message: 'Welcome to Contact Manager API' }));

  fastify.get('/health', {
    schema: {
      description: 'Health check',
      tags: ['Health'],
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string' },
            ts: { type: 'string' },
          },
        },
      },
    },
  }, async () => ({ status: 'ok', ts: new Date().toISOString() }));
}
