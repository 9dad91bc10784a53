/**
 * Contact routes
 * Thin mapping from HTTP verbs to ContactService operations.
 * Registered under the /contacts prefix, so every path answers with and
 * without a trailing slash at the collection root.
 */

import type { FastifyInstance } from 'fastify';
import type { ContactService } from '@rolodex/core';
import {
  CONTACT_BODY_FIELDS_SCHEMA,
  CONTACT_ID_PARAMS_SCHEMA,
  CONTACT_SCHEMA,
  ERROR_RESPONSE_SCHEMA,
  EXAMPLE_NEW_CONTACT,
  LIST_QUERYSTRING_SCHEMA,
} from './common.js';

interface ContactParams {
  id: number;
}

interface ListQuerystring {
  skip?: number;
  limit?: number;
  search?: string;
}

export async function registerContactRoutes(
  fastify: FastifyInstance,
  service: ContactService
) {
  /**
   * POST /contacts/
   */
  fastify.post('/', {
    schema: {
      description: 'Create a contact',
      tags: ['Contacts'],
      body: {
        type: 'object',
        properties: CONTACT_BODY_FIELDS_SCHEMA,
        examples: [EXAMPLE_NEW_CONTACT],
      },
      response: {
        200: CONTACT_SCHEMA,
        422: ERROR_RESPONSE_SCHEMA,
        503: ERROR_RESPONSE_SCHEMA,
      },
    },
  }, async (request) => service.create(request.body));

  /**
   * GET /contacts/?skip=&limit=&search=
   */
  fastify.get<{ Querystring: ListQuerystring }>('/', {
    schema: {
      description: 'List contacts in insertion order, optionally filtered by search',
      tags: ['Contacts'],
      querystring: LIST_QUERYSTRING_SCHEMA,
      response: {
        200: { type: 'array', items: CONTACT_SCHEMA },
        422: ERROR_RESPONSE_SCHEMA,
        503: ERROR_RESPONSE_SCHEMA,
      },
    },
  }, async (request) => service.list(request.query));

  /**
   * GET /contacts/:id
   */
  fastify.get<{ Params: ContactParams }>('/:id', {
    schema: {
      description: 'Fetch a contact by id',
      tags: ['Contacts'],
      params: CONTACT_ID_PARAMS_SCHEMA,
      response: {
        200: CONTACT_SCHEMA,
        404: ERROR_RESPONSE_SCHEMA,
        422: ERROR_RESPONSE_SCHEMA,
        503: ERROR_RESPONSE_SCHEMA,
      },
    },
  }, async (request) => service.get(request.params.id));

  /**
   * PUT /contacts/:id
   * Partial update: fields left out of the body keep their stored values.
   */
  fastify.put<{ Params: ContactParams }>('/:id', {
    schema: {
      description: 'Update a contact; only the supplied fields change',
      tags: ['Contacts'],
      params: CONTACT_ID_PARAMS_SCHEMA,
      body: {
        type: 'object',
        properties: CONTACT_BODY_FIELDS_SCHEMA,
      },
      response: {
        200: CONTACT_SCHEMA,
        404: ERROR_RESPONSE_SCHEMA,
        422: ERROR_RESPONSE_SCHEMA,
        503: ERROR_RESPONSE_SCHEMA,
      },
    },
  }, async (request) => service.update(request.params.id, request.body));

  /**
   * DELETE /contacts/:id
   * Responds with the contact as it was before deletion.
   */
  fastify.delete<{ Params: ContactParams }>('/:id', {
    schema: {
      description: 'Delete a contact permanently',
      tags: ['Contacts'],
      params: CONTACT_ID_PARAMS_SCHEMA,
      response: {
        200: CONTACT_SCHEMA,
        404: ERROR_RESPONSE_SCHEMA,
        422: ERROR_RESPONSE_SCHEMA,
        503: ERROR_RESPONSE_SCHEMA,
      },
    },
  }, async (request) => service.delete(request.params.id));
}
