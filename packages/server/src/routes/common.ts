/**
 * Contact routes - shared JSON schemas and examples
 * Used for querystring/params coercion, response serialization and the
 * OpenAPI document.
 */

import type { NewContact } from '@rolodex/core';

export const CONTACT_FIELDS_SCHEMA = {
  first_name: { type: 'string', description: 'Given name (required, non-empty)' },
  last_name: { type: 'string', description: 'Family name (required, non-empty)' },
  email: { type: 'string', description: 'Email address (required, must be valid)' },
  phone_number: { type: 'string', description: 'Phone number (required, non-empty)' },
  address: { type: 'string', nullable: true, description: 'Postal address (optional)' },
};

/**
 * Request body fields carry no `type`: Ajv would coerce 123 or ['x'] into
 * strings before the contact schemas in @rolodex/core see them.
 */
export const CONTACT_BODY_FIELDS_SCHEMA = {
  first_name: { description: 'Given name (string, required, non-empty)' },
  last_name: { description: 'Family name (string, required, non-empty)' },
  email: { description: 'Email address (string, required, must be valid)' },
  phone_number: { description: 'Phone number (string, required, non-empty)' },
  address: { description: 'Postal address (string or null, optional)' },
};

export const CONTACT_SCHEMA = {
  type: 'object',
  description: 'Stored contact',
  properties: {
    id: { type: 'integer', description: 'Store-assigned id' },
    ...CONTACT_FIELDS_SCHEMA,
  },
};

export const CONTACT_ID_PARAMS_SCHEMA = {
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: 'integer', description: 'Contact id' },
  },
};

export const LIST_QUERYSTRING_SCHEMA = {
  type: 'object',
  properties: {
    skip: { type: 'integer', description: 'Number of matches to skip', default: 0 },
    limit: { type: 'integer', description: 'Maximum number of contacts to return', default: 100 },
    search: {
      type: 'string',
      description: 'Case-insensitive substring of first_name, last_name or email',
    },
  },
};

/**
 * Error response schema shared by every route
 */
export const ERROR_RESPONSE_SCHEMA = {
  type: 'object',
  properties: {
    message: { type: 'string' },
    category: { type: 'string', example: 'Validation' },
    issues: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          path: { type: 'string', example: 'email' },
          message: { type: 'string', example: 'email must be a valid email address' },
        },
      },
    },
  },
};

export const EXAMPLE_NEW_CONTACT: NewContact = {
  first_name: 'Test',
  last_name: 'User',
  email: 'test@example.com',
  phone_number: '1234567890',
  address: '123 Test St',
};
