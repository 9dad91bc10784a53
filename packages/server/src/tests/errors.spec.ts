import { describe, it, expect } from 'vitest';
import { NotFoundError, StoreUnavailableError, ValidationError } from '@rolodex/core';
import { toErrorReply } from '../errors.js';

describe('toErrorReply', () => {
  it('maps validation errors to 422 with issues', () => {
    const error = new ValidationError('Invalid contact', [
      { path: 'email', message: 'email must be a valid email address' },
    ]);

    expect(toErrorReply(error)).toEqual({
      statusCode: 422,
      body: {
        message: 'Invalid contact',
        category: 'Validation',
        issues: [{ path: 'email', message: 'email must be a valid email address' }],
      },
    });
  });

  it('maps not found errors to 404', () => {
    expect(toErrorReply(new NotFoundError('Contact', 4))).toEqual({
      statusCode: 404,
      body: { message: 'Contact not found', category: 'NotFound' },
    });
  });

  it('maps store failures to 503 without exposing the cause', () => {
    const error = new StoreUnavailableError('SQLite list failed', new Error('SQLITE_BUSY'));

    expect(toErrorReply(error)).toEqual({
      statusCode: 503,
      body: { message: 'SQLite list failed', category: 'Unavailable' },
    });
  });

  it('maps request schema failures to 422', () => {
    const error = Object.assign(new Error('params/id must be integer'), {
      statusCode: 400,
      validation: [{ instancePath: '/id', message: 'must be integer' }],
    });

    expect(toErrorReply(error)).toEqual({
      statusCode: 422,
      body: {
        message: 'params/id must be integer',
        category: 'Validation',
        issues: [{ path: 'id', message: 'must be integer' }],
      },
    });
  });

  it('passes other client errors through', () => {
    const error = Object.assign(new Error('Unsupported Media Type'), { statusCode: 415 });

    expect(toErrorReply(error)).toEqual({
      statusCode: 415,
      body: { message: 'Unsupported Media Type', category: 'Request' },
    });
  });

  it('hides unexpected errors behind a 500', () => {
    expect(toErrorReply(new TypeError('boom'))).toEqual({
      statusCode: 500,
      body: { message: 'Internal server error', category: 'Internal' },
    });
    expect(toErrorReply('not even an error').statusCode).toBe(500);
  });
});
