import type { FastifyInstance } from 'fastify';
import {
  ValidationError,
  isContactError,
  type ContactErrorCategory,
  type FieldIssue,
} from '@rolodex/core';

/**
 * Map error categories to HTTP status codes
 */
const STATUS_BY_CATEGORY: Record<ContactErrorCategory, number> = {
  Validation: 422,
  NotFound: 404,
  Unavailable: 503,
};

export interface ErrorBody {
  message: string;
  category: ContactErrorCategory | 'Request' | 'Internal';
  issues?: FieldIssue[];
}

export interface ErrorReply {
  statusCode: number;
  body: ErrorBody;
}

interface SchemaValidationEntry {
  instancePath: string;
  message?: string;
}

/**
 * Fastify request-schema failures carry the ajv errors in `validation`
 */
function isSchemaValidationError(
  error: unknown
): error is Error & { validation: SchemaValidationEntry[] } {
  return error instanceof Error && 'validation' in error && Array.isArray(error.validation);
}

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    return typeof error.statusCode === 'number' ? error.statusCode : undefined;
  }
  return undefined;
}

/**
 * Translate any thrown value into a status code and error body.
 * Datastore failures never turn into client errors.
 */
export function toErrorReply(error: unknown): ErrorReply {
  if (isContactError(error)) {
    const body: ErrorBody = { message: error.message, category: error.category };
    if (error instanceof ValidationError) {
      body.issues = error.issues;
    }
    return { statusCode: STATUS_BY_CATEGORY[error.category], body };
  }

  if (isSchemaValidationError(error)) {
    return {
      statusCode: 422,
      body: {
        message: error.message,
        category: 'Validation',
        issues: error.validation.map((entry) => ({
          path: entry.instancePath.replace(/^\//, '').replace(/\//g, '.'),
          message: entry.message ?? 'is invalid',
        })),
      },
    };
  }

  const statusCode = statusCodeOf(error);
  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
    return {
      statusCode,
      body: {
        message: error instanceof Error ? error.message : 'Bad request',
        category: 'Request',
      },
    };
  }

  return {
    statusCode: 500,
    body: { message: 'Internal server error', category: 'Internal' },
  };
}

/**
 * Install the error and not-found handlers on a Fastify instance
 */
export function registerErrorHandlers(fastify: FastifyInstance): void {
  fastify.setErrorHandler((error: unknown, request, reply) => {
    const { statusCode, body } = toErrorReply(error);
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Request failed');
    } else {
      request.log.info({ statusCode, category: body.category }, body.message);
    }
    return reply.status(statusCode).send(body);
  });

  fastify.setNotFoundHandler((_request, reply) => {
    return reply.status(404).send({ message: 'Route not found', category: 'NotFound' });
  });
}
