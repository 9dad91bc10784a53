import { z } from 'zod';
import { ValidationError, type FieldIssue } from '../errors/index.js';
import type {
  ContactChanges,
  ContactQuery,
  NewContact,
} from '../types/index.js';

/**
 * Zod schemas for runtime validation of contact input
 */

export const DEFAULT_SKIP = 0;
export const DEFAULT_LIMIT = 100;

/**
 * Required text field: present, a string, and not blank.
 * The value is kept exactly as supplied.
 */
function requiredText(field: string) {
  return z
    .string({
      error: (issue) =>
        issue.input === undefined ? `${field} is required` : `${field} must be a string`,
    })
    .regex(/\S/, `${field} must not be empty`);
}

const EmailSchema = z.email({
  error: (issue) =>
    issue.input === undefined ? 'email is required' : 'email must be a valid email address',
});

const AddressSchema = z
  .string({ error: 'address must be a string or null' })
  .nullable()
  .optional();

/**
 * Contact creation schema. Unknown keys (including `id`) are rejected.
 */
export const ContactCreateSchema = z.strictObject({
  first_name: requiredText('first_name'),
  last_name: requiredText('last_name'),
  email: EmailSchema,
  phone_number: requiredText('phone_number'),
  address: AddressSchema,
});

/**
 * Partial update schema: every field optional, each supplied field must
 * still satisfy its constraint. `address: null` clears the address.
 */
export const ContactChangesSchema = ContactCreateSchema.partial();

export const ContactQuerySchema = z.object({
  skip: z
    .int({ error: 'skip must be an integer' })
    .min(0, 'skip must not be negative')
    .default(DEFAULT_SKIP),
  limit: z
    .int({ error: 'limit must be an integer' })
    .min(1, 'limit must be at least 1')
    .default(DEFAULT_LIMIT),
  search: z.string({ error: 'search must be a string' }).optional(),
});

export const ContactIdSchema = z.int({ error: 'id must be an integer' });

/**
 * Flatten zod issues into field-level issues.
 * Unrecognized keys produce one issue per key.
 */
export function toFieldIssues(error: z.ZodError): FieldIssue[] {
  const issues: FieldIssue[] = [];
  for (const issue of error.issues) {
    if (issue.code === 'unrecognized_keys') {
      for (const key of issue.keys) {
        issues.push({ path: key, message: `${key} is not a recognized field` });
      }
      continue;
    }
    issues.push({
      path: issue.path.map(String).join('.'),
      message: issue.message,
    });
  }
  return issues;
}

function parseOrThrow<T>(schema: z.ZodType<T>, input: unknown, message: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(message, toFieldIssues(result.error));
  }
  return result.data;
}

export function validateNewContact(input: unknown): NewContact {
  return parseOrThrow(ContactCreateSchema, input, 'Invalid contact');
}

export function validateContactChanges(input: unknown): ContactChanges {
  return parseOrThrow(ContactChangesSchema, input, 'Invalid contact changes');
}

/**
 * Apply list defaults (skip 0, limit 100) and check ranges.
 * An empty search string is treated as no search.
 */
export function validateContactQuery(input: unknown): ContactQuery {
  const query = parseOrThrow(ContactQuerySchema, input ?? {}, 'Invalid list options');
  if (query.search === '') {
    return { skip: query.skip, limit: query.limit };
  }
  return query;
}

export function validateContactId(input: unknown): number {
  return parseOrThrow(ContactIdSchema, input, 'Invalid contact id');
}
