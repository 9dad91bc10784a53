// Domain types
export * from './types/index.js';

// Interfaces and contracts
export * from './interfaces/index.js';

// Errors
export {
  ContactError,
  ValidationError,
  NotFoundError,
  StoreUnavailableError,
  isContactError,
} from './errors/index.js';
export type { ContactErrorCategory, FieldIssue } from './errors/index.js';

// Validation
export {
  ContactCreateSchema,
  ContactChangesSchema,
  ContactQuerySchema,
  ContactIdSchema,
  DEFAULT_SKIP,
  DEFAULT_LIMIT,
  toFieldIssues,
  validateNewContact,
  validateContactChanges,
  validateContactQuery,
  validateContactId,
} from './validation/contact.js';

// Operations
export { ContactService } from './services/contact-service.js';
export type { ContactServiceOptions } from './services/contact-service.js';

// Persistence
export * from './stores/index.js';

// Utilities
export {
  mergeContact,
  withStoreTracing,
  serializeForLog,
  truncateString,
  errorToLog,
} from './utils/index.js';
