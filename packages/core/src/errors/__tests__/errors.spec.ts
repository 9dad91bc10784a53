import { describe, it, expect } from 'vitest';
import {
  ContactError,
  NotFoundError,
  StoreUnavailableError,
  ValidationError,
  isContactError,
} from '../index.js';

describe('Contact errors', () => {
  it('should carry a category per error type', () => {
    expect(new ValidationError('bad').category).toBe('Validation');
    expect(new NotFoundError('Contact', 1).category).toBe('NotFound');
    expect(new StoreUnavailableError('down').category).toBe('Unavailable');
  });

  it('should only mark store failures as retryable', () => {
    expect(new ValidationError('bad').isRetryable()).toBe(false);
    expect(new NotFoundError('Contact', 1).isRetryable()).toBe(false);
    expect(new StoreUnavailableError('down').isRetryable()).toBe(true);
  });

  it('should build the not-found message from the resource', () => {
    const error = new NotFoundError('Contact', 42);
    expect(error.message).toBe('Contact not found');
    expect(error.id).toBe(42);
    expect(error.name).toBe('NotFoundError');
  });

  it('should keep the original store error as cause', () => {
    const cause = new Error('SQLITE_BUSY');
    expect(new StoreUnavailableError('down', cause).cause).toBe(cause);
  });

  it('should support instanceof checks', () => {
    const error: unknown = new ValidationError('bad', [{ path: 'email', message: 'x' }]);
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toBeInstanceOf(ContactError);
    expect(error).toBeInstanceOf(Error);
    expect(isContactError(error)).toBe(true);
    expect(isContactError(new Error('other'))).toBe(false);
  });
});
