/**
 * Error category determines how a caller should react
 *
 * - "Validation": Malformed or missing input; fix the request, don't retry
 * - "NotFound": Referenced contact does not exist; don't retry
 * - "Unavailable": Datastore failure (connection loss, I/O); may retry
 */
export type ContactErrorCategory = "Validation" | "NotFound" | "Unavailable";

/**
 * A single field-level validation problem
 */
export interface FieldIssue {
  /** Dotted path of the offending field ("" for the whole input) */
  path: string;
  message: string;
}

/**
 * ContactError
 * Base class of every error the contact operations signal on purpose
 */
export abstract class ContactError extends Error {
  abstract readonly category: ContactErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Determine if this error may succeed when retried by the caller.
   * Nothing is retried internally.
   */
  isRetryable(): boolean {
    return this.category === "Unavailable";
  }
}

/**
 * ValidationError
 * Thrown when input validation fails. Nothing is persisted.
 */
export class ValidationError extends ContactError {
  readonly category = "Validation" as const;

  constructor(
    message: string,
    readonly issues: FieldIssue[] = []
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * NotFoundError
 * Thrown when the referenced id does not exist
 */
export class NotFoundError extends ContactError {
  readonly category = "NotFound" as const;

  constructor(
    readonly resource: string,
    readonly id: number
  ) {
    super(`${resource} not found`);
    this.name = "NotFoundError";
  }
}

/**
 * StoreUnavailableError
 * Wraps a datastore-level failure. The original error is kept as `cause`.
 */
export class StoreUnavailableError extends ContactError {
  readonly category = "Unavailable" as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "StoreUnavailableError";
  }
}

export function isContactError(error: unknown): error is ContactError {
  return error instanceof ContactError;
}
