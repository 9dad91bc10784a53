/**
 * HTTP Error Type
 * Raised for failed requests that carry no contact error of their own:
 * network failures, timeouts and unexpected status codes.
 */
export interface HttpErrorResponse {
  status: number;
  statusText: string;
  data: unknown;
}

export class HttpError extends Error {
  readonly status?: number;
  readonly response?: HttpErrorResponse;

  constructor(
    message: string,
    properties: { status?: number; response?: HttpErrorResponse; cause?: unknown } = {}
  ) {
    super(message, { cause: properties.cause });
    Object.setPrototypeOf(this, HttpError.prototype);
    this.name = 'HttpError';
    this.status = properties.status;
    this.response = properties.response;
  }
}
