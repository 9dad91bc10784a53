import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import {
  NotFoundError,
  StoreUnavailableError,
  ValidationError,
  noopLogger,
  type Contact,
  type ContactChanges,
  type ListContactsOptions,
  type Logger,
  type NewContact,
} from '@rolodex/core';
import { HttpError } from './errors.js';

export interface ContactsClientOptions {
  /** API origin, e.g. http://localhost:8000 */
  baseUrl: string;
  timeoutMs?: number;
  axiosInstance?: AxiosInstance;
  logger?: Logger;
  /** Log every request and response at debug level (default: HTTP_DEBUG=1) */
  debug?: boolean;
}

const ErrorBodySchema = z.object({
  message: z.string(),
  category: z.string().optional(),
  issues: z.array(z.object({ path: z.string(), message: z.string() })).optional(),
});

/**
 * Typed client for the /contacts API.
 * Error responses are turned back into the core error classes so callers
 * handle remote and local failures the same way.
 */
export class ContactsClient {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly debug: boolean;

  constructor(opts: ContactsClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.http = opts.axiosInstance ?? axios.create({ timeout: opts.timeoutMs ?? 30_000 });
    this.logger = opts.logger ?? noopLogger;
    this.debug = opts.debug ?? process.env.HTTP_DEBUG === '1';
  }

  create(input: NewContact): Promise<Contact> {
    return this.request<Contact>({ method: 'POST', url: '/contacts/', data: input });
  }

  list(options: ListContactsOptions = {}): Promise<Contact[]> {
    return this.request<Contact[]>({
      method: 'GET',
      url: '/contacts/',
      params: { skip: options.skip, limit: options.limit, search: options.search },
    });
  }

  get(id: number): Promise<Contact> {
    return this.request<Contact>({ method: 'GET', url: `/contacts/${id}` }, id);
  }

  update(id: number, changes: ContactChanges): Promise<Contact> {
    return this.request<Contact>({ method: 'PUT', url: `/contacts/${id}`, data: changes }, id);
  }

  delete(id: number): Promise<Contact> {
    return this.request<Contact>({ method: 'DELETE', url: `/contacts/${id}` }, id);
  }

  private async request<T>(config: AxiosRequestConfig, contactId?: number): Promise<T> {
    if (this.debug) {
      this.logger.debug('request', { method: config.method, url: config.url });
    }
    try {
      const res = await this.http.request<T>({ baseURL: this.baseUrl, ...config });
      if (this.debug) {
        this.logger.debug('response', { status: res.status, url: config.url });
      }
      return res.data;
    } catch (err) {
      if (this.debug) {
        this.logger.debug('error', {
          url: config.url,
          error: err instanceof Error ? err.message : String(err),
        });
      }
      throw this.toError(err, contactId);
    }
  }

  private toError(err: unknown, contactId?: number): unknown {
    if (!axios.isAxiosError(err)) {
      return err;
    }
    if (!err.response) {
      return new HttpError(err.message, { cause: err });
    }

    const { status, statusText, data } = err.response;
    const body = ErrorBodySchema.safeParse(data);
    const message = body.success ? body.data.message : err.message;

    if (status === 422) {
      return new ValidationError(message, body.success ? body.data.issues ?? [] : []);
    }
    if (status === 404 && contactId !== undefined) {
      return new NotFoundError('Contact', contactId);
    }
    if (status === 503) {
      return new StoreUnavailableError(message, err);
    }
    return new HttpError(message, {
      status,
      response: { status, statusText, data },
      cause: err,
    });
  }
}
