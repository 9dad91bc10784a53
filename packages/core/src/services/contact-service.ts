import {
  NotFoundError,
  StoreUnavailableError,
  isContactError,
} from '../errors/index.js';
import { noopLogger } from '../interfaces/index.js';
import type { ContactStore, Logger } from '../interfaces/index.js';
import type { Contact } from '../types/index.js';
import { errorToLog, truncateString } from '../utils/logging.js';
import {
  validateContactChanges,
  validateContactId,
  validateContactQuery,
  validateNewContact,
} from '../validation/contact.js';

export interface ContactServiceOptions {
  store: ContactStore;
  logger?: Logger;
}

/**
 * ContactService
 * The contact operations: create, list/search, get, update, delete.
 *
 * Inputs arrive untyped from the transport and are validated here, so every
 * method accepts `unknown` for caller-supplied data. Results and failures:
 * - ValidationError: malformed input, nothing persisted
 * - NotFoundError: the id does not exist
 * - StoreUnavailableError: anything the store failed with
 */
export class ContactService {
  private readonly store: ContactStore;
  private readonly logger: Logger;

  constructor(opts: ContactServiceOptions) {
    this.store = opts.store;
    this.logger = opts.logger ?? noopLogger;
  }

  async create(input: unknown): Promise<Contact> {
    const contact = validateNewContact(input);
    const created = await this.call('create', () => this.store.insert(contact));
    this.logger.info('Contact created', { contactId: created.id });
    return created;
  }

  /**
   * @param options skip (default 0), limit (default 100), search
   */
  async list(options: unknown = {}): Promise<Contact[]> {
    const query = validateContactQuery(options);
    const contacts = await this.call('list', () => this.store.list(query));
    this.logger.debug('Contacts listed', {
      skip: query.skip,
      limit: query.limit,
      search: query.search !== undefined ? truncateString(query.search, 64) : undefined,
      count: contacts.length,
    });
    return contacts;
  }

  async get(id: unknown): Promise<Contact> {
    const contactId = validateContactId(id);
    const contact = await this.call('get', () => this.store.findById(contactId));
    if (!contact) {
      throw new NotFoundError('Contact', contactId);
    }
    return contact;
  }

  /**
   * Partial update: only fields present in `changes` are overwritten.
   * An empty change set returns the stored contact unchanged.
   */
  async update(id: unknown, changes: unknown): Promise<Contact> {
    const contactId = validateContactId(id);
    const validChanges = validateContactChanges(changes);
    const updated = await this.call('update', () =>
      this.store.update(contactId, validChanges)
    );
    if (!updated) {
      throw new NotFoundError('Contact', contactId);
    }
    this.logger.info('Contact updated', {
      contactId,
      fields: Object.keys(validChanges),
    });
    return updated;
  }

  /**
   * Hard delete
   * @returns the contact as it was immediately before deletion
   */
  async delete(id: unknown): Promise<Contact> {
    const contactId = validateContactId(id);
    const removed = await this.call('delete', () => this.store.remove(contactId));
    if (!removed) {
      throw new NotFoundError('Contact', contactId);
    }
    this.logger.info('Contact deleted', { contactId });
    return removed;
  }

  /**
   * Run a store call. Domain errors pass through; anything else is a
   * datastore failure and becomes StoreUnavailableError.
   */
  private async call<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      this.logger.error('Contact store failure', {
        operation,
        error: errorToLog(error),
      });
      if (isContactError(error)) {
        throw error;
      }
      throw new StoreUnavailableError(`Contact store failed during ${operation}`, error);
    }
  }
}
