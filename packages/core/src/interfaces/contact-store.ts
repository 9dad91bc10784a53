import type {
  Contact,
  ContactChanges,
  ContactQuery,
  NewContact,
} from '../types/index.js';

/**
 * ContactStore
 * Persistence contract for contacts.
 *
 * Every call is one all-or-nothing unit: a failure leaves no partial write
 * visible. Implementations report datastore failures as
 * StoreUnavailableError and report a missing id by returning null.
 * Inputs are assumed to be validated already.
 */
export interface ContactStore {
  /**
   * Persist a new contact and assign its id
   */
  insert(input: NewContact): Promise<Contact>;

  /**
   * Contacts in ascending id order, filtered by `search` and paged
   */
  list(query: ContactQuery): Promise<Contact[]>;

  findById(id: number): Promise<Contact | null>;

  /**
   * Merge `changes` into the stored contact (see mergeContact)
   * @returns the merged contact, or null when the id does not exist
   */
  update(id: number, changes: ContactChanges): Promise<Contact | null>;

  /**
   * Hard-delete a contact
   * @returns the contact as it was before deletion, or null when missing
   */
  remove(id: number): Promise<Contact | null>;
}
