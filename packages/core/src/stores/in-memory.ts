import type { ContactStore } from '../interfaces/index.js';
import type {
  Contact,
  ContactChanges,
  ContactQuery,
  NewContact,
} from '../types/index.js';
import { mergeContact } from '../utils/merge.js';

/**
 * Case-insensitive substring match on first_name, last_name or email
 */
export function matchesSearch(contact: Contact, search: string | undefined): boolean {
  if (!search) return true;
  const needle = search.toLowerCase();
  return (
    contact.first_name.toLowerCase().includes(needle) ||
    contact.last_name.toLowerCase().includes(needle) ||
    contact.email.toLowerCase().includes(needle)
  );
}

/**
 * InMemoryContactStore
 * Simple in-memory implementation of ContactStore for testing and local development
 * Not suitable for production use
 */
export class InMemoryContactStore implements ContactStore {
  // Map iteration follows insertion order, which is ascending id order here
  private contacts = new Map<number, Contact>();
  private nextId = 1;

  async insert(input: NewContact): Promise<Contact> {
    const contact: Contact = {
      id: this.nextId++,
      first_name: input.first_name,
      last_name: input.last_name,
      email: input.email,
      phone_number: input.phone_number,
      address: input.address ?? null,
    };
    this.contacts.set(contact.id, contact);
    return { ...contact };
  }

  async list(query: ContactQuery): Promise<Contact[]> {
    return Array.from(this.contacts.values())
      .filter((contact) => matchesSearch(contact, query.search))
      .slice(query.skip, query.skip + query.limit)
      .map((contact) => ({ ...contact }));
  }

  async findById(id: number): Promise<Contact | null> {
    const contact = this.contacts.get(id);
    return contact ? { ...contact } : null;
  }

  async update(id: number, changes: ContactChanges): Promise<Contact | null> {
    const existing = this.contacts.get(id);
    if (!existing) return null;
    const merged = mergeContact(existing, changes);
    this.contacts.set(id, merged);
    return { ...merged };
  }

  async remove(id: number): Promise<Contact | null> {
    const existing = this.contacts.get(id);
    if (!existing) return null;
    this.contacts.delete(id);
    return existing;
  }

  /**
   * Clear all data (useful for testing). Ids keep increasing.
   */
  clear(): void {
    this.contacts.clear();
  }
}
