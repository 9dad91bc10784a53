import type { Contact, ContactChanges } from '../types/index.js';

/**
 * Apply a sparse change set onto an existing contact.
 *
 * Only fields present in `changes` are overwritten; undefined means "not
 * supplied". `address: null` is a real value and clears the address.
 * The id is always taken from `existing`. Neither argument is mutated.
 */
export function mergeContact(existing: Contact, changes: ContactChanges): Contact {
  return {
    id: existing.id,
    first_name: changes.first_name ?? existing.first_name,
    last_name: changes.last_name ?? existing.last_name,
    email: changes.email ?? existing.email,
    phone_number: changes.phone_number ?? existing.phone_number,
    address: changes.address !== undefined ? changes.address : existing.address,
  };
}
