/**
 * Contact domain type
 * A person's contact details. Field names double as the stored column
 * names and the JSON representation.
 */
export interface Contact {
  /** Store-assigned identifier, never changes */
  id: number;

  first_name: string;

  last_name: string;

  /** Syntactically valid email address */
  email: string;

  phone_number: string;

  /** Postal address, null when not supplied */
  address: string | null;
}

/**
 * Writable contact fields (everything except the id)
 */
export type ContactFields = Omit<Contact, "id">;

/**
 * Input for creating a contact. Address may be omitted.
 */
export type NewContact = Omit<ContactFields, "address"> & {
  address?: string | null;
};

/**
 * Sparse change set for a partial update.
 * A key that is absent (or undefined) leaves the stored value untouched.
 */
export type ContactChanges = Partial<ContactFields>;

/**
 * List / search parameters after defaults are applied
 */
export interface ContactQuery {
  /** Number of matches to skip */
  skip: number;

  /** Maximum number of contacts to return */
  limit: number;

  /** Case-insensitive substring matched against first_name, last_name and email */
  search?: string;
}

/**
 * Caller-facing list options, all optional
 */
export type ListContactsOptions = Partial<ContactQuery>;
