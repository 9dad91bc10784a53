export type {
  Contact,
  ContactFields,
  NewContact,
  ContactChanges,
  ContactQuery,
  ListContactsOptions,
} from './contact.js';
