export { ContactsClient } from './contacts-client.js';
export type { ContactsClientOptions } from './contacts-client.js';
export { HttpError } from './errors.js';
export type { HttpErrorResponse } from './errors.js';
