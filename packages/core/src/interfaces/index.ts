export type { ContactStore } from './contact-store.js';
export type { Logger } from './logger.js';
export { noopLogger } from './logger.js';
