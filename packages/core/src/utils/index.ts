/**
 * Utility functions shared by stores and transports
 */

export { mergeContact } from './merge.js';
export { serializeForLog, truncateString, errorToLog } from './logging.js';
export { withStoreTracing } from './store-wrapper.js';
