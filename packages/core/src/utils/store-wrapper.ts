/**
 * Store Wrappers
 * Higher-order functions for adding cross-cutting concerns to a ContactStore
 */

import type { ContactStore, Logger } from '../interfaces/index.js';

type StoreOperation = keyof ContactStore;

/**
 * Create a wrapper that logs every store call with timing information
 * Useful for monitoring datastore latency and debugging
 *
 * Usage:
 * ```typescript
 * const store = withStoreTracing(new SqliteContactStore('contacts.db'), logger);
 *
 * // Every call is now logged:
 * // [contacts] insert started
 * // [contacts] insert completed in 3ms
 * ```
 *
 * Errors are logged and rethrown unchanged.
 */
export function withStoreTracing(
  store: ContactStore,
  logger: Logger,
  label = 'contacts'
): ContactStore {
  async function trace<T>(operation: StoreOperation, run: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    logger.debug(`[${label}] ${operation} started`, { operation });

    try {
      const result = await run();
      const duration = Date.now() - startTime;
      logger.info(`[${label}] ${operation} completed in ${duration}ms`, {
        operation,
        duration,
        status: 'success',
      });
      return result;
    } catch (error) {
      const duration = Date.now() - startTime;
      logger.error(`[${label}] ${operation} failed after ${duration}ms`, {
        operation,
        duration,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  return {
    insert: (input) => trace('insert', () => store.insert(input)),
    list: (query) => trace('list', () => store.list(query)),
    findById: (id) => trace('findById', () => store.findById(id)),
    update: (id, changes) => trace('update', () => store.update(id, changes)),
    remove: (id) => trace('remove', () => store.remove(id)),
  };
}
