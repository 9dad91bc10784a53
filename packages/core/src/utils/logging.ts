/**
 * Log record helpers for store failures and search text
 */

/**
 * Deep-copy a value through JSON so the logger never holds a live reference.
 * Values JSON cannot represent (cycles, BigInt) become a marker string.
 */
export function serializeForLog(value: unknown): unknown {
  if (value === null || typeof value !== 'object') return value;
  try {
    return JSON.parse(JSON.stringify(value));
  } catch (err) {
    return `[Unserializable object: ${err instanceof Error ? err.message : String(err)}]`;
  }
}

/** Cap free text (e.g. a search string) before it goes into a log line */
export function truncateString(text: string, maxLength = 500): string {
  return text.length <= maxLength ? text : `${text.slice(0, maxLength)}...`;
}

/**
 * Create a safe log object from an error
 * Follows `cause` one level so wrapped driver errors stay visible.
 */
export function errorToLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const entry: Record<string, unknown> = {
      type: error.name,
      message: error.message,
      stack: error.stack,
    };
    if (error.cause !== undefined) {
      entry.cause =
        error.cause instanceof Error
          ? { type: error.cause.name, message: error.cause.message }
          : serializeForLog(error.cause);
    }
    return entry;
  }

  if (typeof error === 'object' && error !== null) {
    return { type: 'object', value: serializeForLog(error) };
  }

  return {
    type: typeof error,
    message: String(error),
  };
}

