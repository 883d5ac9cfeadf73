/**
 * error-helpers.ts
 * Error message and error code extraction utilities
 */

/**
 * Safely extract error message from any error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

/**
 * Returns the system or library error code carried by an error or by its cause
 * chain (e.g. ECONNREFUSED, UND_ERR_HEADERS_TIMEOUT).
 */
export function getErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code;
    }
    current = current.cause;
  }
  return undefined;
}
