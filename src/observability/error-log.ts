/**
 * Secret-safe error records
 *
 * One JSON line per failure on stderr, with credentials in URLs, bearer
 * tokens and sensitive keys masked.
 */

/**
 * Mask sensitive data in error messages
 */
export function maskSensitiveData(data: unknown): unknown {
  if (typeof data === 'string') {
    // Mask credentials in URLs
    let masked = data.replace(/([a-z][a-z0-9+.-]*:\/\/)[^@/\s]+@/gi, '$1***:***@');
    // Mask Bearer tokens
    masked = masked.replace(/Bearer\s+[a-zA-Z0-9-_.]+/gi, 'Bearer ***');
    return masked;
  } else if (typeof data === 'object' && data !== null) {
    const masked: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      // Mask known sensitive keys
      if (/api[_-]?key|password|token|secret|auth/i.test(key)) {
        masked[key] = '***';
      } else {
        masked[key] = maskSensitiveData(value);
      }
    }
    return masked;
  }
  return data;
}

/**
 * Safe error logger that masks secrets
 */
export function logError(error: unknown, context?: Record<string, unknown>) {
  const errorData = {
    type: 'error',
    timestamp: new Date().toISOString(),
    error: error instanceof Error ? {
      name: error.name,
      message: maskSensitiveData(error.message),
      cause: error.cause instanceof Error ? maskSensitiveData(error.cause.message) : undefined,
      stack: process.env.NODE_ENV === 'development' ? error.stack : undefined
    } : maskSensitiveData(error),
    context: context ? maskSensitiveData(context) : undefined
  };

  console.error(JSON.stringify(errorData));
}
