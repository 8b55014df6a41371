/**
 * Error Sanitization Utility
 *
 * Strips credentials from error messages before they reach logs or
 * surface in an error raised to the caller.
 */

const MAX_INPUT_LENGTH = 10000;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Sanitize an error message
 *
 * @param secrets - Literal values that must never appear (e.g. the SMTP password)
 */
export function sanitizeErrorMessage(errorMessage: string, secrets: readonly string[] = []): string {
  let sanitized = errorMessage;
  if (sanitized.length > MAX_INPUT_LENGTH) {
    sanitized = sanitized.substring(0, MAX_INPUT_LENGTH) + '...[truncated]';
  }

  for (const secret of secrets) {
    if (secret.length === 0) continue;
    sanitized = sanitized.replace(new RegExp(escapeRegExp(secret), 'g'), '[redacted]');
  }

  sanitized = sanitized.replace(/(password|passwd|senha)([:\s=]+)[^\s,;]{1,100}/gi, '$1$2[redacted]');
  sanitized = sanitized.replace(/(token|secret|credential)([:\s=]+)[^\s,;]{1,100}/gi, '$1$2[redacted]');
  // AUTH PLAIN / LOGIN payloads echoed back by some SMTP servers
  sanitized = sanitized.replace(/\bAUTH\s+(PLAIN|LOGIN)\s+\S+/gi, 'AUTH $1 [redacted]');

  return sanitized;
}

/**
 * Sanitized message of an unknown thrown value
 */
export function describeError(error: unknown, secrets: readonly string[] = []): string {
  const message = error instanceof Error ? error.message : String(error);
  return sanitizeErrorMessage(message, secrets);
}
