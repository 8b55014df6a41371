/**
 * Centralized error type definitions for the procurement digest job
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Missing or invalid environment input. Raised before any network call.
 */
export class ConfigurationError extends AppError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIGURATION_ERROR', { issues });
  }
}

/**
 * The portal could not be queried (unreachable, non-retryable status or retries exhausted)
 */
export class FetchError extends AppError {
  public readonly statusCode?: number;
  public readonly attempts: number;
  public readonly pagesFetched: number;

  constructor(
    message: string,
    options: { statusCode?: number; attempts: number; pagesFetched?: number; context?: Record<string, unknown> }
  ) {
    super(message, 'FETCH_ERROR', {
      statusCode: options.statusCode,
      attempts: options.attempts,
      ...options.context,
    });
    this.statusCode = options.statusCode;
    this.attempts = options.attempts;
    this.pagesFetched = options.pagesFetched ?? 0;
  }
}

/**
 * A single portal record could not be mapped. Recovered locally by skipping it.
 */
export class MalformedRecordError extends AppError {
  constructor(reason: string, public readonly field: string) {
    super(`Malformed record: ${reason}`, 'MALFORMED_RECORD', { field });
  }
}

/**
 * The email transport failed after its retry budget
 */
export class DeliveryError extends AppError {
  constructor(message: string, public readonly attempts: number) {
    super(message, 'DELIVERY_ERROR', { attempts });
  }
}
