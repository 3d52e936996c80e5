/**
 * @fileoverview Error taxonomy for yieldwatch.
 *
 * Every error carries a machine-readable code, structured context data and
 * an ISO timestamp so it can be logged as one JSON object.
 *
 * @module @yieldwatch/contracts/errors
 */

/**
 * Base error class for all yieldwatch errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new WatchError('CUSTOM_ERROR', 'Something went wrong', { code: '2330' });
 * ```
 */
export class WatchError extends Error {
  /** Machine-readable error code (e.g. 'PROVIDER_REQUEST_FAILED') */
  readonly code: string;

  /** Structured context for debugging */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'WatchError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Thrown when a request to an external data source fails in transport
 * (timeout, DNS, connection reset, non-2xx from a listing page).
 */
export class ProviderRequestError extends WatchError {
  constructor(
    message: string,
    data: {
      provider: string;
      url?: string;
      statusCode?: number;
      [key: string]: unknown;
    }
  ) {
    super('PROVIDER_REQUEST_FAILED', message, data);
    this.name = 'ProviderRequestError';
  }
}

/**
 * Thrown when a provider answers but the payload is unusable
 * (error object, missing result, unknown symbol).
 */
export class ProviderResponseError extends WatchError {
  constructor(
    message: string,
    data: {
      provider: string;
      symbol?: string;
      [key: string]: unknown;
    }
  ) {
    super('PROVIDER_RESPONSE_INVALID', message, data);
    this.name = 'ProviderResponseError';
  }
}

/**
 * Thrown when the outbound notification call fails in transport.
 * HTTP status codes never produce this error.
 */
export class NotificationError extends WatchError {
  constructor(
    message: string,
    data: {
      code: string;
      url: string;
      [key: string]: unknown;
    }
  ) {
    super('NOTIFICATION_FAILED', message, data);
    this.name = 'NotificationError';
  }
}

/**
 * Thrown when another run holds the alert ledger lock.
 */
export class LedgerLockError extends WatchError {
  constructor(
    message: string,
    data: {
      lockPath: string;
      heldSinceMs?: number;
      [key: string]: unknown;
    }
  ) {
    super('LEDGER_LOCKED', message, data);
    this.name = 'LedgerLockError';
  }
}

/**
 * Thrown when configuration fails validation or a required value is missing.
 */
export class ConfigError extends WatchError {
  constructor(message: string, data: { issues: string[]; [key: string]: unknown }) {
    super('CONFIG_INVALID', message, data);
    this.name = 'ConfigError';
  }
}

export function isWatchError(error: unknown): error is WatchError {
  return error instanceof WatchError;
}

export function isProviderRequestError(error: unknown): error is ProviderRequestError {
  return error instanceof ProviderRequestError;
}

export function isProviderResponseError(error: unknown): error is ProviderResponseError {
  return error instanceof ProviderResponseError;
}

export function isNotificationError(error: unknown): error is NotificationError {
  return error instanceof NotificationError;
}

export function isLedgerLockError(error: unknown): error is LedgerLockError {
  return error instanceof LedgerLockError;
}

/**
 * Extracts a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
