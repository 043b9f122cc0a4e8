/**
 * Error taxonomy
 *
 * Only ConfigError is fatal (at startup). The rest are logged by the sync
 * engine and turned into a zero count for the affected unit of work.
 */

/** Invalid or missing configuration at startup */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/** Upstream connectivity probe failed; routing switches to the proxy */
export class ConnectivityError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConnectivityError';
  }
}

/** One upstream page could not be fetched or decoded */
export class FetchError extends Error {
  /** HTTP status when the upstream answered with a non-success code */
  readonly status?: number;

  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super(message, options);
    this.name = 'FetchError';
    this.status = options?.status;
  }
}

/** One upstream row did not have the expected shape */
export class MalformedRecordError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MalformedRecordError';
  }
}

/** A table or row operation failed */
export class PersistenceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
