/**
 * Error kinds raised by the database lifecycle and the lookup path.
 */
export class GeoIpError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Network failure, timeout or non-success status while fetching the
 * database. Retried on the next scheduled cycle.
 */
export class DownloadError extends GeoIpError {
  readonly status?: number;

  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

/**
 * A downloaded candidate was rejected. The artifact is discarded.
 */
export class ValidationError extends GeoIpError {}

/**
 * Malformed binary structure in a database file.
 */
export class DecodeError extends GeoIpError {}

/**
 * A database handle was used after it was retired or disposed.
 */
export class DatabaseClosedError extends GeoIpError {}

/**
 * Malformed input from a caller, e.g. an invalid IP literal.
 */
export class InputError extends GeoIpError {}

/**
 * No database could be made available at startup.
 */
export class StartupError extends GeoIpError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
