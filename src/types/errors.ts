/**
 * Error types raised outside of log content.
 * Log content itself never raises: unreadable lines become events.
 */

/** Unusable trust catalog or config file. Fatal before any session runs. */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A consolidated session file that cannot be read or does not validate. */
export class BundleFormatError extends Error {
  override readonly name = 'BundleFormatError';

  constructor(
    message: string,
    readonly file: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
