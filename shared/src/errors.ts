/**
 * Raised when an environment variable or config file value cannot be used.
 * Thrown at startup; nothing recovers from it.
 */
export class ConfigurationError extends Error {
  constructor(
    public variable: string,
    message: string,
  ) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigurationError';
    Error.captureStackTrace(this, this.constructor);
  }
}
