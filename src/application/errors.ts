/**
 * Application-level errors for HTTP layer mapping.
 */
export class DatabaseUnavailableError extends Error {
  constructor(
    message = 'Database not available. Check DATABASE_URL and DATABASE_NAME environment variables.'
  ) {
    super(message);
    this.name = 'DatabaseUnavailableError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
