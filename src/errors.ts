/**
 * Raised when an operation needs a collaborator that was never wired in:
 * no search client, no connection resolver, an unknown connection name or
 * an unknown cache driver. Not retryable.
 */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';

  constructor(message: string) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SearchBackendError extends Error {
  override readonly name = 'SearchBackendError';

  constructor(
    message: string,
    override readonly cause?: unknown,
    readonly statusCode?: number,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class CacheStoreError extends Error {
  override readonly name = 'CacheStoreError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
