/**
 * Custom error types for Zotero Web API integration
 */

/**
 * Base error for Zotero API failures
 */
export class ZoteroApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly responseBody?: string,
    public readonly headers: Record<string, string> = {}
  ) {
    super(message);
    this.name = 'ZoteroApiError';
    Object.setPrototypeOf(this, ZoteroApiError.prototype);
  }

  /**
   * Check if error is a client error (4xx)
   */
  isClientError(): boolean {
    return this.statusCode !== undefined && this.statusCode >= 400 && this.statusCode < 500;
  }

  /**
   * Check if error is a server error (5xx)
   */
  isServerError(): boolean {
    return this.statusCode !== undefined && this.statusCode >= 500;
  }

  /**
   * Invalid or insufficiently privileged API key (401/403)
   */
  isUnauthorized(): boolean {
    return this.statusCode === 401 || this.statusCode === 403;
  }

  isRateLimited(): boolean {
    return this.statusCode === 429;
  }

  toHumanReadable(): string {
    const parts = [this.message];

    if (this.responseBody) {
      parts.push(`Details: ${this.responseBody}`);
    }

    if (this.statusCode) {
      parts.push(`Status: ${this.statusCode}`);
    }

    return parts.join(' | ');
  }
}

/**
 * Error for configuration issues
 */
export class ZoteroConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ZoteroConfigError';
    Object.setPrototypeOf(this, ZoteroConfigError.prototype);
  }
}

/**
 * Check if an error is transient and should be retried
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof ZoteroApiError) {
    // 429, 5xx, or no status at all (network)
    return (
      error.isRateLimited() ||
      error.isServerError() ||
      error.statusCode === undefined
    );
  }

  // Network errors from fetch
  if (error instanceof TypeError && error.message.includes('fetch')) {
    return true;
  }

  return false;
}

/**
 * Extract a seconds value from the Retry-After header, if any
 */
export function getRetryAfter(error: ZoteroApiError): number | null {
  const retryAfter = error.headers['retry-after'];

  if (retryAfter) {
    const seconds = parseInt(retryAfter, 10);
    return isNaN(seconds) ? null : seconds;
  }

  return null;
}
