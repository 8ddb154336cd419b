import { ZoteroConfig, libraryPrefix } from '../config';
import { ZoteroApiError } from '../errors';
import {
  logApiRequest,
  logApiResponse,
  logApiError,
  logBackoff,
  generateCorrelationId,
} from '../logging';
import { withRetry, RetryConfig, sleep } from './retry';

export const ZOTERO_API_VERSION = '3';

/**
 * HTTP request options for the Zotero API client
 */
export interface ZoteroRequestOptions {
  method?: 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';
  /** JSON-encoded unless a form or raw body is given */
  body?: unknown;
  form?: Record<string, string>;
  raw?: Buffer;
  query?: Record<string, string | number>;
  headers?: Record<string, string>;
  retryConfig?: RetryConfig;
  /** Endpoint outside the library prefix (e.g. /items/new) */
  unprefixed?: boolean;
  /** Absolute URL outside the API (upload targets): no API key, no library prefix */
  external?: boolean;
}

export interface ZoteroResponse {
  status: number;
  headers: Record<string, string>;
  data: unknown;
}

/**
 * Zotero Web API HTTP client
 *
 * Features:
 * - API key and version headers
 * - Error handling with ZoteroApiError
 * - Backoff header honoured before the next request
 * - Retry logic with exponential backoff
 * - Request/response logging
 */
export class ZoteroHttpClient {
  private readonly apiBase: string;
  private readonly prefix: string;
  private backoffUntil = 0;

  constructor(
    private readonly config: ZoteroConfig,
    private readonly retryConfig?: RetryConfig
  ) {
    this.apiBase = config.apiBase.replace(/\/+$/, '');
    this.prefix = libraryPrefix(config);
  }

  /**
   * Make a request relative to the library (`/items` → `/users/<id>/items`)
   *
   * @throws {ZoteroApiError} On API errors
   */
  async request(
    endpoint: string,
    options: ZoteroRequestOptions = {}
  ): Promise<ZoteroResponse> {
    const { method = 'GET', external = false } = options;
    const url = this.buildUrl(endpoint, options.query, external, options.unprefixed ?? false);
    const correlationId = generateCorrelationId();

    return withRetry(
      async () => {
        await this.waitForBackoff();

        const headers: Record<string, string> = { ...options.headers };
        let body: RequestInit['body'];

        if (!external) {
          headers['Zotero-API-Key'] = this.config.apiKey;
          headers['Zotero-API-Version'] = ZOTERO_API_VERSION;
        }

        if (options.raw) {
          body = new Uint8Array(options.raw);
        } else if (options.form) {
          headers['Content-Type'] = 'application/x-www-form-urlencoded';
          body = new URLSearchParams(options.form).toString();
        } else if (options.body !== undefined) {
          headers['Content-Type'] = 'application/json';
          body = JSON.stringify(options.body);
        }

        logApiRequest(method, url, correlationId);
        const startTime = Date.now();

        let response: Response;
        try {
          response = await fetch(url, { method, headers, body });
        } catch (error) {
          logApiError(method, url, error, correlationId);
          throw new ZoteroApiError(
            `Network error: ${error instanceof Error ? error.message : String(error)}`
          );
        }

        this.recordBackoff(response);
        return this.handleResponse(response, method, url, correlationId, Date.now() - startTime);
      },
      options.retryConfig ?? this.retryConfig,
      { method, url }
    );
  }

  private buildUrl(
    endpoint: string,
    query: Record<string, string | number> | undefined,
    external: boolean,
    unprefixed: boolean
  ): string {
    const base = external
      ? endpoint
      : `${this.apiBase}${unprefixed ? '' : this.prefix}${endpoint}`;
    if (!query || Object.keys(query).length === 0) {
      return base;
    }
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      params.set(key, String(value));
    }
    return `${base}${base.includes('?') ? '&' : '?'}${params.toString()}`;
  }

  private async waitForBackoff(): Promise<void> {
    const remaining = this.backoffUntil - Date.now();
    if (remaining > 0) {
      await sleep(remaining);
    }
  }

  private recordBackoff(response: Response): void {
    const backoff = response.headers.get('backoff');
    if (!backoff) {
      return;
    }
    const seconds = parseInt(backoff, 10);
    if (!isNaN(seconds) && seconds > 0) {
      logBackoff(seconds, 'backoff');
      this.backoffUntil = Math.max(this.backoffUntil, Date.now() + seconds * 1000);
    }
  }

  /**
   * Handle response, parsing JSON or throwing errors
   */
  private async handleResponse(
    response: Response,
    method: string,
    url: string,
    correlationId: string,
    duration: number
  ): Promise<ZoteroResponse> {
    const headers = Object.fromEntries(response.headers.entries());
    const text = await response.text();

    if (response.ok) {
      logApiResponse(method, url, response.status, correlationId, duration);
      return { status: response.status, headers, data: parseBody(text) };
    }

    const error = new ZoteroApiError(
      text.trim() || `Zotero API error: ${response.status}`,
      response.status,
      text,
      headers
    );

    logApiError(method, url, error, correlationId);

    throw error;
  }

  async get(
    endpoint: string,
    options?: Omit<ZoteroRequestOptions, 'method' | 'body'>
  ): Promise<ZoteroResponse> {
    return this.request(endpoint, { ...options, method: 'GET' });
  }

  async post(
    endpoint: string,
    body?: unknown,
    options?: Omit<ZoteroRequestOptions, 'method' | 'body'>
  ): Promise<ZoteroResponse> {
    return this.request(endpoint, { ...options, method: 'POST', body });
  }
}

function parseBody(text: string): unknown {
  if (text.length === 0) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
