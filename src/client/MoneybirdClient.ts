import type { Got, Response } from 'got';
import type { Logger } from 'pino';
import type { Authentication } from '../auth/authentication.js';
import { silentLogger } from '../logger.js';
import { withTrailingSlash, withoutLeadingSlashes } from '../url.js';
import { classifyStatus, createApiError } from './errors.js';
import type { AdministrationId, HttpMethod, MoneybirdClientOptions, RequestData } from './types.js';

export const VERSION = '1.0.0';
export const DEFAULT_API_URL = 'https://moneybird.com/api/';
export const API_VERSION = 'v2';

// Decoded body, null when the body is empty or not JSON
function decodeBody<T>(body: string): T | null {
  try {
    return JSON.parse(body);
  } catch {
    return null;
  }
}

/**
 * MoneybirdClient — HTTP client for the MoneyBird REST API.
 *
 * Design constraints:
 *   - One session (got instance) per client, built from the authentication
 *     strategy; renewSession() replaces it, nothing mutates it
 *   - No retries, no rate limiting, no pagination: each call is exactly one
 *     HTTP exchange and every non-success status rejects with a
 *     MoneybirdApiError (see errors.ts for the status table)
 *   - Resource paths are relative to the API version, with an optional
 *     administration segment in front: get('contacts', 123) requests
 *     https://moneybird.com/api/v2/123/contacts.json
 */
export class MoneybirdClient {
  readonly authentication: Authentication;
  readonly baseUrl: string;

  private readonly logger: Logger;
  private session: Got;

  constructor(authentication: Authentication, options: MoneybirdClientOptions = {}) {
    this.authentication = authentication;
    this.baseUrl = withTrailingSlash(options.baseUrl ?? DEFAULT_API_URL);
    this.logger = options.logger ?? silentLogger();
    this.session = this.createSession();
  }

  /**
   * GET request — returns the decoded JSON body.
   *
   *   await client.get('administrations');
   *   await client.get('contacts/synchronization', 123);
   */
  async get<T = unknown>(resourcePath: string, administrationId?: AdministrationId): Promise<T | null> {
    return this.request<T>('GET', resourcePath, administrationId);
  }

  /** POST request, usually to add new data. */
  async post<T = unknown>(
    resourcePath: string,
    data: RequestData,
    administrationId?: AdministrationId,
  ): Promise<T | null> {
    return this.request<T>('POST', resourcePath, administrationId, data);
  }

  /** PATCH request, usually to change existing data. */
  async patch<T = unknown>(
    resourcePath: string,
    data: RequestData,
    administrationId?: AdministrationId,
  ): Promise<T | null> {
    return this.request<T>('PATCH', resourcePath, administrationId, data);
  }

  /**
   * DELETE request. Deletions are usually permanent.
   *
   * MoneyBird answers most deletes with 204, which resolves to null.
   */
  async delete<T = unknown>(resourcePath: string, administrationId?: AdministrationId): Promise<T | null> {
    return this.request<T>('DELETE', resourcePath, administrationId);
  }

  /**
   * Drops the current session and starts a new one from the same
   * authentication strategy, e.g. after an OAuth token was obtained.
   */
  renewSession(): void {
    this.session = this.createSession();
  }

  /** Absolute URL of the endpoint for a resource path. */
  buildUrl(resourcePath: string, administrationId?: AdministrationId): string {
    let url = `${this.baseUrl}${API_VERSION}/`;
    if (administrationId !== undefined) {
      url += `${administrationId}/`;
    }
    return `${url}${withoutLeadingSlashes(resourcePath)}.json`;
  }

  private createSession(): Got {
    return this.authentication.getSession().extend({
      headers: {
        'User-Agent': `moneybird-node/${VERSION}`,
        'Accept': 'application/json',
      },
      responseType: 'text',
      // Status codes are classified in processResponse; the API is never retried
      throwHttpErrors: false,
      retry: { limit: 0 },
    });
  }

  private async request<T>(
    method: HttpMethod,
    resourcePath: string,
    administrationId?: AdministrationId,
    data?: RequestData,
  ): Promise<T | null> {
    const url = this.buildUrl(resourcePath, administrationId);
    this.logger.debug({ method, url }, `${method} ${resourcePath}`);

    let response: Response<string>;
    try {
      response = data === undefined
        ? await this.session(url, { method })
        : await this.session(url, { method, json: data });
    } catch (error) {
      this.logger.error({ method, url, err: error }, `${method} ${resourcePath} failed without a response`);
      throw error;
    }

    this.logger.debug({ method, url, statusCode: response.statusCode }, `${method} ${resourcePath} -> ${response.statusCode}`);

    return this.processResponse<T>(method, url, response);
  }

  private processResponse<T>(method: HttpMethod, url: string, response: Response<string>): T | null {
    const kind = classifyStatus(response.statusCode);
    if (kind === null) {
      return decodeBody<T>(response.body);
    }

    const error = createApiError(kind, {
      statusCode: response.statusCode,
      body: decodeBody<unknown>(response.body),
      request: `${method} ${url}`,
    });
    this.logger.warn({ kind, statusCode: error.statusCode, request: error.request }, error.message);
    throw error;
  }
}
