import { randomUUID } from 'node:crypto';
import got, { type Got } from 'got';
import type { Logger } from 'pino';
import { AuthorizationCode } from 'simple-oauth2';
import type { Authentication } from './authentication.js';
import { TokenAuthentication } from './token.js';
import { OAuthError, OAuthValidationError } from './errors.js';
import { TokenResponseSchema } from './schemas.js';
import { silentLogger } from '../logger.js';
import { withTrailingSlash } from '../url.js';

export const DEFAULT_OAUTH_URL = 'https://moneybird.com/oauth/';

export interface OAuthAuthenticationOptions {
  /** The URL MoneyBird redirects to after the user authorized the application */
  redirectUrl: string;
  clientId: string;
  clientSecret: string;
  /** Token from an earlier authorization, if any */
  authToken?: string;
  oauthBaseUrl?: string;
  logger?: Logger;
}

export interface AuthorizeUrlResult {
  url: string;
  /** Keep this around to check the redirect against (CSRF protection) */
  state: string;
}

/**
 * generateState — random OAuth state, 32 hex characters.
 */
export function generateState(): string {
  return randomUUID().replace(/-/g, '');
}

/**
 * OAuthAuthentication — authorization-code flow for the MoneyBird API.
 *
 * Wraps a TokenAuthentication: once a token has been obtained every request
 * is plain bearer-token authenticated. Until then isReady() is false and the
 * caller has to send the user through authorizeUrl() and back into
 * obtainToken().
 *
 *   const auth = new OAuthAuthentication({ redirectUrl, clientId, clientSecret });
 *   const { url, state } = auth.authorizeUrl(['sales_invoices']);
 *   // ... user authorizes, MoneyBird redirects back ...
 *   await auth.obtainToken(callbackUrl, state);
 */
export class OAuthAuthentication implements Authentication {
  readonly redirectUrl: string;
  readonly clientId: string;
  readonly tokenAuthentication: TokenAuthentication;

  private readonly clientSecret: string;
  private readonly tokenUrl: string;
  private readonly authorizationCode: AuthorizationCode;
  private readonly logger: Logger;

  constructor(options: OAuthAuthenticationOptions) {
    this.redirectUrl = options.redirectUrl;
    this.clientId = options.clientId;
    this.clientSecret = options.clientSecret;
    this.tokenAuthentication = new TokenAuthentication(options.authToken);
    this.logger = options.logger ?? silentLogger();

    const base = new URL(withTrailingSlash(options.oauthBaseUrl ?? DEFAULT_OAUTH_URL));
    const authorizeEndpoint = new URL('authorize/', base);
    const tokenEndpoint = new URL('token/', base);
    this.tokenUrl = tokenEndpoint.toString();

    // Only the URL builder is used; the code exchange happens in obtainToken
    // because MoneyBird expects the client credentials in the form body.
    this.authorizationCode = new AuthorizationCode({
      client: {
        id: this.clientId,
        secret: this.clientSecret,
      },
      auth: {
        tokenHost: tokenEndpoint.origin,
        tokenPath: tokenEndpoint.pathname,
        authorizeHost: authorizeEndpoint.origin,
        authorizePath: authorizeEndpoint.pathname,
      },
    });
  }

  /**
   * Returns the URL to send the user to so they can authorize the application,
   * together with the state that URL carries. A state is generated when none
   * is passed.
   */
  authorizeUrl(scope: string[], state?: string): AuthorizeUrlResult {
    const resolvedState = state ?? this.createState();
    const url = this.authorizationCode.authorizeURL({
      redirect_uri: this.redirectUrl,
      scope: scope.join(' '),
      state: resolvedState,
    });
    return { url, state: resolvedState };
  }

  /**
   * Exchanges the code in the URL the user was redirected back to for an
   * access token, stores it and returns it.
   *
   * An empty `state` skips the CSRF check.
   */
  async obtainToken(redirectUrl: string, state: string): Promise<string> {
    const params = parseRedirectParams(redirectUrl);

    const providerError = params.get('error');
    if (providerError !== null) {
      this.logger.warn({ error: providerError }, 'Error received in OAuth authentication response');
      throw new OAuthError(providerError, params.get('error_description'));
    }

    const code = params.get('code');
    if (!code) {
      this.logger.error('The provided URL is not a valid OAuth authentication response: no code');
      throw new OAuthValidationError('The provided URL is not a valid OAuth authentication response: no code');
    }

    if (state && params.get('state') !== state) {
      this.logger.warn('OAuth CSRF attack detected: the state in the provided URL does not equal the given state');
      throw new OAuthValidationError('CSRF attack detected: the state in the provided URL does not equal the given state');
    }

    const response = await got.post(this.tokenUrl, {
      form: {
        grant_type: 'authorization_code',
        code,
        redirect_uri: this.redirectUrl,
        client_id: this.clientId,
        client_secret: this.clientSecret,
      },
      headers: {
        'Accept': 'application/json',
      },
      responseType: 'text',
      throwHttpErrors: false,
      retry: { limit: 0 },
    });

    const payload = parseTokenBody(response.body);
    if (payload === undefined) {
      this.logger.error({ statusCode: response.statusCode }, 'The OAuth server returned an invalid response when obtaining a token: JSON error');
      throw new OAuthValidationError('The OAuth server returned an invalid response when obtaining a token: JSON error');
    }

    // Any `error` key is a failure, whatever its value
    if (typeof payload === 'object' && payload !== null && 'error' in payload) {
      const errorCode = describeErrorCode(payload.error);
      const description = 'error_description' in payload && typeof payload.error_description === 'string'
        ? payload.error_description
        : undefined;
      this.logger.warn({ error: errorCode }, 'Error while obtaining OAuth authorization token');
      throw new OAuthError(errorCode, description);
    }

    const token = TokenResponseSchema.safeParse(payload);
    if (!token.success) {
      this.logger.error('The OAuth server returned an invalid response when obtaining a token: no access token');
      throw new OAuthValidationError('The OAuth server returned an invalid response when obtaining a token: no access token');
    }

    this.tokenAuthentication.setToken(token.data.access_token);
    this.logger.debug({ state }, 'Obtained OAuth authorization token');

    return token.data.access_token;
  }

  // Restores a token persisted from an earlier exchange
  setToken(authToken: string): void {
    this.tokenAuthentication.setToken(authToken);
  }

  isReady(): boolean {
    return this.tokenAuthentication.isReady();
  }

  getSession(): Got {
    return this.tokenAuthentication.getSession();
  }

  private createState(): string {
    const state = generateState();
    this.logger.debug({ state }, 'Generated OAuth state');
    return state;
  }
}

function parseRedirectParams(redirectUrl: string): URLSearchParams {
  try {
    // Callbacks often arrive as a bare path and query, e.g. req.originalUrl
    return new URL(redirectUrl, 'http://localhost').searchParams;
  } catch {
    throw new OAuthValidationError('The provided URL is not a valid OAuth authentication response: malformed URL');
  }
}

// undefined when the body is not JSON
function parseTokenBody(body: string): unknown {
  try {
    const payload: unknown = JSON.parse(body);
    return payload;
  } catch {
    return undefined;
  }
}

function describeErrorCode(value: unknown): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  return typeof value === 'string' ? value : JSON.stringify(value);
}
