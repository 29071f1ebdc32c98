/**
 * errors.ts — failures raised during the OAuth authorization-code handshake.
 */

// Protocol error reported by the provider, either on the redirect or by the token endpoint
export class OAuthError extends Error {
  readonly code = 'OAUTH_ERROR';
  readonly errorCode: string;
  readonly description: string;

  constructor(errorCode?: string | null, description?: string | null) {
    const code = errorCode || 'unknown';
    const reason = description || 'Unknown reason';
    super(`OAuth error (${code}): ${reason}`);
    this.name = 'OAuthError';
    this.errorCode = code;
    this.description = reason;
  }
}

// The redirect URL or the token endpoint response is not something we can use
export class OAuthValidationError extends Error {
  readonly code = 'OAUTH_INVALID_RESPONSE';

  constructor(message: string) {
    super(message);
    this.name = 'OAuthValidationError';
  }
}
