import got, { type Got } from 'got';
import type { Authentication } from './authentication.js';

/**
 * TokenAuthentication — static bearer token for the MoneyBird API.
 *
 * Also used underneath OAuthAuthentication once a token has been obtained.
 */
export class TokenAuthentication implements Authentication {
  private token: string;

  constructor(authToken = '') {
    this.token = authToken;
  }

  get authToken(): string {
    return this.token;
  }

  setToken(authToken: string): void {
    this.token = authToken;
  }

  isReady(): boolean {
    return this.token.length > 0;
  }

  getSession(): Got {
    return got.extend({
      headers: {
        'Authorization': `Bearer ${this.token}`,
      },
    });
  }
}
