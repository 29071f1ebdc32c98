/**
 * moneybird-client
 *
 * MoneyBird API client with token and OAuth authentication and typed errors
 */

// Authentication
export type { Authentication } from './auth/authentication.js';
export { TokenAuthentication } from './auth/token.js';
export { OAuthAuthentication, DEFAULT_OAUTH_URL, generateState } from './auth/oauth.js';
export type { OAuthAuthenticationOptions, AuthorizeUrlResult } from './auth/oauth.js';
export { OAuthError, OAuthValidationError } from './auth/errors.js';
export type { TokenResponse } from './auth/schemas.js';

// Client
export { MoneybirdClient, VERSION, DEFAULT_API_URL, API_VERSION } from './client/MoneybirdClient.js';
export type { MoneybirdClientOptions, AdministrationId, RequestData, HttpMethod } from './client/types.js';
export {
  MoneybirdApiError,
  isApiError,
  classifyStatus,
  UNKNOWN_STATUS_DESCRIPTION,
} from './client/errors.js';
export type { ApiErrorKind, ApiErrorDetails } from './client/errors.js';

// Configuration & logging
export { loadConfig, createAuthentication, ConfigError } from './config.js';
export type { MoneybirdConfig, OAuthClientConfig } from './config.js';
export { createLogger } from './logger.js';
export type { CreateLoggerOptions } from './logger.js';
