/**
 * errors.ts — Typed errors for MoneyBird API responses.
 *
 * Every failed response becomes one MoneybirdApiError; the `kind` tells the
 * failures apart so callers can catch broadly (instanceof) or narrowly
 * (isApiError(error, 'NOT_FOUND')).
 */

export type ApiErrorKind =
  | 'UNAUTHORIZED'
  | 'THROTTLED'
  | 'NOT_FOUND'
  | 'INVALID_DATA'
  | 'SERVER_ERROR'
  | 'UNKNOWN';

export const UNKNOWN_STATUS_DESCRIPTION = 'Unknown status code received.';

// null marks a successful response. 400 stays UNAUTHORIZED: existing callers rely on it.
const STATUS_KINDS: ReadonlyMap<number, ApiErrorKind | null> = new Map<number, ApiErrorKind | null>([
  [200, null],
  [201, null],
  [204, null],
  [400, 'UNAUTHORIZED'],
  [401, 'UNAUTHORIZED'],
  [403, 'THROTTLED'],
  [404, 'NOT_FOUND'],
  [406, 'NOT_FOUND'],
  [422, 'INVALID_DATA'],
  [429, 'THROTTLED'],
  [500, 'SERVER_ERROR'],
]);

/**
 * classifyStatus — maps an HTTP status code to an error kind, or null when the
 * response is a success.
 */
export function classifyStatus(statusCode: number): ApiErrorKind | null {
  const kind = STATUS_KINDS.get(statusCode);
  return kind === undefined ? 'UNKNOWN' : kind;
}

/**
 * extractDescription — reads the `error` field of a decoded error body.
 *
 * MoneyBird sends either a message string or an object of per-field
 * validation messages; the latter is serialized as JSON.
 */
export function extractDescription(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('error' in body)) {
    return undefined;
  }
  const error = body.error;
  if (error === null || error === undefined || error === '') {
    return undefined;
  }
  return typeof error === 'string' ? error : JSON.stringify(error);
}

export interface ApiErrorDetails {
  statusCode: number;
  /** Decoded JSON body, null when the body was empty or not JSON */
  body: unknown;
  /** Method and URL of the request, e.g. "GET https://moneybird.com/api/v2/administrations.json" */
  request: string;
}

export class MoneybirdApiError extends Error {
  readonly kind: ApiErrorKind;
  readonly statusCode: number;
  readonly description: string | undefined;
  readonly body: unknown;
  readonly request: string;

  constructor(kind: ApiErrorKind, details: ApiErrorDetails, description?: string) {
    super(description ? `API error ${details.statusCode}: ${description}` : `API error ${details.statusCode}`);
    this.name = 'MoneybirdApiError';
    this.kind = kind;
    this.statusCode = details.statusCode;
    this.description = description;
    this.body = details.body;
    this.request = details.request;
  }
}

export function isApiError(error: unknown, kind?: ApiErrorKind): error is MoneybirdApiError {
  return error instanceof MoneybirdApiError && (kind === undefined || error.kind === kind);
}

/**
 * createApiError — builds the error for a failed response of the given kind.
 */
export function createApiError(kind: ApiErrorKind, details: ApiErrorDetails): MoneybirdApiError {
  const description = kind === 'UNKNOWN' ? UNKNOWN_STATUS_DESCRIPTION : extractDescription(details.body);
  return new MoneybirdApiError(kind, details, description);
}
