import type { Logger } from 'pino';

// Options passed to the MoneybirdClient constructor
export interface MoneybirdClientOptions {
  /** API root, the version segment is appended to it. Defaults to https://moneybird.com/api/ */
  baseUrl?: string;
  logger?: Logger;
}

// Administration (tenant) ids are 18-digit numbers; strings avoid precision loss
export type AdministrationId = string | number;

// Request body for POST and PATCH, sent as JSON
export type RequestData = Record<string, unknown>;

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';
