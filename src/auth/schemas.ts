/**
 * schemas.ts — Zod schemas for the MoneyBird token endpoint.
 *
 * The endpoint answers with JSON either way: an `error` field on failure,
 * an `access_token` on success. Failures are recognised by the key alone.
 */

import { z } from 'zod';

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;
