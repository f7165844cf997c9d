import { z } from 'zod';

/**
 * Token endpoint response for both the authorization_code and refresh_token
 * grants. A refresh answer usually carries no refresh_token.
 */
export const tokenResponseSchema = z.object({
  access_token: z.string().optional(),
  id_token: z.string().optional(),
  /** Lifetime of the access token in seconds */
  expires_in: z.number().int().optional(),
  token_type: z.string().optional(),
  refresh_token: z.string().optional(),
});

export type TokenResponse = z.infer<typeof tokenResponseSchema>;
