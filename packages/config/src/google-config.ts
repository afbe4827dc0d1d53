/**
 * Google OAuth configuration schema
 */

import { z } from 'zod';

/**
 * Google configuration schema (non-secret redirect URI and file locations)
 */
export const GoogleConfigSchema = z.object({
  // Must match a redirect URI registered on the OAuth client
  OAUTH_REDIRECT_URI: z.string().url().optional(),

  // Client secret bundle downloaded from the Google Cloud console
  GOOGLE_CLIENT_SECRETS_FILE: z.string().default('credentials.json'),

  // Document that append_diary writes to
  GOOGLE_DIARY_DOC_ID: z.string().default(''),
});

export type GoogleConfig = z.infer<typeof GoogleConfigSchema>;

/**
 * Google OAuth secrets schema. When both are set they take precedence
 * over the client secret bundle.
 */
export const GoogleSecretsSchema = z.object({
  GOOGLE_CLIENT_ID: z.string().optional(),
  GOOGLE_CLIENT_SECRET: z.string().optional(),
});

export type GoogleSecrets = z.infer<typeof GoogleSecretsSchema>;
