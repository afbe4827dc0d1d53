/**
 * Google OAuth client configuration
 *
 * Reads the client secret bundle downloaded from the Google Cloud console
 * (`{"web": {...}}` or `{"installed": {...}}`). GOOGLE_CLIENT_ID and
 * GOOGLE_CLIENT_SECRET override the bundle when both are set.
 */

import { promises as fs } from 'node:fs';
import { z } from 'zod';
import { ClientSecretsError, errorMessage } from './errors.js';

export interface GoogleClientConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

const ClientEntrySchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
});

const ClientSecretsBundleSchema = z
  .object({
    web: ClientEntrySchema.optional(),
    installed: ClientEntrySchema.optional(),
  })
  .refine(bundle => bundle.web !== undefined || bundle.installed !== undefined, {
    message: 'expected a "web" or "installed" client entry',
  });

export interface LoadClientConfigOptions {
  secretsFile: string;
  clientId?: string;
  clientSecret?: string;
  /** OAUTH_REDIRECT_URI; falls back to the bundle's first redirect URI */
  redirectUri?: string;
}

function resolveRedirectUri(explicit: string | undefined, fromBundle: string[] | undefined): string {
  const redirectUri = explicit ?? fromBundle?.[0];
  if (!redirectUri) {
    throw new ClientSecretsError('No OAuth redirect URI configured: set OAUTH_REDIRECT_URI');
  }
  return redirectUri;
}

export async function loadGoogleClientConfig(options: LoadClientConfigOptions): Promise<GoogleClientConfig> {
  if (options.clientId && options.clientSecret) {
    return {
      clientId: options.clientId,
      clientSecret: options.clientSecret,
      redirectUri: resolveRedirectUri(options.redirectUri, undefined),
    };
  }

  let raw: string;
  try {
    raw = await fs.readFile(options.secretsFile, 'utf8');
  } catch (error) {
    throw new ClientSecretsError(
      `Cannot read Google client secrets file ${options.secretsFile}: ${errorMessage(error)}`,
      { secretsFile: options.secretsFile }
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ClientSecretsError(`Google client secrets file is not JSON: ${errorMessage(error)}`);
  }

  const parsed = ClientSecretsBundleSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.errors.map(err => `${err.path.join('.') || '(root)'}: ${err.message}`).join(', ');
    throw new ClientSecretsError(`Invalid Google client secrets file: ${issues}`);
  }

  const entry = parsed.data.web ?? parsed.data.installed;
  if (!entry) {
    throw new ClientSecretsError('Invalid Google client secrets file: no client entry');
  }

  return {
    clientId: entry.client_id,
    clientSecret: entry.client_secret,
    redirectUri: resolveRedirectUri(options.redirectUri, entry.redirect_uris),
  };
}
