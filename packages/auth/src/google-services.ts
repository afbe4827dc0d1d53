/**
 * Authenticated Google API clients for the current identity
 */

import { google, type docs_v1, type drive_v3 } from 'googleapis';
import { OAuth2Client } from 'google-auth-library';
import type { GoogleClientConfig } from './client-secrets.js';
import type { CredentialStore } from './credential-store.js';
import { NotAuthenticatedError } from './errors.js';
import type { RequestIdentityContext } from './identity-context.js';
import { DOCUMENT_SCOPES } from './scopes.js';

export interface GoogleServiceFactoryOptions {
  credentials: CredentialStore;
  identity: RequestIdentityContext;
  clientConfig: GoogleClientConfig;
  requiredScopes?: readonly string[];
}

export class GoogleServiceFactory {
  private readonly requiredScopes: readonly string[];

  constructor(private readonly options: GoogleServiceFactoryOptions) {
    this.requiredScopes = options.requiredScopes ?? DOCUMENT_SCOPES;
  }

  /**
   * OAuth2 client holding the user's access token
   *
   * @param userId defaults to the bound request identity
   * @throws NotAuthenticatedError when no usable credentials exist
   * @throws CredentialRefreshError when renewal is rejected
   */
  async authorize(userId?: string): Promise<OAuth2Client> {
    const id = userId ?? this.options.identity.current();
    if (!id) {
      throw new NotAuthenticatedError('no request identity bound');
    }

    const record = await this.options.credentials.requireUsable(id, this.requiredScopes);

    const client = new OAuth2Client(
      this.options.clientConfig.clientId,
      this.options.clientConfig.clientSecret,
      this.options.clientConfig.redirectUri
    );
    // No refresh token: renewal goes through the Credential Store so it is persisted
    client.setCredentials({
      access_token: record.accessToken,
      expiry_date: record.expiresAt,
      token_type: record.tokenType ?? 'Bearer',
      scope: record.scopes.join(' '),
    });
    return client;
  }

  async docs(userId?: string): Promise<docs_v1.Docs> {
    return google.docs({ version: 'v1', auth: await this.authorize(userId) });
  }

  async drive(userId?: string): Promise<drive_v3.Drive> {
    return google.drive({ version: 'v3', auth: await this.authorize(userId) });
  }
}
