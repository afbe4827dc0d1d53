/**
 * Upstream OAuth token operations
 *
 * The Credential Store and the Authorization Flow Coordinator only see the
 * OAuthTokenClient interface; GoogleOAuthTokenClient backs it with
 * google-auth-library.
 */

import { OAuth2Client, type Credentials } from 'google-auth-library';
import type { GoogleClientConfig } from './client-secrets.js';
import { parseScopes } from './scopes.js';
import { logger } from '@docdesk/observability';

/** Used when a token response carries no expiry */
export const DEFAULT_TOKEN_LIFETIME_MS = 3600 * 1000;

/**
 * Normalized token endpoint response
 */
export interface TokenGrant {
  accessToken: string;
  refreshToken?: string;
  /** Epoch milliseconds */
  expiresAt: number;
  /** Absent when the response did not list scopes */
  scopes?: string[];
  tokenType?: string;
}

export interface ConsentUrlRequest {
  scopes: readonly string[];
  state: string;
}

export interface OAuthTokenClient {
  /** Pure: builds the provider consent URL */
  buildAuthUrl(_request: ConsentUrlRequest): string;
  exchangeCode(_code: string): Promise<TokenGrant>;
  refresh(_refreshToken: string): Promise<TokenGrant>;
}

export interface GoogleOAuthTokenClientOptions {
  /** Clock override (tests) */
  now?: () => number;
}

export class GoogleOAuthTokenClient implements OAuthTokenClient {
  private readonly oauth2Client: OAuth2Client;
  private readonly now: () => number;

  constructor(private readonly config: GoogleClientConfig, options: GoogleOAuthTokenClientOptions = {}) {
    this.oauth2Client = this.createClient();
    this.now = options.now ?? Date.now;
  }

  /**
   * Fresh client so per-call credentials never leak between users
   */
  createClient(): OAuth2Client {
    return new OAuth2Client(
      this.config.clientId,
      this.config.clientSecret,
      this.config.redirectUri
    );
  }

  buildAuthUrl(request: ConsentUrlRequest): string {
    return this.oauth2Client.generateAuthUrl({
      access_type: 'offline',
      prompt: 'consent',
      scope: [...request.scopes],
      state: request.state,
    });
  }

  async exchangeCode(code: string): Promise<TokenGrant> {
    const { tokens } = await this.createClient().getToken({
      code,
      redirect_uri: this.config.redirectUri,
    });

    logger.oauthDebug('Authorization code exchanged', {
      provider: 'google',
      hasRefreshToken: Boolean(tokens.refresh_token),
      hasExpiry: tokens.expiry_date !== null && tokens.expiry_date !== undefined,
    });

    return this.toGrant(tokens);
  }

  async refresh(refreshToken: string): Promise<TokenGrant> {
    const client = this.createClient();
    client.setCredentials({ refresh_token: refreshToken });

    const { credentials } = await client.refreshAccessToken();

    return this.toGrant(credentials);
  }

  private toGrant(tokens: Credentials): TokenGrant {
    if (!tokens.access_token) {
      throw new Error('No access token received');
    }

    return {
      accessToken: tokens.access_token,
      refreshToken: tokens.refresh_token ?? undefined,
      expiresAt: tokens.expiry_date ?? this.now() + DEFAULT_TOKEN_LIFETIME_MS,
      scopes: parseScopes(tokens.scope),
      tokenType: tokens.token_type ?? undefined,
    };
  }
}
