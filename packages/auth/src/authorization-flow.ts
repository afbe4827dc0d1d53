/**
 * Authorization Flow Coordinator
 *
 * Per-user state: Unconnected -> (consent URL issued) -> AwaitingConsent ->
 * (code exchanged) -> Connected. A refresh rejection or narrowed scopes
 * sends the user back through consent.
 *
 * The OAuth `state` parameter carries the plain user id; nothing is kept
 * server-side between issuing the URL and the redirect.
 */

import type { CredentialRecord } from '@docdesk/persistence';
import { assertValidUserId } from '@docdesk/persistence';
import { logger } from '@docdesk/observability';
import { CodeExchangeError, errorMessage } from './errors.js';
import type { CredentialStore } from './credential-store.js';
import { DOCUMENT_SCOPES } from './scopes.js';
import type { OAuthTokenClient } from './token-client.js';

export class AuthorizationFlowCoordinator {
  constructor(
    private readonly tokenClient: OAuthTokenClient,
    private readonly credentials: CredentialStore,
    private readonly scopes: readonly string[] = DOCUMENT_SCOPES
  ) {}

  /**
   * Consent URL for the user: offline access, forced consent (so a refresh
   * token is always issued), every document scope in one grant.
   */
  buildConsentUrl(userId: string): string {
    assertValidUserId(userId);
    return this.tokenClient.buildAuthUrl({ scopes: this.scopes, state: userId });
  }

  /**
   * Exchange a one-time code and persist the resulting credentials
   *
   * @throws CodeExchangeError when the provider rejects the code
   */
  async exchangeCode(userId: string, code: string): Promise<CredentialRecord> {
    assertValidUserId(userId);

    let record: CredentialRecord;
    try {
      const grant = await this.tokenClient.exchangeCode(code);
      record = {
        accessToken: grant.accessToken,
        refreshToken: grant.refreshToken,
        expiresAt: grant.expiresAt,
        scopes: grant.scopes ?? [...this.scopes],
        tokenType: grant.tokenType,
      };
    } catch (error) {
      logger.oauthError('Authorization code exchange failed', { userId, error: errorMessage(error) });
      throw new CodeExchangeError(errorMessage(error), userId);
    }

    try {
      await this.credentials.save(userId, record);
    } catch (error) {
      logger.oauthError('Exchanged credentials could not be saved', { userId, error: errorMessage(error) });
      throw error;
    }

    logger.oauthInfo('Google account connected', {
      userId,
      renewable: record.refreshToken !== undefined,
      scopes: record.scopes,
    });

    return record;
  }
}
