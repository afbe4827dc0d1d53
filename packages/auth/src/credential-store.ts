/**
 * Credential Store
 *
 * Keyed by chat identity. `load` hands back a usable record whenever one can
 * be obtained without user interaction: an expired record with a refresh
 * token is renewed and written back before it is returned.
 */

import type { CredentialRecord, CredentialRecordStore } from '@docdesk/persistence';
import { logger } from '@docdesk/observability';
import { CredentialRefreshError, NotAuthenticatedError, errorMessage } from './errors.js';
import { DOCUMENT_SCOPES, missingScopes } from './scopes.js';
import type { OAuthTokenClient } from './token-client.js';

/** Records expiring within this window count as expired */
export const TOKEN_REFRESH_BUFFER_MS = 60 * 1000;

export interface CredentialStoreOptions {
  refreshBufferMs?: number;
  now?: () => number;
}

export class CredentialStore {
  private readonly refreshBufferMs: number;
  private readonly now: () => number;
  // Concurrent loads for one user share a single refresh round-trip
  private readonly refreshing = new Map<string, Promise<CredentialRecord>>();

  constructor(
    private readonly records: CredentialRecordStore,
    private readonly tokenClient: Pick<OAuthTokenClient, 'refresh'>,
    options: CredentialStoreOptions = {}
  ) {
    this.refreshBufferMs = options.refreshBufferMs ?? TOKEN_REFRESH_BUFFER_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Whether anything is stored for the user. Expiry is not considered.
   */
  exists(userId: string): Promise<boolean> {
    return this.records.has(userId);
  }

  /**
   * @returns null when nothing is stored; the stale record unchanged when it
   * is expired and has no refresh token
   * @throws CredentialRefreshError when the provider rejects the refresh token
   */
  async load(userId: string): Promise<CredentialRecord | null> {
    const record = await this.records.read(userId);
    if (!record) {
      return null;
    }

    if (!this.isExpired(record)) {
      return record;
    }

    const { refreshToken } = record;
    if (!refreshToken) {
      logger.oauthWarn('Stored credentials expired and cannot be renewed', { userId });
      return record;
    }

    const inFlight = this.refreshing.get(userId);
    if (inFlight) {
      return inFlight;
    }

    const pending = this.refresh(userId, record, refreshToken).finally(() => {
      this.refreshing.delete(userId);
    });
    this.refreshing.set(userId, pending);
    return pending;
  }

  /**
   * A record Google will accept now, renewed first when it has to be.
   *
   * @throws NotAuthenticatedError when nothing is stored, the record is past
   * its expiry with no way to renew it, or it lacks a required scope
   * @throws CredentialRefreshError when the provider rejects the refresh token
   */
  async requireUsable(userId: string, requiredScopes: readonly string[] = DOCUMENT_SCOPES): Promise<CredentialRecord> {
    const record = await this.load(userId);
    if (!record) {
      throw new NotAuthenticatedError('no stored credentials', userId);
    }

    // The refresh buffer only decides when to renew; an unrenewable token stays usable until it lapses
    if (record.expiresAt <= this.now()) {
      logger.oauthWarn('Refusing expired credentials without refresh token', { userId });
      throw new NotAuthenticatedError('credentials expired and cannot be renewed', userId);
    }

    const missing = missingScopes(record.scopes, requiredScopes);
    if (missing.length > 0) {
      logger.oauthWarn('Stored credentials lack required scopes', { userId, missing });
      throw new NotAuthenticatedError(`missing scopes: ${missing.join(' ')}`, userId);
    }

    return record;
  }

  /**
   * Whether the user can be served without going through consent again.
   * Storage errors propagate.
   */
  async isConnected(userId: string, requiredScopes?: readonly string[]): Promise<boolean> {
    try {
      await this.requireUsable(userId, requiredScopes);
      return true;
    } catch (error) {
      if (error instanceof NotAuthenticatedError || error instanceof CredentialRefreshError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Full overwrite of the user's record
   */
  async save(userId: string, record: CredentialRecord): Promise<void> {
    await this.records.write(userId, record);
  }

  private isExpired(record: CredentialRecord): boolean {
    return record.expiresAt - this.refreshBufferMs <= this.now();
  }

  private async refresh(userId: string, record: CredentialRecord, refreshToken: string): Promise<CredentialRecord> {
    logger.oauthInfo('Refreshing expired credentials', { userId });

    let renewed: CredentialRecord;
    try {
      const grant = await this.tokenClient.refresh(refreshToken);
      renewed = {
        accessToken: grant.accessToken,
        // Providers usually omit an unchanged refresh token or scope set
        refreshToken: grant.refreshToken ?? refreshToken,
        expiresAt: grant.expiresAt,
        scopes: grant.scopes ?? record.scopes,
        tokenType: grant.tokenType ?? record.tokenType,
      };
    } catch (error) {
      logger.oauthError('Credential refresh rejected', error);
      throw new CredentialRefreshError(
        `Failed to refresh Google credentials: ${errorMessage(error)}`,
        userId,
        { cause: errorMessage(error) }
      );
    }

    await this.records.write(userId, renewed);
    logger.oauthInfo('Credentials refreshed', {
      userId,
      expiresAt: new Date(renewed.expiresAt).toISOString(),
    });
    return renewed;
  }
}
