/**
 * Unit tests for AuthorizationFlowCoordinator
 */

import type { Mock } from 'vitest';
import { MemoryCredentialRecordStore, InvalidUserIdError } from '@docdesk/persistence';
import {
  AuthorizationFlowCoordinator,
  CodeExchangeError,
  CredentialStore,
  DOCUMENT_SCOPES,
  GoogleOAuthTokenClient,
  type OAuthTokenClient,
  type TokenGrant,
} from '../../src/index.js';

const clientConfig = {
  clientId: 'test-client-id',
  clientSecret: 'test-secret',
  redirectUri: 'http://localhost:8080/oauth/callback',
};

describe('AuthorizationFlowCoordinator', () => {
  describe('buildConsentUrl', () => {
    const tokenClient = new GoogleOAuthTokenClient(clientConfig);
    const records = new MemoryCredentialRecordStore();
    const coordinator = new AuthorizationFlowCoordinator(
      tokenClient,
      new CredentialStore(records, tokenClient)
    );

    it('should request offline access with forced consent and every document scope', () => {
      const url = new URL(coordinator.buildConsentUrl('123456789'));

      expect(url.origin).toBe('https://accounts.google.com');
      expect(url.searchParams.get('access_type')).toBe('offline');
      expect(url.searchParams.get('prompt')).toBe('consent');
      expect(url.searchParams.get('scope')).toBe(DOCUMENT_SCOPES.join(' '));
      expect(url.searchParams.get('state')).toBe('123456789');
      expect(url.searchParams.get('client_id')).toBe('test-client-id');
      expect(url.searchParams.get('redirect_uri')).toBe('http://localhost:8080/oauth/callback');
      expect(url.searchParams.get('response_type')).toBe('code');
    });

    it('should be a pure function of its input', () => {
      expect(coordinator.buildConsentUrl('42')).toBe(coordinator.buildConsentUrl('42'));
      expect(coordinator.buildConsentUrl('42')).not.toBe(coordinator.buildConsentUrl('43'));
    });

    it('should not touch storage', async () => {
      coordinator.buildConsentUrl('42');

      expect(await records.has('42')).toBe(false);
    });

    it('should reject ids that cannot be stored', () => {
      expect(() => coordinator.buildConsentUrl('../42')).toThrow(InvalidUserIdError);
    });
  });

  describe('exchangeCode', () => {
    let records: MemoryCredentialRecordStore;
    let exchangeCode: Mock<(code: string) => Promise<TokenGrant>>;
    let coordinator: AuthorizationFlowCoordinator;

    beforeEach(() => {
      records = new MemoryCredentialRecordStore();
      exchangeCode = vi.fn<(code: string) => Promise<TokenGrant>>();
      const tokenClient: OAuthTokenClient = {
        buildAuthUrl: () => 'https://example.test/consent',
        exchangeCode,
        refresh: vi.fn(),
      };
      coordinator = new AuthorizationFlowCoordinator(tokenClient, new CredentialStore(records, tokenClient));
    });

    it('should persist and return the exchanged credentials', async () => {
      const grant: TokenGrant = {
        accessToken: 'access-1',
        refreshToken: 'refresh-1',
        expiresAt: 1_900_000_000_000,
        scopes: [...DOCUMENT_SCOPES],
        tokenType: 'Bearer',
      };
      exchangeCode.mockResolvedValue(grant);

      const record = await coordinator.exchangeCode('42', 'one-time-code');

      expect(exchangeCode).toHaveBeenCalledWith('one-time-code');
      expect(record).toEqual(grant);
      expect(await records.read('42')).toEqual(grant);
    });

    it('should record the requested scopes when the response omits them', async () => {
      exchangeCode.mockResolvedValue({ accessToken: 'access-1', expiresAt: 5 });

      const record = await coordinator.exchangeCode('42', 'code');

      expect(record.scopes).toEqual([...DOCUMENT_SCOPES]);
      expect(record.refreshToken).toBeUndefined();
    });

    it('should surface a rejected code as CodeExchangeError without storing anything', async () => {
      exchangeCode.mockRejectedValue(new Error('invalid_grant'));

      await expect(coordinator.exchangeCode('42', 'reused-code')).rejects.toMatchObject({
        name: 'CodeExchangeError',
        code: 'exchange_failed',
        message: 'invalid_grant',
        userId: '42',
      });
      expect(await records.has('42')).toBe(false);
    });

    it('should propagate persistence failures after a successful exchange', async () => {
      exchangeCode.mockResolvedValue({ accessToken: 'access-1', expiresAt: 5 });
      const diskFull = new Error('ENOSPC');
      vi.spyOn(records, 'write').mockRejectedValue(diskFull);

      await expect(coordinator.exchangeCode('42', 'code')).rejects.toBe(diskFull);
    });

    it('should leave earlier credentials alone when the exchange fails', async () => {
      exchangeCode.mockResolvedValueOnce({ accessToken: 'access-1', expiresAt: 5, scopes: ['a'] });
      await coordinator.exchangeCode('42', 'good-code');
      exchangeCode.mockRejectedValueOnce(new Error('expired code'));

      await expect(coordinator.exchangeCode('42', 'bad-code')).rejects.toBeInstanceOf(CodeExchangeError);
      expect((await records.read('42'))?.accessToken).toBe('access-1');
    });
  });
});
