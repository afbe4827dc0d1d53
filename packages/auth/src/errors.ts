/**
 * Authentication error taxonomy
 *
 * Every error carries a stable `code` so transports can map failures to
 * user-facing text without string matching.
 */

export { InvalidUserIdError } from '@docdesk/persistence';

export const RECONNECT_INSTRUCTIONS =
  "Google account not connected. Send me any message and click 'Connect Google'.";

export class OAuthError extends Error {
  constructor(
    message: string,
    public code: string,
    public provider?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'OAuthError';
  }
}

/**
 * No usable credentials for the current identity: nothing stored, no
 * identity bound, expired without a refresh token, or scopes narrowed.
 * The message is the remediation text shown to the user.
 */
export class NotAuthenticatedError extends OAuthError {
  constructor(public readonly reason: string, public readonly userId?: string) {
    super(RECONNECT_INSTRUCTIONS, 'not_authenticated', 'google', { reason, userId });
    this.name = 'NotAuthenticatedError';
  }
}

/**
 * The provider rejected a refresh token (revoked or expired grant)
 */
export class CredentialRefreshError extends OAuthError {
  constructor(message: string, public readonly userId: string, details?: unknown) {
    super(message, 'refresh_failed', 'google', details);
    this.name = 'CredentialRefreshError';
  }
}

/**
 * A one-time authorization code was invalid, expired or already used
 */
export class CodeExchangeError extends OAuthError {
  constructor(message: string, public readonly userId: string, details?: unknown) {
    super(message, 'exchange_failed', 'google', details);
    this.name = 'CodeExchangeError';
  }
}

export class IdentityContextError extends OAuthError {
  constructor(message: string) {
    super(message, 'identity_context');
    this.name = 'IdentityContextError';
  }
}

export class ClientSecretsError extends OAuthError {
  constructor(message: string, details?: unknown) {
    super(message, 'client_secrets', 'google', details);
    this.name = 'ClientSecretsError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
