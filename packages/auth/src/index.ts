/**
 * @docdesk/auth
 *
 * Per-user Google OAuth: credential lifecycle, consent flow, request-scoped
 * identity and authenticated API clients.
 */

export * from './errors.js';
export * from './scopes.js';
export * from './client-secrets.js';
export * from './token-client.js';
export * from './credential-store.js';
export * from './authorization-flow.js';
export * from './identity-context.js';
export * from './google-services.js';
export * from './allowlist.js';
