/**
 * @docdesk/persistence
 *
 * Storage for per-user OAuth credential records.
 *
 * ```typescript
 * import { CredentialRecordStoreFactory, setLogger } from '@docdesk/persistence';
 *
 * setLogger(myLogger);
 * const store = CredentialRecordStoreFactory.create({ type: 'file', directory: '/srv/tokens' });
 * ```
 *
 * ### Memory
 * - Ephemeral, for tests
 *
 * ### File
 * - One JSON file per user, survives restarts
 * - Single-instance deployments only (no locking)
 */

export * from './types.js';
export * from './user-id.js';
export * from './interfaces/credential-record-store.js';
export * from './stores/file/file-credential-record-store.js';
export * from './stores/memory/memory-credential-record-store.js';
export * from './factories/credential-record-store-factory.js';
export { setLogger, getLogger, resetLogger, type PersistenceLogger } from './logger.js';
