/**
 * In-Memory Credential Record Store
 *
 * Records are kept serialized so callers never share mutable objects with
 * the store, matching the file store's copy-on-read behaviour.
 *
 * WARNING: All records are lost on restart.
 */

import type { CredentialRecordStore } from '../../interfaces/credential-record-store.js';
import { CredentialRecordSchema, validateCredentialRecord, type CredentialRecord } from '../../types.js';
import { assertValidUserId } from '../../user-id.js';
import { logger } from '../../logger.js';

export class MemoryCredentialRecordStore implements CredentialRecordStore {
  private records = new Map<string, string>();

  constructor() {
    logger.info('MemoryCredentialRecordStore initialized');
  }

  async has(userId: string): Promise<boolean> {
    assertValidUserId(userId);
    return this.records.has(userId);
  }

  async read(userId: string): Promise<CredentialRecord | null> {
    assertValidUserId(userId);
    const serialized = this.records.get(userId);
    if (serialized === undefined) {
      return null;
    }
    return CredentialRecordSchema.parse(JSON.parse(serialized));
  }

  async write(userId: string, record: CredentialRecord): Promise<void> {
    assertValidUserId(userId);
    this.records.set(userId, JSON.stringify(validateCredentialRecord(record)));
    logger.debug('Credential record stored in memory', { userId });
  }
}
