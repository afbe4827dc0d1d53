/**
 * Credential Record Store Interface
 *
 * Raw keyed storage for one credential record per user id. Expiry and
 * refresh are decided one layer up; stores never look inside a record.
 *
 * Implementations:
 * - FileCredentialRecordStore: one JSON file per user, survives restarts
 * - MemoryCredentialRecordStore: tests and throwaway runs
 */

import type { CredentialRecord } from '../types.js';

export interface CredentialRecordStore {
  /**
   * Whether an entry exists. Does not read or validate it.
   */
  has(_userId: string): Promise<boolean>;

  /**
   * @returns the stored record, or null when there is none
   */
  read(_userId: string): Promise<CredentialRecord | null>;

  /**
   * Replace the stored record in full
   */
  write(_userId: string, _record: CredentialRecord): Promise<void>;
}
