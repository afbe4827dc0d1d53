/**
 * Credential Record Store Factory
 *
 * - 'file': FileCredentialRecordStore in the given directory (default)
 * - 'memory': MemoryCredentialRecordStore
 */

import type { CredentialRecordStore } from '../interfaces/credential-record-store.js';
import { FileCredentialRecordStore } from '../stores/file/file-credential-record-store.js';
import { MemoryCredentialRecordStore } from '../stores/memory/memory-credential-record-store.js';
import { logger } from '../logger.js';

export type CredentialRecordStoreType = 'memory' | 'file';

export interface CredentialRecordStoreFactoryOptions {
  type?: CredentialRecordStoreType;

  /**
   * Tokens directory for the file store. Required when type is 'file'.
   */
  directory?: string;
}

export class CredentialRecordStoreFactory {
  static create(options: CredentialRecordStoreFactoryOptions = {}): CredentialRecordStore {
    const storeType = options.type ?? 'file';

    switch (storeType) {
      case 'memory':
        logger.info('Creating in-memory credential record store');
        return new MemoryCredentialRecordStore();

      case 'file':
        if (!options.directory) {
          throw new Error('File credential store requires a directory');
        }
        logger.info('Creating file-based credential record store', { directory: options.directory });
        return new FileCredentialRecordStore({ directory: options.directory });

      default: {
        const unknownType: never = storeType;
        throw new Error(`Unknown credential store type: ${String(unknownType)}`);
      }
    }
  }
}
