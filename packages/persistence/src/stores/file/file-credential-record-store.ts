/**
 * File-Based Credential Record Store
 *
 * One `<userId>.json` file per connected user inside a tokens directory.
 *
 * - Directory created on first write with 0700 permissions
 * - Files written atomically (temp file then rename) with 0600 permissions
 * - Contents validated on read; a malformed file is an error, not "absent"
 *
 * No locking: a single writer per user id is assumed.
 */

import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import type { CredentialRecordStore } from '../../interfaces/credential-record-store.js';
import {
  CREDENTIAL_FILE_VERSION,
  CredentialRecord,
  PersistedCredentialRecord,
  PersistedCredentialRecordSchema,
  validateCredentialRecord,
} from '../../types.js';
import { assertValidUserId } from '../../user-id.js';
import { logger } from '../../logger.js';

export interface FileCredentialRecordStoreOptions {
  /** Directory holding the per-user files */
  directory: string;
}

export class CorruptCredentialRecordError extends Error {
  readonly code = 'corrupt_credential_record';

  constructor(public readonly filePath: string, reason: string) {
    super(`Credential file ${filePath} is unreadable: ${reason}`);
    this.name = 'CorruptCredentialRecordError';
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function isNotFound(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT';
}

export class FileCredentialRecordStore implements CredentialRecordStore {
  private readonly directory: string;

  constructor(options: FileCredentialRecordStoreOptions) {
    this.directory = options.directory;

    logger.info('FileCredentialRecordStore initialized', { directory: this.directory });
  }

  /**
   * Path of the file that holds a user's record
   */
  pathFor(userId: string): string {
    assertValidUserId(userId);
    return join(this.directory, `${userId}.json`);
  }

  async has(userId: string): Promise<boolean> {
    const filePath = this.pathFor(userId);
    try {
      await fs.access(filePath);
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async read(userId: string): Promise<CredentialRecord | null> {
    const filePath = this.pathFor(userId);

    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        logger.debug('No credential file for user', { userId });
        return null;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new CorruptCredentialRecordError(filePath, error instanceof Error ? error.message : String(error));
    }

    const parsed = PersistedCredentialRecordSchema.safeParse(json);
    if (!parsed.success) {
      const reason = parsed.error.errors
        .map(err => `${err.path.join('.')}: ${err.message}`)
        .join(', ');
      throw new CorruptCredentialRecordError(filePath, reason);
    }

    logger.debug('Credential record loaded', {
      userId,
      updatedAt: parsed.data.updatedAt,
    });

    return parsed.data.record;
  }

  async write(userId: string, record: CredentialRecord): Promise<void> {
    const filePath = this.pathFor(userId);
    const validated = validateCredentialRecord(record);

    await fs.mkdir(this.directory, { recursive: true, mode: 0o700 });

    const data: PersistedCredentialRecord = {
      version: CREDENTIAL_FILE_VERSION,
      userId,
      updatedAt: new Date().toISOString(),
      record: validated,
    };

    // Atomic write: write to temp file, then rename
    const tempPath = `${filePath}.${randomUUID()}.tmp`;
    try {
      await fs.writeFile(tempPath, JSON.stringify(data, null, 2), { mode: 0o600 });
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await this.removeTempFile(tempPath);
      logger.error('Failed to save credential record', {
        userId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    logger.info('Credential record saved', {
      userId,
      expiresAt: new Date(record.expiresAt).toISOString(),
      renewable: record.refreshToken !== undefined,
    });
  }

  private async removeTempFile(tempPath: string): Promise<void> {
    try {
      await fs.unlink(tempPath);
    } catch (error) {
      if (!isNotFound(error)) {
        logger.warn('Failed to remove temporary credential file', {
          tempPath,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
