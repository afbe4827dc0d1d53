/**
 * Credential record types shared by all stores
 */

import { z } from 'zod';

/**
 * OAuth credentials held for one chat identity.
 *
 * `expiresAt` is epoch milliseconds. A record without `refreshToken`
 * cannot be renewed once it expires.
 */
export interface CredentialRecord {
  accessToken: string;
  refreshToken?: string;
  expiresAt: number;
  scopes: string[];
  tokenType?: string;
}

export const CredentialRecordSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).optional(),
  expiresAt: z.number().int().nonnegative(),
  scopes: z.array(z.string()),
  tokenType: z.string().optional(),
});

export class InvalidCredentialRecordError extends Error {
  readonly code = 'invalid_credential_record';

  constructor(reason: string) {
    super(`Credential record rejected: ${reason}`);
    this.name = 'InvalidCredentialRecordError';
  }
}

/**
 * Check a record before it is stored, so whatever is written reads back
 *
 * @throws InvalidCredentialRecordError
 */
export function validateCredentialRecord(record: CredentialRecord): CredentialRecord {
  const parsed = CredentialRecordSchema.safeParse(record);
  if (!parsed.success) {
    throw new InvalidCredentialRecordError(
      parsed.error.errors.map(err => `${err.path.join('.')}: ${err.message}`).join(', ')
    );
  }
  return parsed.data;
}

export const CREDENTIAL_FILE_VERSION = 1;

/**
 * On-disk envelope around a record
 */
export const PersistedCredentialRecordSchema = z.object({
  version: z.literal(CREDENTIAL_FILE_VERSION),
  userId: z.string(),
  updatedAt: z.string(),
  record: CredentialRecordSchema,
});

export type PersistedCredentialRecord = z.infer<typeof PersistedCredentialRecordSchema>;
