/**
 * Storage/persistence configuration schema
 * Backend selection and location for credential records
 */

import { z } from 'zod';

/**
 * Storage configuration schema
 */
export const StorageConfigSchema = z.object({
  // One <userId>.json credential file per connected user lives here
  TOKENS_DIR: z.string().min(1),

  // 'memory' keeps records for the lifetime of the process only
  CREDENTIAL_STORE_TYPE: z.enum(['memory', 'file']).default('file'),
});

export type StorageConfig = z.infer<typeof StorageConfigSchema>;
