/**
 * Base configuration schema
 * Runtime environment, callback HTTP listener and chat access settings
 */

import { z } from 'zod';

/**
 * Base configuration schema (non-secret settings)
 */
export const BaseConfigSchema = z.object({
  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),

  // OAuth consent callback listener
  OAUTH_CALLBACK_PORT: z.number().int().min(1).max(65535).default(8080),
  OAUTH_CALLBACK_HOST: z.string().default('0.0.0.0'),

  // Comma-separated Discord user ids; empty allows every sender
  ALLOWED_DISCORD_USER_IDS: z.string().default(''),

  // Concurrent tool executions per process
  TOOL_WORKER_CONCURRENCY: z.number().int().min(1).max(64).default(4),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

/**
 * Chat transport secrets
 */
export const DiscordSecretsSchema = z.object({
  DISCORD_BOT_TOKEN: z.string().optional(),
});

export type DiscordSecrets = z.infer<typeof DiscordSecretsSchema>;
