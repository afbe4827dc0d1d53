/**
 * Environment configuration for docdesk
 * Combines all configuration schemas and separates loggable settings from secrets
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { BaseConfigSchema, DiscordSecretsSchema } from './base-config.js';
import { GoogleConfigSchema, GoogleSecretsSchema } from './google-config.js';
import { AgentConfigSchema, LLMSecretsSchema } from './agent-config.js';
import { StorageConfigSchema } from './storage-config.js';

/**
 * Non-secret configuration schema (safe to log)
 */
export const ConfigurationSchema = BaseConfigSchema
  .merge(GoogleConfigSchema)
  .merge(AgentConfigSchema)
  .merge(StorageConfigSchema);

/**
 * Secret configuration schema (never log)
 */
export const SecretsSchema = DiscordSecretsSchema
  .merge(GoogleSecretsSchema)
  .merge(LLMSecretsSchema);

/**
 * Combined environment schema
 */
export const EnvironmentSchema = ConfigurationSchema.merge(SecretsSchema);

export type Configuration = z.infer<typeof ConfigurationSchema>;
export type Secrets = z.infer<typeof SecretsSchema>;
export type Environment = z.infer<typeof EnvironmentSchema>;
export type SecretName = keyof Secrets;

/**
 * Configuration status interface
 */
export interface ConfigurationStatus {
  configuration: Configuration;
  secrets: {
    configured: string[];
    missing: string[];
    total: number;
  };
}

/**
 * Logger interface for optional logging
 */
export interface ConfigLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: Error | unknown): void;
}

export class ConfigurationError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export const DEFAULT_TOKENS_DIR = join(homedir(), 'AgentWorkspace', 'tokens');

/**
 * Expand a leading `~` to the current user's home directory
 */
export function expandHome(path: string): string {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return Number.parseInt(value, 10);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Environment configuration manager
 */
export class EnvironmentConfig {
  private static _instance: Environment | null = null;
  private static _configStatus: ConfigurationStatus | null = null;
  private static _logger: ConfigLogger | null = null;

  /**
   * Set optional logger for configuration messages
   */
  static setLogger(logger: ConfigLogger): void {
    this._logger = logger;
  }

  /**
   * Load and validate environment configuration
   */
  static load(): Environment {
    if (this._instance) {
      return this._instance;
    }

    // Parse environment variables with type conversion
    const env = {
      // Base configuration
      NODE_ENV: process.env.NODE_ENV || 'development',
      LOG_LEVEL: nonEmpty(process.env.LOG_LEVEL)?.toLowerCase(),
      OAUTH_CALLBACK_PORT: parseInteger(process.env.OAUTH_CALLBACK_PORT, 8080),
      OAUTH_CALLBACK_HOST: process.env.OAUTH_CALLBACK_HOST || '0.0.0.0',
      ALLOWED_DISCORD_USER_IDS: process.env.ALLOWED_DISCORD_USER_IDS ?? '',
      TOOL_WORKER_CONCURRENCY: parseInteger(process.env.TOOL_WORKER_CONCURRENCY, 4),

      // Google
      OAUTH_REDIRECT_URI: nonEmpty(process.env.OAUTH_REDIRECT_URI),
      GOOGLE_CLIENT_SECRETS_FILE: process.env.GOOGLE_CLIENT_SECRETS_FILE || 'credentials.json',
      GOOGLE_DIARY_DOC_ID: process.env.GOOGLE_DIARY_DOC_ID?.trim() ?? '',
      GOOGLE_CLIENT_ID: nonEmpty(process.env.GOOGLE_CLIENT_ID),
      GOOGLE_CLIENT_SECRET: nonEmpty(process.env.GOOGLE_CLIENT_SECRET),

      // Agent
      AGENT_MODEL: nonEmpty(process.env.AGENT_MODEL),
      AGENT_MAX_TOKENS: parseInteger(process.env.AGENT_MAX_TOKENS, 4096),
      AGENT_MAX_ITERATIONS: parseInteger(process.env.AGENT_MAX_ITERATIONS, 8),
      ANTHROPIC_API_KEY: nonEmpty(process.env.ANTHROPIC_API_KEY),

      // Storage
      TOKENS_DIR: expandHome(nonEmpty(process.env.TOKENS_DIR) ?? DEFAULT_TOKENS_DIR),
      CREDENTIAL_STORE_TYPE: nonEmpty(process.env.CREDENTIAL_STORE_TYPE),

      // Discord
      DISCORD_BOT_TOKEN: nonEmpty(process.env.DISCORD_BOT_TOKEN),
    };

    const result = EnvironmentSchema.safeParse(env);
    if (!result.success) {
      const issues = result.error.errors.map(err => `${err.path.join('.')}: ${err.message}`);
      if (this._logger) {
        this._logger.error('Environment configuration validation failed', { issues });
      }
      throw new ConfigurationError(`Invalid environment configuration: ${issues.join(', ')}`, issues);
    }

    this._instance = result.data;
    this._configStatus = this.analyzeConfiguration(result.data);
    return this._instance;
  }

  /**
   * Analyze configuration and separate secrets
   */
  private static analyzeConfiguration(env: Environment): ConfigurationStatus {
    const configuration = ConfigurationSchema.parse(env);

    // Analyze secrets without exposing their values
    const values: Record<string, unknown> = { ...env };
    const secretKeys = Object.keys(SecretsSchema.shape);
    const configured: string[] = [];
    const missing: string[] = [];

    for (const key of secretKeys) {
      const value = values[key];
      if (typeof value === 'string' && value.length > 0) {
        configured.push(key);
      } else {
        missing.push(key);
      }
    }

    return {
      configuration,
      secrets: {
        configured,
        missing,
        total: secretKeys.length
      }
    };
  }

  /**
   * Get current environment configuration
   */
  static get(): Environment {
    return this.load();
  }

  /**
   * Get configuration status
   */
  static getConfigurationStatus(): ConfigurationStatus {
    if (!this._configStatus) {
      this.load();
    }
    if (!this._configStatus) {
      throw new Error('Configuration status not initialized after load()');
    }
    return this._configStatus;
  }

  /**
   * Log configuration status (requires logger to be set)
   */
  static logConfiguration(): void {
    if (!this._logger) {
      return;
    }

    const status = this.getConfigurationStatus();

    this._logger.info('Configuration loaded', { configuration: status.configuration });

    this._logger.info('Secrets Status', {
      totalSecrets: status.secrets.total,
      configuredCount: status.secrets.configured.length,
      configured: status.secrets.configured.join(', ') || 'none',
      missingCount: status.secrets.missing.length,
      missing: status.secrets.missing.join(', ') || 'none'
    });

    if (!this.get().GOOGLE_DIARY_DOC_ID) {
      this._logger.info('Diary document not configured; append_diary will report how to set it');
    }
  }

  /**
   * Return a secret or fail with the variable name that needs setting
   */
  static requireSecret(name: SecretName): string {
    const value = this.get()[name];
    if (!value) {
      throw new ConfigurationError(`Missing required secret: ${name}`, [name]);
    }
    return value;
  }

  /**
   * Reset configuration (useful for testing)
   */
  static reset(): void {
    this._instance = null;
    this._configStatus = null;
  }

  /**
   * Parsed Discord allowlist. Empty means unrestricted.
   */
  static getAllowedDiscordUserIds(): string[] {
    return this.get().ALLOWED_DISCORD_USER_IDS
      .split(',')
      .map(id => id.trim())
      .filter(id => id.length > 0);
  }

  /**
   * Get OAuth callback listener configuration
   */
  static getServerConfig(): { port: number; host: string } {
    const env = this.get();

    return {
      port: env.OAUTH_CALLBACK_PORT,
      host: env.OAUTH_CALLBACK_HOST,
    };
  }

  static getAgentConfig(): { model: string; maxTokens: number; maxIterations: number } {
    const env = this.get();

    return {
      model: env.AGENT_MODEL,
      maxTokens: env.AGENT_MAX_TOKENS,
      maxIterations: env.AGENT_MAX_ITERATIONS,
    };
  }
}
