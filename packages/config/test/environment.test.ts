/**
 * Unit tests for EnvironmentConfig
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { preserveEnv, RecordingLogger } from '@docdesk/testing';
import { ConfigurationError, EnvironmentConfig, expandHome } from '../src/index.js';

describe('EnvironmentConfig', () => {
  let restoreEnv: () => void;

  beforeEach(() => {
    restoreEnv = preserveEnv();
    for (const key of [
      'OAUTH_CALLBACK_PORT',
      'OAUTH_REDIRECT_URI',
      'ALLOWED_DISCORD_USER_IDS',
      'TOKENS_DIR',
      'CREDENTIAL_STORE_TYPE',
      'GOOGLE_CLIENT_SECRETS_FILE',
      'GOOGLE_DIARY_DOC_ID',
      'DISCORD_BOT_TOKEN',
      'ANTHROPIC_API_KEY',
      'GOOGLE_CLIENT_ID',
      'GOOGLE_CLIENT_SECRET',
      'AGENT_MODEL',
      'AGENT_MAX_ITERATIONS',
      'LOG_LEVEL',
    ]) {
      delete process.env[key];
    }
    EnvironmentConfig.reset();
  });

  afterEach(() => {
    EnvironmentConfig.reset();
    restoreEnv();
  });

  describe('defaults', () => {
    it('should apply documented defaults', () => {
      const env = EnvironmentConfig.load();

      expect(env.OAUTH_CALLBACK_PORT).toBe(8080);
      expect(env.GOOGLE_CLIENT_SECRETS_FILE).toBe('credentials.json');
      expect(env.TOKENS_DIR).toBe(join(homedir(), 'AgentWorkspace', 'tokens'));
      expect(env.CREDENTIAL_STORE_TYPE).toBe('file');
      expect(env.AGENT_MAX_ITERATIONS).toBe(8);
      expect(env.GOOGLE_DIARY_DOC_ID).toBe('');
      expect(env.OAUTH_REDIRECT_URI).toBeUndefined();
    });

    it('should cache the parsed configuration until reset', () => {
      const first = EnvironmentConfig.load();
      process.env.OAUTH_CALLBACK_PORT = '9090';

      expect(EnvironmentConfig.load()).toBe(first);

      EnvironmentConfig.reset();
      expect(EnvironmentConfig.load().OAUTH_CALLBACK_PORT).toBe(9090);
    });
  });

  describe('validation', () => {
    it('should reject a non-numeric port', () => {
      process.env.OAUTH_CALLBACK_PORT = 'eighty';

      expect(() => EnvironmentConfig.load()).toThrow(ConfigurationError);
    });

    it('should reject an invalid redirect URI', () => {
      process.env.OAUTH_REDIRECT_URI = 'not a url';

      expect(() => EnvironmentConfig.load()).toThrow(/OAUTH_REDIRECT_URI/);
    });

    it('should reject an unknown credential store type', () => {
      process.env.CREDENTIAL_STORE_TYPE = 'redis';

      expect(() => EnvironmentConfig.load()).toThrow(/CREDENTIAL_STORE_TYPE/);
    });
  });

  describe('getAllowedDiscordUserIds', () => {
    it('should return an empty list when unset', () => {
      expect(EnvironmentConfig.getAllowedDiscordUserIds()).toEqual([]);
    });

    it('should split and trim the comma-separated list', () => {
      process.env.ALLOWED_DISCORD_USER_IDS = ' 111, 222 ,,333 ';

      expect(EnvironmentConfig.getAllowedDiscordUserIds()).toEqual(['111', '222', '333']);
    });
  });

  describe('secrets', () => {
    it('should report configured and missing secrets without values', () => {
      process.env.DISCORD_BOT_TOKEN = 'test-secret';

      const status = EnvironmentConfig.getConfigurationStatus();

      expect(status.secrets.configured).toEqual(['DISCORD_BOT_TOKEN']);
      expect(status.secrets.missing).toEqual(['GOOGLE_CLIENT_ID', 'GOOGLE_CLIENT_SECRET', 'ANTHROPIC_API_KEY']);
      expect(status.secrets.total).toBe(4);
      expect(JSON.stringify(status.configuration)).not.toContain('test-secret');
    });

    it('should return a required secret when present', () => {
      process.env.ANTHROPIC_API_KEY = 'test-key';

      expect(EnvironmentConfig.requireSecret('ANTHROPIC_API_KEY')).toBe('test-key');
    });

    it('should name the missing variable when a required secret is absent', () => {
      expect(() => EnvironmentConfig.requireSecret('DISCORD_BOT_TOKEN')).toThrow(
        'Missing required secret: DISCORD_BOT_TOKEN'
      );
    });
  });

  describe('logConfiguration', () => {
    it('should log status at info level and leave allowlist warnings to the bot', () => {
      const recorder = new RecordingLogger();
      EnvironmentConfig.setLogger(recorder);

      EnvironmentConfig.logConfiguration();

      expect(recorder.messages('warn')).toEqual([]);
      expect(recorder.messages('info')).toEqual([
        'Configuration loaded',
        'Secrets Status',
        'Diary document not configured; append_diary will report how to set it',
      ]);
    });
  });

  describe('expandHome', () => {
    it('should expand a leading tilde', () => {
      expect(expandHome('~/tokens')).toBe(join(homedir(), 'tokens'));
      expect(expandHome('/var/tokens')).toBe('/var/tokens');
    });
  });
});
