/**
 * Sender Allowlist
 *
 * Restricts which Discord user ids the bot answers.
 * Configured via ALLOWED_DISCORD_USER_IDS; empty means everyone.
 */

import { logger } from '@docdesk/observability';

export interface AllowlistConfig {
  enabled: boolean;
  allowedUsers: Set<string>;
}

/**
 * Build allowlist configuration from parsed user ids
 */
export function createAllowlistConfig(userIds: readonly string[]): AllowlistConfig {
  const ids = userIds.map(id => id.trim()).filter(id => id.length > 0);

  if (ids.length === 0) {
    logger.warn('Sender allowlist not configured - all Discord users will be served', {
      hint: 'Set ALLOWED_DISCORD_USER_IDS to restrict access'
    });
    return { enabled: false, allowedUsers: new Set() };
  }

  logger.info('Sender allowlist loaded', { count: ids.length });

  return { enabled: true, allowedUsers: new Set(ids) };
}

export function isUserAllowed(userId: string, config: AllowlistConfig): boolean {
  if (!config.enabled) {
    return true;
  }

  const allowed = config.allowedUsers.has(userId);
  if (!allowed) {
    logger.debug('Ignoring message from user outside allowlist', { userId });
  }
  return allowed;
}
