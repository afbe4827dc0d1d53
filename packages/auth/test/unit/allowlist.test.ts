/**
 * Unit tests for the sender allowlist
 */

import { logger } from '@docdesk/observability';
import { createAllowlistConfig, isUserAllowed } from '../../src/index.js';

describe('allowlist', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should warn once when no ids are configured', () => {
    const warn = vi.spyOn(logger, 'warn');

    createAllowlistConfig([]);

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('Sender allowlist not configured - all Discord users will be served', {
      hint: 'Set ALLOWED_DISCORD_USER_IDS to restrict access',
    });
  });

  it('should allow everyone when no ids are configured', () => {
    const config = createAllowlistConfig([]);

    expect(config.enabled).toBe(false);
    expect(isUserAllowed('anyone', config)).toBe(true);
  });

  it('should ignore blank entries', () => {
    const config = createAllowlistConfig([' ', '']);

    expect(config.enabled).toBe(false);
  });

  it('should only allow listed ids', () => {
    const config = createAllowlistConfig([' 111 ', '222']);

    expect(config.enabled).toBe(true);
    expect(isUserAllowed('111', config)).toBe(true);
    expect(isUserAllowed('222', config)).toBe(true);
    expect(isUserAllowed('333', config)).toBe(false);
  });
});
