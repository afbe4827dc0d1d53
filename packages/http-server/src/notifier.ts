/**
 * Out-of-band user notification after the consent redirect completes
 */

import { logger } from '@docdesk/observability';

export const CONNECTED_MESSAGE =
  "✅ Google account connected! You can now use all Google Drive features. Just tell me what you'd like to do.";

export interface UserNotifier {
  notify(userId: string, text: string): Promise<void>;
}

/**
 * Notifier that can be attached after the HTTP server starts
 *
 * The chat client only becomes able to send messages once it has logged in,
 * which may happen after the first callback arrives. Until a target is
 * attached, notifications are dropped with a debug log.
 */
export class DeferredUserNotifier implements UserNotifier {
  private target?: UserNotifier;

  attach(target: UserNotifier): void {
    this.target = target;
  }

  detach(): void {
    this.target = undefined;
  }

  get attached(): boolean {
    return this.target !== undefined;
  }

  async notify(userId: string, text: string): Promise<void> {
    if (!this.target) {
      logger.debug('No notifier attached; skipping user notification', { userId });
      return;
    }
    await this.target.notify(userId, text);
  }
}
