/**
 * Google consent redirect
 *
 * Google sends the browser here after the user approves (or declines) the
 * consent screen. The `state` parameter carries the chat user id, so no
 * server-side session is needed to know whose credentials to store.
 */

import type { NextFunction, Request, Response, Router } from 'express';
import type { AuthorizationFlowCoordinator } from '@docdesk/auth';
import { errorMessage } from '@docdesk/auth';
import { logger } from '@docdesk/observability';
import { cancelledPage, connectedPage, failurePage } from '../pages.js';
import { CONNECTED_MESSAGE, type UserNotifier } from '../notifier.js';
import { queryParam, setOAuthAntiCachingHeaders } from '../oauth-helpers.js';

export const OAUTH_CALLBACK_PATH = '/oauth/callback';

export interface OAuthCallbackRoutesOptions {
  coordinator: Pick<AuthorizationFlowCoordinator, 'exchangeCode'>;
  notifier?: UserNotifier;
}

export function setupOAuthCallbackRoutes(router: Router, options: OAuthCallbackRoutesOptions): void {
  const { coordinator, notifier } = options;

  const notifyConnected = async (userId: string): Promise<void> => {
    if (!notifier) {
      return;
    }
    try {
      await notifier.notify(userId, CONNECTED_MESSAGE);
    } catch (error) {
      logger.oauthWarn('Could not notify user after connecting', { userId, error: errorMessage(error) });
    }
  };

  const callbackHandler = async (req: Request, res: Response): Promise<void> => {
    setOAuthAntiCachingHeaders(res);

    const code = queryParam(req, 'code');
    const state = queryParam(req, 'state');
    const error = queryParam(req, 'error');

    if (error || !code || !state) {
      logger.oauthInfo('Consent flow cancelled', {
        userId: state,
        error,
        hasCode: Boolean(code),
      });
      res.status(400).type('html').send(cancelledPage());
      return;
    }

    try {
      await coordinator.exchangeCode(state, code);
    } catch (exchangeError) {
      // Already logged by the coordinator; the message is shown as-is so the
      // user can tell an expired code from a misconfiguration.
      res.status(500).type('html').send(failurePage(errorMessage(exchangeError)));
      return;
    }

    await notifyConnected(state);
    res.status(200).type('html').send(connectedPage());
  };

  router.get(OAUTH_CALLBACK_PATH, (req: Request, res: Response, next: NextFunction) => {
    callbackHandler(req, res).catch(next);
  });
}
