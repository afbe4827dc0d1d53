/**
 * @docdesk/http-server
 * Express app for the Google consent redirect and health check
 */

export { createApp, CallbackServer, type CallbackAppOptions, type CallbackServerOptions } from './app.js';
export { escapeHtml, cancelledPage, connectedPage, failurePage } from './pages.js';
export { CONNECTED_MESSAGE, DeferredUserNotifier, type UserNotifier } from './notifier.js';
export { setOAuthAntiCachingHeaders, queryParam } from './oauth-helpers.js';
export { setupHealthRoutes, type HealthResponse, type HealthRoutesOptions } from './routes/health-routes.js';
export {
  setupOAuthCallbackRoutes,
  OAUTH_CALLBACK_PATH,
  type OAuthCallbackRoutesOptions,
} from './routes/oauth-callback-routes.js';
