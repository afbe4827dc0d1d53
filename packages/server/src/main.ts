#!/usr/bin/env node

/**
 * docdesk entry point
 *
 * Runs the OAuth consent callback server and the Discord client in one
 * process. The callback server must be reachable at OAUTH_REDIRECT_URI.
 */

import { createAllowlistConfig, loadGoogleClientConfig } from '@docdesk/auth';
import { DiscordBot, createDiscordClient } from '@docdesk/bot';
import { EnvironmentConfig } from '@docdesk/config';
import { logger } from '@docdesk/observability';
import { setLogger as setPersistenceLogger } from '@docdesk/persistence';
import { createApplication } from './application.js';

async function main(): Promise<void> {
  try {
    EnvironmentConfig.setLogger(logger);
    const env = EnvironmentConfig.load();

    logger.info('Starting docdesk', { environment: env.NODE_ENV });
    EnvironmentConfig.logConfiguration();
    setPersistenceLogger(logger);

    const discordToken = EnvironmentConfig.requireSecret('DISCORD_BOT_TOKEN');
    const clientConfig = await loadGoogleClientConfig({
      secretsFile: env.GOOGLE_CLIENT_SECRETS_FILE,
      clientId: env.GOOGLE_CLIENT_ID,
      clientSecret: env.GOOGLE_CLIENT_SECRET,
      redirectUri: env.OAUTH_REDIRECT_URI,
    });

    const app = createApplication({ env, clientConfig });
    logger.info('Document tools loaded', { tools: app.tools.getNames() });

    const bot = new DiscordBot({
      client: createDiscordClient(),
      handler: app.handler,
      allowlist: createAllowlistConfig(EnvironmentConfig.getAllowedDiscordUserIds()),
      onReady: notifier => app.notifier.attach(notifier),
    });

    await app.callbackServer.start();
    await bot.start(discordToken);

    const handleShutdown = async (signal: string): Promise<void> => {
      logger.info('Received shutdown signal, shutting down gracefully', { signal });
      try {
        app.notifier.detach();
        await bot.stop();
        await app.callbackServer.stop();
        logger.info('Server stopped successfully');
        process.exit(0);
      } catch (error) {
        logger.error('Error during shutdown', error);
        process.exit(1);
      }
    };

    process.once('SIGINT', () => void handleShutdown('SIGINT'));
    process.once('SIGTERM', () => void handleShutdown('SIGTERM'));
  } catch (error) {
    logger.error('Server startup failed', error);
    process.exit(1);
  }
}

main().catch(error => {
  logger.error('Unhandled server error', error);
  process.exit(1);
});
