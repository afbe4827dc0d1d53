/**
 * Discord gateway client for direct messages
 */

import {
  ChannelType,
  Client,
  Events,
  GatewayIntentBits,
  Partials,
  type Message,
} from 'discord.js';
import { errorMessage, isUserAllowed, type AllowlistConfig } from '@docdesk/auth';
import { logger } from '@docdesk/observability';
import type { MessageHandler } from '../message-handler.js';
import { DiscordReplyChannel } from './discord-reply-channel.js';
import { DiscordDmNotifier } from './dm-notifier.js';

export interface InboundMessage {
  authorId: string;
  authorIsBot: boolean;
  isDirectMessage: boolean;
}

/**
 * Only direct messages from people (not bots, not ourselves) on the
 * allowlist reach the handler
 */
export function shouldHandleMessage(
  message: InboundMessage,
  selfId: string | undefined,
  allowlist: AllowlistConfig
): boolean {
  if (message.authorId === selfId || message.authorIsBot) {
    return false;
  }
  if (!message.isDirectMessage) {
    return false;
  }
  return isUserAllowed(message.authorId, allowlist);
}

export function createDiscordClient(): Client {
  return new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.DirectMessages,
      GatewayIntentBits.MessageContent,
    ],
    // DM channels are not cached before their first message
    partials: [Partials.Channel],
  });
}

export interface DiscordBotOptions {
  client: Client;
  handler: MessageHandler;
  allowlist: AllowlistConfig;
  onReady?: (notifier: DiscordDmNotifier) => void;
}

export class DiscordBot {
  private readonly client: Client;

  constructor(private readonly options: DiscordBotOptions) {
    this.client = options.client;

    this.client.once(Events.ClientReady, ready => {
      logger.info('Discord client ready', { user: ready.user.tag, userId: ready.user.id });
      this.options.onReady?.(new DiscordDmNotifier(ready.users));
    });

    this.client.on(Events.MessageCreate, message => {
      this.onMessage(message);
    });

    this.client.on(Events.Error, error => {
      logger.error('Discord client error', { error: error.message });
    });
  }

  async start(token: string): Promise<void> {
    await this.client.login(token);
  }

  async stop(): Promise<void> {
    await this.client.destroy();
    logger.info('Discord client stopped');
  }

  private onMessage(message: Message): void {
    const channel = message.channel;
    const inbound: InboundMessage = {
      authorId: message.author.id,
      authorIsBot: message.author.bot,
      isDirectMessage: channel.type === ChannelType.DM,
    };
    if (!shouldHandleMessage(inbound, this.client.user?.id, this.options.allowlist)) {
      return;
    }
    if (channel.type !== ChannelType.DM) {
      return;
    }

    const userId = message.author.id;
    const { handler } = this.options;
    const replies: DiscordReplyChannel = new DiscordReplyChannel(channel, userId, followUp =>
      handler.process(userId, followUp, replies)
    );

    handler.process(userId, message.content, replies).catch((error: unknown) => {
      logger.error('Unhandled message failure', { userId, error: errorMessage(error) });
    });
  }
}
