/**
 * @docdesk/bot
 * Discord DM transport
 */

export * from './messages.js';
export type { ReplyAttachment, ReplyChannel } from './reply-channel.js';
export { MessageHandler, attachmentFor, type MessageHandlerOptions } from './message-handler.js';
export * from './discord/components.js';
export * from './discord/views.js';
export { DiscordReplyChannel, type FollowUp } from './discord/discord-reply-channel.js';
export { DiscordDmNotifier, type DirectMessageUser, type UserDirectory } from './discord/dm-notifier.js';
export {
  DiscordBot,
  createDiscordClient,
  shouldHandleMessage,
  type DiscordBotOptions,
  type InboundMessage,
} from './discord/discord-bot.js';
