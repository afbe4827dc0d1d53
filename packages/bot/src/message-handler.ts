/**
 * Message handler
 *
 * One inbound chat message in, one or more replies out. Users without a
 * usable Google grant get the consent link; everyone else gets the agent,
 * run with their identity bound so tools resolve their credentials.
 */

import type { AgentReply, DocumentAgent } from '@docdesk/agent';
import type { AuthorizationFlowCoordinator, CredentialStore, RequestIdentityContext } from '@docdesk/auth';
import { errorMessage } from '@docdesk/auth';
import { logger } from '@docdesk/observability';
import type { PendingInteraction } from '@docdesk/tools';
import { CONNECT_PROMPT, failureReply, splitMessage } from './messages.js';
import type { ReplyAttachment, ReplyChannel } from './reply-channel.js';

export interface MessageHandlerOptions {
  credentials: Pick<CredentialStore, 'isConnected'>;
  coordinator: Pick<AuthorizationFlowCoordinator, 'buildConsentUrl'>;
  identity: RequestIdentityContext;
  agent: Pick<DocumentAgent, 'invoke'>;
}

/**
 * The component to attach to the last reply chunk. A reconnect request
 * wins over everything, then a picker, then a form; among several of a
 * kind the latest wins.
 */
export function attachmentFor(
  interactions: readonly PendingInteraction[],
  consentUrl: () => string
): ReplyAttachment | undefined {
  let reconnect = false;
  let picker: ReplyAttachment | undefined;
  let form: ReplyAttachment | undefined;

  for (const interaction of interactions) {
    switch (interaction.kind) {
      case 'reconnect':
        reconnect = true;
        break;
      case 'document-picker':
        picker = { type: 'document-picker', documents: interaction.documents };
        break;
      case 'form':
        form = { type: 'form', form: interaction.form };
        break;
    }
  }

  if (reconnect) {
    return { type: 'connect', url: consentUrl() };
  }
  return picker ?? form;
}

export class MessageHandler {
  constructor(private readonly options: MessageHandlerOptions) {}

  /**
   * Handle one message. Never rejects: failures are logged and, where
   * possible, reported back in the conversation.
   */
  async process(userId: string, content: string, channel: ReplyChannel): Promise<void> {
    try {
      await this.handle(userId, content, channel);
    } catch (error) {
      logger.error('Message handling failed', { userId, error: errorMessage(error) });
      try {
        await channel.send(failureReply(errorMessage(error)));
      } catch (sendError) {
        logger.warn('Could not report failure to user', { userId, error: errorMessage(sendError) });
      }
    }
  }

  private async handle(userId: string, content: string, channel: ReplyChannel): Promise<void> {
    if (!(await this.options.credentials.isConnected(userId))) {
      const url = this.options.coordinator.buildConsentUrl(userId);
      logger.info('Prompting user to connect Google', { userId });
      await channel.send(CONNECT_PROMPT, { type: 'connect', url });
      return;
    }

    const { reply, interactions } = await channel.withTyping(() => this.runAgent(userId, content));

    const chunks = splitMessage(reply);
    const attachment = attachmentFor(interactions, () => this.options.coordinator.buildConsentUrl(userId));
    for (const [index, chunk] of chunks.entries()) {
      const isLast = index === chunks.length - 1;
      await channel.send(chunk, isLast ? attachment : undefined);
    }
  }

  private async runAgent(userId: string, content: string): Promise<AgentReply> {
    try {
      return await this.options.identity.run(userId, () =>
        this.options.agent.invoke({ threadId: userId, message: content })
      );
    } catch (error) {
      logger.warn('Agent run failed', { userId, error: errorMessage(error) });
      return { reply: failureReply(errorMessage(error)), interactions: [] };
    }
  }
}
