/**
 * ReplyChannel over a Discord DM channel
 */

import { ComponentType, type DMChannel } from 'discord.js';
import { errorMessage } from '@docdesk/auth';
import { logger } from '@docdesk/observability';
import type { ReplyAttachment, ReplyChannel } from '../reply-channel.js';
import { connectButtonRow } from './components.js';
import {
  DocumentPickerView,
  FORM_LIFETIME_MS,
  FormView,
  PICKER_LIFETIME_MS,
  type PickerSelection,
} from './views.js';

/** Discord clears the typing indicator after about ten seconds */
const TYPING_REFRESH_MS = 9 * 1000;

type SentMessage = Awaited<ReturnType<DMChannel['send']>>;

export type FollowUp = (content: string) => Promise<void>;

export class DiscordReplyChannel implements ReplyChannel {
  constructor(
    private readonly channel: Pick<DMChannel, 'send' | 'sendTyping'>,
    private readonly ownerId: string,
    private readonly followUp: FollowUp
  ) {}

  async send(content: string, attachment?: ReplyAttachment): Promise<void> {
    if (!attachment) {
      await this.channel.send({ content });
      return;
    }

    switch (attachment.type) {
      case 'connect':
        await this.channel.send({ content, components: [connectButtonRow(attachment.url)] });
        return;
      case 'document-picker': {
        const view = new DocumentPickerView(this.ownerId, attachment.documents);
        const message = await this.channel.send({ content, components: [view.row()] });
        this.collectPicks(message, view);
        return;
      }
      case 'form': {
        const view = new FormView(this.ownerId, attachment.form);
        const message = await this.channel.send({ content, components: [view.buttonRow()] });
        this.collectFormPresses(message, view);
        return;
      }
    }
  }

  async withTyping<T>(work: () => Promise<T>): Promise<T> {
    const pulse = (): void => {
      this.channel.sendTyping().catch((error: unknown) => {
        logger.debug('Typing indicator failed', { error: errorMessage(error) });
      });
    };

    pulse();
    const timer = setInterval(pulse, TYPING_REFRESH_MS);
    try {
      return await work();
    } finally {
      clearInterval(timer);
    }
  }

  private collectPicks(message: SentMessage, view: DocumentPickerView): void {
    const collector = message.createMessageComponentCollector({
      componentType: ComponentType.StringSelect,
      time: PICKER_LIFETIME_MS,
    });

    collector.on('collect', interaction => {
      this.onPick(view, interaction, () => collector.stop('selected')).catch((error: unknown) => {
        logger.warn('Document picker interaction failed', { userId: this.ownerId, error: errorMessage(error) });
      });
    });

    collector.on('end', (_collected, reason) => {
      if (reason !== 'time') {
        return;
      }
      message.edit({ components: [view.row(true)] }).catch((error: unknown) => {
        logger.debug('Could not disable expired picker', { error: errorMessage(error) });
      });
    });
  }

  private async onPick(
    view: DocumentPickerView,
    interaction: PickerSelection,
    settle: () => void
  ): Promise<void> {
    const followUp = await view.select(interaction);
    if (followUp === undefined) {
      return;
    }
    settle();
    await this.followUp(followUp);
  }

  private collectFormPresses(message: SentMessage, view: FormView): void {
    const collector = message.createMessageComponentCollector({
      componentType: ComponentType.Button,
      time: FORM_LIFETIME_MS,
    });

    collector.on('collect', interaction => {
      const opened = view.open(interaction).then(async shown => {
        if (!shown) {
          return;
        }
        collector.stop('opened');
        await message.edit({ components: [view.buttonRow(true)] });

        const submission = await interaction.awaitModalSubmit({
          time: FORM_LIFETIME_MS,
          filter: modal => modal.customId === view.modalId,
        });
        await this.followUp(await view.submit(submission));
      });

      opened.catch((error: unknown) => {
        logger.warn('Form interaction failed or expired', { userId: this.ownerId, error: errorMessage(error) });
      });
    });

    collector.on('end', (_collected, reason) => {
      if (reason !== 'time') {
        return;
      }
      message.edit({ components: [view.buttonRow(true)] }).catch((error: unknown) => {
        logger.debug('Could not disable expired form button', { error: errorMessage(error) });
      });
    });
  }
}
