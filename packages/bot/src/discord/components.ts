/**
 * Discord message components for replies
 */

import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  ModalBuilder,
  StringSelectMenuBuilder,
  StringSelectMenuOptionBuilder,
  TextInputBuilder,
  TextInputStyle,
} from 'discord.js';
import { truncate, type DocumentSummary, type FormDefinition } from '@docdesk/tools';

export const SELECT_OPTION_LABEL_MAX_LENGTH = 100;

export function connectButtonRow(url: string): ActionRowBuilder<ButtonBuilder> {
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder()
      .setLabel('Connect Google')
      .setStyle(ButtonStyle.Link)
      .setURL(url)
      .setEmoji('🔗')
  );
}

export function modifiedDescription(document: DocumentSummary): string {
  return `Modified ${document.modifiedTime?.slice(0, 10) || 'unknown'}`;
}

export function documentPickerRow(
  customId: string,
  documents: readonly DocumentSummary[],
  disabled = false
): ActionRowBuilder<StringSelectMenuBuilder> {
  const options = documents.map(document =>
    new StringSelectMenuOptionBuilder()
      .setLabel(truncate(document.name, SELECT_OPTION_LABEL_MAX_LENGTH))
      .setValue(document.id)
      .setDescription(modifiedDescription(document))
  );

  return new ActionRowBuilder<StringSelectMenuBuilder>().addComponents(
    new StringSelectMenuBuilder()
      .setCustomId(customId)
      .setPlaceholder('Choose a document…')
      .setDisabled(disabled)
      .addOptions(options)
  );
}

export function formButtonRow(customId: string, disabled = false): ActionRowBuilder<ButtonBuilder> {
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder()
      .setCustomId(customId)
      .setLabel('Open Form')
      .setStyle(ButtonStyle.Primary)
      .setEmoji('📝')
      .setDisabled(disabled)
  );
}

export function formFieldId(index: number): string {
  return `field-${index}`;
}

export function formModal(customId: string, form: FormDefinition): ModalBuilder {
  const rows = form.fields.map((field, index) => {
    const input = new TextInputBuilder()
      .setCustomId(formFieldId(index))
      .setLabel(field.label)
      .setStyle(field.long ? TextInputStyle.Paragraph : TextInputStyle.Short)
      .setRequired(true);
    if (field.placeholder) {
      input.setPlaceholder(field.placeholder);
    }
    return new ActionRowBuilder<TextInputBuilder>().addComponents(input);
  });

  return new ModalBuilder().setCustomId(customId).setTitle(form.title).addComponents(rows);
}
