/**
 * Interactive reply views
 *
 * Each view belongs to the user whose request produced it. Other users
 * get an ephemeral refusal; the owner's pick or submission becomes the
 * text of a follow-up message.
 */

import { randomUUID } from 'node:crypto';
import type { ActionRowBuilder, ButtonBuilder, ModalBuilder, StringSelectMenuBuilder } from 'discord.js';
import type { DocumentSummary, FormDefinition } from '@docdesk/tools';
import { logger } from '@docdesk/observability';
import { documentPickerRow, formButtonRow, formFieldId, formModal } from './components.js';
import {
  FORM_NOT_FOR_YOU,
  PICKER_NOT_FOR_YOU,
  formatDocumentSelection,
  formatFormSubmission,
} from '../messages.js';

export const PICKER_LIFETIME_MS = 120 * 1000;
export const FORM_LIFETIME_MS = 300 * 1000;

interface Refusable {
  readonly user: { readonly id: string };
  reply(options: { content: string; ephemeral: boolean }): Promise<unknown>;
}

export interface PickerSelection extends Refusable {
  readonly values: string[];
  update(options: { components: ActionRowBuilder<StringSelectMenuBuilder>[] }): Promise<unknown>;
}

export interface FormButtonPress extends Refusable {
  showModal(modal: ModalBuilder): Promise<unknown>;
}

export interface FormSubmission {
  readonly fields: { getTextInputValue(customId: string): string };
  deferUpdate(): Promise<unknown>;
}

export class DocumentPickerView {
  readonly customId = `docdesk-picker:${randomUUID()}`;

  constructor(
    readonly ownerId: string,
    readonly documents: readonly DocumentSummary[]
  ) {}

  row(disabled = false): ActionRowBuilder<StringSelectMenuBuilder> {
    return documentPickerRow(this.customId, this.documents, disabled);
  }

  /**
   * Accept the owner's pick: disable the menu and return the follow-up
   * message. Returns undefined for anyone else.
   */
  async select(selection: PickerSelection): Promise<string | undefined> {
    if (selection.user.id !== this.ownerId) {
      await selection.reply({ content: PICKER_NOT_FOR_YOU, ephemeral: true });
      return undefined;
    }

    const [selectedId = ''] = selection.values;
    const selected = this.documents.find(document => document.id === selectedId);
    await selection.update({ components: [this.row(true)] });

    logger.debug('Document picked', { userId: this.ownerId, documentId: selectedId });
    return formatDocumentSelection(selected?.name ?? selectedId, selectedId);
  }
}

export class FormView {
  private readonly id = randomUUID();
  readonly buttonId = `docdesk-form:${this.id}`;
  readonly modalId = `docdesk-form-modal:${this.id}`;

  constructor(
    readonly ownerId: string,
    readonly form: FormDefinition
  ) {}

  buttonRow(disabled = false): ActionRowBuilder<ButtonBuilder> {
    return formButtonRow(this.buttonId, disabled);
  }

  modal(): ModalBuilder {
    return formModal(this.modalId, this.form);
  }

  /**
   * Open the modal for the owner. Returns false when someone else pressed.
   */
  async open(press: FormButtonPress): Promise<boolean> {
    if (press.user.id !== this.ownerId) {
      await press.reply({ content: FORM_NOT_FOR_YOU, ephemeral: true });
      return false;
    }
    await press.showModal(this.modal());
    return true;
  }

  /**
   * Acknowledge a submitted modal and return the follow-up message
   */
  async submit(submission: FormSubmission): Promise<string> {
    await submission.deferUpdate();
    const answers = this.form.fields.map((field, index) => ({
      label: field.label,
      value: submission.fields.getTextInputValue(formFieldId(index)),
    }));
    return formatFormSubmission(answers);
  }
}
