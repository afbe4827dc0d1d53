/**
 * Pending interactions
 *
 * Tools that need the user to pick or fill something in queue an
 * interaction on the collector for the current request. The agent hands
 * them to the transport together with its reply.
 */

export const PICKER_MAX_OPTIONS = 25;
export const FORM_MAX_FIELDS = 5;
export const FORM_TITLE_MAX_LENGTH = 45;
export const FORM_LABEL_MAX_LENGTH = 45;
export const FORM_PLACEHOLDER_MAX_LENGTH = 100;

export interface DocumentSummary {
  id: string;
  name: string;
  /** RFC 3339 timestamp from Drive */
  modifiedTime?: string;
}

export interface FormField {
  label: string;
  placeholder: string;
  /** Multi-line input */
  long: boolean;
}

export interface FormDefinition {
  title: string;
  fields: FormField[];
}

export interface DocumentPickerInteraction {
  kind: 'document-picker';
  documents: DocumentSummary[];
}

export interface FormInteraction {
  kind: 'form';
  form: FormDefinition;
}

/** The stored Google grant is unusable; the user has to consent again */
export interface ReconnectInteraction {
  kind: 'reconnect';
}

export type PendingInteraction = DocumentPickerInteraction | FormInteraction | ReconnectInteraction;

export function truncate(value: string, maxLength: number): string {
  return value.length > maxLength ? value.slice(0, maxLength) : value;
}

/**
 * Clamp a form to what a chat modal can display
 */
export function normalizeForm(form: {
  title: string;
  fields: ReadonlyArray<{ label: string; placeholder?: string; long?: boolean }>;
}): FormDefinition {
  return {
    title: truncate(form.title, FORM_TITLE_MAX_LENGTH),
    fields: form.fields.slice(0, FORM_MAX_FIELDS).map(field => ({
      label: truncate(field.label, FORM_LABEL_MAX_LENGTH),
      placeholder: truncate(field.placeholder ?? '', FORM_PLACEHOLDER_MAX_LENGTH),
      long: field.long ?? false,
    })),
  };
}

export class InteractionCollector {
  private readonly queued: PendingInteraction[] = [];

  showDocumentPicker(documents: readonly DocumentSummary[]): DocumentPickerInteraction {
    const interaction: DocumentPickerInteraction = {
      kind: 'document-picker',
      documents: documents.slice(0, PICKER_MAX_OPTIONS),
    };
    this.queued.push(interaction);
    return interaction;
  }

  requestForm(form: FormDefinition): FormInteraction {
    const interaction: FormInteraction = { kind: 'form', form: normalizeForm(form) };
    this.queued.push(interaction);
    return interaction;
  }

  requestReconnect(): ReconnectInteraction {
    const interaction: ReconnectInteraction = { kind: 'reconnect' };
    this.queued.push(interaction);
    return interaction;
  }

  /**
   * Everything queued so far, in order; the collector is left empty
   */
  drain(): PendingInteraction[] {
    return this.queued.splice(0, this.queued.length);
  }
}
