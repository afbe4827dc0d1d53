/**
 * Tools that hand the user a chat component instead of asking for text
 */

import { z } from 'zod';
import {
  FORM_MAX_FIELDS,
  PICKER_MAX_OPTIONS,
  defineTool,
  textResult,
} from '@docdesk/tools';
import type { DocumentService } from '../document-service.js';
import { guarded } from '../failures.js';

export function showDocumentPickerTool(documents: DocumentService) {
  return defineTool({
    name: 'show_document_picker',
    description:
      "Show the user a select menu listing their Google Docs so they can pick one. " +
      'Use this any time you need a document ID; never ask the user to type one manually. ' +
      'After calling this tool, tell the user a document picker will appear below your message.',
    inputSchema: z.object({}),
    handler: (_input, context) =>
      guarded('show_document_picker', context, async () => {
        const files = await documents.list(PICKER_MAX_OPTIONS);
        if (files.length === 0) {
          return textResult("No Google Docs found in the user's Drive.");
        }
        const picker = context.interactions.showDocumentPicker(files);
        const names = picker.documents.map(file => `- ${file.name}`).join('\n');
        return textResult(`Picker queued with ${picker.documents.length} documents:\n${names}`);
      }),
  });
}

const FormFieldInput = z.object({
  label: z.string().min(1).describe('Label shown next to the input (max 45 chars)'),
  placeholder: z.string().optional().describe('Hint text inside the field (max 100 chars)'),
  long: z
    .boolean()
    .optional()
    .describe('True for a multi-line text area (e.g. document body), false for a single-line input'),
});

export function requestFormTool() {
  return defineTool({
    name: 'request_form',
    description:
      'Send the user a modal form to collect structured input. ' +
      'Use when you need several pieces of information at once, e.g. a document title and its body. ' +
      `Supports up to ${FORM_MAX_FIELDS} fields. Set long=true for multi-line fields (document content, descriptions). ` +
      "After calling this tool, end your message by telling the user to click 'Open Form'.",
    inputSchema: z.object({
      title: z.string().min(1).describe('Title shown at the top of the form dialog (max 45 chars)'),
      fields: z.array(FormFieldInput).min(1).describe(`Fields to collect from the user, 1 to ${FORM_MAX_FIELDS} items`),
    }),
    handler: async ({ title, fields }, { interactions }) => {
      interactions.requestForm({
        title,
        fields: fields.map(field => ({
          label: field.label,
          placeholder: field.placeholder ?? '',
          long: field.long ?? false,
        })),
      });
      return textResult(`Form '${title}' queued. The user will see an Open Form button.`);
    },
  });
}
