/**
 * Docs API content tools
 */

import { z } from 'zod';
import { defineTool, textResult } from '@docdesk/tools';
import type { DocumentService } from '../document-service.js';
import { guarded } from '../failures.js';
import { appendText, createDocument, overwriteDocument } from '../operations.js';

const DocIdInput = z.object({
  doc_id: z.string().min(1).describe('The Google Doc document ID'),
});

export function createGoogleDocTool(documents: DocumentService) {
  return defineTool({
    name: 'create_google_doc',
    description:
      'Create a new Google Doc with a given title and optional initial content. ' +
      'Returns the document ID needed for future operations. ' +
      'Always confirm the title with the user before creating.',
    inputSchema: z.object({
      title: z.string().min(1).describe('Title for the new Google Doc'),
      initial_content: z.string().optional().describe('Optional initial text content to populate the doc'),
    }),
    handler: ({ title, initial_content }, context) =>
      guarded('create_google_doc', context, async () => {
        const id = await createDocument(documents, title, initial_content ?? '');
        return textResult(`Created Google Doc '${title}' (ID: ${id})`);
      }),
  });
}

export function readGoogleDocTool(documents: DocumentService) {
  return defineTool({
    name: 'read_google_doc',
    description:
      'Read the full text content of a Google Doc by its document ID. ' +
      "Use show_document_picker first if you don't have the ID.",
    inputSchema: DocIdInput,
    handler: ({ doc_id }, context) =>
      guarded('read_google_doc', context, async () => {
        const document = await documents.get(doc_id);
        return textResult(`# ${document.title}\n\n${document.text}`);
      }),
  });
}

export function appendGoogleDocTool(documents: DocumentService) {
  return defineTool({
    name: 'append_google_doc',
    description:
      'Append text to the end of an existing Google Doc without touching existing content. ' +
      'Ideal for adding notes, diary entries, or continuing a document.',
    inputSchema: DocIdInput.extend({
      text: z.string().describe('Text to append at the end of the document'),
    }),
    handler: ({ doc_id, text }, context) =>
      guarded('append_google_doc', context, async () => {
        await appendText(documents, doc_id, text);
        return textResult(`Text appended to doc ${doc_id}.`);
      }),
  });
}

export function overwriteGoogleDocTool(documents: DocumentService) {
  return defineTool({
    name: 'overwrite_google_doc',
    description:
      'Replace the entire content of an existing Google Doc with new text. ' +
      'ALWAYS confirm with the user before calling this; it cannot be undone easily.',
    inputSchema: DocIdInput.extend({
      new_content: z.string().describe('New full content; replaces everything currently in the document'),
    }),
    handler: ({ doc_id, new_content }, context) =>
      guarded('overwrite_google_doc', context, async () => {
        await overwriteDocument(documents, doc_id, new_content);
        return textResult(`Doc ${doc_id} overwritten successfully.`);
      }),
  });
}
