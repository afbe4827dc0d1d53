/**
 * Drive API file management tools
 */

import { z } from 'zod';
import { defineTool, textResult } from '@docdesk/tools';
import type { DocumentService } from '../document-service.js';
import { guarded } from '../failures.js';
import { formatDate } from '../text.js';

export const LIST_DOCUMENTS_LIMIT = 20;

export function deleteGoogleDocTool(documents: DocumentService) {
  return defineTool({
    name: 'delete_google_doc',
    description:
      'Permanently delete a Google Doc by its document ID. ' +
      'ALWAYS ask the user to confirm by document name before calling this; deletion cannot be undone.',
    inputSchema: z.object({
      doc_id: z.string().min(1).describe('The Google Doc document ID'),
    }),
    handler: ({ doc_id }, context) =>
      guarded('delete_google_doc', context, async () => {
        await documents.delete(doc_id);
        return textResult(`Doc ${doc_id} permanently deleted.`);
      }),
  });
}

export function listGoogleDocsTool(documents: DocumentService) {
  return defineTool({
    name: 'list_google_docs',
    description:
      "List Google Docs in the user's Drive with names, IDs, and last-modified dates. " +
      'Prefer show_document_picker for interactive selection; use this only when you need ' +
      'the list as text (e.g. to summarise what documents exist).',
    inputSchema: z.object({}),
    handler: (_input, context) =>
      guarded('list_google_docs', context, async () => {
        const files = await documents.list(LIST_DOCUMENTS_LIMIT);
        if (files.length === 0) {
          return textResult('No Google Docs found.');
        }
        const lines = files.map(file => `- ${file.name} (ID: ${file.id}, modified: ${formatDate(file.modifiedTime)})`);
        return textResult(`Google Docs:\n${lines.join('\n')}`);
      }),
  });
}
