/**
 * Diary shortcut: timestamped entries appended to one configured doc
 */

import { z } from 'zod';
import { defineTool, textResult } from '@docdesk/tools';
import type { DocumentService } from '../document-service.js';
import { guarded } from '../failures.js';
import { appendText } from '../operations.js';
import { formatTime, formatTimestamp } from '../text.js';

export const DIARY_NOT_CONFIGURED =
  'No diary doc configured. Set GOOGLE_DIARY_DOC_ID, or use append_google_doc with a specific doc.';

export function formatDiaryEntry(entry: string, at: Date): string {
  return `\n[${formatTimestamp(at)}]\n${entry}\n`;
}

export function appendDiaryTool(
  documents: DocumentService,
  diaryDocumentId: string | undefined,
  now: () => Date = () => new Date()
) {
  return defineTool({
    name: 'append_diary',
    description:
      'Add a timestamped entry to the diary Google Doc. ' +
      'Use when the user shares something that happened, wants to log their day, ' +
      'record a thought, or journal anything.',
    inputSchema: z.object({
      entry: z.string().min(1).describe('The diary entry text. Timestamps and formatting are handled automatically.'),
    }),
    handler: ({ entry }, context) =>
      guarded('append_diary', context, async () => {
        if (!diaryDocumentId) {
          return textResult(DIARY_NOT_CONFIGURED);
        }
        const at = now();
        await appendText(documents, diaryDocumentId, formatDiaryEntry(entry, at));
        return textResult(`Diary entry added at ${formatTime(at)}`);
      }),
  });
}
