/**
 * @docdesk/docs-tools
 *
 * Google Docs and Drive tools for the agent:
 * - create, read, append, overwrite (Docs API)
 * - delete, list (Drive API)
 * - diary shortcut
 * - document picker and form requests
 */

import { ToolRegistry } from '@docdesk/tools';
import type { DocumentService } from './document-service.js';
import { appendDiaryTool } from './tools/diary.js';
import {
  appendGoogleDocTool,
  createGoogleDocTool,
  overwriteGoogleDocTool,
  readGoogleDocTool,
} from './tools/google-docs.js';
import { deleteGoogleDocTool, listGoogleDocsTool } from './tools/google-drive.js';
import { requestFormTool, showDocumentPickerTool } from './tools/interactive.js';

export interface DocumentToolsOptions {
  documents: DocumentService;
  /** GOOGLE_DIARY_DOC_ID; append_diary explains how to set it when absent */
  diaryDocumentId?: string;
  now?: () => Date;
}

/**
 * Registry with every document tool, in the order the model sees them
 */
export function createDocumentTools(options: DocumentToolsOptions): ToolRegistry {
  const { documents } = options;
  const registry = new ToolRegistry();

  registry.add(appendDiaryTool(documents, options.diaryDocumentId, options.now));
  registry.add(createGoogleDocTool(documents));
  registry.add(readGoogleDocTool(documents));
  registry.add(appendGoogleDocTool(documents));
  registry.add(overwriteGoogleDocTool(documents));
  registry.add(deleteGoogleDocTool(documents));
  registry.add(listGoogleDocsTool(documents));
  registry.add(showDocumentPickerTool(documents));
  registry.add(requestFormTool());

  return registry;
}

export {
  GoogleDocumentService,
  GOOGLE_DOC_MIME_TYPE,
  toSnapshot,
  type DocumentService,
  type DocumentSnapshot,
  type DocumentEdit,
} from './document-service.js';
export { appendText, createDocument, overwriteDocument } from './operations.js';
export { describeFailure, guarded, httpStatusOf, needsReconnect } from './failures.js';
export { extractText, formatDate, formatTimestamp, formatTime } from './text.js';
export { DIARY_NOT_CONFIGURED, formatDiaryEntry } from './tools/diary.js';
export { LIST_DOCUMENTS_LIMIT } from './tools/google-drive.js';
