/**
 * Index arithmetic for Docs edits
 *
 * A Docs body always ends with a newline the API will not let you touch,
 * so "the end" is the last element's endIndex minus one and the first
 * writable index is 1.
 */

import type { DocumentEdit, DocumentService } from './document-service.js';

export async function appendText(documents: DocumentService, documentId: string, text: string): Promise<void> {
  if (text.length === 0) {
    return;
  }
  const document = await documents.get(documentId);
  await documents.edit(documentId, [{ insertText: { index: document.endIndex - 1, text } }]);
}

/**
 * @returns the new document id
 */
export async function createDocument(
  documents: DocumentService,
  title: string,
  initialContent = ''
): Promise<string> {
  const document = await documents.create(title);
  if (initialContent.length > 0) {
    await documents.edit(document.id, [
      { insertText: { index: document.endIndex - 1, text: initialContent } },
    ]);
  }
  return document.id;
}

export async function overwriteDocument(
  documents: DocumentService,
  documentId: string,
  content: string
): Promise<void> {
  const document = await documents.get(documentId);
  const end = document.endIndex - 1;

  const edits: DocumentEdit[] = [];
  if (end > 1) {
    edits.push({ deleteRange: { startIndex: 1, endIndex: end } });
  }
  if (content.length > 0) {
    edits.push({ insertText: { index: 1, text: content } });
  }
  await documents.edit(documentId, edits);
}
