/**
 * Google Docs and Drive access for the current request identity
 *
 * Tools depend on the DocumentService interface; GoogleDocumentService is
 * the googleapis-backed implementation.
 */

import type { docs_v1 } from 'googleapis';
import type { GoogleServiceFactory } from '@docdesk/auth';
import type { DocumentSummary } from '@docdesk/tools';
import { extractText } from './text.js';

export const GOOGLE_DOC_MIME_TYPE = 'application/vnd.google-apps.document';

/**
 * The parts of a document the tools work with
 */
export interface DocumentSnapshot {
  id: string;
  title: string;
  text: string;
  /** endIndex of the last structural element of the body */
  endIndex: number;
}

export type DocumentEdit =
  | { insertText: { index: number; text: string } }
  | { deleteRange: { startIndex: number; endIndex: number } };

export interface DocumentService {
  create(title: string): Promise<DocumentSnapshot>;
  get(documentId: string): Promise<DocumentSnapshot>;
  /** Applied in order, atomically */
  edit(documentId: string, edits: readonly DocumentEdit[]): Promise<void>;
  delete(documentId: string): Promise<void>;
  /** Non-trashed Google Docs, most recently modified first */
  list(limit: number): Promise<DocumentSummary[]>;
}

export function toSnapshot(document: docs_v1.Schema$Document, fallbackId = ''): DocumentSnapshot {
  const content = document.body?.content ?? [];
  const last = content[content.length - 1];
  return {
    id: document.documentId ?? fallbackId,
    title: document.title ?? 'Untitled',
    text: extractText(document),
    endIndex: last?.endIndex ?? 1,
  };
}

function toRequest(edit: DocumentEdit): docs_v1.Schema$Request {
  if ('insertText' in edit) {
    return {
      insertText: {
        location: { index: edit.insertText.index },
        text: edit.insertText.text,
      },
    };
  }
  return {
    deleteContentRange: {
      range: { startIndex: edit.deleteRange.startIndex, endIndex: edit.deleteRange.endIndex },
    },
  };
}

export class GoogleDocumentService implements DocumentService {
  constructor(private readonly services: GoogleServiceFactory) {}

  async create(title: string): Promise<DocumentSnapshot> {
    const docs = await this.services.docs();
    const { data } = await docs.documents.create({ requestBody: { title } });
    return toSnapshot(data);
  }

  async get(documentId: string): Promise<DocumentSnapshot> {
    const docs = await this.services.docs();
    const { data } = await docs.documents.get({ documentId });
    return toSnapshot(data, documentId);
  }

  async edit(documentId: string, edits: readonly DocumentEdit[]): Promise<void> {
    if (edits.length === 0) {
      return;
    }
    const docs = await this.services.docs();
    await docs.documents.batchUpdate({
      documentId,
      requestBody: { requests: edits.map(toRequest) },
    });
  }

  async delete(documentId: string): Promise<void> {
    const drive = await this.services.drive();
    await drive.files.delete({ fileId: documentId });
  }

  async list(limit: number): Promise<DocumentSummary[]> {
    const drive = await this.services.drive();
    const { data } = await drive.files.list({
      q: `mimeType='${GOOGLE_DOC_MIME_TYPE}' and trashed=false`,
      fields: 'files(id, name, modifiedTime)',
      orderBy: 'modifiedTime desc',
      pageSize: limit,
    });

    const summaries: DocumentSummary[] = [];
    for (const file of data.files ?? []) {
      if (!file.id) {
        continue;
      }
      summaries.push({
        id: file.id,
        name: file.name ?? 'Untitled',
        ...(file.modifiedTime ? { modifiedTime: file.modifiedTime } : {}),
      });
    }
    return summaries;
  }
}
