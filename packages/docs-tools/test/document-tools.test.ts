/**
 * Tests for the document tool registry
 */

import { CredentialRefreshError, NotAuthenticatedError, RECONNECT_INSTRUCTIONS } from '@docdesk/auth';
import { InteractionCollector, resultText, type ToolContext } from '@docdesk/tools';
import { DIARY_NOT_CONFIGURED, createDocumentTools } from '../src/index.js';
import { FakeDocumentService } from './fake-document-service.js';

describe('document tools', () => {
  let documents: FakeDocumentService;
  let context: ToolContext;
  const at = new Date(2024, 4, 17, 21, 5);

  beforeEach(() => {
    documents = new FakeDocumentService();
    context = { interactions: new InteractionCollector() };
  });

  function tools(diaryDocumentId?: string) {
    return createDocumentTools({ documents, diaryDocumentId, now: () => at });
  }

  it('should register every tool in a stable order', () => {
    expect(tools().getNames()).toEqual([
      'append_diary',
      'create_google_doc',
      'read_google_doc',
      'append_google_doc',
      'overwrite_google_doc',
      'delete_google_doc',
      'list_google_docs',
      'show_document_picker',
      'request_form',
    ]);
  });

  describe('create_google_doc', () => {
    it('should create the document and report its id', async () => {
      const result = await tools().call(
        'create_google_doc',
        { title: 'Plan', initial_content: 'Step one' },
        context
      );

      expect(resultText(result)).toBe("Created Google Doc 'Plan' (ID: doc-1)");
      expect(documents.body('doc-1')).toBe('Step one');
    });
  });

  describe('read_google_doc', () => {
    it('should return a title heading and the body text', async () => {
      documents.seed('doc-a', 'Notes', 'line one');

      const result = await tools().call('read_google_doc', { doc_id: 'doc-a' }, context);

      expect(result.isError).toBeUndefined();
      expect(resultText(result)).toBe('# Notes\n\nline one\n');
    });

    it('should report a missing document as a tool error', async () => {
      const result = await tools().call('read_google_doc', { doc_id: 'missing' }, context);

      expect(result.isError).toBe(true);
      expect(resultText(result)).toBe('Google API request failed: Requested entity was not found: missing');
    });
  });

  describe('append_google_doc', () => {
    it('should append to the end', async () => {
      documents.seed('doc-a', 'Notes', 'first');

      const result = await tools().call('append_google_doc', { doc_id: 'doc-a', text: '\nsecond' }, context);

      expect(resultText(result)).toBe('Text appended to doc doc-a.');
      expect(documents.body('doc-a')).toBe('first\nsecond');
    });
  });

  describe('overwrite_google_doc', () => {
    it('should replace the whole body', async () => {
      documents.seed('doc-a', 'Notes', 'old');

      const result = await tools().call('overwrite_google_doc', { doc_id: 'doc-a', new_content: 'new body' }, context);

      expect(resultText(result)).toBe('Doc doc-a overwritten successfully.');
      expect(documents.body('doc-a')).toBe('new body');
    });
  });

  describe('delete_google_doc', () => {
    it('should delete through Drive', async () => {
      documents.seed('doc-a', 'Notes', '');

      const result = await tools().call('delete_google_doc', { doc_id: 'doc-a' }, context);

      expect(resultText(result)).toBe('Doc doc-a permanently deleted.');
      expect(documents.documents.has('doc-a')).toBe(false);
    });
  });

  describe('list_google_docs', () => {
    it('should list newest first with ids and dates', async () => {
      documents.seed('doc-old', 'Old', '', '2023-12-31T23:00:00.000Z');
      documents.seed('doc-new', 'New', '', '2024-05-01T08:00:00.000Z');

      const result = await tools().call('list_google_docs', {}, context);

      expect(resultText(result)).toBe(
        'Google Docs:\n' +
        '- New (ID: doc-new, modified: 2024-05-01)\n' +
        '- Old (ID: doc-old, modified: 2023-12-31)'
      );
    });

    it('should cap the listing at 20 documents', async () => {
      for (let i = 0; i < 25; i++) {
        documents.seed(`doc-${i}`, `Doc ${i}`, '', `2024-01-${String(i + 1).padStart(2, '0')}T00:00:00.000Z`);
      }

      const result = await tools().call('list_google_docs', {}, context);

      expect(resultText(result).split('\n')).toHaveLength(21);
    });

    it('should say when there are no documents', async () => {
      const result = await tools().call('list_google_docs', {}, context);

      expect(resultText(result)).toBe('No Google Docs found.');
    });

    it('should turn an authentication failure into reconnect instructions', async () => {
      documents.failure = new NotAuthenticatedError('no stored credentials', '42');

      const result = await tools().call('list_google_docs', {}, context);

      expect(result).toEqual({ content: [{ type: 'text', text: RECONNECT_INSTRUCTIONS }], isError: true });
      expect(context.interactions.drain()).toEqual([{ kind: 'reconnect' }]);
    });

    it('should queue a reconnect when the grant was revoked', async () => {
      documents.failure = new CredentialRefreshError('Failed to refresh Google credentials: invalid_grant', '42');
      documents.seed('doc-a', 'Notes', 'x');

      const result = await tools().call('read_google_doc', { doc_id: 'doc-a' }, context);

      expect(result.isError).toBe(true);
      expect(context.interactions.drain()).toEqual([{ kind: 'reconnect' }]);
    });

    it('should not queue a reconnect for other failures', async () => {
      const result = await tools().call('read_google_doc', { doc_id: 'missing' }, context);

      expect(result.isError).toBe(true);
      expect(context.interactions.drain()).toEqual([]);
    });
  });

  describe('append_diary', () => {
    it('should append a timestamped entry to the diary doc', async () => {
      documents.seed('diary', 'Diary', 'Day one');

      const result = await tools('diary').call('append_diary', { entry: 'Went hiking' }, context);

      expect(resultText(result)).toBe('Diary entry added at 21:05');
      expect(documents.body('diary')).toBe('Day one\n[2024-05-17 21:05]\nWent hiking\n');
    });

    it('should explain how to configure a diary when none is set', async () => {
      const result = await tools().call('append_diary', { entry: 'Went hiking' }, context);

      expect(resultText(result)).toBe(DIARY_NOT_CONFIGURED);
      expect(documents.edits).toEqual([]);
    });
  });

  describe('show_document_picker', () => {
    it('should queue a picker on the request context', async () => {
      documents.seed('doc-a', 'Alpha', '', '2024-02-01T00:00:00.000Z');
      documents.seed('doc-b', 'Beta', '', '2024-03-01T00:00:00.000Z');

      const result = await tools().call('show_document_picker', {}, context);

      expect(resultText(result)).toBe('Picker queued with 2 documents:\n- Beta\n- Alpha');
      expect(context.interactions.drain()).toEqual([
        {
          kind: 'document-picker',
          documents: [
            { id: 'doc-b', name: 'Beta', modifiedTime: '2024-03-01T00:00:00.000Z' },
            { id: 'doc-a', name: 'Alpha', modifiedTime: '2024-02-01T00:00:00.000Z' },
          ],
        },
      ]);
    });

    it('should not queue an empty picker', async () => {
      const result = await tools().call('show_document_picker', {}, context);

      expect(resultText(result)).toBe("No Google Docs found in the user's Drive.");
      expect(context.interactions.drain()).toEqual([]);
    });
  });

  describe('request_form', () => {
    it('should queue a clamped form', async () => {
      const result = await tools().call(
        'request_form',
        {
          title: 'New document',
          fields: [
            { label: 'Title' },
            { label: 'Body', placeholder: 'What should it say?', long: true },
          ],
        },
        context
      );

      expect(resultText(result)).toBe("Form 'New document' queued. The user will see an Open Form button.");
      expect(context.interactions.drain()).toEqual([
        {
          kind: 'form',
          form: {
            title: 'New document',
            fields: [
              { label: 'Title', placeholder: '', long: false },
              { label: 'Body', placeholder: 'What should it say?', long: true },
            ],
          },
        },
      ]);
    });

    it('should reject a form without fields', async () => {
      await expect(tools().call('request_form', { title: 'Empty', fields: [] }, context)).rejects.toThrow(
        "Invalid input for tool 'request_form'"
      );
    });
  });
});
