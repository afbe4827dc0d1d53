/**
 * Tests for the document agent loop
 */

import { z } from 'zod';
import { RequestIdentityContext } from '@docdesk/auth';
import { ToolRegistry, WorkerPool, errorResult, textResult } from '@docdesk/tools';
import { ConversationMemory, DocumentAgent, NO_REPLY_TEXT, SYSTEM_PROMPT } from '../src/index.js';
import { ScriptedModel, callTool, say } from './scripted-model.js';

describe('DocumentAgent', () => {
  let identity: RequestIdentityContext;
  let tools: ToolRegistry;
  let seenIdentities: string[];

  beforeEach(() => {
    identity = new RequestIdentityContext();
    seenIdentities = [];
    tools = new ToolRegistry();
    tools.add({
      name: 'list_google_docs',
      description: 'List docs',
      inputSchema: z.object({}),
      handler: async () => {
        seenIdentities.push(identity.current());
        return textResult('Google Docs:\n- Notes (ID: doc-a, modified: 2024-01-01)');
      },
    });
    tools.add({
      name: 'show_document_picker',
      description: 'Picker',
      inputSchema: z.object({}),
      handler: async (_input, { interactions }) => {
        interactions.showDocumentPicker([{ id: 'doc-a', name: 'Notes' }]);
        return textResult('Picker queued with 1 documents:\n- Notes');
      },
    });
    tools.add({
      name: 'read_google_doc',
      description: 'Read',
      inputSchema: z.object({ doc_id: z.string() }),
      handler: async () => errorResult('Document not found: gone'),
    });
    tools.add({
      name: 'explode',
      description: 'Throws',
      inputSchema: z.object({}),
      handler: async () => {
        throw new Error('socket hang up');
      },
    });
  });

  function agent(model: ScriptedModel, options: { memory?: ConversationMemory; maxIterations?: number } = {}) {
    return new DocumentAgent({ model, tools, pool: new WorkerPool(4, identity), ...options });
  }

  it('should return a direct answer without calling tools', async () => {
    const model = new ScriptedModel([say('Hello!')]);

    const result = await agent(model).invoke({ threadId: '42', message: 'hi' });

    expect(result).toEqual({ reply: 'Hello!', interactions: [] });
    expect(model.requests[0].messages).toEqual([{ role: 'user', content: 'hi' }]);
    expect(model.requests[0].toolNames).toEqual(['list_google_docs', 'show_document_picker', 'read_google_doc', 'explode']);
  });

  it('should feed tool results back and finish with the final answer', async () => {
    const model = new ScriptedModel([
      callTool('t1', 'list_google_docs', {}),
      say('You have one doc: Notes.'),
    ]);

    const result = await agent(model).invoke({ threadId: '42', message: 'what docs do I have?' });

    expect(result.reply).toBe('You have one doc: Notes.');
    expect(model.requests[1].messages).toEqual([
      { role: 'user', content: 'what docs do I have?' },
      { role: 'assistant', content: [{ type: 'tool_use', id: 't1', name: 'list_google_docs', input: {} }] },
      {
        role: 'user',
        content: [
          {
            type: 'tool_result',
            tool_use_id: 't1',
            content: 'Google Docs:\n- Notes (ID: doc-a, modified: 2024-01-01)',
          },
        ],
      },
    ]);
  });

  it('should flag error results and thrown failures for the model', async () => {
    const model = new ScriptedModel([
      {
        content: [
          { type: 'tool_use', id: 't1', name: 'read_google_doc', input: { doc_id: 'gone' } },
          { type: 'tool_use', id: 't2', name: 'explode', input: {} },
          { type: 'tool_use', id: 't3', name: 'no_such_tool', input: {} },
        ],
      },
      say('Something failed.'),
    ]);

    await agent(model).invoke({ threadId: '42', message: 'read it' });

    expect(model.requests[1].messages[2]).toEqual({
      role: 'user',
      content: [
        { type: 'tool_result', tool_use_id: 't1', content: 'Document not found: gone', is_error: true },
        { type: 'tool_result', tool_use_id: 't2', content: 'Error: socket hang up', is_error: true },
        { type: 'tool_result', tool_use_id: 't3', content: 'Error: Unknown tool: no_such_tool', is_error: true },
      ],
    });
  });

  it('should return interactions queued during the request', async () => {
    const model = new ScriptedModel([
      callTool('t1', 'show_document_picker', {}),
      say('Pick a document below.'),
    ]);

    const result = await agent(model).invoke({ threadId: '42', message: 'open a doc' });

    expect(result.interactions).toEqual([
      { kind: 'document-picker', documents: [{ id: 'doc-a', name: 'Notes' }] },
    ]);
  });

  it('should keep interactions of concurrent requests apart', async () => {
    const model = new ScriptedModel([
      callTool('a1', 'show_document_picker', {}),
      say('Pick one below.'),
      say('Hello.'),
    ]);
    const shared = agent(model);

    const [alice, bob] = await Promise.all([
      shared.invoke({ threadId: 'alice', message: 'pick' }),
      shared.invoke({ threadId: 'bob', message: 'hello' }),
    ]);

    expect(alice.interactions).toHaveLength(1);
    expect(bob.interactions).toEqual([]);
  });

  it('should run tools under the caller identity', async () => {
    const model = new ScriptedModel([callTool('t1', 'list_google_docs', {}), say('Done listing.')]);

    await identity.run('42', () => agent(model).invoke({ threadId: '42', message: 'list' }));

    expect(seenIdentities).toEqual(['42']);
  });

  it('should stop after the iteration limit', async () => {
    const model = new ScriptedModel([
      callTool('t1', 'list_google_docs', {}, 'Looking...'),
      callTool('t2', 'list_google_docs', {}),
      callTool('t3', 'list_google_docs', {}),
    ]);

    const result = await agent(model, { maxIterations: 2 }).invoke({ threadId: '42', message: 'loop' });

    expect(model.requests).toHaveLength(2);
    expect(result.reply).toBe('Looking...');
  });

  it('should fall back to a short acknowledgement when the model says nothing', async () => {
    const model = new ScriptedModel([{ content: [] }]);

    const result = await agent(model).invoke({ threadId: '42', message: 'ok' });

    expect(result.reply).toBe(NO_REPLY_TEXT);
  });

  it('should remember earlier turns per thread', async () => {
    const memory = new ConversationMemory();
    const model = new ScriptedModel([say('Nice to meet you.'), say('You said your name.')]);
    const shared = agent(model, { memory });

    await shared.invoke({ threadId: '42', message: 'I am Sam' });
    await shared.invoke({ threadId: '42', message: 'what did I say?' });

    expect(model.requests[1].messages).toEqual([
      { role: 'user', content: 'I am Sam' },
      { role: 'assistant', content: [{ type: 'text', text: 'Nice to meet you.' }] },
      { role: 'user', content: 'what did I say?' },
    ]);
  });

  it('should serialize invocations on the same thread', async () => {
    const model = new ScriptedModel([say('first'), say('second')]);
    const shared = agent(model);

    const [first, second] = await Promise.all([
      shared.invoke({ threadId: '42', message: 'one' }),
      shared.invoke({ threadId: '42', message: 'two' }),
    ]);

    expect([first.reply, second.reply]).toEqual(['first', 'second']);
    expect(model.requests[1].messages).toEqual([
      { role: 'user', content: 'one' },
      { role: 'assistant', content: [{ type: 'text', text: 'first' }] },
      { role: 'user', content: 'two' },
    ]);
  });

  it('should leave memory untouched when the model fails', async () => {
    const memory = new ConversationMemory();
    const model = new ScriptedModel([
      () => {
        throw new Error('overloaded');
      },
      say('Back again.'),
    ]);
    const shared = agent(model, { memory });

    await expect(shared.invoke({ threadId: '42', message: 'hi' })).rejects.toThrow('overloaded');
    await shared.invoke({ threadId: '42', message: 'retry' });

    expect(memory.history('42')).toEqual([
      { role: 'user', content: 'retry' },
      { role: 'assistant', content: [{ type: 'text', text: 'Back again.' }] },
    ]);
  });

  it('should use the standing system prompt', () => {
    expect(SYSTEM_PROMPT).toContain('NEVER ask the user to type or paste a document ID');
  });
});
