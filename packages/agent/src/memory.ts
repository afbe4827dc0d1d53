/**
 * Per-thread conversation memory
 */

import type { ConversationMessage } from './types.js';

export const DEFAULT_MEMORY_MESSAGES = 40;

/**
 * True for a message that can open a conversation: a user turn that is
 * not answering an earlier tool call
 */
function isConversationStart(message: ConversationMessage): boolean {
  if (message.role !== 'user') {
    return false;
  }
  return typeof message.content === 'string' || message.content.every(block => block.type !== 'tool_result');
}

/**
 * Drop the oldest messages until at most `limit` remain and the history
 * opens on a plain user turn
 */
export function trimHistory(messages: readonly ConversationMessage[], limit: number): ConversationMessage[] {
  let start = Math.max(0, messages.length - limit);
  while (start < messages.length && !isConversationStart(messages[start])) {
    start++;
  }
  return messages.slice(start);
}

export class ConversationMemory {
  private readonly threads = new Map<string, ConversationMessage[]>();

  constructor(private readonly limit: number = DEFAULT_MEMORY_MESSAGES) {}

  history(threadId: string): ConversationMessage[] {
    return [...(this.threads.get(threadId) ?? [])];
  }

  append(threadId: string, messages: readonly ConversationMessage[]): void {
    const combined = [...(this.threads.get(threadId) ?? []), ...messages];
    this.threads.set(threadId, trimHistory(combined, this.limit));
  }

  clear(threadId: string): void {
    this.threads.delete(threadId);
  }
}
