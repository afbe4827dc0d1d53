/**
 * Conversation and model types
 *
 * Shaped after the Messages API content blocks so a conversation can be
 * replayed to the model as-is.
 */

import type { ToolSpec } from '@docdesk/tools';

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: unknown;
}

export interface ToolResultBlock {
  type: 'tool_result';
  tool_use_id: string;
  content: string;
  is_error?: boolean;
}

export type AssistantBlock = TextBlock | ToolUseBlock;
export type UserBlock = TextBlock | ToolResultBlock;

export type ConversationMessage =
  | { role: 'user'; content: string | UserBlock[] }
  | { role: 'assistant'; content: AssistantBlock[] };

export interface ModelRequest {
  system: string;
  messages: readonly ConversationMessage[];
  tools: readonly ToolSpec[];
}

export interface ModelResponse {
  content: AssistantBlock[];
  stopReason?: string;
}

/**
 * Decides the next action: answer, or request tool calls
 */
export interface AgentModel {
  decide(_request: ModelRequest): Promise<ModelResponse>;
}
