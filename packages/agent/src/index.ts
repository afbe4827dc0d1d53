/**
 * @docdesk/agent
 *
 * The model/tool loop that turns a chat message into a reply.
 */

export * from './types.js';
export { ClaudeAgentModel, type ClaudeModelConfig } from './claude-model.js';
export { ConversationMemory, DEFAULT_MEMORY_MESSAGES, trimHistory } from './memory.js';
export { SYSTEM_PROMPT } from './system-prompt.js';
export {
  DocumentAgent,
  DEFAULT_MAX_ITERATIONS,
  NO_REPLY_TEXT,
  type AgentRequest,
  type AgentReply,
  type DocumentAgentOptions,
} from './document-agent.js';
