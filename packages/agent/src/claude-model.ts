/**
 * AgentModel over the Anthropic Messages API
 */

import Anthropic from '@anthropic-ai/sdk';
import { logger } from '@docdesk/observability';
import type { ToolSpec } from '@docdesk/tools';
import type {
  AgentModel,
  AssistantBlock,
  ConversationMessage,
  ModelRequest,
  ModelResponse,
} from './types.js';

export interface ClaudeModelConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
}

function toMessageParam(message: ConversationMessage): Anthropic.MessageParam {
  if (message.role === 'assistant') {
    return {
      role: 'assistant',
      content: message.content.map((block): Anthropic.ContentBlockParam =>
        block.type === 'text'
          ? { type: 'text', text: block.text }
          : { type: 'tool_use', id: block.id, name: block.name, input: block.input }
      ),
    };
  }

  if (typeof message.content === 'string') {
    return { role: 'user', content: message.content };
  }

  return {
    role: 'user',
    content: message.content.map((block): Anthropic.ContentBlockParam =>
      block.type === 'text'
        ? { type: 'text', text: block.text }
        : {
            type: 'tool_result',
            tool_use_id: block.tool_use_id,
            content: block.content,
            ...(block.is_error ? { is_error: true } : {}),
          }
    ),
  };
}

function toTool(spec: ToolSpec): Anthropic.Tool {
  const { properties, required, description } = spec.inputSchema;
  return {
    name: spec.name,
    description: spec.description,
    input_schema: {
      type: 'object',
      properties,
      ...(required ? { required } : {}),
      ...(description ? { description } : {}),
    },
  };
}

function fromContent(content: Anthropic.ContentBlock[]): AssistantBlock[] {
  const blocks: AssistantBlock[] = [];
  for (const block of content) {
    if (block.type === 'text') {
      blocks.push({ type: 'text', text: block.text });
    } else if (block.type === 'tool_use') {
      blocks.push({ type: 'tool_use', id: block.id, name: block.name, input: block.input });
    }
  }
  return blocks;
}

export class ClaudeAgentModel implements AgentModel {
  private readonly client: Anthropic;

  constructor(private readonly config: ClaudeModelConfig, client?: Anthropic) {
    this.client = client ?? new Anthropic({ apiKey: config.apiKey });
  }

  async decide(request: ModelRequest): Promise<ModelResponse> {
    const startTime = Date.now();
    const response = await this.client.messages.create({
      model: this.config.model,
      max_tokens: this.config.maxTokens,
      system: request.system,
      messages: request.messages.map(toMessageParam),
      tools: request.tools.map(toTool),
    });

    logger.debug('Model turn completed', {
      model: this.config.model,
      stopReason: response.stop_reason,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      durationMs: Date.now() - startTime,
    });

    return {
      content: fromContent(response.content),
      ...(response.stop_reason ? { stopReason: response.stop_reason } : {}),
    };
  }
}
