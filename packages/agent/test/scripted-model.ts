/**
 * AgentModel double that replays scripted responses and records requests
 */

import type { AgentModel, ConversationMessage, ModelRequest, ModelResponse } from '../src/index.js';

export type ScriptStep = ModelResponse | ((request: ModelRequest) => ModelResponse | Promise<ModelResponse>);

export class ScriptedModel implements AgentModel {
  readonly requests: Array<{ messages: ConversationMessage[]; toolNames: string[] }> = [];

  constructor(private readonly steps: ScriptStep[]) {}

  async decide(request: ModelRequest): Promise<ModelResponse> {
    this.requests.push({
      messages: request.messages.map(message => structuredClone(message)),
      toolNames: request.tools.map(tool => tool.name),
    });
    const step = this.steps.shift();
    if (!step) {
      throw new Error('ScriptedModel ran out of steps');
    }
    return typeof step === 'function' ? step(request) : step;
  }
}

export function say(text: string): ModelResponse {
  return { content: [{ type: 'text', text }], stopReason: 'end_turn' };
}

export function callTool(id: string, name: string, input: unknown, text?: string): ModelResponse {
  return {
    content: [
      ...(text ? [{ type: 'text' as const, text }] : []),
      { type: 'tool_use', id, name, input },
    ],
    stopReason: 'tool_use',
  };
}
