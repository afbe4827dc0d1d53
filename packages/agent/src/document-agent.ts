/**
 * Document agent: the model/tool loop behind every chat message
 */

import { logger, withSpan } from '@docdesk/observability';
import {
  InteractionCollector,
  resultText,
  type PendingInteraction,
  type ToolRegistry,
  type WorkerPool,
} from '@docdesk/tools';
import { ConversationMemory } from './memory.js';
import { SYSTEM_PROMPT } from './system-prompt.js';
import type {
  AgentModel,
  AssistantBlock,
  ConversationMessage,
  TextBlock,
  ToolResultBlock,
  ToolUseBlock,
} from './types.js';

export const DEFAULT_MAX_ITERATIONS = 8;

export const NO_REPLY_TEXT = 'Done.';

export interface AgentRequest {
  /** Conversation key; the chat user id */
  threadId: string;
  message: string;
}

export interface AgentReply {
  reply: string;
  /** Components queued by tools during this request only */
  interactions: PendingInteraction[];
}

export interface DocumentAgentOptions {
  model: AgentModel;
  tools: ToolRegistry;
  pool: WorkerPool;
  memory?: ConversationMemory;
  maxIterations?: number;
  systemPrompt?: string;
}

function textOf(blocks: readonly AssistantBlock[]): string {
  return blocks
    .filter((block): block is TextBlock => block.type === 'text')
    .map(block => block.text)
    .join('\n')
    .trim();
}

function toolCallsOf(blocks: readonly AssistantBlock[]): ToolUseBlock[] {
  return blocks.filter((block): block is ToolUseBlock => block.type === 'tool_use');
}

export class DocumentAgent {
  private readonly memory: ConversationMemory;
  private readonly maxIterations: number;
  private readonly systemPrompt: string;
  /** Tail of the in-flight invocation per thread */
  private readonly threadTails = new Map<string, Promise<unknown>>();

  constructor(private readonly options: DocumentAgentOptions) {
    this.memory = options.memory ?? new ConversationMemory();
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
  }

  /**
   * Run one user message to completion. Invocations on the same thread
   * run one after another so their turns never interleave in memory.
   */
  invoke(request: AgentRequest): Promise<AgentReply> {
    const previous = this.threadTails.get(request.threadId) ?? Promise.resolve();
    const run = previous.then(
      () => this.run(request),
      () => this.run(request)
    );
    const tail = run.catch(() => undefined);
    this.threadTails.set(request.threadId, tail);
    void tail.then(() => {
      if (this.threadTails.get(request.threadId) === tail) {
        this.threadTails.delete(request.threadId);
      }
    });
    return run;
  }

  private run(request: AgentRequest): Promise<AgentReply> {
    return withSpan('agent.invoke', { 'agent.thread_id': request.threadId }, async (span) => {
      const interactions = new InteractionCollector();
      const turn: ConversationMessage[] = [{ role: 'user', content: request.message }];
      let reply = '';
      let iterations = 0;

      while (iterations < this.maxIterations) {
        iterations++;
        const response = await this.options.model.decide({
          system: this.systemPrompt,
          messages: [...this.memory.history(request.threadId), ...turn],
          tools: this.options.tools.list(),
        });
        turn.push({ role: 'assistant', content: response.content });
        reply = textOf(response.content) || reply;

        const calls = toolCallsOf(response.content);
        if (calls.length === 0) {
          break;
        }

        const results = await Promise.all(calls.map(call => this.execute(call, interactions)));
        turn.push({ role: 'user', content: results });

        if (iterations === this.maxIterations) {
          logger.warn('Agent stopped at iteration limit', {
            threadId: request.threadId,
            maxIterations: this.maxIterations,
          });
        }
      }

      this.memory.append(request.threadId, turn);
      span.setAttribute('agent.iterations', iterations);

      return {
        reply: reply || NO_REPLY_TEXT,
        interactions: interactions.drain(),
      };
    });
  }

  private async execute(call: ToolUseBlock, interactions: InteractionCollector): Promise<ToolResultBlock> {
    try {
      const result = await this.options.pool.submit(() =>
        this.options.tools.call(call.name, call.input, { interactions })
      );
      return {
        type: 'tool_result',
        tool_use_id: call.id,
        content: resultText(result),
        ...(result.isError ? { is_error: true } : {}),
      };
    } catch (error) {
      return {
        type: 'tool_result',
        tool_use_id: call.id,
        content: `Error: ${error instanceof Error ? error.message : String(error)}`,
        is_error: true,
      };
    }
  }
}
