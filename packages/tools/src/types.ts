/**
 * Tool definition types
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { InteractionCollector } from './interactions.js';

export interface TextContent {
  type: 'text';
  text: string;
}

/**
 * Outcome of a tool call as fed back to the model
 */
export interface ToolResult {
  content: TextContent[];
  /** The model sees the text as a failure it can explain or retry */
  isError?: boolean;
}

/**
 * Per-request state handed to every handler
 */
export interface ToolContext {
  interactions: InteractionCollector;
}

export type ToolHandler<TInput = unknown> = (
  _input: TInput,
  _context: ToolContext
) => Promise<ToolResult>;

/**
 * Tool definition with type-safe input schema
 */
export interface ToolDefinition<TInput = unknown> {
  /** Tool name - used for invocation */
  name: string;

  /** Shown to the model; says when to use the tool */
  description: string;

  /** Zod schema for input validation and type inference */
  inputSchema: ZodType<TInput, ZodTypeDef, unknown>;

  handler: ToolHandler<TInput>;
}

export function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}

export function errorResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }], isError: true };
}

/**
 * Concatenated text of a result
 */
export function resultText(result: ToolResult): string {
  return result.content.map(part => part.text).join('\n');
}
