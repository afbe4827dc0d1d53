/**
 * Helper function for defining tools with type inference
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { ToolDefinition, ToolHandler } from './types.js';

/**
 * Define a tool with automatic type inference from Zod schema
 *
 * Example:
 * ```typescript
 * const readDoc = defineTool({
 *   name: 'read_google_doc',
 *   description: 'Read a Google Doc by id',
 *   inputSchema: z.object({
 *     doc_id: z.string().describe('The Google Doc document ID')
 *   }),
 *   handler: async ({ doc_id }) => textResult(await docs.read(doc_id))
 * });
 * ```
 */
export function defineTool<TInput>(config: {
  name: string;
  description: string;
  inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  handler: ToolHandler<TInput>;
}): ToolDefinition<TInput> {
  return {
    name: config.name,
    description: config.description,
    inputSchema: config.inputSchema,
    handler: config.handler,
  };
}
