/**
 * Tool registry for managing and invoking tools
 */

import { logger, withSpan } from '@docdesk/observability';
import type { ZodTypeAny } from 'zod';
import { toInputSchema, type JsonObjectSchema } from './json-schema.js';
import type { ToolContext, ToolDefinition, ToolResult } from './types.js';

/**
 * Model-facing description of a tool
 */
export interface ToolSpec {
  name: string;
  description: string;
  inputSchema: JsonObjectSchema;
}

interface RegisteredTool {
  name: string;
  description: string;
  inputSchema: ZodTypeAny;
  invoke(_args: unknown, _context: ToolContext): Promise<ToolResult>;
}

/**
 * Registry for tools with validated, traced invocation
 *
 * Features:
 * - Tool registration and lookup
 * - Input validation via Zod schemas
 * - JSON Schema listing for the model
 * - One span per call (`tool.<name>`)
 */
export class ToolRegistry {
  private tools: Map<string, RegisteredTool> = new Map();

  /**
   * Register a tool in the registry
   */
  add<TInput>(tool: ToolDefinition<TInput>): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool '${tool.name}' is already registered`);
    }

    this.tools.set(tool.name, {
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
      invoke: async (args, context) => {
        const parseResult = tool.inputSchema.safeParse(args);

        if (!parseResult.success) {
          const errors = parseResult.error.errors
            .map(err => `${err.path.join('.')}: ${err.message}`)
            .join(', ');
          throw new Error(`Invalid input for tool '${tool.name}': ${errors}`);
        }

        return tool.handler(parseResult.data, context);
      },
    });
  }

  /**
   * Get all tool names
   */
  getNames(): string[] {
    return Array.from(this.tools.keys());
  }

  /**
   * Tool specs in registration order
   */
  list(): ToolSpec[] {
    return Array.from(this.tools.values()).map(tool => ({
      name: tool.name,
      description: tool.description,
      inputSchema: toInputSchema(tool.inputSchema),
    }));
  }

  /**
   * Invoke a tool by name with runtime validation
   *
   * @param args - Tool arguments (validated against the tool's schema)
   * @throws Error if the tool is unknown, the input is invalid or the handler fails
   */
  async call(name: string, args: unknown, context: ToolContext): Promise<ToolResult> {
    const tool = this.tools.get(name);

    if (!tool) {
      logger.warn('Unknown tool requested', { tool: name });
      throw new Error(`Unknown tool: ${name}`);
    }

    return withSpan(`tool.${name}`, { 'tool.name': name }, async (span) => {
      const startTime = Date.now();
      try {
        const result = await tool.invoke(args, context);
        span.setAttribute('tool.is_error', result.isError === true);
        logger.debug('Tool executed', {
          tool: name,
          isError: result.isError === true,
          durationMs: Date.now() - startTime,
        });
        return result;
      } catch (error) {
        logger.warn('Tool execution failed', {
          tool: name,
          error: error instanceof Error ? error.message : String(error),
          durationMs: Date.now() - startTime,
        });
        throw error;
      }
    });
  }
}
