/**
 * @docdesk/tools
 *
 * Tool definitions, the registry the agent calls through, per-request
 * interactions and the identity-preserving worker pool.
 */

export {
  type TextContent,
  type ToolResult,
  type ToolContext,
  type ToolHandler,
  type ToolDefinition,
  textResult,
  errorResult,
  resultText,
} from './types.js';
export { defineTool } from './define.js';
export { ToolRegistry, type ToolSpec } from './registry.js';
export { zodToJsonSchema, toInputSchema, type JsonSchema, type JsonObjectSchema } from './json-schema.js';
export * from './interactions.js';
export { WorkerPool } from './worker-pool.js';
