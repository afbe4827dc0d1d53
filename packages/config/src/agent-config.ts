/**
 * Agent configuration schema
 * Model selection and tool loop limits
 */

import { z } from 'zod';

export const DEFAULT_AGENT_MODEL = 'claude-sonnet-4-5-20250929';

export const AgentConfigSchema = z.object({
  AGENT_MODEL: z.string().min(1).default(DEFAULT_AGENT_MODEL),
  AGENT_MAX_TOKENS: z.number().int().min(1).default(4096),
  AGENT_MAX_ITERATIONS: z.number().int().min(1).max(50).default(8),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;

/**
 * LLM secrets schema (API keys)
 */
export const LLMSecretsSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
});

export type LLMSecrets = z.infer<typeof LLMSecretsSchema>;
