/**
 * Configuration Schema
 *
 * Zod validation schemas for fathom.yaml. Defines the structure and
 * validation rules for defaults, the model provider, pricing, response
 * schemas, MCP servers, subagents (collectors) and agents (coordinators).
 * Validation runs after environment interpolation.
 *
 * Dependencies:
 * - zod: TypeScript-first schema validation with static type inference
 */
import { z } from 'zod';

export const ResponseFormatSchema = z
  .enum(['human', 'json', 'machine'])
  .transform((format) => (format === 'human' ? 'human' : 'machine'));

export const DefaultsSchema = z.object({
  agent: z.string().optional(),
  models: z
    .object({
      orchestrator: z.string().default('gpt-4o'),
      collector: z.string().default('gpt-4o-mini'),
    })
    .default({}),
  timeouts: z
    .object({
      investigation: z.coerce.number().int().min(30).max(600).default(300),
      subagent: z.coerce.number().int().min(10).max(300).default(60),
    })
    .default({}),
  max_turns: z
    .object({
      investigation: z.coerce.number().int().min(1).max(50).default(15),
      subagent: z.coerce.number().int().min(1).max(30).default(10),
    })
    .default({}),
  response: z
    .object({
      format: ResponseFormatSchema.default('human'),
    })
    .default({}),
  temperature: z.coerce.number().min(0).max(2).optional(),
  max_output_tokens: z.coerce.number().int().positive().optional(),
});

export const OpenAIProviderSchema = z.object({
  type: z.literal('openai'),
  api_key: z.string().min(1, 'api_key must not be empty'),
  base_url: z.string().url().optional(),
  timeout_seconds: z.coerce.number().int().positive().optional(),
});

export const OllamaProviderSchema = z.object({
  type: z.literal('ollama'),
  host: z.string().url().default('http://localhost:11434'),
});

export const ProviderSchema = z.discriminatedUnion('type', [OpenAIProviderSchema, OllamaProviderSchema]);

export const ModelPriceSchema = z.object({
  prompt: z.coerce.number().nonnegative(),
  completion: z.coerce.number().nonnegative(),
});

export const ResponseSchemaConfigSchema = z.object({
  file: z.string().min(1),
  description: z.string().default(''),
  format: ResponseFormatSchema.default('human'),
});

export const McpServerSchema = z
  .object({
    command: z.string().default(''),
    args: z.array(z.string()).default([]),
    env: z.record(z.string(), z.string()).default({}),
    url: z.string().default(''),
    headers: z.record(z.string(), z.string()).default({}),
    tools: z.array(z.string()).default([]),
    in_cluster_fallback: z.boolean().default(false),
  })
  .superRefine((server, ctx) => {
    if (!server.command && !server.url) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "MCP server must have either 'command' or 'url' configured",
      });
    }
    if (server.command && server.url) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "MCP server cannot have both 'command' and 'url' configured",
      });
    }
    if (server.url && !/^https?:\/\//.test(server.url)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['url'],
        message: 'MCP server URL must start with http:// or https://',
      });
    }
  });

const RunnableFields = {
  description: z.string().min(1),
  system_prompt_file: z.string().min(1),
  model: z.string().default(''),
  timeout_seconds: z.coerce.number().int().min(0).max(600).default(0),
  max_turns: z.coerce.number().int().min(0).max(50).default(0),
  prompt_variables: z.record(z.string(), z.string()).default({}),
  request_variables: z.array(z.string()).default([]),
};

export const SubagentSchema = z.object({
  ...RunnableFields,
  mcp_servers: z.array(z.string()).default([]),
  allowed_tools: z.array(z.string()).default([]),
});

export const AgentSchema = z.object({
  ...RunnableFields,
  subagents: z.array(z.string()).default([]),
  response_schema: z.string().default(''),
});

export const FathomConfigSchema = z.object({
  version: z.union([z.string(), z.number()]).transform(String).default('1.0'),
  defaults: DefaultsSchema.default({}),
  provider: ProviderSchema.default({ type: 'ollama' }),
  pricing: z.record(z.string(), ModelPriceSchema).default({}),
  response_schemas: z.record(z.string(), ResponseSchemaConfigSchema).default({}),
  mcp_servers: z.record(z.string(), McpServerSchema).default({}),
  subagents: z.record(z.string(), SubagentSchema).default({}),
  agents: z.record(z.string(), AgentSchema).default({}),
  assistants: z.record(z.string(), AgentSchema).default({}),
});

export type ResponseFormat = z.output<typeof ResponseFormatSchema>;
export type Defaults = z.infer<typeof DefaultsSchema>;
export type ProviderConfig = z.infer<typeof ProviderSchema>;
export type ModelPrice = z.infer<typeof ModelPriceSchema>;
export type ResponseSchemaConfig = z.infer<typeof ResponseSchemaConfigSchema>;
export type McpServerConfig = z.infer<typeof McpServerSchema>;
export type SubagentConfig = z.infer<typeof SubagentSchema>;
export type AgentConfig = z.infer<typeof AgentSchema>;
export type FathomConfig = z.infer<typeof FathomConfigSchema>;
