/**
 * Builders for resolved configurations, for tests that do not need the
 * YAML loader in the way.
 */
import type {
  AgentSpec,
  CollectorSpec,
  Configuration,
  ResponseSchema,
  ToolServerSpec,
} from '../../src/config/model.js';
import type { ModelPrice } from '../../src/config/schema.js';

export function agentSpec(id: string, overrides: Partial<Omit<AgentSpec, 'kind' | 'id'>> = {}): AgentSpec {
  return {
    kind: 'agent',
    id,
    description: `${id} coordinator`,
    instruction: `You are ${id}.`,
    model: `model-${id}`,
    maxTurns: 5,
    timeoutMs: 5_000,
    promptVariables: {},
    requestVariables: [],
    collectors: [],
    ...overrides,
  };
}

export function collectorSpec(
  id: string,
  overrides: Partial<Omit<CollectorSpec, 'kind' | 'id'>> = {}
): CollectorSpec {
  return {
    kind: 'collector',
    id,
    description: `${id} collector`,
    instruction: `You are ${id}.`,
    model: `model-${id}`,
    maxTurns: 5,
    timeoutMs: 5_000,
    promptVariables: {},
    requestVariables: [],
    toolServers: [],
    allowedTools: [],
    ...overrides,
  };
}

export function toolServerSpec(id: string, tools: string[] = []): ToolServerSpec {
  return {
    id,
    connection: { type: 'stdio', command: `/usr/local/bin/${id}`, args: [], env: {} },
    tools,
  };
}

export function buildConfiguration(parts: {
  agents?: AgentSpec[];
  collectors?: CollectorSpec[];
  toolServers?: ToolServerSpec[];
  responseSchemas?: ResponseSchema[];
  pricing?: Record<string, ModelPrice>;
  defaultAgent?: string;
}): Configuration {
  return {
    version: '1.0',
    source: '/tmp/fathom.yaml',
    ...(parts.defaultAgent ? { defaultAgent: parts.defaultAgent } : {}),
    defaultFormat: 'human',
    provider: { type: 'ollama', host: 'http://localhost:11434' },
    sampling: {},
    pricing: new Map(Object.entries(parts.pricing ?? {})),
    agents: new Map((parts.agents ?? []).map((agent) => [agent.id, agent])),
    collectors: new Map((parts.collectors ?? []).map((collector) => [collector.id, collector])),
    toolServers: new Map((parts.toolServers ?? []).map((server) => [server.id, server])),
    responseSchemas: new Map((parts.responseSchemas ?? []).map((schema) => [schema.id, schema])),
  };
}
