/**
 * Configuration Model
 *
 * The resolved, immutable form of fathom.yaml that the runtime works with.
 * Agents and collectors are two variants of one tagged record sharing the
 * instruction, model and budget fields; every collection is a lookup map
 * keyed by identifier. Built once by the loader and frozen.
 */
import type { ModelPrice, ProviderConfig, ResponseFormat } from './schema.js';

interface RunnableBase {
  id: string;
  description: string;
  /** Prompt template; `${name}` / `$name` placeholders are filled at planning time. */
  instruction: string;
  model: string;
  maxTurns: number;
  timeoutMs: number;
  promptVariables: Readonly<Record<string, string>>;
  requestVariables: readonly string[];
}

export interface AgentSpec extends RunnableBase {
  kind: 'agent';
  collectors: readonly string[];
  responseSchema?: string;
}

export interface CollectorSpec extends RunnableBase {
  kind: 'collector';
  toolServers: readonly string[];
  /** Narrows the servers' allow-lists further; empty means no extra narrowing. */
  allowedTools: readonly string[];
}

export type RunnableSpec = AgentSpec | CollectorSpec;

export type ToolServerConnection =
  | {
      type: 'stdio';
      command: string;
      args: readonly string[];
      env: Readonly<Record<string, string>>;
    }
  | {
      type: 'http';
      url: string;
      headers: Readonly<Record<string, string>>;
    };

export interface ToolServerSpec {
  id: string;
  connection: ToolServerConnection;
  /** Tool names exposed to collectors; empty exposes every tool the server lists. */
  tools: readonly string[];
}

export interface ResponseSchema {
  id: string;
  description: string;
  mode: ResponseFormat;
  file: string;
  document: Readonly<Record<string, unknown>>;
}

export interface SamplingDefaults {
  temperature?: number;
  maxOutputTokens?: number;
}

export interface Configuration {
  version: string;
  source: string;
  defaultAgent?: string;
  defaultFormat: ResponseFormat;
  provider: ProviderConfig;
  sampling: SamplingDefaults;
  pricing: ReadonlyMap<string, ModelPrice>;
  agents: ReadonlyMap<string, AgentSpec>;
  collectors: ReadonlyMap<string, CollectorSpec>;
  toolServers: ReadonlyMap<string, ToolServerSpec>;
  responseSchemas: ReadonlyMap<string, ResponseSchema>;
}

export function getAgentSpec(config: Configuration, id: string): AgentSpec | undefined {
  return config.agents.get(id);
}

/**
 * The agent a request runs when it names none: `defaults.agent`, else the
 * first agent declared in the document.
 */
export function resolveDefaultAgent(config: Configuration): AgentSpec | undefined {
  if (config.defaultAgent) {
    return config.agents.get(config.defaultAgent);
  }
  for (const agent of config.agents.values()) {
    return agent;
  }
  return undefined;
}

export function getResponseSchemaFor(
  config: Configuration,
  agent: AgentSpec
): ResponseSchema | undefined {
  return agent.responseSchema ? config.responseSchemas.get(agent.responseSchema) : undefined;
}

export function estimateCostUsd(
  config: Configuration,
  model: string,
  usage: { promptTokens: number; completionTokens: number }
): number {
  const price = config.pricing.get(model);
  if (!price) return 0;
  return (usage.promptTokens * price.prompt + usage.completionTokens * price.completion) / 1_000_000;
}
