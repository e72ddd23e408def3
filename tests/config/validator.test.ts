import { describe, it, expect } from 'vitest';
import { FathomConfigSchema } from '../../src/config/schema.js';
import {
  findDelegationCycles,
  validateReferences,
  validateYamlString,
} from '../../src/config/validator.js';

const runnable = (description: string) => ({ description, system_prompt_file: `prompts/${description}.md` });

describe('validateYamlString', () => {
  it('should parse a mapping', () => {
    const result = validateYamlString('agents:\n  triage:\n    description: t\n');
    expect(result.isValid).toBe(true);
    expect(result.parsedValue).toEqual({ agents: { triage: { description: 't' } } });
  });

  it('should treat an empty document as an empty mapping', () => {
    expect(validateYamlString('').parsedValue).toEqual({});
  });

  it('should report syntax errors', () => {
    const result = validateYamlString('agents: [unclosed\n');
    expect(result.isValid).toBe(false);
    expect(result.errors[0]?.message).toMatch(/^Invalid YAML syntax: /);
  });

  it('should reject a document that is not a mapping', () => {
    const result = validateYamlString('- one\n- two\n');
    expect(result.errors).toEqual([{ path: '', message: 'Configuration file must contain a YAML mapping' }]);
  });
});

describe('validateReferences', () => {
  it('should accept a consistent configuration', () => {
    const config = FathomConfigSchema.parse({
      mcp_servers: { k8s: { command: 'mcp-kubernetes' } },
      subagents: { pods: { ...runnable('pods'), mcp_servers: ['k8s'] } },
      agents: { triage: { ...runnable('triage'), subagents: ['pods'] } },
    });
    expect(validateReferences(config)).toEqual([]);
  });

  it('should collect every unresolved reference', () => {
    const config = FathomConfigSchema.parse({
      defaults: { agent: 'missing_agent' },
      subagents: { pods: { ...runnable('pods'), mcp_servers: ['k8s'] } },
      agents: { triage: { ...runnable('triage'), subagents: ['nodes'], response_schema: 'report' } },
    });

    expect(validateReferences(config)).toEqual([
      { path: 'defaults.agent', message: "Default agent 'missing_agent' is not declared" },
      { path: 'agents.triage.subagents[0]', message: "Agent 'triage' references unknown subagent 'nodes'" },
      {
        path: 'agents.triage.response_schema',
        message: "Agent 'triage' references unknown response_schema 'report'",
      },
      { path: 'subagents.pods.mcp_servers[0]', message: "Subagent 'pods' references unknown mcp_server 'k8s'" },
    ]);
  });

  it('should not resolve references through inherited object properties', () => {
    const config = FathomConfigSchema.parse({
      defaults: { agent: 'constructor' },
      subagents: { pods: { ...runnable('pods'), mcp_servers: ['toString'] } },
      agents: {
        triage: { ...runnable('triage'), subagents: ['hasOwnProperty'], response_schema: 'valueOf' },
      },
    });

    expect(validateReferences(config)).toEqual([
      { path: 'defaults.agent', message: "Default agent 'constructor' is not declared" },
      {
        path: 'agents.triage.subagents[0]',
        message: "Agent 'triage' references unknown subagent 'hasOwnProperty'",
      },
      {
        path: 'agents.triage.response_schema',
        message: "Agent 'triage' references unknown response_schema 'valueOf'",
      },
      { path: 'subagents.pods.mcp_servers[0]', message: "Subagent 'pods' references unknown mcp_server 'toString'" },
    ]);
  });

  it('should reject names shared between agents, assistants and subagents', () => {
    const config = FathomConfigSchema.parse({
      subagents: { triage: runnable('sub') },
      agents: { triage: runnable('a') },
      assistants: { triage: runnable('b') },
    });

    expect(validateReferences(config).map((issue) => issue.message)).toEqual([
      "Agent 'triage' is declared under both 'agents' and 'assistants'",
      "Name 'triage' is used by both an agent and a subagent",
    ]);
  });

  it('should report a subagent that tries to delegate back to its agent', () => {
    const config = FathomConfigSchema.parse({
      subagents: { pods: { ...runnable('pods'), mcp_servers: ['triage'] } },
      agents: { triage: { ...runnable('triage'), subagents: ['pods'] } },
    });

    expect(validateReferences(config)).toEqual([
      {
        path: 'subagents.pods.mcp_servers[0]',
        message: "Subagent 'pods' lists 'triage' as an mcp_server, but it is an agent; subagents cannot delegate",
      },
      { path: '', message: 'Delegation cycle detected: triage -> pods -> triage' },
    ]);
  });
});

describe('findDelegationCycles', () => {
  it('should find no cycles in a two-level tree', () => {
    const config = FathomConfigSchema.parse({
      subagents: { pods: runnable('pods'), nodes: runnable('nodes') },
      agents: {
        triage: { ...runnable('triage'), subagents: ['pods', 'nodes'] },
        capacity: { ...runnable('capacity'), subagents: ['nodes'] },
      },
    });
    expect(findDelegationCycles(config)).toEqual([]);
  });

  it('should report a longer cycle once', () => {
    const config = FathomConfigSchema.parse({
      subagents: {
        pods: { ...runnable('pods'), mcp_servers: ['nodes'] },
        nodes: { ...runnable('nodes'), mcp_servers: ['pods'] },
      },
      agents: { triage: { ...runnable('triage'), subagents: ['pods'] } },
    });
    expect(findDelegationCycles(config)).toEqual([['pods', 'nodes', 'pods']]);
  });
});
