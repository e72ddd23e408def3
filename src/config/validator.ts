/**
 * Configuration validator.
 *
 * Works in three passes over one document, collecting every problem rather
 * than stopping at the first:
 * 1. YAML syntax
 * 2. Zod structural validation, with dotted paths
 * 3. Cross-references between agents, subagents, MCP servers and response
 *    schemas, plus cycle detection over the delegation graph
 *
 * File-level checks (prompt and schema files) live in the loader because they
 * need the config directory.
 */
import type { ZodError } from 'zod';
import { parseDocument } from 'yaml';
import type { ConfigIssue } from '../errors.js';
import type { AgentConfig, FathomConfig } from './schema.js';

export interface ValidationResult {
  isValid: boolean;
  errors: ConfigIssue[];
  parsedValue?: unknown;
}

export function zodErrorsToIssues(zodError: ZodError): ConfigIssue[] {
  return zodError.errors.map((err) => ({
    path: err.path.join('.'),
    message: err.message,
  }));
}

/**
 * Validate a YAML string can be parsed. An empty document parses to `{}`.
 */
export function validateYamlString(yamlString: string): ValidationResult {
  const document = parseDocument(yamlString, { prettyErrors: true });

  if (document.errors.length > 0) {
    return {
      isValid: false,
      errors: document.errors.map((error) => {
        const lineInfo = error.linePos
          ? `Line ${error.linePos[0].line}, column ${error.linePos[0].col}: `
          : '';
        return { path: '', message: `Invalid YAML syntax: ${lineInfo}${error.message}` };
      }),
    };
  }

  const parsed: unknown = document.toJS() ?? {};
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return {
      isValid: false,
      errors: [{ path: '', message: 'Configuration file must contain a YAML mapping' }],
    };
  }

  return { isValid: true, errors: [], parsedValue: parsed };
}

/**
 * `agents` and its alias `assistants`, merged. A name declared under both is
 * reported by {@link validateReferences}.
 */
export function mergedAgents(config: FathomConfig): Record<string, AgentConfig> {
  return { ...config.assistants, ...config.agents };
}

export function validateReferences(config: FathomConfig): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  const agents = mergedAgents(config);

  for (const name of Object.keys(config.assistants)) {
    if (Object.hasOwn(config.agents, name)) {
      issues.push({
        path: `assistants.${name}`,
        message: `Agent '${name}' is declared under both 'agents' and 'assistants'`,
      });
    }
  }

  for (const name of Object.keys(agents)) {
    if (Object.hasOwn(config.subagents, name)) {
      issues.push({
        path: `subagents.${name}`,
        message: `Name '${name}' is used by both an agent and a subagent`,
      });
    }
  }

  if (config.defaults.agent && !Object.hasOwn(agents, config.defaults.agent)) {
    issues.push({
      path: 'defaults.agent',
      message: `Default agent '${config.defaults.agent}' is not declared`,
    });
  }

  for (const [agentName, agent] of Object.entries(agents)) {
    const section = Object.hasOwn(config.agents, agentName) ? 'agents' : 'assistants';
    agent.subagents.forEach((subagentName, index) => {
      if (!Object.hasOwn(config.subagents, subagentName)) {
        issues.push({
          path: `${section}.${agentName}.subagents[${index}]`,
          message: `Agent '${agentName}' references unknown subagent '${subagentName}'`,
        });
      }
    });

    if (agent.response_schema && !Object.hasOwn(config.response_schemas, agent.response_schema)) {
      issues.push({
        path: `${section}.${agentName}.response_schema`,
        message: `Agent '${agentName}' references unknown response_schema '${agent.response_schema}'`,
      });
    }
  }

  for (const [subagentName, subagent] of Object.entries(config.subagents)) {
    subagent.mcp_servers.forEach((serverName, index) => {
      if (Object.hasOwn(config.mcp_servers, serverName)) return;

      const path = `subagents.${subagentName}.mcp_servers[${index}]`;
      if (Object.hasOwn(agents, serverName) || Object.hasOwn(config.subagents, serverName)) {
        issues.push({
          path,
          message: `Subagent '${subagentName}' lists '${serverName}' as an mcp_server, but it is an agent; subagents cannot delegate`,
        });
      } else {
        issues.push({
          path,
          message: `Subagent '${subagentName}' references unknown mcp_server '${serverName}'`,
        });
      }
    });
  }

  for (const cycle of findDelegationCycles(config)) {
    issues.push({
      path: '',
      message: `Delegation cycle detected: ${cycle.join(' -> ')}`,
    });
  }

  return issues;
}

/**
 * Depth-first search over agents and subagents. Edges are an agent's
 * subagents, plus any subagent `mcp_servers` entry that names an agent or
 * subagent. Each cycle is returned once, closed (`a -> b -> a`).
 */
export function findDelegationCycles(config: FathomConfig): string[][] {
  const agents = mergedAgents(config);
  const nodes = new Set([...Object.keys(agents), ...Object.keys(config.subagents)]);

  const edges = (node: string): string[] => {
    const targets = [
      ...(agents[node]?.subagents ?? []),
      ...(config.subagents[node]?.mcp_servers ?? []),
    ];
    return targets.filter((target) => nodes.has(target));
  };

  const cycles: string[][] = [];
  const seen = new Set<string>();
  const state = new Map<string, 'visiting' | 'done'>();
  const stack: string[] = [];

  const visit = (node: string): void => {
    state.set(node, 'visiting');
    stack.push(node);

    for (const next of edges(node)) {
      const nextState = state.get(next);
      if (nextState === 'visiting') {
        const cycle = [...stack.slice(stack.indexOf(next)), next];
        const key = [...cycle.slice(0, -1)].sort().join('|');
        if (!seen.has(key)) {
          seen.add(key);
          cycles.push(cycle);
        }
      } else if (nextState === undefined) {
        visit(next);
      }
    }

    stack.pop();
    state.set(node, 'done');
  };

  for (const node of nodes) {
    if (!state.has(node)) {
      visit(node);
    }
  }

  return cycles;
}
