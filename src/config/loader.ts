/**
 * Configuration Loader
 *
 * Reads fathom.yaml, interpolates the environment, validates structure,
 * references and files, and builds the frozen {@link Configuration} the
 * runtime reads. Every problem found is collected into one
 * ConfigValidationError so an operator can fix the document in one pass.
 *
 * Searches for the config file starting from the current directory up to
 * root, and caches the loaded configuration for the process.
 */
import { existsSync, readFileSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import { ConfigValidationError, type ConfigIssue } from '../errors.js';
import { compileSchema } from '../formatter/ajv.js';
import { isRecord } from '../llm/types.js';
import { configLogger } from '../utils/logger.js';
import { expandString, interpolateDocument, type Environment } from './interpolate.js';
import type {
  AgentSpec,
  CollectorSpec,
  Configuration,
  ResponseSchema,
  ToolServerSpec,
} from './model.js';
import { FathomConfigSchema, type FathomConfig, type McpServerConfig } from './schema.js';
import { mergedAgents, validateReferences, validateYamlString, zodErrorsToIssues } from './validator.js';

export const DEFAULT_CONFIG_FILENAME = 'fathom.yaml';
export const IN_CLUSTER_FLAG = '--in-cluster';

export interface LoadOptions {
  env?: Environment;
}

let cachedConfiguration: Configuration | null = null;
let cachedPath: string | null = null;

export function findConfigFile(startDir: string = process.cwd()): string | null {
  let dir = resolve(startDir);

  for (;;) {
    const candidate = resolve(dir, DEFAULT_CONFIG_FILENAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * `--config`, else FATHOM_CONFIG, else fathom.yaml found upward from the
 * working directory.
 */
export function resolveConfigPath(explicit?: string, env: Environment = process.env): string {
  const path = explicit ?? env['FATHOM_CONFIG'] ?? findConfigFile();
  if (!path) {
    throw new ConfigValidationError(DEFAULT_CONFIG_FILENAME, [
      {
        path: '',
        message: `Configuration file not found. Create ${DEFAULT_CONFIG_FILENAME}, set FATHOM_CONFIG or pass --config.`,
      },
    ]);
  }
  return resolve(path);
}

export function loadConfiguration(path: string, options: LoadOptions = {}): Configuration {
  const env = options.env ?? process.env;
  const source = resolve(path);

  if (!existsSync(source)) {
    throw new ConfigValidationError(source, [
      { path: '', message: `Configuration file not found: ${source}` },
    ]);
  }

  const yamlResult = validateYamlString(readFileSync(source, 'utf-8'));
  if (!yamlResult.isValid) {
    throw new ConfigValidationError(source, yamlResult.errors);
  }

  const interpolated = interpolateDocument(yamlResult.parsedValue, env);
  const parsed = FathomConfigSchema.safeParse(interpolated.value);
  if (!parsed.success) {
    throw new ConfigValidationError(source, [
      ...interpolated.issues,
      ...zodErrorsToIssues(parsed.error),
    ]);
  }

  const document = parsed.data;
  const baseDir = dirname(source);
  const issues: ConfigIssue[] = [...interpolated.issues, ...validateReferences(document)];
  issues.push(...checkPromptFiles(document, baseDir));
  const responseSchemas = loadResponseSchemas(document, baseDir, issues);

  if (issues.length > 0) {
    throw new ConfigValidationError(source, issues);
  }

  const configuration = buildConfiguration(document, source, baseDir, env, responseSchemas);
  configLogger.info(
    {
      source,
      agents: configuration.agents.size,
      collectors: configuration.collectors.size,
      toolServers: configuration.toolServers.size,
      responseSchemas: configuration.responseSchemas.size,
    },
    'Configuration loaded'
  );
  return configuration;
}

/**
 * Loads once per process and path. The server and CLI call this at startup
 * so a bad document stops them before they accept work.
 */
export function getConfiguration(path?: string, options: LoadOptions = {}): Configuration {
  const configPath = resolveConfigPath(path, options.env);
  if (cachedConfiguration && cachedPath === configPath) {
    return cachedConfiguration;
  }
  cachedConfiguration = loadConfiguration(configPath, options);
  cachedPath = configPath;
  return cachedConfiguration;
}

export function clearConfigurationCache(): void {
  cachedConfiguration = null;
  cachedPath = null;
}

function resolveFile(baseDir: string, file: string): string {
  return isAbsolute(file) ? file : resolve(baseDir, file);
}

function sectionOf(document: FathomConfig, agentName: string): string {
  return Object.hasOwn(document.agents, agentName) ? 'agents' : 'assistants';
}

function checkPromptFiles(document: FathomConfig, baseDir: string): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  const check = (path: string, file: string) => {
    if (!existsSync(resolveFile(baseDir, file))) {
      issues.push({ path, message: `Prompt file not found: ${file}` });
    }
  };

  for (const [name, agent] of Object.entries(mergedAgents(document))) {
    check(`${sectionOf(document, name)}.${name}.system_prompt_file`, agent.system_prompt_file);
  }
  for (const [name, subagent] of Object.entries(document.subagents)) {
    check(`subagents.${name}.system_prompt_file`, subagent.system_prompt_file);
  }
  return issues;
}

function loadResponseSchemas(
  document: FathomConfig,
  baseDir: string,
  issues: ConfigIssue[]
): Map<string, ResponseSchema> {
  const schemas = new Map<string, ResponseSchema>();

  for (const [id, entry] of Object.entries(document.response_schemas)) {
    const path = `response_schemas.${id}.file`;
    const file = resolveFile(baseDir, entry.file);

    if (!existsSync(file)) {
      issues.push({ path, message: `Response schema file not found: ${entry.file}` });
      continue;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(file, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      issues.push({ path, message: `Response schema file is not valid JSON: ${reason}` });
      continue;
    }

    if (!isRecord(parsed)) {
      issues.push({ path, message: 'Response schema must be a JSON object' });
      continue;
    }

    const compiled = compileSchema(parsed);
    if (!compiled.ok) {
      issues.push({ path, message: `Response schema does not compile: ${compiled.error}` });
      continue;
    }

    schemas.set(id, {
      id,
      description: entry.description,
      mode: entry.format,
      file,
      document: Object.freeze(parsed),
    });
  }

  return schemas;
}

function readPrompt(baseDir: string, file: string, env: Environment): string {
  // Unresolved placeholders are kept for the run-time prompt variables.
  return expandString(readFileSync(resolveFile(baseDir, file), 'utf-8'), env).trim();
}

export function buildToolServerSpec(id: string, server: McpServerConfig): ToolServerSpec {
  if (server.url) {
    return Object.freeze({
      id,
      connection: Object.freeze({ type: 'http', url: server.url, headers: Object.freeze({ ...server.headers }) }),
      tools: Object.freeze([...server.tools]),
    });
  }

  const env = Object.fromEntries(Object.entries(server.env).filter(([, value]) => value !== ''));
  const args = [...server.args];
  if (Object.keys(env).length === 0 && server.in_cluster_fallback && !args.includes(IN_CLUSTER_FLAG)) {
    args.push(IN_CLUSTER_FLAG);
  }

  return Object.freeze({
    id,
    connection: Object.freeze({
      type: 'stdio',
      command: server.command,
      args: Object.freeze(args),
      env: Object.freeze(env),
    }),
    tools: Object.freeze([...server.tools]),
  });
}

function buildConfiguration(
  document: FathomConfig,
  source: string,
  baseDir: string,
  env: Environment,
  responseSchemas: Map<string, ResponseSchema>
): Configuration {
  const { defaults } = document;

  const agents = new Map<string, AgentSpec>();
  for (const [id, agent] of Object.entries(mergedAgents(document))) {
    agents.set(
      id,
      Object.freeze({
        kind: 'agent',
        id,
        description: agent.description,
        instruction: readPrompt(baseDir, agent.system_prompt_file, env),
        model: agent.model || defaults.models.orchestrator,
        maxTurns: agent.max_turns || defaults.max_turns.investigation,
        timeoutMs: (agent.timeout_seconds || defaults.timeouts.investigation) * 1000,
        promptVariables: Object.freeze({ ...agent.prompt_variables }),
        requestVariables: Object.freeze([...agent.request_variables]),
        collectors: Object.freeze([...agent.subagents]),
        ...(agent.response_schema ? { responseSchema: agent.response_schema } : {}),
      })
    );
  }

  const collectors = new Map<string, CollectorSpec>();
  for (const [id, subagent] of Object.entries(document.subagents)) {
    collectors.set(
      id,
      Object.freeze({
        kind: 'collector',
        id,
        description: subagent.description,
        instruction: readPrompt(baseDir, subagent.system_prompt_file, env),
        model: subagent.model || defaults.models.collector,
        maxTurns: subagent.max_turns || defaults.max_turns.subagent,
        timeoutMs: (subagent.timeout_seconds || defaults.timeouts.subagent) * 1000,
        promptVariables: Object.freeze({ ...subagent.prompt_variables }),
        requestVariables: Object.freeze([...subagent.request_variables]),
        toolServers: Object.freeze([...subagent.mcp_servers]),
        allowedTools: Object.freeze([...subagent.allowed_tools]),
      })
    );
  }

  const toolServers = new Map<string, ToolServerSpec>();
  for (const [id, server] of Object.entries(document.mcp_servers)) {
    toolServers.set(id, buildToolServerSpec(id, server));
  }

  return Object.freeze({
    version: document.version,
    source,
    ...(defaults.agent ? { defaultAgent: defaults.agent } : {}),
    defaultFormat: defaults.response.format,
    provider: Object.freeze({ ...document.provider }),
    sampling: Object.freeze({
      ...(defaults.temperature !== undefined ? { temperature: defaults.temperature } : {}),
      ...(defaults.max_output_tokens !== undefined ? { maxOutputTokens: defaults.max_output_tokens } : {}),
    }),
    pricing: new Map(Object.entries(document.pricing)),
    agents,
    collectors,
    toolServers,
    responseSchemas,
  });
}
