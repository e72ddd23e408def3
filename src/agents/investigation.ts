/**
 * Investigation Service
 *
 * Entry point for one query: resolves the agent, runs it through the
 * runtime, formats the coordinator's answer against the agent's response
 * schema and reports metrics for the whole tree of runs.
 */
import { randomUUID } from 'node:crypto';
import {
  getAgentSpec,
  getResponseSchemaFor,
  resolveDefaultAgent,
  type AgentSpec,
  type Configuration,
} from '../config/model.js';
import { FathomError, UnknownAgentError } from '../errors.js';
import { CONTENT_TYPES, formatResponse } from '../formatter/response.js';
import { EMPTY_USAGE, addUsage, type ModelAdapter, type TokenUsage } from '../llm/types.js';
import { ToolServerGateway } from '../mcp/gateway.js';
import { agentLogger } from '../utils/logger.js';
import { AgentRuntime } from './runtime.js';
import { summarizeRun, type Run, type RunObserver, type RunSummary } from './types.js';

/** Upper bound on a per-request time budget override, in seconds. */
export const MAX_TIMEOUT_SECONDS = 600;

export interface InvestigationRequest {
  query: string;
  agent?: string;
  variables?: Readonly<Record<string, string>>;
  timeoutSeconds?: number;
  requestId?: string;
  signal?: AbortSignal;
  observer?: RunObserver;
}

export interface AgentMetrics {
  durationMs: number;
  numTurns: number;
  totalCostUsd: number;
  usage: TokenUsage;
}

export interface InvestigationResult {
  requestId: string;
  agent: string;
  /** The validated object for machine schemas, the rendered text otherwise. */
  result: string | Record<string, unknown>;
  contentType: string;
  body: string;
  metrics: AgentMetrics;
  breakdown: Record<string, AgentMetrics>;
  run: Run;
}

export interface InvestigationDependencies {
  configuration: Configuration;
  adapter: ModelAdapter;
  gateway?: ToolServerGateway;
}

function metricsOf(summary: RunSummary): AgentMetrics {
  return {
    durationMs: summary.durationMs,
    numTurns: summary.numTurns,
    totalCostUsd: summary.costUsd,
    usage: summary.usage,
  };
}

function mergeMetrics(a: AgentMetrics, b: AgentMetrics): AgentMetrics {
  return {
    durationMs: a.durationMs + b.durationMs,
    numTurns: a.numTurns + b.numTurns,
    totalCostUsd: a.totalCostUsd + b.totalCostUsd,
    usage: addUsage(a.usage, b.usage),
  };
}

/**
 * One entry per participating agent id. Several runs of the same collector
 * are merged, so the entries add up to the investigation's totals.
 */
export function buildBreakdown(root: RunSummary): Record<string, AgentMetrics> {
  const breakdown: Record<string, AgentMetrics> = {};
  const visit = (summary: RunSummary) => {
    const metrics = metricsOf(summary);
    const existing = breakdown[summary.specId];
    breakdown[summary.specId] = existing ? mergeMetrics(existing, metrics) : metrics;
    summary.children.forEach(visit);
  };
  visit(root);
  return breakdown;
}

/**
 * Wall-clock duration of the coordinator, turns of the coordinator, and
 * usage and cost summed over every run in the tree.
 */
export function buildMetrics(root: RunSummary): AgentMetrics {
  let usage: TokenUsage = { ...EMPTY_USAGE };
  let totalCostUsd = 0;
  const visit = (summary: RunSummary) => {
    usage = addUsage(usage, summary.usage);
    totalCostUsd += summary.costUsd;
    summary.children.forEach(visit);
  };
  visit(root);
  return { durationMs: root.durationMs, numTurns: root.numTurns, totalCostUsd, usage };
}

export class InvestigationService {
  readonly configuration: Configuration;
  private readonly runtime: AgentRuntime;

  constructor(deps: InvestigationDependencies) {
    this.configuration = deps.configuration;
    this.runtime = new AgentRuntime({
      adapter: deps.adapter,
      configuration: deps.configuration,
      gateway: deps.gateway ?? new ToolServerGateway(),
    });
  }

  resolveAgent(name?: string): AgentSpec {
    const agent = name ? getAgentSpec(this.configuration, name) : resolveDefaultAgent(this.configuration);
    if (!agent) {
      throw new UnknownAgentError(name ?? '(default)', [...this.configuration.agents.keys()]);
    }
    return agent;
  }

  async investigate(request: InvestigationRequest): Promise<InvestigationResult> {
    const requestId = request.requestId ?? randomUUID();
    const agent = this.resolveAgent(request.agent);

    agentLogger.info({ requestId, agent: agent.id }, 'Investigation started');

    const run = await this.runtime.run(agent, request.query, {
      ...(request.signal ? { signal: request.signal } : {}),
      ...(request.timeoutSeconds ? { timeoutMs: request.timeoutSeconds * 1000 } : {}),
      ...(request.variables ? { variables: request.variables } : {}),
      ...(request.observer ? { observer: request.observer } : {}),
    });

    if (run.status !== 'completed') {
      const error =
        run.error ?? new FathomError(`Run of '${agent.id}' ended ${run.status}`, 'RUN_FAILED', 500);
      Object.assign(error.details, { requestId });
      throw error;
    }

    const formatted = formatResponse(run.output, getResponseSchemaFor(this.configuration, agent));
    const summary = summarizeRun(run);
    const metrics = buildMetrics(summary);

    agentLogger.info(
      { requestId, agent: agent.id, runId: run.id, ...metrics },
      'Investigation completed'
    );

    return {
      requestId,
      agent: agent.id,
      result: formatted.contentType === CONTENT_TYPES.machine && formatted.data ? formatted.data : formatted.body,
      contentType: formatted.contentType,
      body: formatted.body,
      metrics,
      breakdown: buildBreakdown(summary),
      run,
    };
  }
}
