/**
 * Delegation Protocol
 *
 * A coordinator sees one tool per collector it may delegate to. Calling it
 * starts a nested collector run with a budget no larger than what the
 * coordinator has left, and the collector's outcome comes back as the tool
 * result. Collectors never receive these tools, so delegation is one level
 * deep.
 */
import type { AgentSpec, CollectorSpec, Configuration } from '../config/model.js';
import { FathomError, ToolInvocationError, ToolNotAuthorizedError } from '../errors.js';
import type { ToolCallPart, ToolDeclaration } from '../llm/types.js';
import type { DispatchContext, Run, RunObserver, ToolExecution, ToolSurface } from './types.js';

export const QUERY_PARAMETER = 'query';

export interface CollectorRunOptions {
  signal: AbortSignal;
  timeoutMs: number;
  variables: Readonly<Record<string, string>>;
  observer?: RunObserver;
  parentRunId: string;
}

export interface CollectorRunner {
  run(spec: CollectorSpec, query: string, options: CollectorRunOptions): Promise<Run>;
}

export function delegationDeclaration(collector: CollectorSpec): ToolDeclaration {
  return {
    name: collector.id,
    description: collector.description,
    parameters: {
      type: 'object',
      properties: {
        [QUERY_PARAMETER]: {
          type: 'string',
          description: `What ${collector.id} should find out`,
        },
      },
      required: [QUERY_PARAMETER],
    },
  };
}

/**
 * Renders a nested run's outcome as the text its coordinator reads.
 */
export function delegationResult(run: Run): ToolExecution {
  if (run.status === 'completed') {
    const content = run.truncated
      ? `${run.output}\n\n[truncated: collector '${run.specId}' reached its output token limit]`
      : run.output;
    return { content, isError: false, child: run };
  }

  const message = run.error?.message ?? 'no result';
  const execution: ToolExecution = {
    content: `collector '${run.specId}' ${run.status}: ${message}`,
    isError: true,
    child: run,
  };
  if (run.error instanceof ToolInvocationError && run.error.phase === 'connect') {
    execution.fatal = run.error;
  }
  return execution;
}

export class DelegationSurface implements ToolSurface {
  readonly concurrent = true;
  readonly declarations: readonly ToolDeclaration[];
  private readonly collectors: ReadonlyMap<string, CollectorSpec>;

  constructor(
    private readonly agent: AgentSpec,
    configuration: Configuration,
    private readonly runner: CollectorRunner
  ) {
    const collectors = new Map<string, CollectorSpec>();
    for (const id of agent.collectors) {
      const collector = configuration.collectors.get(id);
      if (collector) collectors.set(id, collector);
    }
    this.collectors = collectors;
    this.declarations = [...collectors.values()].map(delegationDeclaration);
  }

  async execute(call: ToolCallPart, context: DispatchContext): Promise<ToolExecution> {
    const collector = this.collectors.get(call.name);
    if (!collector) {
      throw new ToolNotAuthorizedError(call.name, this.agent.id);
    }

    const query = call.arguments[QUERY_PARAMETER];
    if (typeof query !== 'string' || query.trim() === '') {
      throw new FathomError(
        `Delegation to '${collector.id}' needs a non-empty string '${QUERY_PARAMETER}' argument`,
        'INVALID_ARGUMENTS',
        400,
        { details: { collector: collector.id } }
      );
    }

    const remainingMs = Math.max(0, context.deadline - Date.now());
    const child = await this.runner.run(collector, query, {
      signal: context.signal,
      timeoutMs: Math.min(remainingMs, collector.timeoutMs),
      variables: context.variables,
      ...(context.observer ? { observer: context.observer } : {}),
      parentRunId: context.run.id,
    });

    return delegationResult(child);
  }
}
