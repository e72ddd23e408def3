/**
 * Agent Runtime
 *
 * Runs one agent or collector against one query as a bounded turn loop:
 *
 *   planning -> model-call -> (tool-dispatch -> model-call)* -> terminal
 *
 * Terminal states are completed, failed, timed-out and turn-limit-exceeded.
 * `run()` never throws; the returned Run carries its status, the partial
 * transcript and, unless it completed, the error that ended it.
 */
import { randomUUID } from 'node:crypto';
import type { CollectorSpec, Configuration, RunnableSpec, ToolServerSpec } from '../config/model.js';
import { estimateCostUsd } from '../config/model.js';
import {
  AdapterError,
  RunCancelledError,
  RunTimeoutError,
  ToolInvocationError,
  TurnLimitExceededError,
  toErrorMessage,
  toFathomError,
  type FathomError,
} from '../errors.js';
import {
  EMPTY_USAGE,
  addUsage,
  textOf,
  type GenerateResponse,
  type InvalidToolCallPart,
  type ModelAdapter,
  type Part,
  type ToolCallPart,
} from '../llm/types.js';
import { withToolSession, type ToolServerGateway } from '../mcp/gateway.js';
import { linkAbortSignal } from '../utils/abort.js';
import { agentLogger } from '../utils/logger.js';
import { DelegationSurface, type CollectorRunner } from './delegation.js';
import { bindVariables, renderInstruction } from './prompt.js';
import { CollectorToolSurface } from './tools.js';
import {
  summarizeRun,
  type DispatchContext,
  type Run,
  type RunEvent,
  type RunObserver,
  type TerminalStatus,
  type ToolExecution,
  type ToolSurface,
} from './types.js';

const MODEL_CALL_ATTEMPTS = 2;

export interface RuntimeDependencies {
  adapter: ModelAdapter;
  configuration: Configuration;
  gateway: ToolServerGateway;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Overrides the runnable's time budget. */
  timeoutMs?: number;
  /** Overrides the runnable's turn budget. */
  maxTurns?: number;
  variables?: Readonly<Record<string, string>>;
  observer?: RunObserver;
  parentRunId?: string;
}

interface RunState {
  spec: RunnableSpec;
  run: Run;
  controller: AbortController;
  deadline: number;
  timeoutMs: number;
  maxTurns: number;
  variables: Readonly<Record<string, string>>;
  observer?: RunObserver;
  timedOut: boolean;
}

type CallPart = ToolCallPart | InvalidToolCallPart;

function isCallPart(part: Part): part is CallPart {
  return part.type === 'tool-call' || part.type === 'invalid-tool-call';
}

export class AgentRuntime implements CollectorRunner {
  constructor(private readonly deps: RuntimeDependencies) {}

  async run(spec: RunnableSpec, query: string, options: RunOptions = {}): Promise<Run> {
    const timeoutMs = options.timeoutMs ?? spec.timeoutMs;
    const maxTurns = options.maxTurns ?? spec.maxTurns;
    const run: Run = {
      id: randomUUID(),
      specId: spec.id,
      kind: spec.kind,
      model: spec.model,
      ...(options.parentRunId ? { parentRunId: options.parentRunId } : {}),
      transcript: [],
      usage: { ...EMPTY_USAGE },
      costUsd: 0,
      numTurns: 0,
      status: 'running',
      truncated: false,
      output: '',
      children: [],
      startedAt: Date.now(),
    };

    const state: RunState = {
      spec,
      run,
      controller: new AbortController(),
      deadline: run.startedAt + timeoutMs,
      timeoutMs,
      maxTurns,
      variables: options.variables ?? {},
      ...(options.observer ? { observer: options.observer } : {}),
      timedOut: false,
    };

    const unlink = linkAbortSignal(options.signal, state.controller);
    const timer = setTimeout(() => {
      state.timedOut = true;
      state.controller.abort(new RunTimeoutError(spec.id, timeoutMs, run.numTurns + 1));
    }, timeoutMs);

    agentLogger.info(
      { runId: run.id, agent: spec.id, kind: spec.kind, model: spec.model, maxTurns, timeoutMs, parentRunId: run.parentRunId },
      'Run started'
    );
    this.emit(state, {
      type: 'run-started',
      runId: run.id,
      agent: spec.id,
      kind: spec.kind,
      ...(run.parentRunId ? { parentRunId: run.parentRunId } : {}),
    });

    try {
      if (spec.kind === 'collector') {
        await this.runCollector(state, spec, query);
      } else {
        await this.loop(state, query, new DelegationSurface(spec, this.deps.configuration, this));
      }
    } catch (error) {
      this.fail(state, error);
    } finally {
      clearTimeout(timer);
      unlink();
      run.finishedAt = Date.now();
      run.costUsd = estimateCostUsd(this.deps.configuration, spec.model, run.usage);
    }

    this.finish(state);
    return run;
  }

  private async runCollector(state: RunState, spec: CollectorSpec, query: string): Promise<void> {
    const servers: ToolServerSpec[] = [];
    for (const id of spec.toolServers) {
      const server = this.deps.configuration.toolServers.get(id);
      if (!server) {
        throw new ToolInvocationError(id, 'connect', `MCP server '${id}' is not configured`);
      }
      servers.push(server);
    }

    const signal = state.controller.signal;
    await withToolSession(this.deps.gateway, servers, signal, async (session) => {
      const surface = await CollectorToolSurface.create(spec, session, signal);
      await this.loop(state, query, surface);
    });
  }

  private async loop(state: RunState, query: string, surface: ToolSurface): Promise<void> {
    const { spec, run } = state;
    const variables = bindVariables(spec.promptVariables, spec.requestVariables, state.variables);

    run.transcript.push(
      { role: 'system', parts: [{ type: 'text', text: renderInstruction(spec.instruction, variables) }] },
      { role: 'user', parts: [{ type: 'text', text: query }] }
    );

    for (;;) {
      this.checkInterrupt(state);

      const response = await this.generate(state, surface);
      run.numTurns += 1;
      run.usage = addUsage(run.usage, response.usage);
      run.transcript.push({ role: 'assistant', parts: response.parts });
      this.emit(state, {
        type: 'model-call',
        runId: run.id,
        agent: spec.id,
        turn: run.numTurns,
        finishReason: response.finishReason,
        usage: response.usage,
      });

      const calls = response.parts.filter(isCallPart);
      if (calls.length === 0) {
        run.output = textOf(response.parts);
        run.truncated = response.finishReason === 'max-tokens';
        run.status = 'completed';
        return;
      }

      if (run.numTurns >= state.maxTurns) {
        throw new TurnLimitExceededError(spec.id, state.maxTurns);
      }

      await this.dispatch(state, surface, calls);
    }
  }

  private checkInterrupt(state: RunState): void {
    const { spec, run, controller } = state;
    if (state.timedOut || Date.now() >= state.deadline) {
      throw new RunTimeoutError(spec.id, state.timeoutMs, run.numTurns + 1);
    }
    if (controller.signal.aborted) {
      throw new RunCancelledError(spec.id, run.numTurns + 1, controller.signal.reason);
    }
  }

  /**
   * One model call. An AdapterError is retried once against the same
   * transcript; anything else, or a second failure, ends the run.
   */
  private async generate(state: RunState, surface: ToolSurface): Promise<GenerateResponse> {
    const { spec, run, controller } = state;
    const { sampling } = this.deps.configuration;

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.deps.adapter.generate(
          {
            model: spec.model,
            turns: [...run.transcript],
            ...(surface.declarations.length > 0 ? { tools: [...surface.declarations] } : {}),
            ...sampling,
          },
          controller.signal
        );
      } catch (error) {
        if (controller.signal.aborted || !(error instanceof AdapterError) || attempt >= MODEL_CALL_ATTEMPTS) {
          throw error;
        }
        agentLogger.warn(
          { runId: run.id, agent: spec.id, turn: run.numTurns + 1, error: error.message },
          'Model call failed, retrying'
        );
      }
    }
  }

  private async dispatch(state: RunState, surface: ToolSurface, calls: CallPart[]): Promise<void> {
    const { spec, run } = state;
    const context: DispatchContext = {
      run,
      signal: state.controller.signal,
      deadline: state.deadline,
      variables: state.variables,
      ...(state.observer ? { observer: state.observer } : {}),
    };

    const executeOne = async (call: CallPart): Promise<ToolExecution> => {
      if (call.type === 'invalid-tool-call') {
        return { content: `Error: invalid arguments for '${call.name}': ${call.error}`, isError: true };
      }

      this.emit(state, {
        type: 'tool-call',
        runId: run.id,
        agent: spec.id,
        callId: call.id,
        tool: call.name,
        arguments: call.arguments,
      });

      try {
        return await surface.execute(call, context);
      } catch (error) {
        const execution: ToolExecution = { content: `Error: ${toErrorMessage(error)}`, isError: true };
        if (error instanceof ToolInvocationError && error.phase === 'connect') {
          execution.fatal = error;
        }
        return execution;
      }
    };

    const executions: ToolExecution[] = [];
    if (surface.concurrent) {
      executions.push(...(await Promise.all(calls.map(executeOne))));
    } else {
      for (const call of calls) {
        executions.push(await executeOne(call));
      }
    }

    let fatal: FathomError | undefined;
    for (const [index, call] of calls.entries()) {
      const execution = executions[index];
      if (!execution) continue;

      if (execution.child) {
        run.children.push(summarizeRun(execution.child));
      }
      run.transcript.push({
        role: 'tool',
        parts: [
          { type: 'tool-result', callId: call.id, name: call.name, content: execution.content, isError: execution.isError },
        ],
      });
      this.emit(state, {
        type: 'tool-result',
        runId: run.id,
        agent: spec.id,
        callId: call.id,
        tool: call.name,
        isError: execution.isError,
        content: execution.content,
      });
      fatal ??= execution.fatal;
    }

    if (fatal) {
      throw fatal;
    }
  }

  private fail(state: RunState, cause: unknown): void {
    const { spec, run, controller } = state;
    let status: TerminalStatus;
    let error: FathomError;

    if (cause instanceof RunTimeoutError) {
      status = 'timed-out';
      error = cause;
    } else if (state.timedOut) {
      status = 'timed-out';
      error = new RunTimeoutError(spec.id, state.timeoutMs, run.numTurns + 1);
    } else if (cause instanceof TurnLimitExceededError) {
      status = 'turn-limit-exceeded';
      error = cause;
    } else if (controller.signal.aborted && !(cause instanceof RunCancelledError)) {
      status = 'failed';
      error = new RunCancelledError(spec.id, run.numTurns + 1, controller.signal.reason);
    } else {
      status = 'failed';
      error = toFathomError(cause);
    }

    Object.assign(error.details, { runId: run.id, status, numTurns: run.numTurns });
    run.status = status;
    run.error = error;
  }

  private finish(state: RunState): void {
    const { spec, run } = state;
    const status: TerminalStatus = run.status === 'running' ? 'failed' : run.status;
    run.status = status;

    const durationMs = (run.finishedAt ?? Date.now()) - run.startedAt;
    const fields = {
      runId: run.id,
      agent: spec.id,
      status,
      numTurns: run.numTurns,
      durationMs,
      usage: run.usage,
      costUsd: run.costUsd,
    };
    if (status === 'completed') {
      agentLogger.info(fields, 'Run finished');
    } else {
      agentLogger.warn({ ...fields, error: run.error?.message }, 'Run ended without completing');
    }

    this.emit(state, {
      type: 'run-finished',
      runId: run.id,
      agent: spec.id,
      status,
      numTurns: run.numTurns,
      ...(run.error ? { error: run.error.message } : {}),
    });
  }

  private emit(state: RunState, event: RunEvent): void {
    try {
      state.observer?.(event);
    } catch (error) {
      agentLogger.warn({ runId: state.run.id, event: event.type, error: toErrorMessage(error) }, 'Run observer threw');
    }
  }
}
