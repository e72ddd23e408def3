/**
 * Agent Type Definitions
 *
 * Runs, their summaries and the events a run emits. A run is one execution
 * of an agent or collector against one query; its transcript is append-only
 * and its status only ever moves from `running` to one terminal value.
 */
import type { FathomError } from '../errors.js';
import type { ToolCallPart, ToolDeclaration, TokenUsage, Turn } from '../llm/types.js';

export type RunnableKind = 'agent' | 'collector';

export type TerminalStatus = 'completed' | 'failed' | 'timed-out' | 'turn-limit-exceeded';
export type RunStatus = 'running' | TerminalStatus;

export interface RunSummary {
  runId: string;
  specId: string;
  kind: RunnableKind;
  model: string;
  status: RunStatus;
  numTurns: number;
  usage: TokenUsage;
  costUsd: number;
  durationMs: number;
  children: RunSummary[];
}

export interface Run {
  id: string;
  specId: string;
  kind: RunnableKind;
  model: string;
  parentRunId?: string;
  transcript: Turn[];
  usage: TokenUsage;
  costUsd: number;
  numTurns: number;
  status: RunStatus;
  truncated: boolean;
  output: string;
  error?: FathomError;
  children: RunSummary[];
  startedAt: number;
  finishedAt?: number;
}

export type RunEvent =
  | { type: 'run-started'; runId: string; agent: string; kind: RunnableKind; parentRunId?: string }
  | {
      type: 'model-call';
      runId: string;
      agent: string;
      turn: number;
      finishReason: string;
      usage: TokenUsage;
    }
  | { type: 'tool-call'; runId: string; agent: string; callId: string; tool: string; arguments: Record<string, unknown> }
  | { type: 'tool-result'; runId: string; agent: string; callId: string; tool: string; isError: boolean; content: string }
  | {
      type: 'run-finished';
      runId: string;
      agent: string;
      status: TerminalStatus;
      numTurns: number;
      error?: string;
    };

export type RunObserver = (event: RunEvent) => void;

/**
 * What a tool call needs from the run that makes it.
 */
export interface DispatchContext {
  run: Run;
  signal: AbortSignal;
  /** Absolute wall-clock deadline of the calling run, in epoch ms. */
  deadline: number;
  /** Request variables as received; each runnable binds its own allow-list. */
  variables: Readonly<Record<string, string>>;
  observer?: RunObserver;
}

/**
 * The complete set of tools a run may call. A coordinator's surface holds
 * only delegation tools; a collector's only its tool servers' tools.
 */
export interface ToolSurface {
  readonly declarations: readonly ToolDeclaration[];
  /** Calls on a concurrent surface are started together and joined. */
  readonly concurrent: boolean;
  execute(call: ToolCallPart, context: DispatchContext): Promise<ToolExecution>;
}

export interface ToolExecution {
  content: string;
  isError: boolean;
  /** The nested run a delegation produced, attached to the caller in call order. */
  child?: Run;
  /** Set when the failure removes a capability the run depends on; ends the run. */
  fatal?: FathomError;
}

export function summarizeRun(run: Run): RunSummary {
  return {
    runId: run.id,
    specId: run.specId,
    kind: run.kind,
    model: run.model,
    status: run.status,
    numTurns: run.numTurns,
    usage: run.usage,
    costUsd: run.costUsd,
    durationMs: (run.finishedAt ?? Date.now()) - run.startedAt,
    children: run.children,
  };
}
