/**
 * Error Types
 *
 * Typed errors shared by the configuration loader, model adapters, tool
 * gateway, agent runtime and HTTP layer. Every error carries a
 * machine-readable code and the HTTP status the server maps it to.
 *
 * Errors raised inside a single tool call or delegation are turned into tool
 * results by the runtime. Errors that break the run itself (budgets, adapter
 * failures, schema mismatches) surface as these classes at the HTTP boundary.
 */

export interface FathomErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class FathomError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    options: FathomErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'FathomError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = options.details ?? {};
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(requestId?: string) {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(requestId ? { requestId } : {}),
        details: this.details,
      },
    };
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Startup-fatal. Lists every problem found in the configuration document.
 */
export class ConfigValidationError extends FathomError {
  readonly issues: ConfigIssue[];

  constructor(source: string, issues: ConfigIssue[]) {
    const lines = issues.map((issue) =>
      issue.path ? `  - ${issue.path}: ${issue.message}` : `  - ${issue.message}`
    );
    super(`Invalid configuration in ${source}:\n${lines.join('\n')}`, 'CONFIG_INVALID', 500, {
      details: { source, issues },
    });
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

export class AdapterError extends FathomError {
  readonly provider: string;

  constructor(provider: string, message: string, options: FathomErrorOptions = {}) {
    super(message, 'ADAPTER_ERROR', 502, {
      ...options,
      details: { provider, ...options.details },
    });
    this.name = 'AdapterError';
    this.provider = provider;
  }
}

export class ToolNotAuthorizedError extends FathomError {
  readonly tool: string;

  constructor(tool: string, owner: string) {
    super(`Tool '${tool}' is not authorized for '${owner}'`, 'TOOL_NOT_AUTHORIZED', 403, {
      details: { tool, owner },
    });
    this.name = 'ToolNotAuthorizedError';
    this.tool = tool;
  }
}

export type ToolFailurePhase = 'connect' | 'invoke';

export class ToolInvocationError extends FathomError {
  readonly server: string;
  readonly tool: string | undefined;
  readonly phase: ToolFailurePhase;

  constructor(
    server: string,
    phase: ToolFailurePhase,
    message: string,
    options: FathomErrorOptions & { tool?: string } = {}
  ) {
    super(message, 'TOOL_INVOCATION_FAILED', 502, {
      cause: options.cause,
      details: { server, phase, ...(options.tool ? { tool: options.tool } : {}), ...options.details },
    });
    this.name = 'ToolInvocationError';
    this.server = server;
    this.tool = options.tool;
    this.phase = phase;
  }
}

export class TurnLimitExceededError extends FathomError {
  constructor(agent: string, maxTurns: number) {
    super(
      `Agent '${agent}' reached its limit of ${maxTurns} turns without finishing`,
      'TURN_LIMIT_EXCEEDED',
      500,
      { details: { agent, maxTurns } }
    );
    this.name = 'TurnLimitExceededError';
  }
}

export class RunTimeoutError extends FathomError {
  constructor(agent: string, timeoutMs: number, turn: number) {
    super(
      `Agent '${agent}' exceeded its time budget of ${timeoutMs}ms at turn ${turn}`,
      'TIMED_OUT',
      504,
      { details: { agent, timeoutMs, turn } }
    );
    this.name = 'RunTimeoutError';
  }
}

export class RunCancelledError extends FathomError {
  constructor(agent: string, turn: number, reason?: unknown) {
    super(`Run of '${agent}' was cancelled at turn ${turn}`, 'CANCELLED', 499, {
      cause: reason,
      details: { agent, turn },
    });
    this.name = 'RunCancelledError';
  }
}

export interface SchemaIssue {
  field: string;
  message: string;
}

export class SchemaValidationError extends FathomError {
  readonly issues: SchemaIssue[];

  constructor(schema: string, issues: SchemaIssue[]) {
    const summary = issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
    super(`Response does not match schema '${schema}': ${summary}`, 'SCHEMA_VALIDATION_FAILED', 422, {
      details: { schema, issues },
    });
    this.name = 'SchemaValidationError';
    this.issues = issues;
  }
}

export class UnknownAgentError extends FathomError {
  constructor(agent: string, available: string[]) {
    super(`Agent '${agent}' not found. Available: ${available.join(', ')}`, 'AGENT_NOT_FOUND', 404, {
      details: { agent, available },
    });
    this.name = 'UnknownAgentError';
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toFathomError(error: unknown): FathomError {
  if (error instanceof FathomError) return error;
  return new FathomError(toErrorMessage(error), 'INTERNAL_ERROR', 500, { cause: error });
}
