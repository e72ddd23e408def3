/**
 * A ModelAdapter that answers from per-model scripts. Each call to a model
 * takes the next step of that model's script; a step may be a response, an
 * error to throw, or a function for calls that need the request or signal.
 */
import type {
  GenerateRequest,
  GenerateResponse,
  ModelAdapter,
  TokenUsage,
  ToolCallPart,
} from '../../src/llm/types.js';

export type ScriptStep =
  | GenerateResponse
  | Error
  | ((request: GenerateRequest, signal?: AbortSignal) => Promise<GenerateResponse>);

export function usage(promptTokens: number, completionTokens: number): TokenUsage {
  return { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
}

export function reply(
  text: string,
  options: { usage?: TokenUsage; finishReason?: GenerateResponse['finishReason'] } = {}
): GenerateResponse {
  return {
    parts: [{ type: 'text', text }],
    finishReason: options.finishReason ?? 'stop',
    usage: options.usage ?? usage(10, 5),
  };
}

let callCounter = 0;

export function toolCall(name: string, args: Record<string, unknown> = {}, id?: string): ToolCallPart {
  return { type: 'tool-call', id: id ?? `call-${++callCounter}`, name, arguments: args };
}

export function callTools(...calls: ToolCallPart[]): GenerateResponse {
  return { parts: calls, finishReason: 'tool-calls', usage: usage(10, 5) };
}

/**
 * A step that stays pending until the run's signal aborts, then rejects the
 * way a provider client does.
 */
export function hangUntilAborted(): ScriptStep {
  return (_request, signal) =>
    new Promise<GenerateResponse>((_resolve, reject) => {
      if (!signal) return;
      const abort = () => reject(new Error('The operation was aborted'));
      if (signal.aborted) abort();
      signal.addEventListener('abort', abort, { once: true });
    });
}

export class ScriptedAdapter implements ModelAdapter {
  readonly provider = 'scripted';
  readonly requests: GenerateRequest[] = [];
  pingError: Error | undefined;
  private readonly scripts: Map<string, ScriptStep[]>;

  constructor(scripts: Record<string, ScriptStep[]>) {
    this.scripts = new Map(Object.entries(scripts).map(([model, steps]) => [model, [...steps]]));
  }

  callsTo(model: string): GenerateRequest[] {
    return this.requests.filter((request) => request.model === model);
  }

  async generate(request: GenerateRequest, signal?: AbortSignal): Promise<GenerateResponse> {
    this.requests.push(request);
    const step = this.scripts.get(request.model)?.shift();
    if (step === undefined) {
      throw new Error(`No scripted response left for model '${request.model}'`);
    }
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === 'function') {
      return step(request, signal);
    }
    return step;
  }

  async ping(): Promise<void> {
    if (this.pingError) throw this.pingError;
  }
}
