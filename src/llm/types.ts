/**
 * LLM Type Definitions
 *
 * Provider-neutral representation of a model exchange: ordered turns made of
 * parts, tool declarations, finish reasons and token usage. Every provider
 * adapter converts to and from these shapes so the agent runtime never sees
 * a provider wire format.
 */

export type Role = 'system' | 'user' | 'assistant' | 'tool';

export interface TextPart {
  type: 'text';
  text: string;
}

export interface ToolCallPart {
  type: 'tool-call';
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/**
 * A tool call whose arguments could not be decoded. It is kept in the
 * transcript so the model sees its own call, but it is never executed.
 */
export interface InvalidToolCallPart {
  type: 'invalid-tool-call';
  id: string;
  name: string;
  rawArguments: string;
  error: string;
}

export interface ToolResultPart {
  type: 'tool-result';
  callId: string;
  name: string;
  content: string;
  isError: boolean;
}

export type ResponsePart = TextPart | ToolCallPart | InvalidToolCallPart;
export type Part = ResponsePart | ToolResultPart;

export interface Turn {
  role: Role;
  parts: Part[];
}

export interface JsonSchemaObject {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
}

export interface ToolDeclaration {
  name: string;
  description: string;
  parameters: JsonSchemaObject;
}

export type FinishReason = 'stop' | 'max-tokens' | 'tool-calls' | 'content-filtered' | 'other';

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface GenerateRequest {
  model: string;
  turns: Turn[];
  tools?: ToolDeclaration[];
  temperature?: number;
  maxOutputTokens?: number;
}

export interface GenerateResponse {
  parts: ResponsePart[];
  finishReason: FinishReason;
  usage: TokenUsage;
}

/**
 * One provider behind one narrow interface. Implementations are stateless
 * apart from their HTTP client and may be called concurrently.
 */
export interface ModelAdapter {
  readonly provider: string;
  generate(request: GenerateRequest, signal?: AbortSignal): Promise<GenerateResponse>;
  ping(signal?: AbortSignal): Promise<void>;
}

export const EMPTY_USAGE: Readonly<TokenUsage> = Object.freeze({
  promptTokens: 0,
  completionTokens: 0,
  totalTokens: 0,
});

export function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    promptTokens: a.promptTokens + b.promptTokens,
    completionTokens: a.completionTokens + b.completionTokens,
    totalTokens: a.totalTokens + b.totalTokens,
  };
}

export function textOf(parts: Part[]): string {
  return parts
    .filter((part): part is TextPart => part.type === 'text')
    .map((part) => part.text)
    .join('');
}

/**
 * Decodes provider-encoded tool arguments. Only a JSON object is accepted;
 * an empty string means "no arguments".
 */
export function decodeToolArguments(
  raw: string
): { ok: true; value: Record<string, unknown> } | { ok: false; error: string } {
  if (raw.trim() === '') {
    return { ok: true, value: {} };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, error: `arguments are not valid JSON: ${message}` };
  }

  if (!isRecord(parsed)) {
    return { ok: false, error: 'arguments must be a JSON object' };
  }

  return { ok: true, value: parsed };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
