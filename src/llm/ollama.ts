/**
 * Ollama Model Adapter
 *
 * Adapter for a local or remote Ollama instance (default: localhost:11434).
 * Ollama has no tool-call ids, so ids are minted here and matched back when
 * tool results are sent.
 *
 * Dependencies:
 * - ollama: Official Ollama JavaScript client for local LLM inference
 */
import { randomUUID } from 'node:crypto';
import { Ollama, type ChatResponse, type Message, type Tool } from 'ollama';
import { AdapterError, toErrorMessage } from '../errors.js';
import {
  isRecord,
  textOf,
  type FinishReason,
  type GenerateRequest,
  type GenerateResponse,
  type ModelAdapter,
  type ResponsePart,
  type ToolDeclaration,
  type Turn,
} from './types.js';

const PROVIDER = 'ollama';

export class OllamaAdapter implements ModelAdapter {
  readonly provider = PROVIDER;

  constructor(private readonly host: string = 'http://localhost:11434') {}

  async generate(request: GenerateRequest, signal?: AbortSignal): Promise<GenerateResponse> {
    let response: ChatResponse;
    try {
      response = await this.client(signal).chat({
        model: request.model,
        messages: toOllamaMessages(request.turns),
        tools: request.tools?.map(toOllamaTool),
        stream: false,
        options: {
          temperature: request.temperature,
          num_predict: request.maxOutputTokens,
        },
      });
    } catch (error) {
      throw new AdapterError(PROVIDER, `Chat request failed: ${toErrorMessage(error)}`, {
        cause: error,
        details: { model: request.model },
      });
    }

    return fromOllamaResponse(response);
  }

  async ping(signal?: AbortSignal): Promise<void> {
    try {
      await this.client(signal).list();
    } catch (error) {
      throw new AdapterError(PROVIDER, `Model endpoint unreachable: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }
  }

  // One client per call: the abort signal is bound through fetch, and calls stay independent.
  private client(signal?: AbortSignal): Ollama {
    return new Ollama({
      host: this.host,
      fetch: (input, init) => fetch(input, { ...init, signal }),
    });
  }
}

export function toOllamaMessages(turns: Turn[]): Message[] {
  const messages: Message[] = [];

  for (const turn of turns) {
    if (turn.role === 'tool') {
      for (const part of turn.parts) {
        if (part.type === 'tool-result') {
          messages.push({ role: 'tool', content: part.content });
        }
      }
      continue;
    }

    const toolCalls = turn.parts.flatMap((part) =>
      part.type === 'tool-call' ? [{ function: { name: part.name, arguments: part.arguments } }] : []
    );

    messages.push({
      role: turn.role,
      content: textOf(turn.parts),
      ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
    });
  }

  return messages;
}

function toOllamaTool(tool: ToolDeclaration): Tool {
  const properties: Record<string, { type: string; description: string; enum?: string[] }> = {};

  for (const [name, schema] of Object.entries(tool.parameters.properties)) {
    if (!isRecord(schema)) continue;
    const values = Array.isArray(schema['enum'])
      ? schema['enum'].filter((value): value is string => typeof value === 'string')
      : undefined;
    properties[name] = {
      type: typeof schema['type'] === 'string' ? schema['type'] : 'string',
      description: typeof schema['description'] === 'string' ? schema['description'] : '',
      ...(values ? { enum: values } : {}),
    };
  }

  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: {
        type: 'object',
        required: tool.parameters.required ?? [],
        properties,
      },
    },
  };
}

export function fromOllamaResponse(response: ChatResponse): GenerateResponse {
  if (!response.message) {
    throw new AdapterError(PROVIDER, 'Malformed provider payload: response has no message');
  }

  const parts: ResponsePart[] = [];
  if (response.message.content) {
    parts.push({ type: 'text', text: response.message.content });
  }

  for (const call of response.message.tool_calls ?? []) {
    const id = `call_${randomUUID()}`;
    const args: unknown = call.function.arguments;
    if (isRecord(args)) {
      parts.push({ type: 'tool-call', id, name: call.function.name, arguments: args });
    } else {
      parts.push({
        type: 'invalid-tool-call',
        id,
        name: call.function.name,
        rawArguments: JSON.stringify(args) ?? '',
        error: `AdapterError: could not decode arguments for '${call.function.name}': arguments must be a JSON object`,
      });
    }
  }

  const promptTokens = response.prompt_eval_count ?? 0;
  const completionTokens = response.eval_count ?? 0;

  return {
    parts,
    finishReason: mapDoneReason(response.done_reason, parts),
    usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
  };
}

function mapDoneReason(reason: string | undefined, parts: ResponsePart[]): FinishReason {
  if (parts.some((part) => part.type !== 'text')) {
    return 'tool-calls';
  }
  if (reason === 'length') {
    return 'max-tokens';
  }
  return 'stop';
}
