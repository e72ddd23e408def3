/**
 * OpenAI-Compatible Model Adapter
 *
 * Maps neutral turns onto one non-streaming chat-completions call and maps
 * the first choice back. Works against any endpoint that speaks the
 * chat-completions wire format (OpenAI, Azure-style gateways, vLLM, LiteLLM)
 * via `baseUrl`.
 *
 * Dependencies:
 * - openai: Official OpenAI JavaScript client
 */
import OpenAI from 'openai';
import { AdapterError, toErrorMessage } from '../errors.js';
import {
  decodeToolArguments,
  textOf,
  type FinishReason,
  type GenerateRequest,
  type GenerateResponse,
  type ModelAdapter,
  type ResponsePart,
  type ToolDeclaration,
  type Turn,
} from './types.js';

type MessageParam = OpenAI.Chat.ChatCompletionMessageParam;
type ToolParam = OpenAI.Chat.ChatCompletionTool;

export interface OpenAIAdapterOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
}

const PROVIDER = 'openai';

export class OpenAIAdapter implements ModelAdapter {
  readonly provider = PROVIDER;
  private client: OpenAI;

  constructor(options: OpenAIAdapterOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      // Retries belong to the runtime so the transcript is never replayed twice.
      maxRetries: 0,
    });
  }

  async generate(request: GenerateRequest, signal?: AbortSignal): Promise<GenerateResponse> {
    let completion: OpenAI.Chat.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: request.model,
          messages: toOpenAIMessages(request.turns),
          ...(request.tools && request.tools.length > 0
            ? { tools: request.tools.map(toOpenAITool) }
            : {}),
          ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
          ...(request.maxOutputTokens !== undefined
            ? { max_completion_tokens: request.maxOutputTokens }
            : {}),
        },
        { signal }
      );
    } catch (error) {
      throw new AdapterError(PROVIDER, `Chat completion request failed: ${toErrorMessage(error)}`, {
        cause: error,
        details: { model: request.model },
      });
    }

    return fromOpenAICompletion(completion);
  }

  async ping(signal?: AbortSignal): Promise<void> {
    try {
      await this.client.models.list({ signal });
    } catch (error) {
      throw new AdapterError(PROVIDER, `Model endpoint unreachable: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

export function toOpenAIMessages(turns: Turn[]): MessageParam[] {
  const messages: MessageParam[] = [];

  for (const turn of turns) {
    switch (turn.role) {
      case 'system':
        messages.push({ role: 'system', content: textOf(turn.parts) });
        break;
      case 'user':
        messages.push({ role: 'user', content: textOf(turn.parts) });
        break;
      case 'assistant': {
        const toolCalls: OpenAI.Chat.ChatCompletionMessageToolCall[] = [];
        for (const part of turn.parts) {
          if (part.type === 'tool-call') {
            toolCalls.push({
              id: part.id,
              type: 'function',
              function: { name: part.name, arguments: JSON.stringify(part.arguments) },
            });
          } else if (part.type === 'invalid-tool-call') {
            toolCalls.push({
              id: part.id,
              type: 'function',
              function: { name: part.name, arguments: part.rawArguments },
            });
          }
        }
        const text = textOf(turn.parts);
        messages.push({
          role: 'assistant',
          content: text === '' && toolCalls.length > 0 ? null : text,
          ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
        });
        break;
      }
      case 'tool':
        for (const part of turn.parts) {
          if (part.type === 'tool-result') {
            messages.push({ role: 'tool', tool_call_id: part.callId, content: part.content });
          }
        }
        break;
    }
  }

  return messages;
}

function toOpenAITool(tool: ToolDeclaration): ToolParam {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}

export function fromOpenAICompletion(completion: OpenAI.Chat.ChatCompletion): GenerateResponse {
  const choice = completion.choices?.[0];
  if (!choice) {
    throw new AdapterError(PROVIDER, 'Malformed provider payload: no choices in response');
  }
  if (!choice.message) {
    throw new AdapterError(PROVIDER, 'Malformed provider payload: choice has no message');
  }

  const parts: ResponsePart[] = [];
  if (choice.message.content) {
    parts.push({ type: 'text', text: choice.message.content });
  }

  for (const call of choice.message.tool_calls ?? []) {
    if (!call.function?.name) {
      throw new AdapterError(PROVIDER, 'Malformed provider payload: tool call without a function name');
    }
    const decoded = decodeToolArguments(call.function.arguments ?? '');
    if (decoded.ok) {
      parts.push({ type: 'tool-call', id: call.id, name: call.function.name, arguments: decoded.value });
    } else {
      parts.push({
        type: 'invalid-tool-call',
        id: call.id,
        name: call.function.name,
        rawArguments: call.function.arguments ?? '',
        error: `AdapterError: could not decode arguments for '${call.function.name}': ${decoded.error}`,
      });
    }
  }

  return {
    parts,
    finishReason: mapFinishReason(choice.finish_reason),
    usage: {
      promptTokens: completion.usage?.prompt_tokens ?? 0,
      completionTokens: completion.usage?.completion_tokens ?? 0,
      totalTokens: completion.usage?.total_tokens ?? 0,
    },
  };
}

export function mapFinishReason(reason: string | null | undefined): FinishReason {
  switch (reason) {
    case 'stop':
      return 'stop';
    case 'length':
      return 'max-tokens';
    case 'tool_calls':
    case 'function_call':
      return 'tool-calls';
    case 'content_filter':
      return 'content-filtered';
    default:
      return 'other';
  }
}
