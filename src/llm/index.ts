import type { ProviderConfig } from '../config/schema.js';
import { OllamaAdapter } from './ollama.js';
import { OpenAIAdapter } from './openai.js';
import type { ModelAdapter } from './types.js';

export * from './types.js';
export { OllamaAdapter } from './ollama.js';
export { OpenAIAdapter } from './openai.js';

export function createModelAdapter(provider: ProviderConfig): ModelAdapter {
  switch (provider.type) {
    case 'openai':
      return new OpenAIAdapter({
        apiKey: provider.api_key,
        ...(provider.base_url ? { baseUrl: provider.base_url } : {}),
        ...(provider.timeout_seconds ? { timeoutMs: provider.timeout_seconds * 1000 } : {}),
      });
    case 'ollama':
      return new OllamaAdapter(provider.host);
  }
}
