/**
 * Any server speaking the OpenAI chat completions API: Ollama, LM Studio,
 * vLLM or OpenAI itself.
 */

import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { DEFAULT_COMPLETION_TIMEOUT_MS } from '../../../config/constants';
import { ModelError } from '../../../utils/errors';
import { toCompletionError } from '../errors';
import type { CompletionOptions, CompletionProvider } from '../provider.interface';

export const DEFAULT_OPENAI_COMPATIBLE_MODEL = 'qwen2.5:7b';

async function createClient(baseURL: string, apiKey: string, timeout: number) {
  const { default: OpenAI } = await import('openai');
  // Retries happen in the pipeline
  return new OpenAI({ baseURL, apiKey, timeout, maxRetries: 0 });
}

export interface OpenAICompatibleSettings {
  baseURL: string;
  apiKey: string;
  model?: string;
  timeoutMs?: number;
}

export function createOpenAICompatibleProvider(
  settings: OpenAICompatibleSettings,
): CompletionProvider {
  const model = settings.model || DEFAULT_OPENAI_COMPATIBLE_MODEL;
  let client: Awaited<ReturnType<typeof createClient>> | null = null;

  async function getClient() {
    if (!client) {
      client = await createClient(settings.baseURL, settings.apiKey, settings.timeoutMs ?? DEFAULT_COMPLETION_TIMEOUT_MS);
    }
    return client;
  }

  return {
    name: 'openai-compatible',
    model,

    async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
      const openai = await getClient();
      const messages: ChatCompletionMessageParam[] = [];
      if (options.systemMessage) {
        messages.push({ role: 'system', content: options.systemMessage });
      }
      messages.push({ role: 'user', content: prompt });

      let response;
      try {
        response = await openai.chat.completions.create(
          {
            model,
            messages,
            temperature: options.temperature,
            max_tokens: options.maxTokens,
          },
          { signal: options.signal },
        );
      } catch (error) {
        throw toCompletionError(error, 'openai-compatible');
      }

      const content = response.choices[0]?.message?.content;
      if (!content?.trim()) {
        throw new ModelError('Empty response from completion server');
      }
      return content;
    },
  };
}
