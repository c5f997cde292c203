import { env } from '../../config/env';
import { ConfigError } from '../../utils/errors';
import { createGeminiProvider } from './providers/gemini.provider';
import { createOpenAICompatibleProvider } from './providers/openai-compatible.provider';
import type { CompletionProvider } from './provider.interface';

let cachedProvider: CompletionProvider | null = null;

export function createCompletionProvider(
  providerName: string = env.COMPLETION_PROVIDER,
): CompletionProvider {
  switch (providerName) {
    case 'gemini':
      return createGeminiProvider({
        apiKey: env.GEMINI_API_KEY,
        model: env.COMPLETION_MODEL,
      });
    case 'openai-compatible':
      return createOpenAICompatibleProvider({
        baseURL: env.OPENAI_BASE_URL,
        apiKey: env.OPENAI_API_KEY,
        model: env.COMPLETION_MODEL,
        timeoutMs: env.COMPLETION_TIMEOUT_MS,
      });
    default:
      throw new ConfigError(`Unknown completion provider: ${providerName}`);
  }
}

export function getCompletionProvider(): CompletionProvider {
  if (!cachedProvider) {
    cachedProvider = createCompletionProvider();
  }
  return cachedProvider;
}
