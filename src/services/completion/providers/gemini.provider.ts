/**
 * @google/genai is loaded with a dynamic import so the SDK is only required
 * when this provider is selected.
 */

import { logger } from '../../../utils/logger';
import { ModelError } from '../../../utils/errors';
import { toCompletionError } from '../errors';
import type { CompletionOptions, CompletionProvider } from '../provider.interface';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash';

async function createClient(apiKey: string | undefined) {
  const { GoogleGenAI } = await import('@google/genai');
  if (!apiKey) return null;
  return new GoogleGenAI({ apiKey });
}

export interface GeminiProviderSettings {
  apiKey?: string;
  model?: string;
}

export function createGeminiProvider(settings: GeminiProviderSettings = {}): CompletionProvider {
  const model = settings.model || DEFAULT_GEMINI_MODEL;
  let client: Awaited<ReturnType<typeof createClient>> = null;
  let initialized = false;

  async function getClient() {
    if (!initialized) {
      initialized = true;
      client = await createClient(settings.apiKey);
      if (!client) {
        logger.warn('GEMINI_API_KEY not configured');
      }
    }
    return client;
  }

  return {
    name: 'gemini',
    model,

    async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
      const genAI = await getClient();
      if (!genAI) {
        throw new ModelError('Gemini API client not initialized - GEMINI_API_KEY missing');
      }

      let result;
      try {
        result = await genAI.models.generateContent({
          model,
          contents: prompt,
          config: {
            temperature: options.temperature,
            maxOutputTokens: options.maxTokens,
            systemInstruction: options.systemMessage,
            abortSignal: options.signal,
          },
        });
      } catch (error) {
        throw toCompletionError(error, 'gemini');
      }

      if (!result.candidates?.length) {
        const blockReason = result.promptFeedback?.blockReason;
        if (blockReason) {
          throw new ModelError(`Content blocked: ${blockReason}`);
        }
        throw new ModelError('Empty response from API');
      }

      const text = result.text;
      if (!text?.trim()) {
        throw new ModelError('Empty response text');
      }
      return text;
    },
  };
}
