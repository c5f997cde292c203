export { createCompletionProvider, getCompletionProvider } from './factory';
export { toCompletionError } from './errors';
export { createGeminiProvider } from './providers/gemini.provider';
export { createOpenAICompatibleProvider } from './providers/openai-compatible.provider';
export type { CompletionOptions, CompletionProvider } from './provider.interface';
