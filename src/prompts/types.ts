/**
 * Prompt management types.
 * The model is chosen by the completion provider; prompts carry sampling settings.
 */

export interface PromptDefinition<TInput = unknown> {
  /** Unique identifier for this prompt (used for logging) */
  id: string;

  version: number;

  /** Human-readable description of what this prompt does */
  description: string;

  temperature: number;

  maxTokens: number;

  /** Optional system message sent ahead of the prompt */
  systemMessage?: string;

  /** Function that builds the prompt string from input */
  build: (input: TInput) => string;
}
