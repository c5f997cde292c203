export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
  systemMessage?: string;
  /** Aborts the request; providers pass it to their SDK */
  signal?: AbortSignal;
}

/**
 * Text completion backend. Implementations throw TransportError when the
 * backend can't be reached and ModelError when it rejects the request or
 * returns nothing usable.
 */
export interface CompletionProvider {
  readonly name: string;
  readonly model: string;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}
