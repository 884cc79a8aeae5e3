/**
 * Querywise - Language Model Types
 *
 * The narrow contract the pipeline consumes: chat completion and text
 * embedding. Production code talks to {@link LLMClient}; tests inject fakes.
 */

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatOptions {
  temperature?: number;
  maxTokens?: number;
  /** Ask the backend for a JSON object reply */
  jsonMode?: boolean;
  /** Route to the cheaper model (classification, rewriting) */
  useFastModel?: boolean;
  signal?: AbortSignal;
}

export interface EmbedOptions {
  signal?: AbortSignal;
}

export interface LanguageModel {
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<string>;
  embed(texts: string[], options?: EmbedOptions): Promise<number[][]>;
  /** Whether an embedding endpoint is configured at all */
  supportsEmbeddings(): boolean;
}
