/**
 * Querywise - Language Model Client
 *
 * REST client for an OpenAI-compatible chat-completion endpoint and an
 * embedding endpoint. Every call goes to the primary URL first and to the
 * fallback URL second; a caller abort is never retried.
 */

import { z } from 'zod';

import logger from '../utils/logger.js';
import {
  BackendUnavailableError,
  RequestCancelledError,
  type BackendKind,
  type LLMConfig,
} from '../utils/types.js';

import type { ChatMessage, ChatOptions, EmbedOptions, LanguageModel } from './types.js';

// =============================================================================
// Response Schemas
// =============================================================================

const ChatReplySchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
      })
    )
    .optional(),
  response: z.string().optional(),
  content: z.string().optional(),
});

const EmbeddingReplySchema = z.union([
  z.object({ data: z.array(z.object({ embedding: z.array(z.number()) })) }),
  z.array(z.array(z.number())),
]);

// =============================================================================
// LLM Client
// =============================================================================

export class LLMClient implements LanguageModel {
  private config: LLMConfig;

  constructor(config: LLMConfig) {
    this.config = config;
  }

  public supportsEmbeddings(): boolean {
    return Boolean(this.config.embeddingUrl);
  }

  /**
   * Chat completion; returns the reply text
   */
  public async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<string> {
    const payload: Record<string, unknown> = {
      model: options.useFastModel ? this.config.fastModel : this.config.model,
      messages,
      temperature: options.temperature ?? this.config.temperature,
      max_tokens: options.maxTokens ?? this.config.maxTokens,
    };
    if (options.jsonMode) {
      payload['response_format'] = { type: 'json_object' };
    }

    const urls = [this.config.chatUrl, this.config.chatFallbackUrl];

    return this.requestWithFallback('chat', urls, payload, options.signal, (body) => {
      const reply = ChatReplySchema.parse(body);
      const text = reply.choices?.[0]?.message?.content ?? reply.response ?? reply.content;
      if (typeof text !== 'string') {
        throw new Error('Unexpected chat response format');
      }
      return text;
    });
  }

  /**
   * Embed a batch of texts; one vector per input, in input order
   */
  public async embed(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    if (!this.config.embeddingUrl) {
      throw new BackendUnavailableError('embedding', 'No embedding endpoint configured');
    }

    const payload = {
      model: this.config.embeddingModel,
      input: texts,
      dimensions: this.config.embeddingDimensions,
    };
    const urls = [this.config.embeddingUrl, this.config.embeddingFallbackUrl];

    return this.requestWithFallback('embedding', urls, payload, options.signal, (body) => {
      const reply = EmbeddingReplySchema.parse(body);
      const vectors = Array.isArray(reply) ? reply : reply.data.map((item) => item.embedding);
      if (vectors.length !== texts.length) {
        throw new Error(`Expected ${texts.length} embeddings, received ${vectors.length}`);
      }
      return vectors;
    });
  }

  // ===========================================================================
  // Transport
  // ===========================================================================

  private async requestWithFallback<T>(
    kind: BackendKind,
    urls: Array<string | undefined>,
    payload: unknown,
    signal: AbortSignal | undefined,
    parse: (body: unknown) => T
  ): Promise<T> {
    const targets = urls.filter((url): url is string => Boolean(url));
    let lastError = 'no endpoint configured';

    for (const [index, url] of targets.entries()) {
      try {
        const body = await this.post(url, payload, signal);
        return parse(body);
      } catch (error) {
        if (signal?.aborted) {
          throw new RequestCancelledError();
        }
        lastError = error instanceof Error ? error.message : String(error);
        logger.warn('Language model request failed', {
          backend: kind,
          endpoint: index === 0 ? 'primary' : 'fallback',
          error: lastError,
        });
      }
    }

    throw new BackendUnavailableError(kind, `The ${kind} backend is unavailable: ${lastError}`);
  }

  private async post(url: string, payload: unknown, signal?: AbortSignal): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);
    const onAbort = (): void => controller.abort();

    if (signal?.aborted) {
      controller.abort();
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiKey) {
      headers['Authorization'] = `Bearer ${this.config.apiKey}`;
      headers['X-API-KEY'] = this.config.apiKey;
    }

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`HTTP ${response.status} from ${new URL(url).host}`);
      }

      return await response.json();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError' && !signal?.aborted) {
        throw new Error(`Request timed out after ${this.config.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

// =============================================================================
// Reply Parsing
// =============================================================================

/**
 * Pull a JSON value out of a model reply: tolerates ```json fences and
 * prose around the object. Returns null when nothing parses.
 */
export function extractJson(reply: string): unknown {
  let text = reply.trim();

  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fenced?.[1]) {
    text = fenced[1].trim();
  }

  try {
    return JSON.parse(text);
  } catch {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start === -1 || end <= start) {
      return null;
    }
    try {
      return JSON.parse(text.slice(start, end + 1));
    } catch {
      return null;
    }
  }
}

// =============================================================================
// Singleton Instance
// =============================================================================

let llmClientInstance: LLMClient | null = null;

export function getLLMClient(config?: LLMConfig): LLMClient {
  if (llmClientInstance === null) {
    if (config === undefined) {
      throw new Error('LLM configuration required for first initialization');
    }
    llmClientInstance = new LLMClient(config);
  }
  return llmClientInstance;
}

export function resetLLMClient(): void {
  llmClientInstance = null;
}
