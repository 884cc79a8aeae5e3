/**
 * Querywise - Scripted Language Model
 * In-process stand-in for the chat and embedding backends
 */

import type { ChatMessage, ChatOptions, EmbedOptions, LanguageModel } from '../../src/llm/types.js';
import { BackendUnavailableError, RequestCancelledError } from '../../src/utils/types.js';

export type PromptKind = 'classify' | 'rewrite' | 'generate' | 'correct' | 'summarize' | 'general' | 'unknown';

export interface RecordedCall {
  kind: PromptKind;
  messages: ChatMessage[];
  options: ChatOptions;
}

const PROMPT_PREFIXES: ReadonlyArray<[PromptKind, string]> = [
  ['classify', 'You classify'],
  ['rewrite', 'You rewrite'],
  ['generate', 'You are a SQL expert'],
  ['correct', 'The SQL query below failed'],
  ['summarize', 'You summarize'],
  ['general', 'You are a friendly assistant'],
];

/** Which pipeline stage built the prompt, judged by its system message */
export function promptKind(messages: readonly ChatMessage[]): PromptKind {
  const system = messages.find((message) => message.role === 'system')?.content ?? '';
  return PROMPT_PREFIXES.find(([, prefix]) => system.startsWith(prefix))?.[0] ?? 'unknown';
}

type Reply = string | Error;

export class FakeLanguageModel implements LanguageModel {
  public readonly calls: RecordedCall[] = [];
  public readonly embedCalls: string[][] = [];
  private queues = new Map<PromptKind, Reply[]>();
  private fallbacks = new Map<PromptKind, Reply>();
  private embedder: ((text: string) => number[]) | null;
  private embedFailure: Error | null = null;

  constructor(embedder: ((text: string) => number[]) | null = null) {
    this.embedder = embedder;
  }

  /** Queue replies for one stage, consumed in order */
  public script(kind: PromptKind, ...replies: Reply[]): this {
    this.queues.set(kind, [...(this.queues.get(kind) ?? []), ...replies]);
    return this;
  }

  /** Reply used once a stage's queue is empty */
  public always(kind: PromptKind, reply: Reply): this {
    this.fallbacks.set(kind, reply);
    return this;
  }

  public failEmbeddings(error: Error): this {
    this.embedFailure = error;
    return this;
  }

  public callsOf(kind: PromptKind): RecordedCall[] {
    return this.calls.filter((call) => call.kind === kind);
  }

  public async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<string> {
    const kind = promptKind(messages);
    this.calls.push({ kind, messages, options });

    if (options.signal?.aborted) {
      throw new RequestCancelledError();
    }

    const reply = this.queues.get(kind)?.shift() ?? this.fallbacks.get(kind);
    if (reply === undefined) {
      throw new Error(`No scripted reply for a ${kind} prompt`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }

  public async embed(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    this.embedCalls.push(texts);
    if (options.signal?.aborted) {
      throw new RequestCancelledError();
    }
    if (this.embedFailure !== null) {
      throw this.embedFailure;
    }
    const embedder = this.embedder;
    if (embedder === null) {
      throw new BackendUnavailableError('embedding', 'No embedding endpoint configured');
    }
    return texts.map((text) => embedder(text));
  }

  public supportsEmbeddings(): boolean {
    return this.embedder !== null;
  }
}
