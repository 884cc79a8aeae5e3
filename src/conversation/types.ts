/**
 * Querywise - Conversation Types
 */

import type { ResponseIntent } from '../nl-query/types.js';

export interface Turn {
  utterance: string;
  /** Standalone form produced by the rewriter */
  rewritten: string | null;
  intent: ResponseIntent;
  sql: string | null;
  /** Response text shown to the user */
  summary: string | null;
  timestamp: Date;
}

export interface Conversation {
  id: string;
  createdAt: Date;
  turns: Turn[];
}

/**
 * Durable turn history. Implementations only need to be safe for one writer
 * per conversation; the manager serialises turns of the same conversation.
 */
export interface ConversationStore {
  ensure(id: string): Promise<void>;
  append(id: string, turn: Turn, retention: number): Promise<void>;
  recent(id: string, limit: number): Promise<Turn[]>;
  get(id: string): Promise<Conversation | null>;
  close(): Promise<void>;
}
