/**
 * Querywise - Conversation Manager
 *
 * Serialises turns per conversation and hands the pipeline a bounded window
 * of prior turns. Different conversations proceed in parallel.
 */

import type { HistoryTurn } from '../nl-query/types.js';
import { generateId, KeyedMutex } from '../utils/helpers.js';
import logger from '../utils/logger.js';
import type { ConversationConfig } from '../utils/types.js';

import type { Conversation, ConversationStore, Turn } from './types.js';

export interface TurnContext {
  conversationId: string;
  /** Most recent turns, oldest first */
  history: HistoryTurn[];
}

export interface TurnOutcome<T> {
  result: T;
  /** Turn to persist; null records nothing */
  turn: Turn | null;
}

export class ConversationManager {
  private store: ConversationStore;
  private config: Pick<ConversationConfig, 'windowTurns' | 'retentionTurns'>;
  private locks = new KeyedMutex();

  constructor(store: ConversationStore, config: Pick<ConversationConfig, 'windowTurns' | 'retentionTurns'>) {
    this.store = store;
    this.config = config;
  }

  /**
   * Run one exchange under the conversation's lock. A missing id starts a
   * new conversation.
   */
  public async runTurn<T>(
    conversationId: string | undefined,
    handler: (context: TurnContext) => Promise<TurnOutcome<T>>
  ): Promise<{ conversationId: string; result: T }> {
    const id = conversationId ?? generateId();

    return this.locks.runExclusive(id, async () => {
      await this.store.ensure(id);
      const turns = await this.store.recent(id, this.config.windowTurns);
      const { result, turn } = await handler({ conversationId: id, history: turns.map(toHistoryTurn) });

      if (turn !== null) {
        await this.store.append(id, turn, this.config.retentionTurns);
        logger.debug('Conversation turn recorded', { conversationId: id, intent: turn.intent });
      }

      return { conversationId: id, result };
    });
  }

  public get(id: string): Promise<Conversation | null> {
    return this.store.get(id);
  }

  public isBusy(id: string): boolean {
    return this.locks.isLocked(id);
  }

  public close(): Promise<void> {
    return this.store.close();
  }
}

export function toHistoryTurn(turn: Turn): HistoryTurn {
  return {
    utterance: turn.utterance,
    rewritten: turn.rewritten,
    response: turn.summary ?? '',
    sql: turn.sql,
  };
}
