/**
 * Querywise - In-Memory Conversation Store
 */

import type { Conversation, ConversationStore, Turn } from './types.js';

export class MemoryConversationStore implements ConversationStore {
  private conversations = new Map<string, Conversation>();

  public async ensure(id: string): Promise<void> {
    if (!this.conversations.has(id)) {
      this.conversations.set(id, { id, createdAt: new Date(), turns: [] });
    }
  }

  public async append(id: string, turn: Turn, retention: number): Promise<void> {
    await this.ensure(id);
    const conversation = this.conversations.get(id);
    if (conversation === undefined) {
      return;
    }
    conversation.turns.push({ ...turn });

    const excess = conversation.turns.length - Math.max(1, retention);
    if (excess > 0) {
      conversation.turns.splice(0, excess);
    }
  }

  public async recent(id: string, limit: number): Promise<Turn[]> {
    const turns = this.conversations.get(id)?.turns ?? [];
    if (limit <= 0) {
      return [];
    }
    return turns.slice(-limit).map((turn) => ({ ...turn }));
  }

  public async get(id: string): Promise<Conversation | null> {
    const conversation = this.conversations.get(id);
    if (conversation === undefined) {
      return null;
    }
    return {
      id: conversation.id,
      createdAt: conversation.createdAt,
      turns: conversation.turns.map((turn) => ({ ...turn })),
    };
  }

  public async close(): Promise<void> {
    this.conversations.clear();
  }

  public get size(): number {
    return this.conversations.size;
  }
}
