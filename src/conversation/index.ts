/**
 * Querywise - Conversation Module
 */

export { ConversationManager, toHistoryTurn } from './manager.js';
export { MemoryConversationStore } from './memory-store.js';
export { PostgresConversationStore } from './postgres-store.js';

export type { TurnContext, TurnOutcome } from './manager.js';
export type { Conversation, ConversationStore, Turn } from './types.js';
