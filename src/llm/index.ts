/**
 * Querywise - Language Model Module
 *
 * Barrel export file for the chat/embedding client
 */

export { LLMClient, extractJson, getLLMClient, resetLLMClient } from './client.js';

export type { ChatMessage, ChatOptions, ChatRole, EmbedOptions, LanguageModel } from './types.js';
