/**
 * Querywise - API Module
 *
 * REST endpoints for chat, schema introspection and health.
 */

export { createChatRouter, ChatMessageBodySchema } from './routes/chat.js';
export { createSchemaRouter } from './routes/schema.js';
export { createHealthRouter } from './routes/health.js';

export type { HealthDependencies } from './routes/health.js';

export const ROUTE_PREFIXES = {
  chat: '/api/chat',
  schema: '/api/schema',
  health: '/api/health',
} as const;
