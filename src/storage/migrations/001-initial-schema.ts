/**
 * Querywise - Initial Database Migration
 * Conversation and turn tables
 */

export const migrationName = '001-initial-schema';

export const up = `
-- =============================================================================
-- Conversations
-- =============================================================================
CREATE TABLE IF NOT EXISTS conversations (
  id VARCHAR(64) PRIMARY KEY,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_conversations_updated_at ON conversations (updated_at DESC);

-- =============================================================================
-- Conversation Turns
-- One row per exchange; pruned oldest-first past the retention bound
-- =============================================================================
CREATE TABLE IF NOT EXISTS conversation_turns (
  id BIGSERIAL PRIMARY KEY,
  conversation_id VARCHAR(64) NOT NULL REFERENCES conversations (id) ON DELETE CASCADE,
  turn_index INTEGER NOT NULL,
  utterance TEXT NOT NULL,
  rewritten TEXT,
  intent VARCHAR(16) NOT NULL CHECK (intent IN ('meta', 'data', 'ambiguous', 'general', 'error')),
  sql_query TEXT,
  summary TEXT,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  UNIQUE (conversation_id, turn_index)
);

CREATE INDEX IF NOT EXISTS idx_conversation_turns_lookup
  ON conversation_turns (conversation_id, turn_index DESC);
`;

export const down = `
DROP TABLE IF EXISTS conversation_turns;
DROP TABLE IF EXISTS conversations;
`;
