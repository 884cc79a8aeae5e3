/**
 * Querywise - PostgreSQL Conversation Store
 * Turn history in the `conversations` / `conversation_turns` tables
 */

import type { ResponseIntent } from '../nl-query/types.js';
import type { DatabaseClient } from '../storage/postgres.js';

import type { Conversation, ConversationStore, Turn } from './types.js';

interface TurnRow {
  utterance: string;
  rewritten: string | null;
  intent: ResponseIntent;
  sqlQuery: string | null;
  summary: string | null;
  createdAt: Date;
}

interface ConversationRow {
  id: string;
  createdAt: Date;
}

const TURN_COLUMNS = `
  utterance, rewritten, intent, sql_query as "sqlQuery",
  summary, created_at as "createdAt"
`;

export class PostgresConversationStore implements ConversationStore {
  private db: DatabaseClient;

  constructor(db: DatabaseClient) {
    this.db = db;
  }

  public async ensure(id: string): Promise<void> {
    await this.db.execute('INSERT INTO conversations (id) VALUES ($1) ON CONFLICT (id) DO NOTHING', [id]);
  }

  /**
   * Insert the turn and prune everything older than the retention bound in
   * one statement
   */
  public async append(id: string, turn: Turn, retention: number): Promise<void> {
    await this.ensure(id);

    const sql = `
      WITH inserted AS (
        INSERT INTO conversation_turns (
          conversation_id, turn_index, utterance, rewritten, intent, sql_query, summary, created_at
        ) VALUES (
          $1,
          COALESCE((SELECT MAX(turn_index) + 1 FROM conversation_turns WHERE conversation_id = $1), 0),
          $2, $3, $4, $5, $6, $7
        )
        RETURNING turn_index
      )
      DELETE FROM conversation_turns
      WHERE conversation_id = $1
        AND turn_index <= (SELECT turn_index FROM inserted) - $8
    `;

    await this.db.execute(sql, [
      id,
      turn.utterance,
      turn.rewritten,
      turn.intent,
      turn.sql,
      turn.summary,
      turn.timestamp,
      Math.max(1, retention),
    ]);
    await this.db.execute('UPDATE conversations SET updated_at = NOW() WHERE id = $1', [id]);
  }

  public async recent(id: string, limit: number): Promise<Turn[]> {
    if (limit <= 0) {
      return [];
    }
    const sql = `
      SELECT * FROM (
        SELECT turn_index, ${TURN_COLUMNS}
        FROM conversation_turns
        WHERE conversation_id = $1
        ORDER BY turn_index DESC
        LIMIT $2
      ) latest
      ORDER BY turn_index ASC
    `;
    const rows = await this.db.query<TurnRow>(sql, [id, limit]);
    return rows.map(toTurn);
  }

  public async get(id: string): Promise<Conversation | null> {
    const conversation = await this.db.queryOne<ConversationRow>(
      'SELECT id, created_at as "createdAt" FROM conversations WHERE id = $1',
      [id]
    );
    if (conversation === null) {
      return null;
    }

    const rows = await this.db.query<TurnRow>(
      `SELECT ${TURN_COLUMNS} FROM conversation_turns WHERE conversation_id = $1 ORDER BY turn_index ASC`,
      [id]
    );
    return { id: conversation.id, createdAt: conversation.createdAt, turns: rows.map(toTurn) };
  }

  public async close(): Promise<void> {
    await this.db.close();
  }
}

function toTurn(row: TurnRow): Turn {
  return {
    utterance: row.utterance,
    rewritten: row.rewritten,
    intent: row.intent,
    sql: row.sqlQuery,
    summary: row.summary,
    timestamp: row.createdAt,
  };
}
