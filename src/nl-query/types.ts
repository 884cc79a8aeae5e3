/**
 * Querywise - Natural Language Query Types
 *
 * Type definitions for the chat pipeline.
 */

import type { ErrorCode } from '../utils/types.js';

/**
 * Outcome of intent classification
 */
export type Intent = 'DATA' | 'GENERAL' | 'CLARIFICATION';

/**
 * Intent reported on a chat response
 */
export type ResponseIntent = 'meta' | 'data' | 'ambiguous' | 'general' | 'error';

export interface Classification {
  intent: Intent;

  /**
   * Confidence score (0-1)
   */
  confidence: number;

  /**
   * Which stage decided
   */
  source: 'pattern' | 'llm';

  /**
   * Entities the model extracted from the utterance
   */
  entities: string[];

  /**
   * Disambiguating question for CLARIFICATION
   */
  clarification?: string;

  /**
   * Set when a CLARIFICATION comes from low model confidence
   */
  reasonCode?: ErrorCode;
}

/**
 * Query result row
 */
export interface QueryResultRow {
  [key: string]: unknown;
}

/**
 * Query execution result
 */
export interface ExecutionResult {
  columns: string[];

  /**
   * Result rows, at most the configured cap
   */
  rows: QueryResultRow[];

  /**
   * True number of rows the statement produced
   */
  rowCount: number;

  /**
   * Whether rows were dropped to honor the cap
   */
  truncated: boolean;

  executionTimeMs: number;
}

export interface QueryAttempt {
  attempt: number;
  sql: string;
  error: string | null;
  timestamp: Date;
}

export type CorrectionState = 'INIT' | 'ATTEMPTING' | 'SUCCEEDED' | 'EXHAUSTED';

/**
 * One prior exchange as seen by the rewriter and summarizer
 */
export interface HistoryTurn {
  utterance: string;
  rewritten: string | null;
  response: string;
  sql: string | null;
}

/**
 * Chat request body
 */
export interface ChatRequest {
  message: string;
  conversationId?: string;
  context?: Record<string, unknown>;
}

export interface SqlResults {
  columns: string[];
  rows: QueryResultRow[];
  row_count: number;
  truncated: boolean;
}

/**
 * Chat response body
 */
export interface ChatResponse {
  success: boolean;
  response: string;
  intent: ResponseIntent;
  conversation_id: string;
  sql_query?: string;
  sql_results?: SqlResults;
  clarification?: string;
  suggestions?: string[];
  processing_time_ms: number;
  error?: string;
}
