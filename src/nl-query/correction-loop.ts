/**
 * Querywise - Correction Loop
 *
 * Bounded generate → validate → execute cycle. Each failed attempt feeds its
 * statement and error back to the generator. A regenerated statement that
 * matches an earlier attempt ends the loop instead of re-running known-bad SQL.
 *
 *   INIT ──▶ ATTEMPTING ──▶ SUCCEEDED
 *                 │  ▲
 *                 ▼  │ (attempts remain, new SQL)
 *             correction ──▶ EXHAUSTED
 */

import type { CatalogSnapshot } from '../catalog/snapshot.js';
import { throwIfAborted } from '../utils/helpers.js';
import logger, { logPipeline } from '../utils/logger.js';
import {
  ExecutionError,
  ExecutionTimeoutError,
  ValidationRejectedError,
} from '../utils/types.js';

import type { ExecutionEngine } from './executor.js';
import type { GenerationContext, SQLGenerator } from './sql-generator.js';
import { normalizeStatement } from './sql-tokenizer.js';
import type { CorrectionState, ExecutionResult, QueryAttempt } from './types.js';
import type { QueryValidator } from './validator.js';

// =============================================================================
// Configuration
// =============================================================================

export interface CorrectionLoopConfig {
  maxAttempts: number;
  executionTimeoutMs: number;
  rowCap: number;
}

export const DEFAULT_CORRECTION_LOOP_CONFIG: CorrectionLoopConfig = {
  maxAttempts: 3,
  executionTimeoutMs: 10000,
  rowCap: 500,
};

export interface CorrectionRequest {
  question: string;
  /** First candidate from the generator */
  initialSql: string;
  context: GenerationContext;
  catalog?: CatalogSnapshot;
  /**
   * Turns a model-side candidate into the statement that is validated and
   * run (placeholder restoration, row cap)
   */
  prepare?: (sql: string) => string;
  requestId?: string;
}

export type ExhaustionReason = 'max-attempts' | 'duplicate-sql';

export type CorrectionOutcome =
  | {
      state: 'SUCCEEDED';
      sql: string;
      result: ExecutionResult;
      attempts: QueryAttempt[];
    }
  | {
      state: 'EXHAUSTED';
      reason: ExhaustionReason;
      lastSql: string;
      lastError: string;
      attempts: QueryAttempt[];
    };

// =============================================================================
// Correction Loop
// =============================================================================

export class CorrectionLoop {
  private generator: SQLGenerator;
  private validator: QueryValidator;
  private executor: ExecutionEngine;
  private config: CorrectionLoopConfig;

  constructor(
    generator: SQLGenerator,
    validator: QueryValidator,
    executor: ExecutionEngine,
    config: Partial<CorrectionLoopConfig> = {}
  ) {
    this.generator = generator;
    this.validator = validator;
    this.executor = executor;
    this.config = { ...DEFAULT_CORRECTION_LOOP_CONFIG, ...config };
  }

  async run(request: CorrectionRequest): Promise<CorrectionOutcome> {
    const signal = request.context.signal;
    const prepare = request.prepare ?? ((sql: string) => sql);
    const attempts: QueryAttempt[] = [];
    const seen = new Set<string>();

    let state: CorrectionState = 'INIT';
    let candidate = request.initialSql;
    let outcome: CorrectionOutcome | null = null;

    seen.add(normalizeStatement(candidate));

    while (outcome === null) {
      throwIfAborted(signal);
      state = 'ATTEMPTING';

      const attemptNumber = attempts.length + 1;
      const statement = candidate.trim().length > 0 ? prepare(candidate) : candidate;
      const attempt = await this.attempt(statement, request, attemptNumber);

      if (attempt.ok) {
        attempts.push({ attempt: attemptNumber, sql: attempt.sql, error: null, timestamp: new Date() });
        state = 'SUCCEEDED';
        outcome = { state, sql: attempt.sql, result: attempt.result, attempts };
        break;
      }

      const failure = attempt.error;
      attempts.push({ attempt: attemptNumber, sql: statement, error: failure, timestamp: new Date() });
      logger.warn('Query attempt failed', {
        requestId: request.requestId,
        attempt: attemptNumber,
        maxAttempts: this.config.maxAttempts,
        sql: statement,
        error: failure,
      });

      if (attempts.length >= this.config.maxAttempts) {
        state = 'EXHAUSTED';
        outcome = { state, reason: 'max-attempts', lastSql: statement, lastError: failure, attempts };
        break;
      }

      const corrected = await this.generator.correct(request.question, candidate, failure, request.context);
      const key = normalizeStatement(corrected);
      if (seen.has(key)) {
        logger.warn('Correction repeated an earlier statement', {
          requestId: request.requestId,
          attempt: attemptNumber,
        });
        state = 'EXHAUSTED';
        outcome = { state, reason: 'duplicate-sql', lastSql: statement, lastError: failure, attempts };
        break;
      }

      seen.add(key);
      candidate = corrected;
      logPipeline({ requestId: request.requestId, stage: 'correct', outcome: 'retry', attempt: attemptNumber + 1 });
    }

    logger.info('Correction loop finished', {
      requestId: request.requestId,
      state,
      attempts: attempts.length,
    });

    return outcome;
  }

  private async attempt(
    statement: string,
    request: CorrectionRequest,
    attemptNumber: number
  ): Promise<{ ok: true; sql: string; result: ExecutionResult } | { ok: false; error: string }> {
    const startedAt = Date.now();
    try {
      const sql = this.validator.assertValid(statement, request.catalog);
      const result = await this.executor.execute(sql, {
        timeoutMs: this.config.executionTimeoutMs,
        rowCap: this.config.rowCap,
        signal: request.context.signal,
      });

      logPipeline({
        requestId: request.requestId,
        stage: 'execute',
        durationMs: Date.now() - startedAt,
        outcome: 'ok',
        attempt: attemptNumber,
        rowCount: result.rowCount,
        truncated: result.truncated,
      });
      return { ok: true, sql, result };
    } catch (error) {
      if (!isRecoverable(error)) {
        throw error;
      }
      logPipeline({
        requestId: request.requestId,
        stage: error instanceof ValidationRejectedError ? 'validate' : 'execute',
        durationMs: Date.now() - startedAt,
        outcome: 'failed',
        attempt: attemptNumber,
        error: error.message,
      });
      return { ok: false, error: error.message };
    }
  }
}

/**
 * Errors that are fed back to the generator instead of ending the request
 */
function isRecoverable(
  error: unknown
): error is ValidationRejectedError | ExecutionError | ExecutionTimeoutError {
  return (
    error instanceof ValidationRejectedError ||
    error instanceof ExecutionError ||
    error instanceof ExecutionTimeoutError
  );
}
