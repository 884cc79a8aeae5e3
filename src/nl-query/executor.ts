/**
 * Querywise - Execution Engine
 *
 * Runs one validated SELECT against every configured database at once. Each
 * call hands the statement to a fresh worker thread that opens a private
 * in-memory SQLite connection, attaches the physical database files under
 * their aliases and closes the connection when it is done. The worker is
 * terminated on the deadline, on cancellation and after it replies.
 */

import { existsSync } from 'fs';
import path from 'path';
import { Worker } from 'worker_threads';

import Database from 'better-sqlite3';

import logger from '../utils/logger.js';
import {
  ExecutionError,
  ExecutionTimeoutError,
  QuerywiseError,
  RequestCancelledError,
  type DatabaseAttachment,
  type DatabasesConfig,
} from '../utils/types.js';

import {
  EXECUTION_WORKER_SOURCE,
  WorkerReplySchema,
  type ExecutionJob,
  type WorkerReply,
} from './execution-worker.js';
import type { ExecutionResult, QueryResultRow } from './types.js';

// =============================================================================
// Configuration
// =============================================================================

export interface ExecutionOptions {
  timeoutMs: number;
  rowCap: number;
  signal?: AbortSignal;
}

export interface ExecutionHealth {
  ok: boolean;
  aliases: string[];
  error?: string;
}

type RowsReply = Extract<WorkerReply, { kind: 'result' }>;

// =============================================================================
// Execution Engine
// =============================================================================

export class ExecutionEngine {
  private config: DatabasesConfig;
  private driverPath: string;

  constructor(config: DatabasesConfig) {
    this.config = config;
    this.driverPath = require.resolve('better-sqlite3');
  }

  public aliases(): string[] {
    return this.config.attachments.map((attachment) => attachment.alias);
  }

  /**
   * Execute a statement and collect at most `rowCap` rows. Duplicate result
   * column names get a positional suffix (`employee_id_2`).
   */
  public async execute(sql: string, options: ExecutionOptions): Promise<ExecutionResult> {
    if (options.signal?.aborted) {
      throw new RequestCancelledError();
    }

    const attachments = this.config.attachments.map((attachment) => ({
      alias: attachment.alias,
      file: this.resolveFile(attachment),
    }));

    const startedAt = Date.now();
    const reply = await this.runInWorker(
      {
        driverPath: this.driverPath,
        attachments,
        busyTimeoutMs: Math.max(0, Math.floor(this.config.busyTimeoutMs)),
        sql,
        rowCap: options.rowCap,
      },
      options
    );

    const columns = uniqueColumnNames(reply.columns);
    return {
      columns,
      rows: reply.rows.map((values) => toResultRow(columns, values)),
      rowCount: reply.rowCount,
      truncated: reply.rowCount > options.rowCap,
      executionTimeMs: Date.now() - startedAt,
    };
  }

  /**
   * Open a connection, run `SELECT 1` and report the attached aliases
   */
  public healthCheck(): ExecutionHealth {
    try {
      const db = this.open();
      try {
        db.prepare('SELECT 1').get();
        const databases: unknown = db.pragma('database_list');
        const aliases: string[] = [];
        if (Array.isArray(databases)) {
          for (const entry of databases) {
            if (hasName(entry) && entry.name !== 'main' && entry.name !== 'temp') {
              aliases.push(entry.name);
            }
          }
        }
        return { ok: true, aliases };
      } finally {
        db.close();
      }
    } catch (error) {
      return {
        ok: false,
        aliases: [],
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  // ===========================================================================
  // Worker
  // ===========================================================================

  private runInWorker(job: ExecutionJob, options: ExecutionOptions): Promise<RowsReply> {
    return new Promise<RowsReply>((resolve, reject) => {
      const worker = new Worker(EXECUTION_WORKER_SOURCE, { eval: true, workerData: job });
      let settled = false;

      const finish = (outcome: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        options.signal?.removeEventListener('abort', onAbort);
        worker.terminate().catch((error: unknown) => {
          logger.warn('Failed to stop execution worker', {
            error: error instanceof Error ? error.message : String(error),
          });
        });
        outcome();
      };

      const onAbort = (): void => finish(() => reject(new RequestCancelledError()));
      const timer = setTimeout(
        () => finish(() => reject(new ExecutionTimeoutError(options.timeoutMs))),
        options.timeoutMs
      );
      options.signal?.addEventListener('abort', onAbort, { once: true });

      worker.on('message', (message: unknown) => {
        const parsed = WorkerReplySchema.safeParse(message);
        if (!parsed.success) {
          finish(() => reject(new ExecutionError('Execution worker sent a malformed reply')));
          return;
        }
        const reply = parsed.data;
        if (reply.kind === 'result') {
          finish(() => resolve(reply));
          return;
        }
        if (reply.phase === 'attach') {
          logger.error('Failed to open federated connection', { error: reply.message });
          finish(() => reject(new ExecutionError(`Cannot attach databases: ${reply.message}`)));
          return;
        }
        finish(() => reject(new ExecutionError(reply.message)));
      });

      worker.on('error', (error: Error) => {
        finish(() => reject(new ExecutionError(error.message)));
      });

      worker.on('exit', (code: number) => {
        finish(() => reject(new ExecutionError(`Execution worker exited with code ${code}`)));
      });
    });
  }

  // ===========================================================================
  // Connection
  // ===========================================================================

  private open(): Database.Database {
    const db = new Database(':memory:');
    try {
      for (const attachment of this.config.attachments) {
        const file = this.resolveFile(attachment);
        db.prepare(`ATTACH DATABASE ? AS ${quoteIdent(attachment.alias)}`).run(file);
      }
      db.pragma('query_only = ON');
      db.pragma(`busy_timeout = ${Math.max(0, Math.floor(this.config.busyTimeoutMs))}`);
      return db;
    } catch (error) {
      db.close();
      logger.error('Failed to open federated connection', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error instanceof QuerywiseError
        ? error
        : new ExecutionError(`Cannot attach databases: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private resolveFile(attachment: DatabaseAttachment): string {
    const file = path.isAbsolute(attachment.file)
      ? attachment.file
      : path.resolve(this.config.directory, attachment.file);
    if (!existsSync(file)) {
      throw new ExecutionError(`Database file for alias '${attachment.alias}' not found`);
    }
    return file;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/** Suffix repeated names with their occurrence number: `id`, `id_2` */
export function uniqueColumnNames(names: string[]): string[] {
  const seen = new Set<string>();
  return names.map((name) => {
    let candidate = name;
    for (let occurrence = 2; seen.has(candidate); occurrence++) {
      candidate = `${name}_${occurrence}`;
    }
    seen.add(candidate);
    return candidate;
  });
}

function toResultRow(columns: string[], values: unknown[]): QueryResultRow {
  const row: QueryResultRow = {};
  columns.forEach((column, index) => {
    row[column] = values[index];
  });
  return row;
}

function hasName(value: unknown): value is { name: string } {
  return typeof value === 'object' && value !== null && 'name' in value && typeof value.name === 'string';
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
