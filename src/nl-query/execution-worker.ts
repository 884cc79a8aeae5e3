/**
 * Querywise - Execution Worker
 *
 * The thread that owns one federated SQLite connection for the length of a
 * single statement. The engine terminates it on the deadline or on
 * cancellation, so a long native step never holds the event loop.
 */

import { z } from 'zod';

// =============================================================================
// Messages
// =============================================================================

export interface ExecutionJob {
  /** Resolved path of the better-sqlite3 entry point */
  driverPath: string;
  attachments: Array<{ alias: string; file: string }>;
  busyTimeoutMs: number;
  sql: string;
  rowCap: number;
}

export const WorkerReplySchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('result'),
    columns: z.array(z.string()),
    rows: z.array(z.array(z.unknown())),
    rowCount: z.number().int().nonnegative(),
  }),
  z.object({
    kind: z.literal('error'),
    phase: z.enum(['attach', 'query']),
    message: z.string(),
  }),
]);

export type WorkerReply = z.infer<typeof WorkerReplySchema>;

// =============================================================================
// Worker Source
// =============================================================================

/**
 * Evaluated as a CommonJS script inside the worker, so the same source runs
 * from compiled output and from the TypeScript sources under test
 */
export const EXECUTION_WORKER_SOURCE = `
'use strict';
const { parentPort, workerData } = require('worker_threads');
const Database = require(workerData.driverPath);

function messageOf(error) {
  return error instanceof Error ? error.message : String(error);
}

function toScalar(value) {
  if (Buffer.isBuffer(value)) {
    return '<blob ' + value.length + ' bytes>';
  }
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  return value;
}

function run() {
  const db = new Database(':memory:');
  try {
    try {
      for (const attachment of workerData.attachments) {
        const alias = '"' + attachment.alias.replace(/"/g, '""') + '"';
        db.prepare('ATTACH DATABASE ? AS ' + alias).run(attachment.file);
      }
      db.pragma('query_only = ON');
      db.pragma('busy_timeout = ' + workerData.busyTimeoutMs);
    } catch (error) {
      return { kind: 'error', phase: 'attach', message: messageOf(error) };
    }

    try {
      const stmt = db.prepare(workerData.sql);
      if (!stmt.reader) {
        return { kind: 'error', phase: 'query', message: 'Statement does not return rows' };
      }
      const columns = stmt.columns().map((column) => column.name);
      const rows = [];
      let rowCount = 0;
      for (const values of stmt.raw(true).iterate()) {
        rowCount += 1;
        if (rows.length < workerData.rowCap) {
          rows.push(values.map(toScalar));
        }
      }
      return { kind: 'result', columns, rows, rowCount };
    } catch (error) {
      return { kind: 'error', phase: 'query', message: messageOf(error) };
    }
  } finally {
    db.close();
  }
}

parentPort.postMessage(run());
`;
