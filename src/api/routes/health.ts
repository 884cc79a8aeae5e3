/**
 * Querywise - Health API Routes
 *
 * Readiness of the schema catalog, the execution backend and the
 * conversation store.
 */

import { Router, type Request, type Response } from 'express';

import type { SchemaCatalog } from '../../catalog/catalog.js';
import type { LanguageModel } from '../../llm/types.js';
import type { ExecutionEngine } from '../../nl-query/executor.js';
import { asyncHandler } from '../../server/middleware/errorHandler.js';
import type { DatabaseClient } from '../../storage/postgres.js';

export interface HealthDependencies {
  catalog: SchemaCatalog;
  executor: ExecutionEngine;
  llm: LanguageModel;
  /** Set when conversations are stored in PostgreSQL */
  database?: DatabaseClient | null;
  startedAt?: Date;
}

interface CheckResult {
  status: 'up' | 'down';
  [key: string]: unknown;
}

export function createHealthRouter(deps: HealthDependencies): Router {
  const router = Router();
  const startedAt = deps.startedAt ?? new Date();

  router.get(
    '/',
    asyncHandler(async (_req: Request, res: Response) => {
      const snapshot = deps.catalog.getSnapshot();
      const catalog: CheckResult = deps.catalog.isReady()
        ? { status: 'up', tables: snapshot?.stats.tables ?? 0, version: snapshot?.version ?? null }
        : { status: 'down', reason: snapshot === null ? 'not loaded' : 'no tables' };

      const execution = deps.executor.healthCheck();
      const executionCheck: CheckResult = execution.ok
        ? { status: 'up', databases: execution.aliases }
        : { status: 'down', reason: execution.error ?? 'unavailable' };

      const checks: Record<string, CheckResult> = {
        api: { status: 'up' },
        catalog,
        execution: executionCheck,
        llm: { status: 'up', embeddings: deps.llm.supportsEmbeddings() },
      };

      if (deps.database) {
        checks['conversations'] = (await deps.database.ping()) ? { status: 'up' } : { status: 'down' };
      }

      const ready = catalog.status === 'up' && executionCheck.status === 'up';
      res.status(ready ? 200 : 503).json({
        status: ready ? 'healthy' : 'degraded',
        checks,
        uptime_seconds: Math.floor((Date.now() - startedAt.getTime()) / 1000),
        timestamp: new Date().toISOString(),
      });
    })
  );

  return router;
}

export default createHealthRouter;
