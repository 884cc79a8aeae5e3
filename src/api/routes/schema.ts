/**
 * Querywise - Schema API Routes
 *
 * Catalog introspection and atomic reload.
 */

import { Router, type Request, type Response } from 'express';

import type { SchemaCatalog } from '../../catalog/catalog.js';
import { asyncHandler } from '../../server/middleware/errorHandler.js';
import logger from '../../utils/logger.js';
import { CatalogUnavailableError } from '../../utils/types.js';

function successResponse(res: Response, data: unknown, status = 200): void {
  res.status(status).json({
    success: true,
    data,
    timestamp: new Date().toISOString(),
  });
}

export function createSchemaRouter(catalog: SchemaCatalog): Router {
  const router = Router();

  /**
   * GET /api/schema/info
   */
  router.get('/info', (_req: Request, res: Response) => {
    const snapshot = catalog.getSnapshot();
    if (snapshot === null) {
      throw new CatalogUnavailableError();
    }

    successResponse(res, {
      version: snapshot.version,
      loaded_at: snapshot.loadedAt.toISOString(),
      databases: snapshot.databases.map((db) => ({
        name: db.name,
        description: db.description ?? null,
        table_count: db.tableCount,
      })),
      stats: snapshot.stats,
      retrieval_mode: catalog.usesFullDump(snapshot) ? 'full-dump' : 'retrieval',
    });
  });

  /**
   * GET /api/schema/tables?database=name
   */
  router.get('/tables', (req: Request, res: Response) => {
    const snapshot = catalog.getSnapshot();
    if (snapshot === null) {
      throw new CatalogUnavailableError();
    }

    const database = typeof req.query['database'] === 'string' ? req.query['database'] : undefined;
    const entries = database === undefined ? snapshot.entries : snapshot.tablesIn(database);

    successResponse(res, {
      database: database ?? null,
      count: entries.length,
      tables: entries.map((entry) => ({
        name: entry.qualifiedName,
        description: entry.description,
        columns: entry.columns.length,
      })),
    });
  });

  /**
   * POST /api/schema/reload
   */
  router.post(
    '/reload',
    asyncHandler(async (req: Request, res: Response) => {
      const result = await catalog.reload();
      logger.info('Schema catalog reload requested', {
        requestId: req.requestId,
        changed: result.changed,
        tables: result.stats.tables,
      });

      successResponse(res, {
        changed: result.changed,
        version: result.version,
        loaded_at: result.loadedAt.toISOString(),
        stats: result.stats,
      });
    })
  );

  return router;
}

export default createSchemaRouter;
