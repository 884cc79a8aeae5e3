/**
 * Querywise - Application Server
 * Express server hosting the chat, schema and health APIs
 */

import http from 'http';
import { type AddressInfo } from 'net';

import compression from 'compression';
import cors from 'cors';
import express, { type Application } from 'express';
import helmet from 'helmet';

import { ROUTE_PREFIXES } from '../api/index.js';
import { createChatRouter } from '../api/routes/chat.js';
import { createHealthRouter } from '../api/routes/health.js';
import { createSchemaRouter } from '../api/routes/schema.js';
import type { ChatService } from '../nl-query/service.js';
import type { DatabaseClient } from '../storage/postgres.js';
import { logLifecycle } from '../utils/logger.js';
import type { QuerywiseConfig } from '../utils/types.js';

import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestIdMiddleware } from './middleware/requestId.js';
import { requestLogger } from './middleware/requestLogger.js';

// =============================================================================
// Types
// =============================================================================

export interface ApplicationServerOptions {
  config: QuerywiseConfig;
  service: ChatService;
  /** PostgreSQL client backing the conversation store, if any */
  database?: DatabaseClient | null;
}

// =============================================================================
// Application Server Class
// =============================================================================

export class ApplicationServer {
  private app: Application;
  private server: http.Server | null = null;
  private config: QuerywiseConfig;
  private service: ChatService;
  private database: DatabaseClient | null;
  private startTime = new Date();
  private isShuttingDown = false;

  constructor(options: ApplicationServerOptions) {
    this.app = express();
    this.config = options.config;
    this.service = options.service;
    this.database = options.database ?? null;

    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(
      helmet({
        contentSecurityPolicy: false,
      })
    );
    this.app.use(cors());
    this.app.use(compression());
    this.app.use(requestIdMiddleware());
    this.app.use(requestLogger({ skipPaths: ['/health', ROUTE_PREFIXES.health] }));
    this.app.use(express.json({ limit: '1mb' }));
    this.app.set('trust proxy', true);
  }

  private setupRoutes(): void {
    const healthRouter = createHealthRouter({
      catalog: this.service.getCatalog(),
      executor: this.service.getExecutor(),
      llm: this.service.getLanguageModel(),
      database: this.database,
      startedAt: this.startTime,
    });

    this.app.use('/health', healthRouter);
    this.app.use(ROUTE_PREFIXES.health, healthRouter);
    this.app.use(ROUTE_PREFIXES.chat, createChatRouter(this.service));
    this.app.use(ROUTE_PREFIXES.schema, createSchemaRouter(this.service.getCatalog()));

    this.app.use(notFoundHandler);
    this.app.use(errorHandler);
  }

  /**
   * Start listening. Port 0 picks a free port; the bound address is returned.
   */
  public start(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const { port, host } = this.config.server;
      const server = http.createServer(this.app);

      server.once('error', (error) => {
        logLifecycle('error', 'Server error', { error: error.message });
        reject(error);
      });

      server.listen(port, host, () => {
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Server is not listening on a TCP port'));
          return;
        }
        this.startTime = new Date();
        logLifecycle('startup', 'HTTP server listening', { host: address.address, port: address.port });
        resolve(address);
      });

      this.server = server;
    });
  }

  /**
   * Stop accepting connections and wait for in-flight requests
   */
  public async shutdown(): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }
    this.isShuttingDown = true;

    const server = this.server;
    if (server !== null) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
      this.server = null;
    }

    logLifecycle('shutdown', 'HTTP server closed');
  }

  /**
   * Get the Express application (for testing)
   */
  public getApp(): Application {
    return this.app;
  }

  public getServer(): http.Server | null {
    return this.server;
  }
}

export function createApplicationServer(options: ApplicationServerOptions): ApplicationServer {
  return new ApplicationServer(options);
}

export default ApplicationServer;
