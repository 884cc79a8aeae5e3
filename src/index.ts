/**
 * Querywise - Conversational Text-to-SQL Service
 *
 * Main Application Entry Point
 */

import 'dotenv/config';

import { SchemaCatalog } from './catalog/catalog.js';
import { loadConfig } from './config/loader.js';
import { MemoryConversationStore } from './conversation/memory-store.js';
import { PostgresConversationStore } from './conversation/postgres-store.js';
import type { ConversationStore } from './conversation/types.js';
import { getLLMClient } from './llm/client.js';
import { closeChatService, initializeChatService } from './nl-query/service.js';
import { ApplicationServer, createApplicationServer } from './server/server.js';
import { closePostgres, initializePostgres, type PostgresClient } from './storage/postgres.js';
import logger, { logLifecycle } from './utils/logger.js';
import type { QuerywiseConfig } from './utils/types.js';

// =============================================================================
// Global State
// =============================================================================

let applicationServer: ApplicationServer | null = null;
let schemaCatalog: SchemaCatalog | null = null;
let postgresClient: PostgresClient | null = null;
let isShuttingDown = false;

// =============================================================================
// Application Startup
// =============================================================================

async function bootstrap(): Promise<void> {
  logLifecycle('startup', 'Querywise starting up...');

  try {
    const config: QuerywiseConfig = await loadConfig();

    logLifecycle('startup', 'Configuration loaded', {
      port: config.server.port,
      host: config.server.host,
      environment: config.server.nodeEnv,
      databases: config.databases.attachments.length,
      conversationStore: config.conversation.store,
    });

    const llm = getLLMClient(config.llm);

    schemaCatalog = new SchemaCatalog(config.catalog, llm);
    try {
      await schemaCatalog.reload();
    } catch (catalogError) {
      // The service still answers general and meta questions; data questions
      // report the catalog as unavailable until a reload succeeds
      logger.warn('Schema catalog could not be loaded', {
        path: config.catalog.path,
        error: catalogError instanceof Error ? catalogError.message : String(catalogError),
      });
    }
    if (config.catalog.watch) {
      schemaCatalog.startWatching();
    }

    const store = await createConversationStore(config);
    const service = initializeChatService(config, { llm, catalog: schemaCatalog, store });

    applicationServer = createApplicationServer({ config, service, database: postgresClient });
    const address = await applicationServer.start();

    logLifecycle('ready', 'Querywise is ready to accept connections', {
      url: `http://${config.server.host}:${address.port}`,
      catalogReady: schemaCatalog.isReady(),
    });

    printBanner(config, address.port);
  } catch (error) {
    logLifecycle('error', 'Failed to start Querywise', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  }
}

async function createConversationStore(config: QuerywiseConfig): Promise<ConversationStore> {
  if (config.conversation.store === 'postgres') {
    postgresClient = await initializePostgres(config.postgres);
    logLifecycle('startup', 'PostgreSQL conversation store connected');
    return new PostgresConversationStore(postgresClient);
  }

  logLifecycle('startup', 'Using in-memory conversation store');
  return new MemoryConversationStore();
}

// =============================================================================
// Graceful Shutdown
// =============================================================================

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn('Shutdown already in progress, ignoring signal', { signal });
    return;
  }

  isShuttingDown = true;
  logLifecycle('shutdown', `Received ${signal}, starting graceful shutdown...`);

  const shutdownTimeout = setTimeout(() => {
    logger.error('Graceful shutdown timed out, forcing exit');
    process.exit(1);
  }, 30000);

  try {
    if (applicationServer !== null) {
      await applicationServer.shutdown();
    }

    if (schemaCatalog !== null) {
      await schemaCatalog.stopWatching();
    }

    await closeChatService();
    if (postgresClient !== null) {
      await closePostgres();
    }

    clearTimeout(shutdownTimeout);
    logLifecycle('shutdown', 'Querywise shutdown complete');
    process.exit(0);
  } catch (error) {
    clearTimeout(shutdownTimeout);
    logLifecycle('error', 'Error during shutdown', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', {
    error: error.message,
    stack: error.stack,
  });
  void gracefulShutdown('uncaughtException');
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
});

// =============================================================================
// Startup Banner
// =============================================================================

function printBanner(config: QuerywiseConfig, port: number): void {
  const base = `http://${config.server.host}:${port}`;
  const banner = `
╔═══════════════════════════════════════════════════════════════════╗
║                                                                   ║
║    QUERYWISE                                                      ║
║    Conversational text-to-SQL over federated databases            ║
║                                                                   ║
╠═══════════════════════════════════════════════════════════════════╣
║                                                                   ║
║    Chat:    ${`${base}/api/chat/message`.padEnd(54)}║
║    Schema:  ${`${base}/api/schema/info`.padEnd(54)}║
║    Health:  ${`${base}/health`.padEnd(54)}║
║                                                                   ║
║    Environment: ${config.server.nodeEnv.padEnd(50)}║
║    Databases:   ${config.databases.attachments.map((a) => a.alias).join(', ').padEnd(50)}║
║                                                                   ║
╚═══════════════════════════════════════════════════════════════════╝
`;

  // eslint-disable-next-line no-console
  console.log(banner);
}

// =============================================================================
// Start Application
// =============================================================================

bootstrap().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Fatal error during bootstrap:', error);
  process.exit(1);
});
