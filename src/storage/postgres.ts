/**
 * Querywise - PostgreSQL Database Client
 * Connection pool for the durable conversation store
 */

import pgPromise, { type IDatabase, type IMain } from 'pg-promise';

import logger from '../utils/logger.js';
import type { PostgresConfig } from '../utils/types.js';
import { DatabaseError } from '../utils/types.js';

// =============================================================================
// Types
// =============================================================================

export interface DatabaseClient {
  query<T>(sql: string, params?: unknown[]): Promise<T[]>;
  queryOne<T>(sql: string, params?: unknown[]): Promise<T | null>;
  execute(sql: string, params?: unknown[]): Promise<number>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
  isConnected(): boolean;
}

// =============================================================================
// PostgreSQL Client Class
// =============================================================================

export class PostgresClient implements DatabaseClient {
  private pgp: IMain;
  private db: IDatabase<object>;
  private config: PostgresConfig;
  private connected = false;

  constructor(config: PostgresConfig) {
    this.config = config;

    this.pgp = pgPromise({
      capSQL: true,

      query(e) {
        logger.debug('PostgreSQL query', {
          query: e.query.substring(0, 200),
        });
      },

      error(err, e) {
        logger.error('PostgreSQL error', {
          error: err instanceof Error ? err.message : String(err),
          query: e.query?.substring(0, 200),
        });
      },
    });

    this.db = this.pgp({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? { rejectUnauthorized: false } : false,
      max: config.poolMax,
      min: config.poolMin,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    });
  }

  /**
   * Open one connection to prove the pool works
   */
  public async connect(): Promise<void> {
    try {
      const connection = await this.db.connect();
      await connection.done();
      this.connected = true;
      logger.info('PostgreSQL connection pool initialized', {
        host: this.config.host,
        port: this.config.port,
        database: this.config.database,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Failed to connect to PostgreSQL', {
        host: this.config.host,
        port: this.config.port,
        error: message,
      });
      throw new DatabaseError(`Failed to connect to PostgreSQL: ${message}`);
    }
  }

  public async query<T>(sql: string, params?: unknown[]): Promise<T[]> {
    try {
      return await this.db.any<T>(sql, params);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DatabaseError(`Query failed: ${message}`);
    }
  }

  public async queryOne<T>(sql: string, params?: unknown[]): Promise<T | null> {
    try {
      return await this.db.oneOrNone<T>(sql, params);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DatabaseError(`Query failed: ${message}`);
    }
  }

  /**
   * Run a statement and return the number of affected rows
   */
  public async execute(sql: string, params?: unknown[]): Promise<number> {
    try {
      const result = await this.db.result(sql, params);
      return result.rowCount;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DatabaseError(`Execute failed: ${message}`);
    }
  }

  public async ping(): Promise<boolean> {
    try {
      await this.db.one('SELECT 1 AS ok');
      return true;
    } catch (error) {
      logger.warn('PostgreSQL ping failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  public isConnected(): boolean {
    return this.connected;
  }

  public async close(): Promise<void> {
    if (!this.connected) {
      return;
    }
    this.pgp.end();
    this.connected = false;
    logger.info('PostgreSQL connection pool closed');
  }
}

// =============================================================================
// Singleton Instance
// =============================================================================

let postgresInstance: PostgresClient | null = null;

export function getPostgresClient(config?: PostgresConfig): PostgresClient {
  if (postgresInstance === null) {
    if (config === undefined) {
      throw new Error('PostgreSQL configuration required for first initialization');
    }
    postgresInstance = new PostgresClient(config);
  }
  return postgresInstance;
}

export async function initializePostgres(config: PostgresConfig): Promise<PostgresClient> {
  const client = getPostgresClient(config);
  await client.connect();
  return client;
}

export async function closePostgres(): Promise<void> {
  if (postgresInstance !== null) {
    await postgresInstance.close();
    postgresInstance = null;
  }
}
