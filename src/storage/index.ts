/**
 * Querywise - Storage Module
 *
 * Barrel export file for the PostgreSQL client
 */

export {
  PostgresClient,
  getPostgresClient,
  initializePostgres,
  closePostgres,
} from './postgres.js';

export type { DatabaseClient } from './postgres.js';
