/**
 * Querywise - Schema Catalog Types
 */

export interface ColumnEntry {
  readonly name: string;
  readonly type: string;
  readonly nullable: boolean;
  readonly primaryKey?: boolean;
  /** Foreign key target as `database.table.column` */
  readonly references?: string;
  readonly description?: string;
  readonly sampleValues?: readonly string[];
}

/** One table of one database, as shown to the SQL generator. */
export interface SchemaEntry {
  readonly database: string;
  readonly table: string;
  /** `database.table` */
  readonly qualifiedName: string;
  readonly description: string;
  readonly columns: readonly ColumnEntry[];
  readonly sampleRows?: readonly Readonly<Record<string, unknown>>[];
  readonly rowCountEstimate?: number;
  readonly embedding?: readonly number[];
}

export interface DatabaseInfo {
  readonly name: string;
  readonly description?: string;
  readonly tableCount: number;
}

export interface CatalogStats {
  databases: number;
  tables: number;
  columns: number;
  estimatedTokens: number;
  embeddedTables: number;
}

export type RetrievalStrategy = 'full-dump' | 'semantic' | 'keyword';

export interface RetrievalResult {
  entries: readonly SchemaEntry[];
  strategy: RetrievalStrategy;
  /** Prompt rendering of `entries` */
  schemaText: string;
}

export interface ReloadResult {
  changed: boolean;
  version: string;
  stats: CatalogStats;
  loadedAt: Date;
}
