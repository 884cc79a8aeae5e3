/**
 * Querywise - Catalog Snapshot
 *
 * Immutable view of the catalog. A reload builds a new snapshot and the
 * catalog swaps its reference; nothing here is ever mutated after
 * construction.
 */

import { estimateTokens } from '../utils/helpers.js';

import type { CatalogStats, DatabaseInfo, SchemaEntry } from './types.js';

const MAX_SAMPLE_ROWS_IN_PROMPT = 3;

export class CatalogSnapshot {
  public readonly entries: readonly SchemaEntry[];
  public readonly databases: readonly DatabaseInfo[];
  public readonly version: string;
  public readonly loadedAt: Date;
  public readonly stats: Readonly<CatalogStats>;
  public readonly schemaText: string;

  private readonly byQualifiedName: ReadonlyMap<string, SchemaEntry>;
  private readonly byTableName: ReadonlyMap<string, readonly SchemaEntry[]>;

  constructor(entries: SchemaEntry[], databases: DatabaseInfo[], version: string, loadedAt = new Date()) {
    this.entries = Object.freeze(entries.map(freezeEntry));
    this.databases = Object.freeze(databases.map((db) => Object.freeze({ ...db })));
    this.version = version;
    this.loadedAt = loadedAt;
    this.schemaText = renderSchema(this.entries);

    const byQualifiedName = new Map<string, SchemaEntry>();
    const byTableName = new Map<string, SchemaEntry[]>();
    for (const entry of this.entries) {
      byQualifiedName.set(entry.qualifiedName.toLowerCase(), entry);
      const sameName = byTableName.get(entry.table.toLowerCase()) ?? [];
      sameName.push(entry);
      byTableName.set(entry.table.toLowerCase(), sameName);
    }
    this.byQualifiedName = byQualifiedName;
    this.byTableName = byTableName;

    this.stats = Object.freeze({
      databases: this.databases.length,
      tables: this.entries.length,
      columns: this.entries.reduce((sum, entry) => sum + entry.columns.length, 0),
      estimatedTokens: estimateTokens(this.schemaText),
      embeddedTables: this.entries.filter((entry) => entry.embedding !== undefined).length,
    });
  }

  public get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  public databaseNames(): string[] {
    return this.databases.map((db) => db.name);
  }

  public hasDatabase(name: string): boolean {
    const lower = name.toLowerCase();
    return this.databases.some((db) => db.name.toLowerCase() === lower);
  }

  public tablesIn(database: string): readonly SchemaEntry[] {
    const lower = database.toLowerCase();
    return this.entries.filter((entry) => entry.database.toLowerCase() === lower);
  }

  /** Look up by `database.table` or by a bare table name (first match). */
  public findTable(name: string): SchemaEntry | undefined {
    const lower = name.toLowerCase();
    return this.byQualifiedName.get(lower) ?? this.byTableName.get(lower)?.[0];
  }

  public hasQualifiedTable(database: string, table: string): boolean {
    return this.byQualifiedName.has(`${database}.${table}`.toLowerCase());
  }

  /** Whether a bare table name exists in any database */
  public hasTableName(table: string): boolean {
    return this.byTableName.has(table.toLowerCase());
  }
}

// =============================================================================
// Rendering
// =============================================================================

export function renderSchema(entries: readonly SchemaEntry[]): string {
  return entries.map(renderEntry).join('\n\n');
}

export function renderEntry(entry: SchemaEntry): string {
  const lines = [`TABLE ${entry.qualifiedName}`];
  if (entry.description) {
    lines.push(`  -- ${entry.description}`);
  }

  for (const column of entry.columns) {
    const flags: string[] = [column.type];
    if (column.primaryKey) flags.push('PK');
    if (!column.nullable) flags.push('NOT NULL');
    if (column.references) flags.push(`FK -> ${column.references}`);

    let line = `  ${column.name} (${flags.join(', ')})`;
    if (column.description) {
      line += ` -- ${column.description}`;
    }
    if (column.sampleValues && column.sampleValues.length > 0) {
      line += ` e.g. ${column.sampleValues.slice(0, 5).join(', ')}`;
    }
    lines.push(line);
  }

  const samples = entry.sampleRows?.slice(0, MAX_SAMPLE_ROWS_IN_PROMPT) ?? [];
  if (samples.length > 0) {
    lines.push('  Sample rows:');
    for (const row of samples) {
      lines.push(`    ${JSON.stringify(row)}`);
    }
  }

  return lines.join('\n');
}

function freezeEntry(entry: SchemaEntry): SchemaEntry {
  return Object.freeze({
    ...entry,
    columns: Object.freeze(entry.columns.map((column) => Object.freeze({ ...column }))),
    sampleRows: entry.sampleRows
      ? Object.freeze(entry.sampleRows.map((row) => Object.freeze({ ...row })))
      : undefined,
    embedding: entry.embedding ? Object.freeze([...entry.embedding]) : undefined,
  });
}
