/**
 * Querywise - Catalog File Loader
 * Reads and validates the structured schema description file
 */

import { createHash } from 'crypto';
import { promises as fs } from 'fs';

import { z } from 'zod';

import { formatValidationErrors } from '../config/schema.js';
import { ConfigurationError } from '../utils/types.js';

import type { DatabaseInfo, SchemaEntry } from './types.js';

// =============================================================================
// File Schema
// =============================================================================

const ColumnSchema = z.object({
  name: z.string().min(1),
  type: z.string().default('TEXT'),
  nullable: z.boolean().default(true),
  primaryKey: z.boolean().optional(),
  references: z.string().optional(),
  description: z.string().optional(),
  sampleValues: z.array(z.union([z.string(), z.number()]).transform(String)).optional(),
});

const TableSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  rowCountEstimate: z.number().int().min(0).optional(),
  columns: z.array(ColumnSchema).min(1),
  sampleRows: z.array(z.record(z.unknown())).optional(),
  embedding: z.array(z.number()).optional(),
});

const DatabaseSchema = z.object({
  name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'database name must be a plain SQL identifier'),
  description: z.string().optional(),
  tables: z.array(TableSchema).default([]),
});

export const CatalogFileSchema = z.object({
  databases: z.array(DatabaseSchema).default([]),
});

export type CatalogFile = z.infer<typeof CatalogFileSchema>;

export interface CatalogContent {
  entries: SchemaEntry[];
  databases: DatabaseInfo[];
  /** sha256 of the file bytes */
  hash: string;
}

// =============================================================================
// Loading
// =============================================================================

export async function loadCatalogFile(filePath: string): Promise<CatalogContent> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read catalog file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(
      `Catalog file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = CatalogFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Catalog file ${filePath} is invalid: ${formatValidationErrors(parsed.error).join('; ')}`
    );
  }

  return {
    ...toEntries(parsed.data),
    hash: createHash('sha256').update(raw).digest('hex'),
  };
}

export function toEntries(file: CatalogFile): Omit<CatalogContent, 'hash'> {
  const entries: SchemaEntry[] = [];
  const databases: DatabaseInfo[] = [];

  for (const database of file.databases) {
    databases.push({
      name: database.name,
      description: database.description,
      tableCount: database.tables.length,
    });

    for (const table of database.tables) {
      entries.push({
        database: database.name,
        table: table.name,
        qualifiedName: `${database.name}.${table.name}`,
        description: table.description,
        columns: table.columns,
        sampleRows: table.sampleRows,
        rowCountEstimate: table.rowCountEstimate,
        embedding: table.embedding,
      });
    }
  }

  return { entries, databases };
}
