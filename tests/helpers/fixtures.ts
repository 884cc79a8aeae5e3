/**
 * Querywise - Test Fixtures
 * Temporary SQLite databases, catalog files and a fully wired chat service
 */

import fs from 'fs';
import os from 'os';
import path from 'path';

import Database from 'better-sqlite3';
import type { z } from 'zod';

import { SchemaCatalog } from '../../src/catalog/catalog.js';
import type { CatalogFileSchema } from '../../src/catalog/loader.js';
import { ConversationManager } from '../../src/conversation/manager.js';
import { MemoryConversationStore } from '../../src/conversation/memory-store.js';
import { ExecutionEngine } from '../../src/nl-query/executor.js';
import { IntentClassifier } from '../../src/nl-query/intent-classifier.js';
import { loadIntentPatterns } from '../../src/nl-query/patterns.js';
import { QueryRewriter } from '../../src/nl-query/query-rewriter.js';
import { ChatService } from '../../src/nl-query/service.js';
import { SQLGenerator } from '../../src/nl-query/sql-generator.js';
import { ResultSummarizer } from '../../src/nl-query/summarizer.js';
import { QueryValidator } from '../../src/nl-query/validator.js';
import { ColumnMasker } from '../../src/pii/column-masker.js';
import { PiiGuard } from '../../src/pii/guard.js';
import type { CatalogConfig, DatabasesConfig } from '../../src/utils/types.js';

import { FakeLanguageModel } from './fake-llm.js';

export type CatalogFileInput = z.input<typeof CatalogFileSchema>;

export const PATTERNS_PATH = path.resolve(__dirname, '../../data/intent-patterns.json');

// =============================================================================
// Catalog
// =============================================================================

export const TEST_CATALOG: CatalogFileInput = {
  databases: [
    {
      name: 'crew_management',
      description: 'Crew rosters and qualifications',
      tables: [
        {
          name: 'crew_members',
          description: 'Crew roster with role and home base',
          rowCountEstimate: 5,
          columns: [
            { name: 'employee_id', type: 'TEXT', nullable: false, primaryKey: true, description: 'Employee identifier' },
            { name: 'first_name', type: 'TEXT', nullable: false },
            { name: 'last_name', type: 'TEXT', nullable: false },
            { name: 'crew_role', type: 'TEXT', nullable: false, description: 'Captain, First Officer or Flight Attendant' },
            { name: 'base_airport', type: 'TEXT', nullable: false, description: 'Home base airport code, DFW for Dallas' },
            { name: 'update_time', type: 'TEXT', nullable: true },
          ],
        },
        {
          name: 'crew_qualifications',
          description: 'Type ratings and medical checks',
          columns: [
            {
              name: 'employee_id',
              type: 'TEXT',
              nullable: false,
              references: 'crew_management.crew_members.employee_id',
            },
            { name: 'qualification_type', type: 'TEXT', nullable: false },
            { name: 'expiry_date', type: 'TEXT', nullable: true },
          ],
        },
        {
          name: 'crew_assignments',
          description: 'Flights each crew member works',
          columns: [
            { name: 'employee_id', type: 'TEXT', nullable: false },
            {
              name: 'flight_id',
              type: 'INTEGER',
              nullable: false,
              references: 'flight_operations.flights.flight_id',
            },
            { name: 'duty_role', type: 'TEXT', nullable: false },
          ],
        },
      ],
    },
    {
      name: 'flight_operations',
      description: 'Flight schedule',
      tables: [
        {
          name: 'flights',
          description: 'Scheduled and operated flights',
          columns: [
            { name: 'flight_id', type: 'INTEGER', nullable: false, primaryKey: true },
            { name: 'flight_number', type: 'TEXT', nullable: false },
            { name: 'origin', type: 'TEXT', nullable: false },
            { name: 'destination', type: 'TEXT', nullable: false },
          ],
        },
      ],
    },
  ],
};

const TABLE_EMBEDDINGS: Record<string, number[]> = {
  crew_members: [1, 0, 0],
  crew_qualifications: [0, 0, 1],
  crew_assignments: [0.6, 0.8, 0],
  flights: [0, 1, 0],
};

/** {@link TEST_CATALOG} with a precomputed vector on every table */
export function catalogWithEmbeddings(): CatalogFileInput {
  return {
    databases: (TEST_CATALOG.databases ?? []).map((database) => ({
      ...database,
      tables: (database.tables ?? []).map((table) => ({ ...table, embedding: TABLE_EMBEDDINGS[table.name] })),
    })),
  };
}

/** Flight questions point along the second axis, everything else the first */
export function keywordEmbedder(text: string): number[] {
  return text.toLowerCase().includes('flight') ? [0, 1, 0] : [1, 0, 0];
}

export function writeCatalog(dir: string, content: unknown, fileName = 'catalog.json'): string {
  const filePath = path.join(dir, fileName);
  fs.writeFileSync(filePath, JSON.stringify(content, null, 2));
  return filePath;
}

export function catalogConfig(filePath: string, overrides: Partial<CatalogConfig> = {}): CatalogConfig {
  return {
    path: filePath,
    fullDumpTokenThreshold: 30000,
    topK: 5,
    minSimilarity: 0.2,
    embedOnLoad: false,
    watch: false,
    ...overrides,
  };
}

// =============================================================================
// SQLite Databases
// =============================================================================

export function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'querywise-test-'));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export const CREW_ROWS: ReadonlyArray<[string, string, string, string, string]> = [
  ['AA-10001', 'Avery', 'Lee', 'Captain', 'DFW'],
  ['AA-10002', 'Jordan', 'Patel', 'Captain', 'DFW'],
  ['AA-10003', 'Riley', 'Garcia', 'First Officer', 'DFW'],
  ['AA-10004', 'Morgan', 'Nguyen', 'Captain', 'ORD'],
  ['AA-10005', 'Casey', 'Okafor', 'Flight Attendant', 'DFW'],
];

/**
 * Two database files matching {@link TEST_CATALOG}; returns the engine
 * configuration that attaches them
 */
export function createCrewDatabases(dir: string): DatabasesConfig {
  const crew = new Database(path.join(dir, 'crew_management.db'));
  try {
    crew.exec(`
      CREATE TABLE crew_members (
        employee_id TEXT PRIMARY KEY,
        first_name TEXT NOT NULL,
        last_name TEXT NOT NULL,
        crew_role TEXT NOT NULL,
        base_airport TEXT NOT NULL,
        update_time TEXT
      );
      CREATE TABLE crew_qualifications (employee_id TEXT NOT NULL, qualification_type TEXT NOT NULL, expiry_date TEXT);
      CREATE TABLE crew_assignments (employee_id TEXT NOT NULL, flight_id INTEGER NOT NULL, duty_role TEXT NOT NULL);
    `);
    const member = crew.prepare('INSERT INTO crew_members VALUES (?, ?, ?, ?, ?, ?)');
    for (const row of CREW_ROWS) {
      member.run(...row, '2024-03-01 08:00:00');
    }
    crew.prepare('INSERT INTO crew_qualifications VALUES (?, ?, ?)').run('AA-10001', 'Type Rating', '2026-05-01');
    const assignment = crew.prepare('INSERT INTO crew_assignments VALUES (?, ?, ?)');
    assignment.run('AA-10001', 1, 'Captain');
    assignment.run('AA-10003', 1, 'First Officer');
    assignment.run('AA-10004', 2, 'Captain');
  } finally {
    crew.close();
  }

  const flights = new Database(path.join(dir, 'flight_operations.db'));
  try {
    flights.exec(`
      CREATE TABLE flights (
        flight_id INTEGER PRIMARY KEY,
        flight_number TEXT NOT NULL,
        origin TEXT NOT NULL,
        destination TEXT NOT NULL
      );
      INSERT INTO flights VALUES (1, 'QW100', 'DFW', 'ORD');
      INSERT INTO flights VALUES (2, 'QW200', 'ORD', 'MIA');
    `);
  } finally {
    flights.close();
  }

  return {
    directory: dir,
    attachments: [
      { alias: 'crew_management', file: 'crew_management.db' },
      { alias: 'flight_operations', file: 'flight_operations.db' },
    ],
    joinKey: 'employee_id',
    busyTimeoutMs: 1000,
  };
}

// =============================================================================
// Chat Service
// =============================================================================

export interface HarnessOptions {
  catalog?: CatalogFileInput;
  llm?: FakeLanguageModel;
  maxAttempts?: number;
  piiEnabled?: boolean;
  maskedColumns?: string[];
}

export interface ServiceHarness {
  dir: string;
  llm: FakeLanguageModel;
  catalog: SchemaCatalog;
  executor: ExecutionEngine;
  generator: SQLGenerator;
  store: MemoryConversationStore;
  service: ChatService;
  cleanup(): void;
}

export async function createServiceHarness(options: HarnessOptions = {}): Promise<ServiceHarness> {
  const dir = createTempDir();
  const databases = createCrewDatabases(dir);
  const llm = options.llm ?? new FakeLanguageModel();

  const catalog = new SchemaCatalog(catalogConfig(writeCatalog(dir, options.catalog ?? TEST_CATALOG)), llm);
  await catalog.reload();

  const patterns = loadIntentPatterns(PATTERNS_PATH);
  const executor = new ExecutionEngine(databases);
  const generator = new SQLGenerator(llm, { joinKey: 'employee_id' });
  const store = new MemoryConversationStore();

  const service = new ChatService(
    {
      llm,
      catalog,
      pii: new PiiGuard({ enabled: options.piiEnabled ?? true }),
      columnMasker: new ColumnMasker(options.maskedColumns),
      rewriter: new QueryRewriter(llm, patterns.referentialMarkers),
      classifier: new IntentClassifier(llm, patterns),
      generator,
      validator: new QueryValidator(),
      executor,
      summarizer: new ResultSummarizer(llm),
      conversations: new ConversationManager(store, { windowTurns: 5, retentionTurns: 50 }),
    },
    { maxAttempts: options.maxAttempts ?? 3 }
  );

  return {
    dir,
    llm,
    catalog,
    executor,
    generator,
    store,
    service,
    cleanup: () => removeTempDir(dir),
  };
}

/** A generator reply in the JSON shape the prompt asks for */
export function sqlReply(sql: string, explanation = 'Looks up the requested rows.'): string {
  return JSON.stringify({ intent: 'data', sql, explanation });
}
