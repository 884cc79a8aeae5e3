/**
 * Querywise - Meta Questions
 *
 * Questions about the catalog itself ("what databases are there", "describe
 * table x") are answered from the snapshot without a model call.
 */

import type { CatalogSnapshot } from '../catalog/snapshot.js';
import type { SchemaEntry } from '../catalog/types.js';

export type MetaKind = 'counts' | 'databases' | 'tables' | 'describe';

const MAX_LISTED_TABLES = 50;

/** Words allowed between a listing verb and the noun it lists */
const FILLER = '(?:(?:me|all|the|are|of|available)\\s+)*';

/** A qualified or snake_case table name such as `crew_members` */
const TABLE_NAME = '[a-z0-9]+(?:[_.][a-z0-9]+)+';

const META_PATTERNS: ReadonlyArray<[MetaKind, RegExp]> = [
  ['counts', /\b(?:how many|number of)\s+(?:tables|columns|databases)\b/],
  ['databases', new RegExp(`\\b(?:list|show|what|which|display)\\s+${FILLER}(?:databases|dbs)\\b`)],
  ['databases', /\b(?:available\s+(?:databases|dbs)|databases?\s+(?:are\s+)?(?:available|exist))\b/],
  ['tables', new RegExp(`\\b(?:list|show|what|which|display)\\s+${FILLER}tables\\b`)],
  ['tables', /\b(?:available\s+tables|tables\s+(?:are\s+)?(?:available|exist))\b/],
  ['describe', /\b(?:describe|structure of|schema of|columns?\s+(?:of|in|for))\b.*\b(?:tables?|databases?|dbs?)\b/],
  [
    'describe',
    new RegExp(`\\b(?:describe|structure of|schema of|columns?\\s+(?:of|in|for))\\s+(?:the\\s+)?${TABLE_NAME}\\b`),
  ],
];

export function detectMetaQuestion(question: string): MetaKind | null {
  const lower = question.toLowerCase();
  for (const [kind, pattern] of META_PATTERNS) {
    if (pattern.test(lower)) {
      return kind;
    }
  }
  return null;
}

export function answerMetaQuestion(kind: MetaKind, question: string, snapshot: CatalogSnapshot): string {
  switch (kind) {
    case 'counts': {
      const { stats } = snapshot;
      return [
        'Catalog statistics:',
        `  • Databases: ${stats.databases}`,
        `  • Tables: ${stats.tables}`,
        `  • Columns: ${stats.columns}`,
      ].join('\n');
    }

    case 'databases': {
      const lines = snapshot.databases.map((db) => {
        const description = db.description ? ` - ${db.description}` : '';
        return `  • ${db.name} (${db.tableCount} tables)${description}`;
      });
      return `There are ${snapshot.databases.length} databases available:\n${lines.join('\n')}`;
    }

    case 'tables': {
      const database = mentionedDatabase(question, snapshot);
      const tables = database === null ? snapshot.entries : snapshot.tablesIn(database);
      const qualifier = database === null ? '' : ` in ${database}`;
      const listed = tables.slice(0, MAX_LISTED_TABLES).map((entry) => `  • ${entry.qualifiedName}`);
      const more = tables.length > MAX_LISTED_TABLES ? `\n  ... and ${tables.length - MAX_LISTED_TABLES} more` : '';
      return `There are ${tables.length} tables${qualifier}:\n${listed.join('\n')}${more}`;
    }

    case 'describe': {
      const entry = mentionedTable(question, snapshot);
      if (entry === null) {
        const names = snapshot.entries.slice(0, 20).map((table) => `  • ${table.qualifiedName}`);
        return `I couldn't tell which table you mean. Please name one of these:\n${names.join('\n')}`;
      }
      return describeTable(entry);
    }
  }
}

export function describeTable(entry: SchemaEntry): string {
  const columns = entry.columns.map((column) => {
    const flags: string[] = [];
    if (column.primaryKey) flags.push('PK');
    if (column.references) flags.push(`FK -> ${column.references}`);
    if (!column.nullable) flags.push('NOT NULL');
    const suffix = flags.length > 0 ? ` [${flags.join(', ')}]` : '';
    return `  • ${column.name}: ${column.type}${suffix}`;
  });

  const lines = [`Table: ${entry.qualifiedName}`, `Description: ${entry.description || 'N/A'}`];
  if (entry.rowCountEstimate !== undefined) {
    lines.push(`Rows: ~${entry.rowCountEstimate.toLocaleString('en-US')}`);
  }
  lines.push(`Columns (${entry.columns.length}):`, ...columns);
  return lines.join('\n');
}

function mentionedDatabase(question: string, snapshot: CatalogSnapshot): string | null {
  const lower = question.toLowerCase();
  return snapshot.databaseNames().find((name) => containsWord(lower, name.toLowerCase())) ?? null;
}

function mentionedTable(question: string, snapshot: CatalogSnapshot): SchemaEntry | null {
  const lower = question.toLowerCase();
  // Qualified names first so `db.table` beats a bare match elsewhere
  const qualified = snapshot.entries.find((entry) => lower.includes(entry.qualifiedName.toLowerCase()));
  if (qualified) {
    return qualified;
  }
  return snapshot.entries.find((entry) => containsWord(lower, entry.table.toLowerCase())) ?? null;
}

function containsWord(text: string, word: string): boolean {
  let index = text.indexOf(word);
  while (index !== -1) {
    const before = text.charAt(index - 1);
    const after = text.charAt(index + word.length);
    if (!/[a-z0-9_]/.test(before) && !/[a-z0-9_]/.test(after)) {
      return true;
    }
    index = text.indexOf(word, index + 1);
  }
  return false;
}
