/**
 * Querywise - Query Validator
 *
 * Static checks on generated SQL before it reaches the execution engine.
 * Every check works on tokens, so keywords inside string literals,
 * comments or identifiers such as `update_time` never trigger a rejection.
 */

import type { CatalogSnapshot } from '../catalog/snapshot.js';
import { ValidationRejectedError, type RejectionRule } from '../utils/types.js';

import { hasTopLevelLimit, isKeyword, significantTokens, type SqlToken } from './sql-tokenizer.js';

// =============================================================================
// Types
// =============================================================================

export interface ValidationResult {
  valid: boolean;
  /** First rule that failed */
  rule?: RejectionRule;
  errors: string[];
  warnings: string[];
  sanitizedSQL?: string;
}

export interface QueryValidationConfig {
  /**
   * Maximum allowed query length
   */
  maxQueryLength: number;

  /**
   * Reject table references the catalog does not know
   */
  checkQualifiers: boolean;
}

export const DEFAULT_VALIDATION_CONFIG: QueryValidationConfig = {
  maxQueryLength: 5000,
  checkQualifiers: true,
};

/** Mutating, DDL, permission and connection-level keywords */
export const DENY_LIST: ReadonlySet<string> = new Set([
  'INSERT', 'UPDATE', 'DELETE', 'DROP', 'ALTER', 'CREATE', 'TRUNCATE',
  'GRANT', 'REVOKE', 'EXEC', 'EXECUTE', 'MERGE', 'UPSERT', 'CALL',
  'ATTACH', 'DETACH', 'PRAGMA', 'VACUUM', 'REINDEX', 'ANALYZE',
  'COPY', 'LOAD', 'INTO',
]);

const CLAUSE_KEYWORDS = new Set([
  'WHERE', 'JOIN', 'INNER', 'LEFT', 'RIGHT', 'FULL', 'OUTER', 'CROSS', 'NATURAL',
  'ON', 'USING', 'GROUP', 'ORDER', 'HAVING', 'LIMIT', 'OFFSET', 'UNION',
  'INTERSECT', 'EXCEPT', 'WINDOW',
]);

interface TableReference {
  parts: string[];
  position: number;
}

// =============================================================================
// Query Validator Class
// =============================================================================

export class QueryValidator {
  private config: QueryValidationConfig;

  constructor(config: Partial<QueryValidationConfig> = {}) {
    this.config = { ...DEFAULT_VALIDATION_CONFIG, ...config };
  }

  /**
   * Validate a SQL statement. Rules run in order and the first failure is
   * returned; `catalog` enables the table reference check.
   */
  validate(sql: string, catalog?: CatalogSnapshot): ValidationResult {
    const warnings: string[] = [];
    const reject = (rule: RejectionRule, message: string): ValidationResult => ({
      valid: false,
      rule,
      errors: [message],
      warnings,
    });

    const tokens = significantTokens(sql);
    if (tokens.length === 0) {
      return reject('empty', 'The query is empty');
    }

    if (sql.length > this.config.maxQueryLength) {
      return reject('max-length', `Query exceeds maximum length of ${this.config.maxQueryLength} characters`);
    }

    // Rule 1: a single read-only statement
    if (!isKeyword(tokens[0], 'SELECT')) {
      return reject('read-only', 'Only SELECT queries are allowed');
    }

    const terminator = tokens.findIndex((token) => token.type === 'punct' && token.value === ';');
    if (terminator !== -1 && terminator < tokens.length - 1) {
      return reject('single-statement', 'Multiple SQL statements are not allowed');
    }

    // Rule 2: no deny-listed keyword as a standalone word
    const denied = tokens.find((token) => token.type === 'word' && DENY_LIST.has(token.value.toUpperCase()));
    if (denied) {
      return reject('deny-list', `Forbidden keyword: ${denied.value.toUpperCase()}`);
    }

    // Rule 3: only known database/table qualifiers
    if (this.config.checkQualifiers && catalog !== undefined) {
      for (const reference of extractTableReferences(tokens)) {
        const problem = checkReference(reference, catalog);
        if (problem !== null) {
          return reject('unknown-qualifier', problem);
        }
      }
    }

    if (!hasTopLevelLimit(sql)) {
      warnings.push('No LIMIT clause');
    }

    const sanitizedSQL = sql.trim().replace(/;+\s*$/, '').trimEnd();
    return { valid: true, errors: [], warnings, sanitizedSQL };
  }

  /**
   * Validate and throw {@link ValidationRejectedError} on failure
   */
  assertValid(sql: string, catalog?: CatalogSnapshot): string {
    const result = this.validate(sql, catalog);
    if (!result.valid || result.sanitizedSQL === undefined) {
      throw new ValidationRejectedError(result.rule ?? 'read-only', result.errors.join('; '));
    }
    return result.sanitizedSQL;
  }
}

// =============================================================================
// Table Reference Extraction
// =============================================================================

/**
 * Tables named after FROM or JOIN (and comma-separated FROM lists) in every
 * query scope. Subqueries and table-valued functions are skipped; a FROM
 * inside a function call such as SUBSTRING(x FROM 2) is not a table list.
 */
export function extractTableReferences(tokens: SqlToken[]): TableReference[] {
  const references: TableReference[] = [];
  // Whether each open parenthesis scope is a query (starts with SELECT)
  const queryScopes: boolean[] = [true];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined) continue;

    if (token.type === 'punct' && token.value === '(') {
      queryScopes.push(isKeyword(tokens[i + 1], 'SELECT'));
      continue;
    }
    if (token.type === 'punct' && token.value === ')') {
      if (queryScopes.length > 1) queryScopes.pop();
      continue;
    }

    const inQuery = queryScopes[queryScopes.length - 1] ?? false;
    if (!inQuery || !(isKeyword(token, 'FROM') || isKeyword(token, 'JOIN'))) {
      continue;
    }

    let cursor = i + 1;
    const allowList = isKeyword(token, 'FROM');
    for (;;) {
      const parsed = readDottedName(tokens, cursor);
      if (parsed === null) break;

      cursor = parsed.next;
      const after = tokens[cursor];
      const isFunctionCall = after?.type === 'punct' && after.value === '(';
      if (!isFunctionCall) {
        references.push({ parts: parsed.parts, position: parsed.position });
      }

      if (!allowList || isFunctionCall) break;
      cursor = skipAlias(tokens, cursor);
      const separator = tokens[cursor];
      if (separator?.type === 'punct' && separator.value === ',') {
        cursor++;
        continue;
      }
      break;
    }
  }

  return references;
}

function readDottedName(
  tokens: SqlToken[],
  start: number
): { parts: string[]; next: number; position: number } | null {
  const first = tokens[start];
  if (first === undefined || (first.type !== 'word' && first.type !== 'identifier')) {
    return null;
  }

  const parts = [first.value];
  let cursor = start + 1;
  while (tokens[cursor]?.type === 'punct' && tokens[cursor]?.value === '.') {
    const part = tokens[cursor + 1];
    if (part === undefined || (part.type !== 'word' && part.type !== 'identifier')) {
      break;
    }
    parts.push(part.value);
    cursor += 2;
  }

  return { parts, next: cursor, position: first.start };
}

function skipAlias(tokens: SqlToken[], cursor: number): number {
  const token = tokens[cursor];
  if (isKeyword(token, 'AS')) {
    return cursor + 2;
  }
  if (token?.type === 'identifier') {
    return cursor + 1;
  }
  if (token?.type === 'word' && !CLAUSE_KEYWORDS.has(token.value.toUpperCase())) {
    return cursor + 1;
  }
  return cursor;
}

function checkReference(reference: TableReference, catalog: CatalogSnapshot): string | null {
  const { parts } = reference;
  const name = parts.join('.');

  if (parts.length === 1) {
    const [table] = parts;
    if (table !== undefined && catalog.hasTableName(table)) {
      return null;
    }
    return `Unknown table '${name}'`;
  }

  if (parts.length === 2) {
    const [database, table] = parts;
    if (database === undefined || table === undefined) {
      return `Unknown table '${name}'`;
    }
    if (!catalog.hasDatabase(database)) {
      return `Unknown database '${database}' in '${name}'; use one of: ${catalog.databaseNames().join(', ')}`;
    }
    if (!catalog.hasQualifiedTable(database, table)) {
      return `Unknown table '${name}'`;
    }
    return null;
  }

  return `Unsupported table reference '${name}'; use database.table`;
}
