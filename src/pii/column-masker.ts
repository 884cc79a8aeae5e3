/**
 * Querywise - Column Masker
 *
 * Replaces every value of an operator-listed column with a fixed token
 * before a result is summarized or returned. Columns are matched by name,
 * through a SELECT-list alias, or as a positional duplicate (`ssn_2`).
 */

import { isKeyword, significantTokens, type SqlToken } from '../nl-query/sql-tokenizer.js';
import type { ExecutionResult } from '../nl-query/types.js';
import logger from '../utils/logger.js';

export const MASK_TOKEN = '[MASKED]';

// =============================================================================
// Column Masker
// =============================================================================

export class ColumnMasker {
  private columns: Set<string>;

  /**
   * @param maskedColumns - `database.table.column` or bare column names;
   * only the column segment is matched, case-insensitively
   */
  constructor(maskedColumns: readonly string[] = []) {
    this.columns = new Set(
      maskedColumns
        .map((entry) => entry.split('.').pop()?.trim().toLowerCase() ?? '')
        .filter((name) => name.length > 0)
    );
  }

  public isEnabled(): boolean {
    return this.columns.size > 0;
  }

  /**
   * Result columns of `sql` whose values must be masked
   */
  public maskedColumnsFor(sql: string, columns: readonly string[]): string[] {
    if (!this.isEnabled()) {
      return [];
    }
    const aliases = selectListAliases(sql);
    return columns.filter((column) => {
      const name = column.toLowerCase();
      if (this.columns.has(name) || this.columns.has(name.replace(/_\d+$/, ''))) {
        return true;
      }
      return (aliases.get(name) ?? []).some((source) => this.columns.has(source));
    });
  }

  /**
   * Copy of the result with masked column values replaced; the input is
   * returned unchanged when nothing matches
   */
  public apply(sql: string, result: ExecutionResult, requestId?: string): ExecutionResult {
    if (result.rows.length === 0) {
      return result;
    }
    const masked = this.maskedColumnsFor(sql, result.columns);
    if (masked.length === 0) {
      return result;
    }

    logger.info('Masking result columns', { requestId, columns: masked });
    return {
      ...result,
      rows: result.rows.map((row) => {
        const copy = { ...row };
        for (const column of masked) {
          if (column in copy) {
            copy[column] = MASK_TOKEN;
          }
        }
        return copy;
      }),
    };
  }
}

// =============================================================================
// SELECT List
// =============================================================================

/**
 * Alias → lowercased column names read by its expression, for the outermost
 * SELECT list. `COUNT(...)` reads no column values.
 */
export function selectListAliases(sql: string): Map<string, string[]> {
  const tokens = significantTokens(sql);
  const aliases = new Map<string, string[]>();

  const start = tokens.findIndex((token) => token.depth === 0 && isKeyword(token, 'SELECT'));
  if (start === -1) {
    return aliases;
  }
  let end = tokens.findIndex((token, index) => index > start && token.depth === 0 && isKeyword(token, 'FROM'));
  if (end === -1) {
    end = tokens.length;
  }

  for (const item of splitItems(tokens.slice(start + 1, end))) {
    const parsed = parseItem(item);
    if (parsed !== null) {
      aliases.set(parsed.alias, parsed.sources);
    }
  }
  return aliases;
}

function splitItems(tokens: SqlToken[]): SqlToken[][] {
  const items: SqlToken[][] = [[]];
  for (const token of tokens) {
    if (token.depth === 0 && token.type === 'punct' && token.value === ',') {
      items.push([]);
      continue;
    }
    items[items.length - 1]?.push(token);
  }
  return items;
}

function isName(token: SqlToken | undefined): token is SqlToken {
  return token !== undefined && (token.type === 'word' || token.type === 'identifier');
}

function parseItem(item: SqlToken[]): { alias: string; sources: string[] } | null {
  const tokens = isKeyword(item[0], 'DISTINCT') || isKeyword(item[0], 'ALL') ? item.slice(1) : item;
  const last = tokens[tokens.length - 1];
  if (!isName(last) || tokens.length < 2) {
    return null;
  }

  let expression: SqlToken[];
  if (isKeyword(tokens[tokens.length - 2], 'AS')) {
    expression = tokens.slice(0, -2);
  } else if (isColumnReference(tokens.slice(0, -1))) {
    // `m.first_name fn`
    expression = tokens.slice(0, -1);
  } else {
    return null;
  }

  const counts = isKeyword(expression[0], 'COUNT') && expression[1]?.value === '(';
  return {
    alias: last.value.toLowerCase(),
    sources: counts ? [] : expression.filter(isName).map((token) => token.value.toLowerCase()),
  };
}

/** `column`, `table.column` or `database.table.column` */
function isColumnReference(tokens: SqlToken[]): boolean {
  if (tokens.length === 0 || tokens.length % 2 === 0) {
    return false;
  }
  return tokens.every((token, index) =>
    index % 2 === 0 ? isName(token) : token.type === 'punct' && token.value === '.'
  );
}
