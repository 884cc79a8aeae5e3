/**
 * Querywise - SQL Tokenizer
 *
 * Splits SQL into words, literals, quoted identifiers and punctuation so
 * that keyword checks never look inside strings, comments or identifiers.
 */

export type SqlTokenType =
  | 'word'
  | 'identifier'
  | 'string'
  | 'number'
  | 'punct'
  | 'comment';

export interface SqlToken {
  type: SqlTokenType;
  /** Source text; for quoted identifiers the unquoted name */
  value: string;
  start: number;
  end: number;
  /** Parenthesis nesting depth at this token */
  depth: number;
}

const CLOSING_QUOTE: Record<string, string> = { '"': '"', '`': '`', '[': ']' };

export function tokenizeSql(sql: string): SqlToken[] {
  const tokens: SqlToken[] = [];
  const len = sql.length;
  let depth = 0;
  let i = 0;

  const push = (type: SqlTokenType, value: string, start: number, end: number): void => {
    tokens.push({ type, value, start, end, depth });
  };

  while (i < len) {
    const char = sql.charAt(i);
    const next = sql.charAt(i + 1);

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    // Line comment
    if (char === '-' && next === '-') {
      const start = i;
      while (i < len && sql.charAt(i) !== '\n') i++;
      push('comment', sql.slice(start, i), start, i);
      continue;
    }

    // Block comment (unterminated runs to the end)
    if (char === '/' && next === '*') {
      const start = i;
      const close = sql.indexOf('*/', i + 2);
      i = close === -1 ? len : close + 2;
      push('comment', sql.slice(start, i), start, i);
      continue;
    }

    // String literal with '' escapes
    if (char === "'") {
      const start = i;
      i++;
      while (i < len) {
        if (sql.charAt(i) === "'") {
          if (sql.charAt(i + 1) === "'") {
            i += 2;
            continue;
          }
          i++;
          break;
        }
        i++;
      }
      push('string', sql.slice(start, i), start, i);
      continue;
    }

    // Quoted identifier: "x", `x` or [x], doubled closer escapes
    const closer = CLOSING_QUOTE[char];
    if (closer !== undefined) {
      const start = i;
      let name = '';
      i++;
      while (i < len) {
        const c = sql.charAt(i);
        if (c === closer) {
          if (sql.charAt(i + 1) === closer) {
            name += closer;
            i += 2;
            continue;
          }
          i++;
          break;
        }
        name += c;
        i++;
      }
      push('identifier', name, start, i);
      continue;
    }

    if (/[0-9]/.test(char) || (char === '.' && /[0-9]/.test(next))) {
      const start = i;
      i++;
      while (i < len && /[0-9.eE]/.test(sql.charAt(i))) i++;
      push('number', sql.slice(start, i), start, i);
      continue;
    }

    if (/[A-Za-z_]/.test(char)) {
      const start = i;
      i++;
      while (i < len && /[A-Za-z0-9_$]/.test(sql.charAt(i))) i++;
      push('word', sql.slice(start, i), start, i);
      continue;
    }

    if (char === '(') {
      push('punct', char, i, i + 1);
      depth++;
      i++;
      continue;
    }

    if (char === ')') {
      depth = Math.max(0, depth - 1);
      push('punct', char, i, i + 1);
      i++;
      continue;
    }

    push('punct', char, i, i + 1);
    i++;
  }

  return tokens;
}

/** Tokens with comments removed */
export function significantTokens(sql: string): SqlToken[] {
  return tokenizeSql(sql).filter((token) => token.type !== 'comment');
}

export function isKeyword(token: SqlToken | undefined, keyword: string): boolean {
  return token !== undefined && token.type === 'word' && token.value.toUpperCase() === keyword;
}

/** Whether the statement has a LIMIT clause outside any subquery */
export function hasTopLevelLimit(sql: string): boolean {
  return significantTokens(sql).some((token) => token.depth === 0 && isKeyword(token, 'LIMIT'));
}

/**
 * Comparison key for two statements: comments, trailing semicolons and
 * spacing are ignored and everything except string literals is lowercased
 */
export function normalizeStatement(sql: string): string {
  const parts = significantTokens(sql).map((token) => {
    switch (token.type) {
      case 'string':
        return token.value;
      case 'identifier':
        return `"${token.value.toLowerCase().replace(/"/g, '""')}"`;
      default:
        return token.value.toLowerCase();
    }
  });
  while (parts[parts.length - 1] === ';') {
    parts.pop();
  }
  return parts.join(' ');
}

/**
 * Append `LIMIT n` unless the statement already caps its own result
 */
export function ensureRowLimit(sql: string, limit: number): string {
  const trimmed = sql.trim().replace(/;+\s*$/, '').trimEnd();
  if (hasTopLevelLimit(trimmed)) {
    return trimmed;
  }
  const tokens = tokenizeSql(trimmed);
  const last = tokens[tokens.length - 1];
  // A trailing line comment would swallow the appended clause
  const separator = last?.type === 'comment' && last.value.startsWith('--') ? '\n' : ' ';
  return `${trimmed}${separator}LIMIT ${limit}`;
}
