/**
 * Querywise - Query Validator Tests
 */

import { describe, it, expect } from '@jest/globals';

import { CatalogSnapshot } from '../../src/catalog/snapshot.js';
import { CatalogFileSchema, toEntries } from '../../src/catalog/loader.js';
import {
  ensureRowLimit,
  hasTopLevelLimit,
  normalizeStatement,
  significantTokens,
  tokenizeSql,
} from '../../src/nl-query/sql-tokenizer.js';
import { QueryValidator, extractTableReferences } from '../../src/nl-query/validator.js';
import { ValidationRejectedError } from '../../src/utils/types.js';
import { TEST_CATALOG } from '../helpers/fixtures.js';

function testSnapshot(): CatalogSnapshot {
  const { entries, databases } = toEntries(CatalogFileSchema.parse(TEST_CATALOG));
  return new CatalogSnapshot(entries, databases, 'test-version');
}

describe('SQL tokenizer', () => {
  it('keeps keywords inside strings and comments out of the word stream', () => {
    const tokens = tokenizeSql("SELECT 'DROP TABLE x' -- delete me\nFROM t");

    expect(tokens.map((token) => token.type)).toEqual(['word', 'string', 'comment', 'word', 'word']);
    expect(tokens[1]?.value).toBe("'DROP TABLE x'");
  });

  it('reads quoted identifiers without their quotes', () => {
    const tokens = tokenizeSql('SELECT "update" , [delete] FROM t');

    expect(tokens[1]).toMatchObject({ type: 'identifier', value: 'update' });
    expect(tokens[3]).toMatchObject({ type: 'identifier', value: 'delete' });
  });

  it('handles doubled quotes inside string literals', () => {
    const tokens = tokenizeSql("SELECT 'O''Hare' FROM t");

    expect(tokens[1]).toMatchObject({ type: 'string', value: "'O''Hare'" });
    expect(tokens[2]).toMatchObject({ type: 'word', value: 'FROM' });
  });

  it('tracks parenthesis depth', () => {
    const tokens = tokenizeSql('SELECT (SELECT 1 LIMIT 1)');
    const limit = tokens.find((token) => token.value === 'LIMIT');

    expect(limit?.depth).toBe(1);
    expect(hasTopLevelLimit('SELECT (SELECT 1 LIMIT 1)')).toBe(false);
  });
});

describe('normalizeStatement', () => {
  it('ignores keyword case, spacing, comments and the trailing semicolon', () => {
    expect(normalizeStatement('SELECT employee_id,  role\nFROM crew_management.crew_members; -- retry')).toBe(
      normalizeStatement('select employee_id, role from crew_management.crew_members')
    );
  });

  it('keeps the case of string literals', () => {
    const lower = normalizeStatement("SELECT * FROM crew_management.crew_members WHERE crew_role = 'captain'");
    const upper = normalizeStatement("SELECT * FROM crew_management.crew_members WHERE crew_role = 'Captain'");

    expect(lower).not.toBe(upper);
    expect(upper).toBe("select * from crew_management . crew_members where crew_role = 'Captain'");
  });

  it('does not mistake a quoted identifier for separate words', () => {
    expect(normalizeStatement('SELECT "Crew Role" FROM t')).toBe('select "crew role" from t');
    expect(normalizeStatement('SELECT crew role FROM t')).toBe('select crew role from t');
  });
});

describe('ensureRowLimit', () => {
  it('appends a limit and drops the trailing semicolon', () => {
    expect(ensureRowLimit('SELECT * FROM t;', 100)).toBe('SELECT * FROM t LIMIT 100');
  });

  it('leaves a statement that already has a top-level limit', () => {
    expect(ensureRowLimit('SELECT * FROM t LIMIT 5', 100)).toBe('SELECT * FROM t LIMIT 5');
  });

  it('still caps a statement whose only limit is in a subquery', () => {
    expect(ensureRowLimit('SELECT * FROM (SELECT * FROM t LIMIT 5) s', 100)).toBe(
      'SELECT * FROM (SELECT * FROM t LIMIT 5) s LIMIT 100'
    );
  });

  it('starts a new line after a trailing line comment', () => {
    expect(ensureRowLimit('SELECT 1 -- one', 10)).toBe('SELECT 1 -- one\nLIMIT 10');
  });
});

describe('QueryValidator', () => {
  const validator = new QueryValidator();
  const snapshot = testSnapshot();

  it('accepts a column whose name contains a deny-listed word', () => {
    const result = validator.validate(
      "SELECT employee_id, update_time FROM crew_management.crew_members WHERE update_time > '2024-01-01'",
      snapshot
    );

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
  });

  it('rejects a standalone deny-listed keyword', () => {
    const result = validator.validate('SELECT * INTO backup FROM crew_management.crew_members', snapshot);

    expect(result.valid).toBe(false);
    expect(result.rule).toBe('deny-list');
    expect(result.errors).toEqual(['Forbidden keyword: INTO']);
  });

  it('ignores deny-listed words in literals, comments and quoted identifiers', () => {
    expect(validator.validate("SELECT * FROM crew_management.crew_members WHERE crew_role = 'DROP'").valid).toBe(true);
    expect(validator.validate('SELECT 1 -- DELETE everything').valid).toBe(true);
    expect(validator.validate('SELECT "update" FROM crew_management.crew_members').valid).toBe(true);
  });

  it('rejects statements that do not start with SELECT', () => {
    const result = validator.validate('DELETE FROM crew_management.crew_members');

    expect(result.rule).toBe('read-only');
    expect(result.errors).toEqual(['Only SELECT queries are allowed']);
  });

  it('rejects a second statement', () => {
    const result = validator.validate('SELECT 1; DROP TABLE crew_management.crew_members');

    expect(result.rule).toBe('single-statement');
  });

  it('rejects an empty or comment-only query', () => {
    expect(validator.validate('   ').rule).toBe('empty');
    expect(validator.validate('-- nothing').rule).toBe('empty');
  });

  it('rejects an overly long query', () => {
    const short = new QueryValidator({ maxQueryLength: 20 });

    expect(short.validate('SELECT employee_id FROM crew_management.crew_members').rule).toBe('max-length');
  });

  it('rejects unknown database qualifiers and tables', () => {
    expect(validator.validate('SELECT * FROM payroll.crew_members', snapshot).errors).toEqual([
      "Unknown database 'payroll' in 'payroll.crew_members'; use one of: crew_management, flight_operations",
    ]);
    expect(validator.validate('SELECT * FROM crew_management.pilots', snapshot).errors).toEqual([
      "Unknown table 'crew_management.pilots'",
    ]);
  });

  it('checks every table of a cross-database join', () => {
    const sql =
      'SELECT m.first_name, f.flight_number FROM crew_management.crew_members m ' +
      'JOIN crew_management.crew_assignments a ON a.employee_id = m.employee_id ' +
      'JOIN flight_operations.flights f ON f.flight_id = a.flight_id';

    expect(validator.validate(sql, snapshot).valid).toBe(true);
    expect(validator.validate(sql.replace('flight_operations.flights', 'flight_ops.flights'), snapshot).rule).toBe(
      'unknown-qualifier'
    );
  });

  it('does not treat FROM inside a function call as a table list', () => {
    const references = extractTableReferences(
      significantTokens('SELECT SUBSTRING(last_name FROM 2) FROM crew_management.crew_members')
    );

    expect(references.map((reference) => reference.parts.join('.'))).toEqual(['crew_management.crew_members']);
  });

  it('warns about a missing LIMIT and strips the trailing semicolon', () => {
    const result = validator.validate('SELECT employee_id FROM crew_management.crew_members;', snapshot);

    expect(result.warnings).toEqual(['No LIMIT clause']);
    expect(result.sanitizedSQL).toBe('SELECT employee_id FROM crew_management.crew_members');
  });

  it('throws a typed rejection from assertValid', () => {
    expect(() => validator.assertValid('UPDATE crew_management.crew_members SET crew_role = 1')).toThrow(
      ValidationRejectedError
    );

    let rejection: unknown = null;
    try {
      validator.assertValid('SELECT * FROM crew_management.crew_members; VACUUM');
    } catch (error) {
      rejection = error;
    }
    expect(rejection).toBeInstanceOf(ValidationRejectedError);
    expect(rejection instanceof ValidationRejectedError ? rejection.rule : null).toBe('single-statement');
  });
});
