/**
 * Querywise - Execution Engine Tests
 */

import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';

import { ExecutionEngine, uniqueColumnNames } from '../../src/nl-query/executor.js';
import {
  ExecutionError,
  ExecutionTimeoutError,
  RequestCancelledError,
  type DatabasesConfig,
} from '../../src/utils/types.js';
import { createCrewDatabases, createTempDir, removeTempDir } from '../helpers/fixtures.js';

const COUNT_TO_30 = 'WITH RECURSIVE n(x) AS (SELECT 1 UNION ALL SELECT x + 1 FROM n WHERE x < 30) SELECT x FROM n';

// One native step that runs far longer than the deadlines below
const SLOW_COUNT =
  'SELECT count(*) AS n FROM (WITH RECURSIVE c(x) AS (SELECT 1 UNION ALL SELECT x + 1 FROM c WHERE x < 3000000) SELECT x FROM c)';

describe('ExecutionEngine', () => {
  let dir: string;
  let config: DatabasesConfig;
  let engine: ExecutionEngine;

  beforeAll(() => {
    dir = createTempDir();
    config = createCrewDatabases(dir);
    engine = new ExecutionEngine(config);
  });

  afterAll(() => {
    removeTempDir(dir);
  });

  it('queries a table through its database alias', async () => {
    const result = await engine.execute(
      "SELECT employee_id, first_name FROM crew_management.crew_members WHERE crew_role = 'Captain' AND base_airport = 'DFW' ORDER BY employee_id",
      { timeoutMs: 5000, rowCap: 100 }
    );

    expect(result.columns).toEqual(['employee_id', 'first_name']);
    expect(result.rows).toEqual([
      { employee_id: 'AA-10001', first_name: 'Avery' },
      { employee_id: 'AA-10002', first_name: 'Jordan' },
    ]);
    expect(result.rowCount).toBe(2);
    expect(result.truncated).toBe(false);
  });

  it('joins tables that live in different database files', async () => {
    const result = await engine.execute(
      'SELECT m.last_name, f.flight_number FROM crew_management.crew_members m ' +
        'JOIN crew_management.crew_assignments a ON a.employee_id = m.employee_id ' +
        'JOIN flight_operations.flights f ON f.flight_id = a.flight_id ' +
        "WHERE f.origin = 'DFW' ORDER BY m.last_name",
      { timeoutMs: 5000, rowCap: 100 }
    );

    expect(result.rows).toEqual([
      { last_name: 'Garcia', flight_number: 'QW100' },
      { last_name: 'Lee', flight_number: 'QW100' },
    ]);
  });

  it('keeps both columns when a join returns the same name twice', async () => {
    const result = await engine.execute(
      'SELECT * FROM crew_management.crew_members m ' +
        'JOIN crew_management.crew_assignments a ON a.employee_id = m.employee_id ' +
        'WHERE a.flight_id = 2',
      { timeoutMs: 5000, rowCap: 100 }
    );

    expect(result.columns).toEqual([
      'employee_id',
      'first_name',
      'last_name',
      'crew_role',
      'base_airport',
      'update_time',
      'employee_id_2',
      'flight_id',
      'duty_role',
    ]);
    expect(result.rows).toEqual([
      {
        employee_id: 'AA-10004',
        first_name: 'Morgan',
        last_name: 'Nguyen',
        crew_role: 'Captain',
        base_airport: 'ORD',
        update_time: '2024-03-01 08:00:00',
        employee_id_2: 'AA-10004',
        flight_id: 2,
        duty_role: 'Captain',
      },
    ]);
  });

  it('truncates to the row cap and reports the true count', async () => {
    const result = await engine.execute(COUNT_TO_30, { timeoutMs: 5000, rowCap: 10 });

    expect(result.rows).toHaveLength(10);
    expect(result.rows[9]).toEqual({ x: 10 });
    expect(result.rowCount).toBe(30);
    expect(result.truncated).toBe(true);
  });

  it('does not mark a result that exactly fills the cap as truncated', async () => {
    const exact = await engine.execute(COUNT_TO_30, { timeoutMs: 5000, rowCap: 30 });
    const roomy = await engine.execute(COUNT_TO_30, { timeoutMs: 5000, rowCap: 50 });

    expect(exact.truncated).toBe(false);
    expect(exact.rows).toHaveLength(30);
    expect(roomy.truncated).toBe(false);
  });

  it('reports database errors as execution errors', async () => {
    await expect(
      engine.execute('SELECT role FROM crew_management.crew_members', { timeoutMs: 5000, rowCap: 10 })
    ).rejects.toThrow(new ExecutionError('no such column: role'));
  });

  it('refuses statements that return no rows', async () => {
    await expect(
      engine.execute("DELETE FROM crew_management.crew_members WHERE employee_id = 'AA-10001'", {
        timeoutMs: 5000,
        rowCap: 10,
      })
    ).rejects.toThrow(ExecutionError);

    const check = await engine.execute('SELECT COUNT(*) AS total FROM crew_management.crew_members', {
      timeoutMs: 5000,
      rowCap: 10,
    });
    expect(check.rows).toEqual([{ total: 5 }]);
  });

  it('does not start when the request is already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      engine.execute('SELECT 1', { timeoutMs: 5000, rowCap: 10, signal: controller.signal })
    ).rejects.toThrow(RequestCancelledError);
  });

  it('stops a statement that outlives its deadline without blocking the event loop', async () => {
    let ticks = 0;
    const interval = setInterval(() => {
      ticks += 1;
    }, 10);
    const startedAt = Date.now();

    try {
      await expect(engine.execute(SLOW_COUNT, { timeoutMs: 50, rowCap: 10 })).rejects.toThrow(
        new ExecutionTimeoutError(50)
      );
    } finally {
      clearInterval(interval);
    }

    expect(Date.now() - startedAt).toBeLessThan(1000);
    expect(ticks).toBeGreaterThan(0);
  });

  it('stops a running statement when the request is cancelled', async () => {
    const controller = new AbortController();
    const pending = engine.execute(SLOW_COUNT, { timeoutMs: 5000, rowCap: 10, signal: controller.signal });
    setTimeout(() => controller.abort(), 20);

    await expect(pending).rejects.toThrow(RequestCancelledError);
  });

  it('fails clearly when a database file is missing', async () => {
    const broken = new ExecutionEngine({
      ...config,
      attachments: [...config.attachments, { alias: 'hr_payroll', file: 'hr_payroll.db' }],
    });

    await expect(broken.execute('SELECT 1', { timeoutMs: 5000, rowCap: 10 })).rejects.toThrow(
      "Database file for alias 'hr_payroll' not found"
    );
    expect(broken.healthCheck()).toEqual({
      ok: false,
      aliases: [],
      error: "Database file for alias 'hr_payroll' not found",
    });
  });

  it('lists attached aliases in the health check', () => {
    expect(engine.healthCheck()).toEqual({ ok: true, aliases: ['crew_management', 'flight_operations'] });
    expect(engine.aliases()).toEqual(['crew_management', 'flight_operations']);
  });
});

describe('uniqueColumnNames', () => {
  it('numbers repeated names by occurrence', () => {
    expect(uniqueColumnNames(['id', 'name', 'id', 'id'])).toEqual(['id', 'name', 'id_2', 'id_3']);
  });

  it('skips a suffix that is already taken', () => {
    expect(uniqueColumnNames(['id', 'id_2', 'id'])).toEqual(['id', 'id_2', 'id_3']);
  });
});
