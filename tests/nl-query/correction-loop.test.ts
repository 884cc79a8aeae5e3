/**
 * Querywise - Correction Loop Tests
 */

import { jest, describe, it, expect, beforeAll, afterAll, afterEach } from '@jest/globals';

import { CatalogFileSchema, toEntries } from '../../src/catalog/loader.js';
import { CatalogSnapshot } from '../../src/catalog/snapshot.js';
import { CorrectionLoop } from '../../src/nl-query/correction-loop.js';
import { ExecutionEngine } from '../../src/nl-query/executor.js';
import { SQLGenerator, type GenerationContext } from '../../src/nl-query/sql-generator.js';
import { ensureRowLimit } from '../../src/nl-query/sql-tokenizer.js';
import { QueryValidator } from '../../src/nl-query/validator.js';
import logger from '../../src/utils/logger.js';
import {
  BackendUnavailableError,
  ExecutionTimeoutError,
  RequestCancelledError,
} from '../../src/utils/types.js';
import { FakeLanguageModel } from '../helpers/fake-llm.js';
import { TEST_CATALOG, createCrewDatabases, createTempDir, removeTempDir } from '../helpers/fixtures.js';

const QUESTION = 'Which crew members are captains?';
const BAD_COLUMN = 'SELECT employee_id, role FROM crew_management.crew_members';
const GOOD_SQL = "SELECT employee_id FROM crew_management.crew_members WHERE crew_role = 'Captain' ORDER BY employee_id";

describe('CorrectionLoop', () => {
  let dir: string;
  let executor: ExecutionEngine;
  let snapshot: CatalogSnapshot;
  let context: GenerationContext;

  beforeAll(() => {
    dir = createTempDir();
    executor = new ExecutionEngine(createCrewDatabases(dir));
    const { entries, databases } = toEntries(CatalogFileSchema.parse(TEST_CATALOG));
    snapshot = new CatalogSnapshot(entries, databases, 'test-version');
    context = { schemaText: snapshot.schemaText, databases: snapshot.databaseNames() };
  });

  afterAll(() => {
    removeTempDir(dir);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function createLoop(llm: FakeLanguageModel, maxAttempts = 3): CorrectionLoop {
    return new CorrectionLoop(new SQLGenerator(llm), new QueryValidator(), executor, {
      maxAttempts,
      executionTimeoutMs: 5000,
      rowCap: 100,
    });
  }

  it('succeeds on the first attempt without asking for a correction', async () => {
    const llm = new FakeLanguageModel();

    const outcome = await createLoop(llm).run({ question: QUESTION, initialSql: GOOD_SQL, context, catalog: snapshot });

    expect(outcome.state).toBe('SUCCEEDED');
    expect(outcome.attempts).toHaveLength(1);
    expect(llm.calls).toHaveLength(0);
  });

  it('feeds an unknown-column error back and succeeds with a different statement', async () => {
    const llm = new FakeLanguageModel().script('correct', GOOD_SQL);
    const info = jest.spyOn(logger, 'info');

    const outcome = await createLoop(llm).run({
      question: QUESTION,
      initialSql: BAD_COLUMN,
      context,
      catalog: snapshot,
      requestId: 'req-1',
    });

    expect(outcome.state).toBe('SUCCEEDED');
    expect(outcome.attempts.map((attempt) => attempt.sql)).toEqual([BAD_COLUMN, GOOD_SQL]);
    expect(outcome.attempts[0]?.error).toBe('no such column: role');
    expect(outcome.attempts[1]?.error).toBeNull();
    if (outcome.state === 'SUCCEEDED') {
      expect(outcome.result.rows).toEqual([
        { employee_id: 'AA-10001' },
        { employee_id: 'AA-10002' },
        { employee_id: 'AA-10004' },
      ]);
    }

    const correction = llm.callsOf('correct')[0];
    expect(correction?.messages[1]?.content).toBe(
      `Original question: ${QUESTION}\n\nFailed SQL:\n${BAD_COLUMN}\n\nError message: no such column: role`
    );
    expect(info).toHaveBeenCalledWith('Correction loop finished', {
      requestId: 'req-1',
      state: 'SUCCEEDED',
      attempts: 2,
    });
  });

  it('never runs more than the configured number of attempts', async () => {
    const llm = new FakeLanguageModel().script(
      'correct',
      'SELECT role2 FROM crew_management.crew_members',
      'SELECT role3 FROM crew_management.crew_members',
      'SELECT role4 FROM crew_management.crew_members'
    );

    const outcome = await createLoop(llm).run({ question: QUESTION, initialSql: BAD_COLUMN, context, catalog: snapshot });

    expect(outcome.state).toBe('EXHAUSTED');
    expect(outcome.attempts).toHaveLength(3);
    expect(llm.callsOf('correct')).toHaveLength(2);
    if (outcome.state === 'EXHAUSTED') {
      expect(outcome.reason).toBe('max-attempts');
      expect(outcome.lastSql).toBe('SELECT role3 FROM crew_management.crew_members');
      expect(outcome.lastError).toBe('no such column: role3');
    }
  });

  it('asks for no correction when only one attempt is allowed', async () => {
    const llm = new FakeLanguageModel();

    const outcome = await createLoop(llm, 1).run({ question: QUESTION, initialSql: BAD_COLUMN, context });

    expect(outcome.state).toBe('EXHAUSTED');
    expect(outcome.attempts).toHaveLength(1);
    expect(llm.calls).toHaveLength(0);
  });

  it('stops when the correction repeats a statement that already failed', async () => {
    const llm = new FakeLanguageModel().script(
      'correct',
      'select employee_id,  role\nFROM crew_management.crew_members;'
    );

    const outcome = await createLoop(llm).run({ question: QUESTION, initialSql: BAD_COLUMN, context });

    expect(outcome.state).toBe('EXHAUSTED');
    expect(outcome.attempts).toHaveLength(1);
    if (outcome.state === 'EXHAUSTED') {
      expect(outcome.reason).toBe('duplicate-sql');
    }
  });

  it('retries a statement that differs from a failed one only in a literal', async () => {
    const lowerCase = "SELECT role FROM crew_management.crew_members WHERE crew_role = 'captain'";
    const titleCase = "SELECT role FROM crew_management.crew_members WHERE crew_role = 'Captain'";
    const llm = new FakeLanguageModel().script('correct', titleCase);

    const outcome = await createLoop(llm, 2).run({ question: QUESTION, initialSql: lowerCase, context });

    expect(outcome.state).toBe('EXHAUSTED');
    expect(outcome.attempts.map((attempt) => attempt.sql)).toEqual([lowerCase, titleCase]);
    if (outcome.state === 'EXHAUSTED') {
      expect(outcome.reason).toBe('max-attempts');
    }
  });

  it('feeds a timed-out statement back for a correction', async () => {
    const slow = "SELECT employee_id FROM crew_management.crew_members WHERE crew_role LIKE '%Captain%'";
    const llm = new FakeLanguageModel().script('correct', GOOD_SQL);
    const execute = jest.spyOn(executor, 'execute').mockRejectedValueOnce(new ExecutionTimeoutError(100));

    const outcome = await createLoop(llm).run({ question: QUESTION, initialSql: slow, context, catalog: snapshot });

    expect(outcome.state).toBe('SUCCEEDED');
    expect(execute).toHaveBeenCalledTimes(2);
    expect(outcome.attempts[0]?.error).toBe('Query exceeded the 100ms execution timeout');
    expect(llm.callsOf('correct')[0]?.messages[1]?.content).toBe(
      `Original question: ${QUESTION}\n\nFailed SQL:\n${slow}\n\nError message: Query exceeded the 100ms execution timeout`
    );
  });

  it('treats a validation rejection as a correctable failure', async () => {
    const llm = new FakeLanguageModel().script('correct', GOOD_SQL);

    const outcome = await createLoop(llm).run({
      question: QUESTION,
      initialSql: 'DELETE FROM crew_management.crew_members',
      context,
      catalog: snapshot,
    });

    expect(outcome.state).toBe('SUCCEEDED');
    expect(outcome.attempts[0]?.error).toBe('Only SELECT queries are allowed');
  });

  it('runs the prepared form of each candidate', async () => {
    const llm = new FakeLanguageModel();

    const outcome = await createLoop(llm).run({
      question: QUESTION,
      initialSql: GOOD_SQL,
      context,
      prepare: (sql) => ensureRowLimit(sql, 1),
    });

    expect(outcome.state).toBe('SUCCEEDED');
    if (outcome.state === 'SUCCEEDED') {
      expect(outcome.sql).toBe(`${GOOD_SQL} LIMIT 1`);
      expect(outcome.result.rows).toEqual([{ employee_id: 'AA-10001' }]);
    }
  });

  it('stops at once when the request is cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      createLoop(new FakeLanguageModel()).run({
        question: QUESTION,
        initialSql: GOOD_SQL,
        context: { ...context, signal: controller.signal },
      })
    ).rejects.toThrow(RequestCancelledError);
  });

  it('propagates a backend outage during correction', async () => {
    const llm = new FakeLanguageModel().script(
      'correct',
      new BackendUnavailableError('chat', 'The chat backend is unavailable')
    );

    await expect(
      createLoop(llm).run({ question: QUESTION, initialSql: BAD_COLUMN, context })
    ).rejects.toThrow(BackendUnavailableError);
  });
});
