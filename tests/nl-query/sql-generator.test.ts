/**
 * Querywise - SQL Generator Tests
 */

import path from 'path';

import { describe, it, expect } from '@jest/globals';

import { SQLGenerator, cleanSql, loadFewShotExamples } from '../../src/nl-query/sql-generator.js';
import { FakeLanguageModel } from '../helpers/fake-llm.js';
import { sqlReply } from '../helpers/fixtures.js';

const CONTEXT = {
  schemaText: 'TABLE crew_management.crew_members\n  employee_id (TEXT, PK, NOT NULL)',
  databases: ['crew_management', 'flight_operations'],
};

describe('cleanSql', () => {
  it('strips fences, vendor schema qualifiers and trailing semicolons', () => {
    expect(cleanSql('```sql\nSELECT * FROM crew_management.public.crew_members;\n```')).toBe(
      'SELECT * FROM crew_management.crew_members'
    );
    expect(cleanSql('SELECT 1 FROM hr.dbo.payroll ;  ')).toBe('SELECT 1 FROM hr.payroll');
  });
});

describe('SQLGenerator', () => {
  it('returns the statement from a JSON reply', async () => {
    const llm = new FakeLanguageModel().script(
      'generate',
      sqlReply('SELECT employee_id FROM crew_management.crew_members;', 'Lists every employee.')
    );
    const generator = new SQLGenerator(llm, { rowLimit: 50 });

    const outcome = await generator.generate('List all employees', CONTEXT);

    expect(outcome).toEqual({
      kind: 'sql',
      sql: 'SELECT employee_id FROM crew_management.crew_members',
      explanation: 'Lists every employee.',
    });

    const call = llm.callsOf('generate')[0];
    expect(call?.options.jsonMode).toBe(true);
    expect(call?.messages[0]?.content).toContain('Available databases: crew_management, flight_operations.');
    expect(call?.messages[0]?.content).toContain('Every statement must end with LIMIT 50');
    expect(call?.messages[0]?.content).toContain(CONTEXT.schemaText);
    expect(call?.messages[1]?.content).toBe('Question: List all employees');
  });

  it('passes a clarification through', async () => {
    const llm = new FakeLanguageModel().script(
      'generate',
      '```json\n{"intent": "ambiguous", "clarification": "Which base do you mean?"}\n```'
    );

    const outcome = await new SQLGenerator(llm).generate('Show the crew at the base', CONTEXT);

    expect(outcome).toEqual({ kind: 'clarification', clarification: 'Which base do you mean?' });
  });

  it('treats a plain-text reply as SQL', async () => {
    const llm = new FakeLanguageModel().script('generate', 'SELECT COUNT(*) FROM crew_management.crew_members;');

    const outcome = await new SQLGenerator(llm).generate('How many crew members?', CONTEXT);

    expect(outcome).toEqual({ kind: 'sql', sql: 'SELECT COUNT(*) FROM crew_management.crew_members', explanation: '' });
  });

  it('includes history and few-shot examples in the prompt', async () => {
    const llm = new FakeLanguageModel().script('generate', sqlReply('SELECT 1'));
    const generator = new SQLGenerator(llm, {
      examples: [{ question: 'How many flights?', sql: 'SELECT COUNT(*) FROM flight_operations.flights' }],
    });

    await generator.generate('And for Chicago?', {
      ...CONTEXT,
      history: [{ utterance: 'Captains in Dallas?', rewritten: null, response: 'There are 2.', sql: null }],
    });

    const call = llm.callsOf('generate')[0];
    expect(call?.messages[0]?.content).toContain(
      'EXAMPLES:\nQuestion: How many flights?\nSQL: SELECT COUNT(*) FROM flight_operations.flights'
    );
    expect(call?.messages[1]?.content).toContain('Current question: And for Chicago?');
  });

  it('reads corrections in either reply shape', async () => {
    const llm = new FakeLanguageModel().script(
      'correct',
      '```sql\nSELECT crew_role FROM crew_management.crew_members\n```',
      sqlReply('SELECT base_airport FROM crew_management.crew_members')
    );
    const generator = new SQLGenerator(llm);

    await expect(generator.correct('q', 'SELECT role FROM t', 'no such column: role', CONTEXT)).resolves.toBe(
      'SELECT crew_role FROM crew_management.crew_members'
    );
    await expect(generator.correct('q', 'SELECT base FROM t', 'no such column: base', CONTEXT)).resolves.toBe(
      'SELECT base_airport FROM crew_management.crew_members'
    );
  });
});

describe('loadFewShotExamples', () => {
  it('reads the bundled examples', () => {
    const examples = loadFewShotExamples(path.resolve(__dirname, '../../data/few-shot-examples.json'));

    expect(examples.length).toBeGreaterThan(0);
    expect(examples.every((example) => example.sql.startsWith('SELECT'))).toBe(true);
  });

  it('returns no examples for a missing file', () => {
    expect(loadFewShotExamples(path.join(__dirname, 'missing.json'))).toEqual([]);
  });
});
