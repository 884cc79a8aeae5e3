/**
 * Querywise - Query Rewriter Tests
 */

import { describe, it, expect } from '@jest/globals';

import { loadIntentPatterns } from '../../src/nl-query/patterns.js';
import { QueryRewriter, cleanRewrite } from '../../src/nl-query/query-rewriter.js';
import type { HistoryTurn } from '../../src/nl-query/types.js';
import { RequestCancelledError } from '../../src/utils/types.js';
import { FakeLanguageModel } from '../helpers/fake-llm.js';
import { PATTERNS_PATH } from '../helpers/fixtures.js';

const { referentialMarkers } = loadIntentPatterns(PATTERNS_PATH);

const HISTORY: HistoryTurn[] = [
  {
    utterance: 'Show me the captains based in Dallas',
    rewritten: null,
    response: 'There are 2 captains based in Dallas.',
    sql: "SELECT employee_id FROM crew_management.crew_members WHERE crew_role = 'Captain' AND base_airport = 'DFW'",
  },
];

describe('QueryRewriter', () => {
  it('leaves the first message of a conversation alone', async () => {
    const llm = new FakeLanguageModel();
    const rewriter = new QueryRewriter(llm, referentialMarkers);

    const result = await rewriter.rewrite('What about their salaries?', []);

    expect(result).toEqual({ text: 'What about their salaries?', rewritten: false });
    expect(llm.calls).toHaveLength(0);
  });

  it('leaves a self-contained follow-up alone', async () => {
    const llm = new FakeLanguageModel();
    const rewriter = new QueryRewriter(llm, referentialMarkers);

    const result = await rewriter.rewrite('Show flights to Miami', HISTORY);

    expect(result.rewritten).toBe(false);
    expect(llm.calls).toHaveLength(0);
  });

  it('rewrites a follow-up that refers to earlier turns', async () => {
    const llm = new FakeLanguageModel().script(
      'rewrite',
      'Rewritten question: "What are the salaries of the captains based in Dallas?"'
    );
    const rewriter = new QueryRewriter(llm, referentialMarkers);

    const result = await rewriter.rewrite('What about their salaries?', HISTORY);

    expect(result).toEqual({ text: 'What are the salaries of the captains based in Dallas?', rewritten: true });
    expect(llm.callsOf('rewrite')[0]?.messages[1]?.content).toContain(
      'Follow-up question: What about their salaries?'
    );
  });

  it('falls back to the original when the model fails', async () => {
    const llm = new FakeLanguageModel().script('rewrite', new Error('connection reset'));
    const rewriter = new QueryRewriter(llm, referentialMarkers);

    await expect(rewriter.rewrite('And for those in Chicago?', HISTORY)).resolves.toEqual({
      text: 'And for those in Chicago?',
      rewritten: false,
    });
  });

  it('propagates cancellation', async () => {
    const llm = new FakeLanguageModel().script('rewrite', new RequestCancelledError());
    const rewriter = new QueryRewriter(llm, referentialMarkers);

    await expect(rewriter.rewrite('What about them?', HISTORY)).rejects.toThrow(RequestCancelledError);
  });
});

describe('cleanRewrite', () => {
  it('keeps the first non-empty line without labels or quotes', () => {
    expect(cleanRewrite('\n  Standalone question: `Which flights left DFW?`\nExplanation: resolved "it"')).toBe(
      'Which flights left DFW?'
    );
  });
});
