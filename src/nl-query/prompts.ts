/**
 * Querywise - Prompt Templates
 *
 * Every message list sent to the chat backend is built here.
 */

import type { ChatMessage } from '../llm/types.js';

import type { HistoryTurn } from './types.js';

export interface FewShotExample {
  question: string;
  sql: string;
}

export interface GenerationPromptInput {
  question: string;
  schemaText: string;
  databases: string[];
  joinKey: string;
  rowLimit: number;
  examples: FewShotExample[];
  history?: HistoryTurn[];
}

export interface CorrectionPromptInput {
  question: string;
  failedSql: string;
  error: string;
  schemaText: string;
  databases: string[];
  joinKey: string;
  rowLimit: number;
}

// =============================================================================
// Formatting
// =============================================================================

export function formatHistory(turns: readonly HistoryTurn[]): string {
  if (turns.length === 0) {
    return '(none)';
  }
  return turns
    .map((turn) => {
      const lines = [`User: ${turn.rewritten ?? turn.utterance}`];
      if (turn.sql) {
        lines.push(`SQL: ${turn.sql}`);
      }
      lines.push(`Assistant: ${turn.response}`);
      return lines.join('\n');
    })
    .join('\n\n');
}

function sqlRules(databases: string[], joinKey: string, rowLimit: number): string {
  const example = databases[0] ?? 'db_name';
  return `RULES:
1. Generate exactly one SQLite SELECT statement. Never INSERT, UPDATE, DELETE, DROP, ATTACH, PRAGMA or any other statement.
2. Several databases are attached to one connection. ALWAYS qualify tables as database.table (e.g. ${example}.table_name). Available databases: ${databases.join(', ') || '(none)'}.
3. Cross-database JOINs are supported. Join tables from different databases on the shared key column ${joinKey}.
4. Every statement must end with LIMIT ${rowLimit} unless the question asks for fewer rows.
5. Only use tables and columns that appear in the schema below. Do not invent names.
6. Use LIKE with % for partial text matching and SQLite date functions (date(), strftime()) for dates.
7. Use meaningful column aliases for computed values.`;
}

// =============================================================================
// Intent Classification
// =============================================================================

export function buildClassificationMessages(utterance: string, history: readonly HistoryTurn[]): ChatMessage[] {
  return [
    {
      role: 'system',
      content: `You classify messages sent to a database question-answering assistant.

Intents:
- DATA: the user wants information that must be looked up in the databases
- GENERAL: greetings, thanks, small talk or questions unrelated to the data
- CLARIFICATION: the message is too vague to tell which of the two it is

Respond with JSON only:
{"intent": "DATA" | "GENERAL" | "CLARIFICATION", "confidence": 0.0-1.0, "entities": ["..."], "clarification": "question to ask the user, or null"}`,
    },
    {
      role: 'user',
      content: `Conversation history:\n${formatHistory(history)}\n\nMessage: ${utterance}`,
    },
  ];
}

// =============================================================================
// Query Rewriting
// =============================================================================

export function buildRewriteMessages(utterance: string, history: readonly HistoryTurn[]): ChatMessage[] {
  return [
    {
      role: 'system',
      content:
        'You rewrite follow-up questions into standalone questions. Resolve pronouns and references ' +
        'using the conversation. Output only the rewritten question, nothing else.',
    },
    {
      role: 'user',
      content: `Conversation history:\n${formatHistory(history)}\n\nFollow-up question: ${utterance}`,
    },
  ];
}

// =============================================================================
// SQL Generation
// =============================================================================

export function buildGenerationMessages(input: GenerationPromptInput): ChatMessage[] {
  const examples = input.examples
    .map((example) => `Question: ${example.question}\nSQL: ${example.sql}`)
    .join('\n\n');

  let system = `You are a SQL expert. Translate the user's question into a SQLite query.

${sqlRules(input.databases, input.joinKey, input.rowLimit)}

SCHEMA:
${input.schemaText}`;

  if (examples) {
    system += `\n\nEXAMPLES:\n${examples}`;
  }

  system += `

RESPONSE FORMAT:
Respond ONLY with JSON:
{"intent": "data", "sql": "SELECT ...", "explanation": "one sentence"}
If the question cannot be answered without more detail, respond with:
{"intent": "ambiguous", "clarification": "the question to ask the user"}`;

  const messages: ChatMessage[] = [{ role: 'system', content: system }];
  if (input.history && input.history.length > 0) {
    messages.push({
      role: 'user',
      content:
        `Previous conversation (use only to resolve references):\n${formatHistory(input.history)}\n\n` +
        `Current question: ${input.question}`,
    });
  } else {
    messages.push({ role: 'user', content: `Question: ${input.question}` });
  }
  return messages;
}

export function buildCorrectionMessages(input: CorrectionPromptInput): ChatMessage[] {
  return [
    {
      role: 'system',
      content: `The SQL query below failed. Write a corrected query.

${sqlRules(input.databases, input.joinKey, input.rowLimit)}

If the error mentions "no such table", check the database.table qualification.
If the error mentions "no such column", use the exact column names from the schema.
The corrected query must differ from the failed one.

SCHEMA:
${input.schemaText}

Respond ONLY with the corrected SQL, no explanation.`,
    },
    {
      role: 'user',
      content: `Original question: ${input.question}\n\nFailed SQL:\n${input.failedSql}\n\nError message: ${input.error}`,
    },
  ];
}

// =============================================================================
// Summaries & General Chat
// =============================================================================

export interface SummaryPromptInput {
  question: string;
  sql: string;
  rowsJson: string;
  shown: number;
  total: number;
}

export function buildSummaryMessages(input: SummaryPromptInput): ChatMessage[] {
  const partial = input.shown < input.total;
  const countNote = partial
    ? `Only ${input.shown} of ${input.total} rows are shown below. Say "showing ${input.shown} of ${input.total}" in your answer and do not imply the list is complete.`
    : `All ${input.total} rows are shown below.`;

  return [
    {
      role: 'system',
      content: `You summarize database query results for the user.

Answer the question directly in 2-5 sentences, grouping repeated values and adding a short list when it helps.
Format numbers and dates readably. ${countNote}

After the summary add up to 3 follow-up questions, each on its own line prefixed with "SUGGESTION:".`,
    },
    {
      role: 'user',
      content: `Question: ${input.question}\n\nSQL:\n${input.sql}\n\nTotal rows: ${input.total}\n\nRows (JSON):\n${input.rowsJson}`,
    },
  ];
}

export function buildGeneralMessages(utterance: string, history: readonly HistoryTurn[]): ChatMessage[] {
  return [
    {
      role: 'system',
      content:
        'You are a friendly assistant in front of a set of databases. Reply briefly and professionally. ' +
        'If the user seems to want data, suggest asking a specific question about it.',
    },
    {
      role: 'user',
      content: `Conversation history:\n${formatHistory(history)}\n\nMessage: ${utterance}`,
    },
  ];
}
