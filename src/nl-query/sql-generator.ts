/**
 * Querywise - SQL Generator
 *
 * Turns a question and a schema subset into one candidate SELECT statement.
 * The generator never retries; the correction loop drives repeated calls
 * with the execution error.
 */

import { readFileSync } from 'fs';

import { z } from 'zod';

import { extractJson } from '../llm/client.js';
import type { LanguageModel } from '../llm/types.js';
import logger from '../utils/logger.js';

import {
  buildCorrectionMessages,
  buildGenerationMessages,
  type FewShotExample,
} from './prompts.js';
import type { HistoryTurn } from './types.js';

// =============================================================================
// Configuration
// =============================================================================

export interface SQLGeneratorConfig {
  /**
   * Row cap the prompt asks every statement to carry
   */
  rowLimit: number;

  /**
   * Column shared by tables across databases
   */
  joinKey: string;

  /**
   * Temperature for generation
   */
  temperature: number;

  examples: FewShotExample[];
}

export const DEFAULT_SQL_GENERATOR_CONFIG: SQLGeneratorConfig = {
  rowLimit: 100,
  joinKey: 'employee_id',
  temperature: 0.1,
  examples: [],
};

export interface GenerationContext {
  schemaText: string;
  databases: string[];
  history?: HistoryTurn[];
  signal?: AbortSignal;
}

export type GenerationOutcome =
  | { kind: 'sql'; sql: string; explanation: string }
  | { kind: 'clarification'; clarification: string };

const GeneratorReplySchema = z.object({
  intent: z.enum(['data', 'ambiguous']).catch('data'),
  sql: z.string().nullish(),
  explanation: z.string().nullish(),
  clarification: z.string().nullish(),
});

const FewShotFileSchema = z.array(
  z.object({
    question: z.string().min(1),
    sql: z.string().min(1),
  })
);

// =============================================================================
// SQL Generator Class
// =============================================================================

export class SQLGenerator {
  private llm: LanguageModel;
  private config: SQLGeneratorConfig;

  constructor(llm: LanguageModel, config: Partial<SQLGeneratorConfig> = {}) {
    this.llm = llm;
    this.config = { ...DEFAULT_SQL_GENERATOR_CONFIG, ...config };
  }

  /**
   * Generate SQL from a natural language question. A reply that is neither
   * JSON nor clarification is passed on as SQL so that the validator reports
   * what is wrong with it.
   */
  async generate(question: string, context: GenerationContext): Promise<GenerationOutcome> {
    const messages = buildGenerationMessages({
      question,
      schemaText: context.schemaText,
      databases: context.databases,
      joinKey: this.config.joinKey,
      rowLimit: this.config.rowLimit,
      examples: this.config.examples,
      history: context.history,
    });

    const reply = await this.llm.chat(messages, {
      temperature: this.config.temperature,
      jsonMode: true,
      signal: context.signal,
    });

    const parsed = GeneratorReplySchema.safeParse(extractJson(reply));
    if (!parsed.success) {
      logger.debug('Generator reply was not JSON; treating it as SQL');
      return { kind: 'sql', sql: cleanSql(reply), explanation: '' };
    }

    const { intent, sql, explanation, clarification } = parsed.data;
    if (intent === 'ambiguous' && clarification) {
      return { kind: 'clarification', clarification };
    }

    return { kind: 'sql', sql: cleanSql(sql ?? ''), explanation: explanation ?? '' };
  }

  /**
   * Ask for a corrected statement given the failed SQL and its error
   */
  async correct(
    question: string,
    failedSql: string,
    error: string,
    context: GenerationContext
  ): Promise<string> {
    const messages = buildCorrectionMessages({
      question,
      failedSql,
      error,
      schemaText: context.schemaText,
      databases: context.databases,
      joinKey: this.config.joinKey,
      rowLimit: this.config.rowLimit,
    });

    const reply = await this.llm.chat(messages, {
      temperature: this.config.temperature,
      signal: context.signal,
    });

    // Some models answer in the generation JSON shape anyway
    const parsed = GeneratorReplySchema.safeParse(extractJson(reply));
    if (parsed.success && parsed.data.sql) {
      return cleanSql(parsed.data.sql);
    }
    return cleanSql(reply);
  }
}

// =============================================================================
// Cleaning
// =============================================================================

/**
 * Strip markdown fences, trailing semicolons and vendor schema qualifiers
 * (`db.public.table`, `db.dbo.table`) from model output
 */
export function cleanSql(raw: string): string {
  let sql = raw.trim();

  const fenced = sql.match(/```(?:sql)?\s*([\s\S]*?)```/i);
  if (fenced?.[1] !== undefined) {
    sql = fenced[1].trim();
  }

  sql = sql.replace(/\b(\w+)\.(?:public|dbo)\.(\w+)\b/gi, '$1.$2');
  return sql.replace(/[;\s]+$/, '');
}

/**
 * Read few-shot examples; a missing file yields none
 */
export function loadFewShotExamples(filePath: string): FewShotExample[] {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    logger.warn('Few-shot example file not readable; generating without examples', {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    return [];
  }

  const parsed = FewShotFileSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn('Few-shot example file is invalid; generating without examples', { path: filePath });
    return [];
  }
  return parsed.data;
}
