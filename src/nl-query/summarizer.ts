/**
 * Querywise - Result Summarizer
 *
 * Describes an execution result in natural language. Empty results are
 * answered with a fixed phrase and never reach the model; other results are
 * cut to a small sample with the true row count attached.
 */

import type { LanguageModel } from '../llm/types.js';
import logger from '../utils/logger.js';
import { BackendUnavailableError } from '../utils/types.js';

import { buildSummaryMessages } from './prompts.js';
import type { ExecutionResult } from './types.js';

export const NO_RESULTS_MESSAGE = 'No matching records were found for your question.';

export interface SummarizerConfig {
  /**
   * Rows placed in the prompt
   */
  rowCap: number;

  maxSuggestions: number;
}

export const DEFAULT_SUMMARIZER_CONFIG: SummarizerConfig = {
  rowCap: 20,
  maxSuggestions: 3,
};

export interface Summary {
  text: string;
  suggestions: string[];
  usedModel: boolean;
}

export class ResultSummarizer {
  private llm: LanguageModel;
  private config: SummarizerConfig;

  constructor(llm: LanguageModel, config: Partial<SummarizerConfig> = {}) {
    this.llm = llm;
    this.config = { ...DEFAULT_SUMMARIZER_CONFIG, ...config };
  }

  async summarize(
    question: string,
    sql: string,
    result: ExecutionResult,
    signal?: AbortSignal
  ): Promise<Summary> {
    if (result.rowCount === 0) {
      return { text: NO_RESULTS_MESSAGE, suggestions: [], usedModel: false };
    }

    const rows = result.rows.slice(0, this.config.rowCap);
    const shown = rows.length;
    const total = result.rowCount;

    let reply: string;
    try {
      reply = await this.llm.chat(
        buildSummaryMessages({
          question,
          sql,
          rowsJson: JSON.stringify(rows, null, 2),
          shown,
          total,
        }),
        { temperature: 0.3, signal }
      );
    } catch (error) {
      if (!(error instanceof BackendUnavailableError)) {
        throw error;
      }
      logger.warn('Summary generation failed, returning row count only', { error: error.message });
      return {
        text: withCountNote(`The query returned ${total} row${total === 1 ? '' : 's'}.`, shown, total),
        suggestions: [],
        usedModel: false,
      };
    }

    const { text, suggestions } = parseSuggestions(reply, this.config.maxSuggestions);
    return { text: withCountNote(text, shown, total), suggestions, usedModel: true };
  }
}

/**
 * Split `SUGGESTION:` lines off the end of a summary reply
 */
export function parseSuggestions(reply: string, max: number): { text: string; suggestions: string[] } {
  const suggestions: string[] = [];
  const body: string[] = [];

  for (const line of reply.split('\n')) {
    const match = line.match(/^\s*(?:[-*]\s*)?SUGGESTION:\s*(.+)$/i);
    if (match?.[1] !== undefined) {
      if (suggestions.length < max) {
        suggestions.push(match[1].trim());
      }
    } else {
      body.push(line);
    }
  }

  return { text: body.join('\n').trim(), suggestions };
}

/**
 * Append "Showing N of M rows." unless the text already says so
 */
export function withCountNote(text: string, shown: number, total: number): string {
  if (shown >= total) {
    return text;
  }
  const phrase = `showing ${shown} of ${total}`;
  if (text.toLowerCase().includes(phrase)) {
    return text;
  }
  const note = `Showing ${shown} of ${total} rows.`;
  return text.length > 0 ? `${text}\n\n${note}` : note;
}
