/**
 * Querywise - Query Rewriter
 * Turns a follow-up that leans on earlier turns into a standalone question
 */

import type { LanguageModel } from '../llm/types.js';
import logger from '../utils/logger.js';
import { RequestCancelledError } from '../utils/types.js';

import { normalizeUtterance, phraseMatcher } from './patterns.js';
import { buildRewriteMessages } from './prompts.js';
import type { HistoryTurn } from './types.js';

export interface RewriteResult {
  text: string;
  rewritten: boolean;
}

export class QueryRewriter {
  private llm: LanguageModel;
  private markers: RegExp | null;
  private turns: number;

  constructor(llm: LanguageModel, referentialMarkers: readonly string[], turns = 3) {
    this.llm = llm;
    this.markers = phraseMatcher(referentialMarkers);
    this.turns = Math.max(1, turns);
  }

  /**
   * Only follow-ups with a referential marker and some history are rewritten
   */
  public needsRewrite(utterance: string, history: readonly HistoryTurn[]): boolean {
    if (history.length === 0 || this.markers === null) {
      return false;
    }
    return this.markers.test(normalizeUtterance(utterance));
  }

  /**
   * Best effort: any failure other than cancellation returns the original
   */
  async rewrite(utterance: string, history: readonly HistoryTurn[], signal?: AbortSignal): Promise<RewriteResult> {
    if (!this.needsRewrite(utterance, history)) {
      return { text: utterance, rewritten: false };
    }

    let reply: string;
    try {
      reply = await this.llm.chat(buildRewriteMessages(utterance, history.slice(-this.turns)), {
        temperature: 0,
        maxTokens: 500,
        useFastModel: true,
        signal,
      });
    } catch (error) {
      if (error instanceof RequestCancelledError || signal?.aborted) {
        throw error;
      }
      logger.warn('Query rewrite failed, using the original question', {
        error: error instanceof Error ? error.message : String(error),
      });
      return { text: utterance, rewritten: false };
    }

    const cleaned = cleanRewrite(reply);
    if (cleaned.length === 0) {
      return { text: utterance, rewritten: false };
    }
    return { text: cleaned, rewritten: cleaned !== utterance.trim() };
  }
}

/**
 * Drop a leading label and surrounding quotes from the model's reply
 */
export function cleanRewrite(reply: string): string {
  const firstLine = reply.trim().split('\n').find((line) => line.trim().length > 0) ?? '';
  return firstLine
    .trim()
    .replace(/^(?:rewritten|standalone)(?:\s+question)?\s*:\s*/i, '')
    .replace(/^["'`]+|["'`]+$/g, '')
    .trim();
}
