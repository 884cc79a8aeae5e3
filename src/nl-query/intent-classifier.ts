/**
 * Querywise - Intent Classifier
 *
 * Two stages. Greetings and plain data requests are decided by phrase lists
 * without any external call; only the remainder reaches the language model.
 */

import { z } from 'zod';

import { significantTokens } from '../catalog/catalog.js';
import type { CatalogSnapshot } from '../catalog/snapshot.js';
import { extractJson } from '../llm/client.js';
import type { LanguageModel } from '../llm/types.js';
import logger from '../utils/logger.js';
import { ErrorCode } from '../utils/types.js';

import { normalizeUtterance, phraseMatcher, type IntentPatterns } from './patterns.js';
import { buildClassificationMessages } from './prompts.js';
import type { Classification, HistoryTurn } from './types.js';

export interface IntentClassifierConfig {
  /**
   * Model confidence below this yields CLARIFICATION
   */
  confidenceThreshold: number;

  /**
   * History turns included in the model prompt
   */
  historyTurns: number;
}

export const DEFAULT_INTENT_CLASSIFIER_CONFIG: IntentClassifierConfig = {
  confidenceThreshold: 0.5,
  historyTurns: 3,
};

export interface ClassifyOptions {
  catalog?: CatalogSnapshot | null;
  signal?: AbortSignal;
}

export const DEFAULT_CLARIFICATION =
  "Could you tell me a bit more about what you're looking for? I can look up records in the connected databases if you name what you need.";

const PATTERN_CONFIDENCE_GENERAL = 0.99;
const PATTERN_CONFIDENCE_DATA = 0.95;

const ClassificationReplySchema = z.object({
  intent: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
    z.enum(['DATA', 'GENERAL', 'CLARIFICATION'])
  ),
  confidence: z.coerce.number().min(0).max(1),
  entities: z.array(z.string()).catch([]),
  clarification: z.string().nullish(),
});

// =============================================================================
// Intent Classifier
// =============================================================================

export class IntentClassifier {
  private llm: LanguageModel;
  private config: IntentClassifierConfig;
  private general: Set<string>;
  private verbs: RegExp | null;
  private nouns: RegExp | null;
  private catalogTerms: { version: string; terms: Set<string> } | null = null;

  constructor(llm: LanguageModel, patterns: IntentPatterns, config: Partial<IntentClassifierConfig> = {}) {
    this.llm = llm;
    this.config = { ...DEFAULT_INTENT_CLASSIFIER_CONFIG, ...config };
    this.general = new Set(patterns.general.map(normalizeUtterance));
    this.verbs = phraseMatcher(patterns.dataVerbs);
    this.nouns = phraseMatcher(patterns.dataNouns, true);
  }

  async classify(
    utterance: string,
    history: readonly HistoryTurn[],
    options: ClassifyOptions = {}
  ): Promise<Classification> {
    const matched = this.matchPatterns(utterance, options.catalog ?? null);
    if (matched !== null) {
      return matched;
    }
    return this.classifyWithModel(utterance, history, options.signal);
  }

  /**
   * Stage 1. Returns null when no pattern decides.
   */
  public matchPatterns(utterance: string, catalog: CatalogSnapshot | null): Classification | null {
    const normalized = normalizeUtterance(utterance);

    if (normalized.length === 0 || this.general.has(normalized)) {
      return { intent: 'GENERAL', confidence: PATTERN_CONFIDENCE_GENERAL, source: 'pattern', entities: [] };
    }

    const hasVerb = this.verbs?.test(normalized) ?? false;
    if (hasVerb && (this.mentionsDomainNoun(normalized) || this.mentionsCatalogTerm(normalized, catalog))) {
      return { intent: 'DATA', confidence: PATTERN_CONFIDENCE_DATA, source: 'pattern', entities: [] };
    }

    return null;
  }

  private mentionsDomainNoun(normalized: string): boolean {
    return this.nouns?.test(normalized) ?? false;
  }

  private mentionsCatalogTerm(normalized: string, catalog: CatalogSnapshot | null): boolean {
    if (catalog === null || catalog.isEmpty) {
      return false;
    }
    const terms = this.termsFor(catalog);
    for (const token of significantTokens(normalized)) {
      if (terms.has(token)) {
        return true;
      }
    }
    return false;
  }

  private termsFor(catalog: CatalogSnapshot): Set<string> {
    if (this.catalogTerms?.version !== catalog.version) {
      const names = catalog.entries.flatMap((entry) => [entry.table, ...entry.columns.map((column) => column.name)]);
      this.catalogTerms = { version: catalog.version, terms: significantTokens(names.join(' ')) };
    }
    return this.catalogTerms.terms;
  }

  /**
   * Stage 2: structured model classification
   */
  private async classifyWithModel(
    utterance: string,
    history: readonly HistoryTurn[],
    signal?: AbortSignal
  ): Promise<Classification> {
    const reply = await this.llm.chat(
      buildClassificationMessages(utterance, history.slice(-this.config.historyTurns)),
      { temperature: 0, jsonMode: true, useFastModel: true, maxTokens: 300, signal }
    );

    const parsed = ClassificationReplySchema.safeParse(extractJson(reply));
    if (!parsed.success) {
      logger.warn('Unparseable intent classification reply', { length: reply.length });
      return {
        intent: 'CLARIFICATION',
        confidence: 0,
        source: 'llm',
        entities: [],
        clarification: DEFAULT_CLARIFICATION,
        reasonCode: ErrorCode.CLASSIFICATION_LOW_CONFIDENCE,
      };
    }

    const { intent, confidence, entities, clarification } = parsed.data;

    if (confidence < this.config.confidenceThreshold) {
      return {
        intent: 'CLARIFICATION',
        confidence,
        source: 'llm',
        entities,
        clarification: clarification || DEFAULT_CLARIFICATION,
        reasonCode: ErrorCode.CLASSIFICATION_LOW_CONFIDENCE,
      };
    }

    if (intent === 'CLARIFICATION') {
      return {
        intent,
        confidence,
        source: 'llm',
        entities,
        clarification: clarification || DEFAULT_CLARIFICATION,
      };
    }

    return { intent, confidence, source: 'llm', entities };
  }
}
