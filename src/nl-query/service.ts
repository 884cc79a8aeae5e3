/**
 * Querywise - Chat Service
 *
 * Orchestrates one chat turn: PII masking, follow-up rewriting, intent
 * routing, schema retrieval, SQL generation with bounded correction, result
 * summarization and conversation bookkeeping.
 */

import type { SchemaCatalog } from '../catalog/catalog.js';
import type { CatalogSnapshot } from '../catalog/snapshot.js';
import type { LanguageModel } from '../llm/types.js';
import { ConversationManager, type TurnContext, type TurnOutcome } from '../conversation/manager.js';
import type { ConversationStore } from '../conversation/types.js';
import { ColumnMasker } from '../pii/column-masker.js';
import { PiiGuard, type PiiMapping } from '../pii/guard.js';
import logger, { logPipeline, type PipelineStage } from '../utils/logger.js';
import {
  BackendUnavailableError,
  CatalogUnavailableError,
  ErrorCode,
  RequestCancelledError,
  type QuerywiseConfig,
} from '../utils/types.js';

import { CorrectionLoop } from './correction-loop.js';
import { ExecutionEngine } from './executor.js';
import { DEFAULT_CLARIFICATION, IntentClassifier } from './intent-classifier.js';
import { answerMetaQuestion, detectMetaQuestion } from './meta-answerer.js';
import { loadIntentPatterns } from './patterns.js';
import { buildGeneralMessages } from './prompts.js';
import { QueryRewriter } from './query-rewriter.js';
import { loadFewShotExamples, SQLGenerator, type GenerationContext } from './sql-generator.js';
import { ensureRowLimit } from './sql-tokenizer.js';
import { ResultSummarizer } from './summarizer.js';
import type {
  ChatRequest,
  ChatResponse,
  HistoryTurn,
  ResponseIntent,
  SqlResults,
} from './types.js';
import { QueryValidator } from './validator.js';

// =============================================================================
// Configuration
// =============================================================================

export interface ChatServiceConfig {
  maxAttempts: number;
  executionTimeoutMs: number;
  /** Rows kept from an execution */
  rowCap: number;
  /** LIMIT appended to statements that carry none */
  generatedRowLimit: number;
}

export const DEFAULT_CHAT_SERVICE_CONFIG: ChatServiceConfig = {
  maxAttempts: 3,
  executionTimeoutMs: 10000,
  rowCap: 500,
  generatedRowLimit: 100,
};

export interface ChatServiceComponents {
  llm: LanguageModel;
  catalog: SchemaCatalog;
  pii: PiiGuard;
  columnMasker: ColumnMasker;
  rewriter: QueryRewriter;
  classifier: IntentClassifier;
  generator: SQLGenerator;
  validator: QueryValidator;
  executor: ExecutionEngine;
  summarizer: ResultSummarizer;
  conversations: ConversationManager;
}

export interface ChatTurnOptions {
  requestId?: string;
  /** Aborted when the client goes away */
  signal?: AbortSignal;
}

export const EXHAUSTED_MESSAGE =
  "I wasn't able to find an answer for that. Could you try rephrasing your question or providing more details?";

const CATALOG_UNAVAILABLE_MESSAGE =
  "The database schema isn't available right now, so I can't look that up. Please try again shortly.";

const BACKEND_UNAVAILABLE_MESSAGE =
  'The language service is unreachable at the moment. Please try again in a little while.';

const INTERNAL_ERROR_MESSAGE = 'Something went wrong while answering your question. Please try again.';

/**
 * Turn result before placeholders are restored and timing is attached
 */
interface TurnReply {
  success: boolean;
  intent: ResponseIntent;
  response: string;
  /** Standalone question when the rewriter changed the utterance */
  rewritten: string | null;
  sql?: string;
  results?: SqlResults;
  clarification?: string;
  suggestions?: string[];
  error?: string;
}

type ChatBody = Omit<ChatResponse, 'conversation_id' | 'processing_time_ms'>;

// =============================================================================
// Chat Service
// =============================================================================

export class ChatService {
  private components: ChatServiceComponents;
  private config: ChatServiceConfig;
  private loop: CorrectionLoop;

  constructor(components: ChatServiceComponents, config: Partial<ChatServiceConfig> = {}) {
    this.components = components;
    this.config = { ...DEFAULT_CHAT_SERVICE_CONFIG, ...config };
    this.loop = new CorrectionLoop(components.generator, components.validator, components.executor, {
      maxAttempts: this.config.maxAttempts,
      executionTimeoutMs: this.config.executionTimeoutMs,
      rowCap: this.config.rowCap,
    });
  }

  /**
   * Answer one message. Pipeline failures become an error response;
   * cancellation rejects with {@link RequestCancelledError}.
   */
  async chat(request: ChatRequest, options: ChatTurnOptions = {}): Promise<ChatResponse> {
    const startedAt = Date.now();

    const { conversationId, result } = await this.components.conversations.runTurn(
      request.conversationId,
      (context) => this.handleTurn(request.message, context, options)
    );

    const response: ChatResponse = {
      ...result,
      conversation_id: conversationId,
      processing_time_ms: Date.now() - startedAt,
    };

    logger.info('Chat turn completed', {
      requestId: options.requestId,
      conversationId,
      intent: response.intent,
      success: response.success,
      durationMs: response.processing_time_ms,
    });

    return response;
  }

  private handleTurn(
    message: string,
    context: TurnContext,
    options: ChatTurnOptions
  ): Promise<TurnOutcome<ChatBody>> {
    const { pii } = this.components;

    return pii.withMapping(async (mapping) => {
      let reply: TurnReply;
      try {
        reply = await this.answer(message, context, mapping, options);
      } catch (error) {
        if (error instanceof RequestCancelledError) {
          throw error;
        }
        reply = this.failureReply(error, context.conversationId, options.requestId);
      }

      const response = pii.unmask(reply.response, mapping).text;
      const clarification =
        reply.clarification === undefined ? undefined : pii.unmask(reply.clarification, mapping).text;
      const suggestions = reply.suggestions?.map((suggestion) => pii.unmask(suggestion, mapping).text);
      const rewritten = reply.rewritten === null ? null : pii.unmask(reply.rewritten, mapping).text;

      const body: ChatBody = {
        success: reply.success,
        response,
        intent: reply.intent,
        ...(reply.sql !== undefined && { sql_query: reply.sql }),
        ...(reply.results !== undefined && { sql_results: reply.results }),
        ...(clarification !== undefined && { clarification }),
        ...(suggestions !== undefined && suggestions.length > 0 && { suggestions }),
        ...(reply.error !== undefined && { error: reply.error }),
      };

      return {
        result: body,
        turn: {
          utterance: message,
          rewritten,
          intent: reply.intent,
          sql: reply.sql ?? null,
          summary: response,
          timestamp: new Date(),
        },
      };
    });
  }

  // ===========================================================================
  // Pipeline
  // ===========================================================================

  private async answer(
    message: string,
    context: TurnContext,
    mapping: PiiMapping,
    options: ChatTurnOptions
  ): Promise<TurnReply> {
    const { catalog, classifier, rewriter } = this.components;
    const { requestId, signal } = options;

    const meta = detectMetaQuestion(message);
    if (meta !== null) {
      const snapshot = catalog.requireSnapshot();
      return {
        success: true,
        intent: 'meta',
        response: answerMetaQuestion(meta, message, snapshot),
        rewritten: null,
      };
    }

    const masked = this.components.pii.mask(message, mapping).text;
    const history = this.maskHistory(context.history, mapping);

    const rewrite = await this.timed('rewrite', requestId, () => rewriter.rewrite(masked, history, signal));
    const question = rewrite.text;
    const rewritten = rewrite.rewritten ? question : null;

    const classification = await this.timed('classify', requestId, () =>
      classifier.classify(question, history, { catalog: catalog.getSnapshot(), signal })
    );
    logger.debug('Intent classified', {
      requestId,
      intent: classification.intent,
      confidence: classification.confidence,
      source: classification.source,
    });

    switch (classification.intent) {
      case 'GENERAL':
        return { ...(await this.answerGeneral(question, history, signal)), rewritten };

      case 'CLARIFICATION': {
        const clarification = classification.clarification ?? DEFAULT_CLARIFICATION;
        return { success: true, intent: 'ambiguous', response: clarification, clarification, rewritten };
      }

      case 'DATA':
        return { ...(await this.answerData(question, history, mapping, options)), rewritten };
    }
  }

  private async answerGeneral(
    question: string,
    history: HistoryTurn[],
    signal?: AbortSignal
  ): Promise<Omit<TurnReply, 'rewritten'>> {
    const reply = await this.components.llm.chat(buildGeneralMessages(question, history), {
      temperature: 0.7,
      maxTokens: 500,
      useFastModel: true,
      signal,
    });
    return { success: true, intent: 'general', response: reply.trim() };
  }

  private async answerData(
    question: string,
    history: HistoryTurn[],
    mapping: PiiMapping,
    options: ChatTurnOptions
  ): Promise<Omit<TurnReply, 'rewritten'>> {
    const { catalog, columnMasker, generator, pii, summarizer } = this.components;
    const { requestId, signal } = options;

    const snapshot: CatalogSnapshot = catalog.requireSnapshot();
    const retrieval = await this.timed('retrieve', requestId, () => catalog.retrieve(question, { signal }));
    logger.debug('Schema retrieved', {
      requestId,
      strategy: retrieval.strategy,
      tables: retrieval.entries.map((entry) => entry.qualifiedName),
    });

    const context: GenerationContext = {
      schemaText: retrieval.schemaText,
      databases: snapshot.databaseNames(),
      history,
      signal,
    };

    const generation = await this.timed('generate', requestId, () => generator.generate(question, context));
    if (generation.kind === 'clarification') {
      return {
        success: true,
        intent: 'ambiguous',
        response: generation.clarification,
        clarification: generation.clarification,
      };
    }

    const outcome = await this.loop.run({
      question,
      initialSql: generation.sql,
      context,
      catalog: snapshot,
      prepare: (sql) => ensureRowLimit(pii.unmask(sql, mapping).text, this.config.generatedRowLimit),
      requestId,
    });

    if (outcome.state === 'EXHAUSTED') {
      logger.warn('No working query for question', {
        requestId,
        reason: outcome.reason,
        attempts: outcome.attempts.length,
        lastError: outcome.lastError,
      });
      return {
        success: false,
        intent: 'data',
        response: EXHAUSTED_MESSAGE,
        sql: outcome.lastSql,
        error: `${ErrorCode.CORRECTION_EXHAUSTED}: no working query after ${outcome.attempts.length} attempt(s)`,
      };
    }

    const { sql } = outcome;
    const result = columnMasker.apply(sql, outcome.result, requestId);
    const maskedResult = { ...result, rows: pii.maskRows(result.rows, mapping) };
    const maskedSql = pii.mask(sql, mapping).text;

    const summary = await this.timed('summarize', requestId, () =>
      summarizer.summarize(question, maskedSql, maskedResult, signal)
    );

    return {
      success: true,
      intent: 'data',
      response: summary.text,
      sql,
      results: {
        columns: result.columns,
        rows: result.rows,
        row_count: result.rowCount,
        truncated: result.truncated,
      },
      suggestions: summary.suggestions,
    };
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  /**
   * Stored turns hold the original text; mask them into this request's mapping
   */
  private maskHistory(history: readonly HistoryTurn[], mapping: PiiMapping): HistoryTurn[] {
    const { pii } = this.components;
    return history.map((turn) => ({
      utterance: pii.mask(turn.utterance, mapping).text,
      rewritten: turn.rewritten === null ? null : pii.mask(turn.rewritten, mapping).text,
      response: pii.mask(turn.response, mapping).text,
      sql: turn.sql === null ? null : pii.mask(turn.sql, mapping).text,
    }));
  }

  private async timed<T>(stage: PipelineStage, requestId: string | undefined, work: () => Promise<T>): Promise<T> {
    const startedAt = Date.now();
    const result = await work();
    logPipeline({ requestId, stage, durationMs: Date.now() - startedAt, outcome: 'ok' });
    return result;
  }

  private failureReply(error: unknown, conversationId: string, requestId?: string): TurnReply {
    if (error instanceof CatalogUnavailableError) {
      logger.warn('Data question without a usable catalog', { requestId, conversationId });
      return {
        success: false,
        intent: 'error',
        response: CATALOG_UNAVAILABLE_MESSAGE,
        rewritten: null,
        error: `${error.code}: ${error.message}`,
      };
    }

    if (error instanceof BackendUnavailableError) {
      logger.error('Language model backend unavailable', {
        requestId,
        conversationId,
        backend: error.backend,
        error: error.message,
      });
      return {
        success: false,
        intent: 'error',
        response: BACKEND_UNAVAILABLE_MESSAGE,
        rewritten: null,
        error: `${error.code}: the ${error.backend} backend is unavailable`,
      };
    }

    logger.error('Chat pipeline failed', {
      requestId,
      conversationId,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return {
      success: false,
      intent: 'error',
      response: INTERNAL_ERROR_MESSAGE,
      rewritten: null,
      error: `${ErrorCode.INTERNAL_ERROR}: the request could not be completed`,
    };
  }

  // ===========================================================================
  // Introspection
  // ===========================================================================

  public getCatalog(): SchemaCatalog {
    return this.components.catalog;
  }

  public getExecutor(): ExecutionEngine {
    return this.components.executor;
  }

  public getConversations(): ConversationManager {
    return this.components.conversations;
  }

  public getLanguageModel(): LanguageModel {
    return this.components.llm;
  }
}

// =============================================================================
// Wiring
// =============================================================================

export interface ChatServiceDependencies {
  llm: LanguageModel;
  catalog: SchemaCatalog;
  store: ConversationStore;
}

/**
 * Build every pipeline component from the loaded configuration
 */
export function createChatService(config: QuerywiseConfig, deps: ChatServiceDependencies): ChatService {
  const { pipeline } = config;
  const patterns = loadIntentPatterns(pipeline.intentPatternsPath);
  const examples = loadFewShotExamples(pipeline.fewShotExamplesPath);

  return new ChatService(
    {
      llm: deps.llm,
      catalog: deps.catalog,
      pii: new PiiGuard({ enabled: pipeline.piiEnabled }),
      columnMasker: new ColumnMasker(pipeline.maskedColumns),
      rewriter: new QueryRewriter(deps.llm, patterns.referentialMarkers, pipeline.rewriteTurns),
      classifier: new IntentClassifier(deps.llm, patterns, {
        confidenceThreshold: pipeline.intentConfidenceThreshold,
        historyTurns: pipeline.rewriteTurns,
      }),
      generator: new SQLGenerator(deps.llm, {
        rowLimit: pipeline.generatedRowLimit,
        joinKey: config.databases.joinKey,
        temperature: config.llm.temperature,
        examples,
      }),
      validator: new QueryValidator(),
      executor: new ExecutionEngine(config.databases),
      summarizer: new ResultSummarizer(deps.llm, { rowCap: pipeline.summaryRowCap }),
      conversations: new ConversationManager(deps.store, config.conversation),
    },
    {
      maxAttempts: pipeline.maxAttempts,
      executionTimeoutMs: pipeline.executionTimeoutMs,
      rowCap: pipeline.rowCap,
      generatedRowLimit: pipeline.generatedRowLimit,
    }
  );
}

// =============================================================================
// Singleton Instance
// =============================================================================

let chatService: ChatService | null = null;

export function getChatService(): ChatService {
  if (chatService === null) {
    throw new Error('Chat service has not been initialized');
  }
  return chatService;
}

export function initializeChatService(config: QuerywiseConfig, deps: ChatServiceDependencies): ChatService {
  chatService = createChatService(config, deps);
  logger.info('Chat service initialized', {
    databases: config.databases.attachments.map((attachment) => attachment.alias),
    maxAttempts: config.pipeline.maxAttempts,
    piiMasking: config.pipeline.piiEnabled,
    maskedColumns: config.pipeline.maskedColumns.length,
    conversationStore: config.conversation.store,
  });
  return chatService;
}

export async function closeChatService(): Promise<void> {
  if (chatService !== null) {
    await chatService.getConversations().close();
    chatService = null;
  }
}
