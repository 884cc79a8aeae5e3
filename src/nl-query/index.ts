/**
 * Querywise - Natural Language Query Module
 *
 * Converts chat messages into validated, federated SQL and summarises the
 * results.
 */

export {
  ChatService,
  DEFAULT_CHAT_SERVICE_CONFIG,
  EXHAUSTED_MESSAGE,
  closeChatService,
  createChatService,
  getChatService,
  initializeChatService,
} from './service.js';
export type {
  ChatServiceComponents,
  ChatServiceConfig,
  ChatServiceDependencies,
  ChatTurnOptions,
} from './service.js';

export { CorrectionLoop, DEFAULT_CORRECTION_LOOP_CONFIG } from './correction-loop.js';
export type { CorrectionOutcome, CorrectionRequest } from './correction-loop.js';
export { ExecutionEngine } from './executor.js';
export { IntentClassifier, DEFAULT_CLARIFICATION } from './intent-classifier.js';
export { answerMetaQuestion, describeTable, detectMetaQuestion } from './meta-answerer.js';
export { loadIntentPatterns } from './patterns.js';
export { QueryRewriter } from './query-rewriter.js';
export { SQLGenerator, cleanSql, loadFewShotExamples } from './sql-generator.js';
export { ResultSummarizer, NO_RESULTS_MESSAGE } from './summarizer.js';
export { QueryValidator, DENY_LIST } from './validator.js';

export type {
  ChatRequest,
  ChatResponse,
  Classification,
  ExecutionResult,
  HistoryTurn,
  Intent,
  ResponseIntent,
  SqlResults,
} from './types.js';
