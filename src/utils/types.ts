/**
 * Querywise - Conversational Text-to-SQL Service
 * Core Type Definitions
 */

// =============================================================================
// Server Configuration Types
// =============================================================================

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
}

// =============================================================================
// Database Configuration Types
// =============================================================================

export interface PostgresConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  poolMin: number;
  poolMax: number;
}

export interface DatabaseAttachment {
  /** Logical alias used to qualify tables in generated SQL */
  alias: string;
  /** SQLite file, relative to the databases directory unless absolute */
  file: string;
  description?: string;
}

export interface DatabasesConfig {
  directory: string;
  attachments: DatabaseAttachment[];
  joinKey: string;
  busyTimeoutMs: number;
}

// =============================================================================
// Language Model Configuration Types
// =============================================================================

export interface LLMConfig {
  chatUrl: string;
  chatFallbackUrl?: string;
  embeddingUrl?: string;
  embeddingFallbackUrl?: string;
  apiKey?: string;
  model: string;
  fastModel: string;
  embeddingModel: string;
  embeddingDimensions: number;
  timeoutMs: number;
  temperature: number;
  maxTokens: number;
}

// =============================================================================
// Catalog & Pipeline Configuration Types
// =============================================================================

export interface CatalogConfig {
  path: string;
  fullDumpTokenThreshold: number;
  topK: number;
  minSimilarity: number;
  embedOnLoad: boolean;
  watch: boolean;
}

export interface PipelineConfig {
  maxAttempts: number;
  executionTimeoutMs: number;
  rowCap: number;
  generatedRowLimit: number;
  summaryRowCap: number;
  intentConfidenceThreshold: number;
  rewriteTurns: number;
  piiEnabled: boolean;
  maskedColumns: string[];
  intentPatternsPath: string;
  fewShotExamplesPath: string;
}

export interface ConversationConfig {
  store: 'memory' | 'postgres';
  windowTurns: number;
  retentionTurns: number;
}

// =============================================================================
// Logging Types
// =============================================================================

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'http' | 'debug';
  format: 'json' | 'pretty';
  fileEnabled: boolean;
  filePath: string;
}

// =============================================================================
// Main Configuration Type
// =============================================================================

export interface QuerywiseConfig {
  server: ServerConfig;
  postgres: PostgresConfig;
  llm: LLMConfig;
  catalog: CatalogConfig;
  databases: DatabasesConfig;
  pipeline: PipelineConfig;
  conversation: ConversationConfig;
  logging: LoggingConfig;
  configFilePath: string;
}

// =============================================================================
// Request Types
// =============================================================================

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      /** Set by the request-id middleware */
      requestId?: string;
      startTime?: number;
    }
  }
}

// =============================================================================
// Error Types
// =============================================================================

export const ErrorCode = {
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  DATABASE_ERROR: 'DATABASE_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  CATALOG_UNAVAILABLE: 'CATALOG_UNAVAILABLE',
  CLASSIFICATION_LOW_CONFIDENCE: 'CLASSIFICATION_LOW_CONFIDENCE',
  VALIDATION_REJECTED: 'VALIDATION_REJECTED',
  EXECUTION_ERROR: 'EXECUTION_ERROR',
  EXECUTION_TIMEOUT: 'EXECUTION_TIMEOUT',
  CORRECTION_EXHAUSTED: 'CORRECTION_EXHAUSTED',
  BACKEND_UNAVAILABLE: 'BACKEND_UNAVAILABLE',
  REQUEST_CANCELLED: 'REQUEST_CANCELLED',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class QuerywiseError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode = 500,
    code: ErrorCode = ErrorCode.INTERNAL_ERROR,
    isOperational = true
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.name = 'QuerywiseError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends QuerywiseError {
  constructor(message: string) {
    super(message, 500, ErrorCode.CONFIGURATION_ERROR, true);
    this.name = 'ConfigurationError';
  }
}

export class DatabaseError extends QuerywiseError {
  constructor(message: string) {
    super(message, 500, ErrorCode.DATABASE_ERROR, true);
    this.name = 'DatabaseError';
  }
}

export class ValidationError extends QuerywiseError {
  public readonly validationErrors: string[];

  constructor(message: string, validationErrors: string[] = []) {
    super(message, 400, ErrorCode.VALIDATION_ERROR, true);
    this.name = 'ValidationError';
    this.validationErrors = validationErrors;
  }
}

export class NotFoundError extends QuerywiseError {
  constructor(message = 'Resource not found') {
    super(message, 404, ErrorCode.NOT_FOUND, true);
    this.name = 'NotFoundError';
  }
}

// -----------------------------------------------------------------------------
// Pipeline errors
// -----------------------------------------------------------------------------

/** Catalog is unloaded or holds no tables; the DATA path cannot proceed. */
export class CatalogUnavailableError extends QuerywiseError {
  constructor(message = 'Schema catalog is not loaded') {
    super(message, 503, ErrorCode.CATALOG_UNAVAILABLE, true);
    this.name = 'CatalogUnavailableError';
  }
}

export type RejectionRule =
  | 'empty'
  | 'read-only'
  | 'single-statement'
  | 'deny-list'
  | 'unknown-qualifier'
  | 'max-length';

export class ValidationRejectedError extends QuerywiseError {
  public readonly rule: RejectionRule;

  constructor(rule: RejectionRule, message: string) {
    super(message, 422, ErrorCode.VALIDATION_REJECTED, true);
    this.name = 'ValidationRejectedError';
    this.rule = rule;
  }
}

export class ExecutionError extends QuerywiseError {
  constructor(message: string) {
    super(message, 422, ErrorCode.EXECUTION_ERROR, true);
    this.name = 'ExecutionError';
  }
}

export class ExecutionTimeoutError extends QuerywiseError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Query exceeded the ${timeoutMs}ms execution timeout`, 504, ErrorCode.EXECUTION_TIMEOUT, true);
    this.name = 'ExecutionTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export type BackendKind = 'chat' | 'embedding';

export class BackendUnavailableError extends QuerywiseError {
  public readonly backend: BackendKind;

  constructor(backend: BackendKind, message: string) {
    super(message, 503, ErrorCode.BACKEND_UNAVAILABLE, true);
    this.name = 'BackendUnavailableError';
    this.backend = backend;
  }
}

export class RequestCancelledError extends QuerywiseError {
  constructor(message = 'Request was cancelled by the client') {
    super(message, 499, ErrorCode.REQUEST_CANCELLED, true);
    this.name = 'RequestCancelledError';
  }
}
