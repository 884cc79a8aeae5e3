/**
 * Querywise - Configuration Schema
 * Zod-based validation schemas for service configuration
 */

import { z } from 'zod';

// =============================================================================
// Server Configuration Schema
// =============================================================================

export const ServerConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8000),
  host: z.string().default('0.0.0.0'),
});

// =============================================================================
// PostgreSQL Configuration Schema
// =============================================================================

export const PostgresConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.number().int().min(1).max(65535).default(5432),
  database: z.string().default('querywise'),
  user: z.string().default('querywise'),
  password: z.string().default('dev_password'),
  ssl: z.boolean().default(false),
  poolMin: z.number().int().min(1).default(2),
  poolMax: z.number().int().min(1).default(10),
});

// =============================================================================
// Language Model Configuration Schema
// =============================================================================

export const LLMConfigSchema = z.object({
  chatUrl: z.string().url().default('http://localhost:11434/v1/chat/completions'),
  chatFallbackUrl: z.string().url().optional(),
  embeddingUrl: z.string().url().optional(),
  embeddingFallbackUrl: z.string().url().optional(),
  apiKey: z.string().optional(),
  model: z.string().default('gpt-4o-mini'),
  fastModel: z.string().default('gpt-4o-mini'),
  embeddingModel: z.string().default('text-embedding-3-small'),
  embeddingDimensions: z.number().int().min(1).default(1024),
  timeoutMs: z.number().int().min(100).default(30000),
  temperature: z.number().min(0).max(2).default(0.1),
  maxTokens: z.number().int().min(1).default(2048),
});

// =============================================================================
// Catalog Configuration Schema
// =============================================================================

export const CatalogConfigSchema = z.object({
  path: z.string().default('./data/schema/catalog.json'),
  fullDumpTokenThreshold: z.number().int().min(0).default(30000),
  topK: z.number().int().min(1).max(100).default(5),
  minSimilarity: z.number().min(-1).max(1).default(0.2),
  embedOnLoad: z.boolean().default(false),
  watch: z.boolean().default(false),
});

// =============================================================================
// Databases Configuration Schema
// =============================================================================

export const DatabaseAttachmentSchema = z.object({
  alias: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'alias must be a plain SQL identifier'),
  file: z.string().min(1),
  description: z.string().optional(),
});

export const DatabasesConfigSchema = z
  .object({
    directory: z.string().default('./data/databases'),
    attachments: z.array(DatabaseAttachmentSchema).default([]),
    joinKey: z.string().default('employee_id'),
    busyTimeoutMs: z.number().int().min(0).default(5000),
  })
  .refine(
    (value) => new Set(value.attachments.map((a) => a.alias.toLowerCase())).size === value.attachments.length,
    { message: 'database aliases must be unique', path: ['attachments'] }
  );

// =============================================================================
// Pipeline Configuration Schema
// =============================================================================

export const PipelineConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).max(10).default(3),
  executionTimeoutMs: z.number().int().min(100).default(10000),
  rowCap: z.number().int().min(1).default(500),
  generatedRowLimit: z.number().int().min(1).default(100),
  summaryRowCap: z.number().int().min(1).default(20),
  intentConfidenceThreshold: z.number().min(0).max(1).default(0.5),
  rewriteTurns: z.number().int().min(1).default(3),
  piiEnabled: z.boolean().default(true),
  /** `database.table.column` or bare column names whose values never leave the server */
  maskedColumns: z.array(z.string().min(1)).default([]),
  intentPatternsPath: z.string().default('./data/intent-patterns.json'),
  fewShotExamplesPath: z.string().default('./data/few-shot-examples.json'),
});

// =============================================================================
// Conversation Configuration Schema
// =============================================================================

export const ConversationConfigSchema = z.object({
  store: z.enum(['memory', 'postgres']).default('memory'),
  windowTurns: z.number().int().min(1).default(5),
  retentionTurns: z.number().int().min(1).default(200),
});

// =============================================================================
// Logging Configuration Schema
// =============================================================================

export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  format: z.enum(['json', 'pretty']).default('json'),
  fileEnabled: z.boolean().default(false),
  filePath: z.string().default('./logs/querywise.log'),
});

// =============================================================================
// Main Configuration Schema (YAML/JSON file)
// =============================================================================

export const ConfigFileSchema = z.object({
  server: ServerConfigSchema.default({}),
  postgres: PostgresConfigSchema.default({}),
  llm: LLMConfigSchema.default({}),
  catalog: CatalogConfigSchema.default({}),
  databases: DatabasesConfigSchema.default({}),
  pipeline: PipelineConfigSchema.default({}),
  conversation: ConversationConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

// =============================================================================
// Exported Types from Schemas
// =============================================================================

export type LLMConfigInput = z.input<typeof LLMConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

export type ConfigFileInput = z.input<typeof ConfigFileSchema>;
export type ConfigFileOutput = z.output<typeof ConfigFileSchema>;

// =============================================================================
// Validation Helper Functions
// =============================================================================

/**
 * Validate configuration file content
 */
export function validateConfigFile(config: unknown): ConfigFileOutput {
  return ConfigFileSchema.parse(config);
}

/**
 * Safely validate configuration file content (returns result object)
 */
export function safeValidateConfigFile(
  config: unknown
): z.SafeParseReturnType<ConfigFileInput, ConfigFileOutput> {
  return ConfigFileSchema.safeParse(config);
}

/**
 * Format Zod validation errors into readable messages
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}
