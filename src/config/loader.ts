/**
 * Querywise - Configuration Loader
 * Loads the YAML/JSON configuration file, validates it and applies
 * environment variable overrides
 */

import fs from 'fs';
import path from 'path';

import { parse as parseYaml } from 'yaml';
import { type z } from 'zod';

import logger, { logConfig } from '../utils/logger.js';
import { ConfigurationError, type QuerywiseConfig } from '../utils/types.js';

import {
  ConversationConfigSchema,
  LoggingConfigSchema,
  formatValidationErrors,
  safeValidateConfigFile,
  type ConfigFileOutput,
} from './schema.js';

const DEFAULT_CONFIG_PATH = './config/querywise.config.yaml';

// =============================================================================
// Environment Variable Helpers
// =============================================================================

function getEnvString(key: string, defaultValue?: string): string | undefined {
  return process.env[key] ?? defaultValue;
}

function getEnvInt(key: string, defaultValue?: number): number | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvFloat(key: string, defaultValue?: number): number | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBool(key: string, defaultValue?: boolean): boolean | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvList(key: string): string[] | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return undefined;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function getEnvEnum<T extends string>(key: string, schema: z.ZodType<T>): T | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return undefined;
  }
  const result = schema.safeParse(value.toLowerCase());
  if (!result.success) {
    logger.warn('Ignoring invalid environment value', { key, value });
    return undefined;
  }
  return result.data;
}

function getNodeEnv(): QuerywiseConfig['server']['nodeEnv'] {
  const value = process.env['NODE_ENV'];
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development';
}

// =============================================================================
// Configuration Loader Class
// =============================================================================

export class ConfigLoader {
  private configPath: string;
  private currentConfig: QuerywiseConfig | null = null;

  constructor(configPath?: string) {
    this.configPath =
      configPath ?? getEnvString('CONFIG_FILE_PATH', DEFAULT_CONFIG_PATH) ?? DEFAULT_CONFIG_PATH;
  }

  /**
   * Load configuration from file and environment variables
   */
  public async load(): Promise<QuerywiseConfig> {
    const raw = this.readConfigFile();

    const result = safeValidateConfigFile(raw);
    if (!result.success) {
      const details = formatValidationErrors(result.error);
      throw new ConfigurationError(`Invalid configuration in ${this.configPath}: ${details.join('; ')}`);
    }

    const config = this.buildConfig(result.data);
    this.currentConfig = config;
    return config;
  }

  private readConfigFile(): unknown {
    if (!fs.existsSync(this.configPath)) {
      logConfig('No config file found, using defaults and environment variables', {
        path: this.configPath,
      });
      return {};
    }

    const fileContent = fs.readFileSync(this.configPath, 'utf-8');
    const extension = path.extname(this.configPath).toLowerCase();

    let parsed: unknown;
    try {
      if (extension === '.yaml' || extension === '.yml') {
        parsed = parseYaml(fileContent);
      } else if (extension === '.json') {
        parsed = JSON.parse(fileContent);
      } else {
        throw new Error(`Unsupported config file format: ${extension}`);
      }
    } catch (error) {
      throw new ConfigurationError(
        `Failed to parse ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    logConfig('Configuration file loaded', { path: this.configPath });
    // An empty YAML document parses to null
    return parsed ?? {};
  }

  /**
   * Build configuration with environment variable overrides
   */
  private buildConfig(fileConfig: ConfigFileOutput): QuerywiseConfig {
    const { server, postgres, llm, catalog, databases, pipeline, conversation, logging } = fileConfig;

    return {
      server: {
        port: getEnvInt('PORT') ?? server.port,
        host: getEnvString('HOST') ?? server.host,
        nodeEnv: getNodeEnv(),
      },

      postgres: {
        host: getEnvString('POSTGRES_HOST') ?? postgres.host,
        port: getEnvInt('POSTGRES_PORT') ?? postgres.port,
        database: getEnvString('POSTGRES_DB') ?? postgres.database,
        user: getEnvString('POSTGRES_USER') ?? postgres.user,
        password: getEnvString('POSTGRES_PASSWORD') ?? postgres.password,
        ssl: getEnvBool('POSTGRES_SSL') ?? postgres.ssl,
        poolMin: getEnvInt('POSTGRES_POOL_MIN') ?? postgres.poolMin,
        poolMax: getEnvInt('POSTGRES_POOL_MAX') ?? postgres.poolMax,
      },

      llm: {
        chatUrl: getEnvString('LLM_CHAT_URL') ?? llm.chatUrl,
        chatFallbackUrl: getEnvString('LLM_CHAT_FALLBACK_URL') ?? llm.chatFallbackUrl,
        embeddingUrl: getEnvString('LLM_EMBEDDING_URL') ?? llm.embeddingUrl,
        embeddingFallbackUrl: getEnvString('LLM_EMBEDDING_FALLBACK_URL') ?? llm.embeddingFallbackUrl,
        apiKey: getEnvString('LLM_API_KEY') ?? llm.apiKey,
        model: getEnvString('LLM_MODEL') ?? llm.model,
        fastModel: getEnvString('LLM_FAST_MODEL') ?? llm.fastModel,
        embeddingModel: getEnvString('LLM_EMBEDDING_MODEL') ?? llm.embeddingModel,
        embeddingDimensions: getEnvInt('LLM_EMBEDDING_DIMENSIONS') ?? llm.embeddingDimensions,
        timeoutMs: getEnvInt('LLM_TIMEOUT_MS') ?? llm.timeoutMs,
        temperature: getEnvFloat('LLM_TEMPERATURE') ?? llm.temperature,
        maxTokens: getEnvInt('LLM_MAX_TOKENS') ?? llm.maxTokens,
      },

      catalog: {
        path: getEnvString('CATALOG_PATH') ?? catalog.path,
        fullDumpTokenThreshold:
          getEnvInt('CATALOG_FULL_DUMP_TOKEN_THRESHOLD') ?? catalog.fullDumpTokenThreshold,
        topK: getEnvInt('CATALOG_TOP_K') ?? catalog.topK,
        minSimilarity: getEnvFloat('CATALOG_MIN_SIMILARITY') ?? catalog.minSimilarity,
        embedOnLoad: getEnvBool('CATALOG_EMBED_ON_LOAD') ?? catalog.embedOnLoad,
        watch: getEnvBool('CATALOG_WATCH') ?? catalog.watch,
      },

      databases: {
        directory: getEnvString('DATABASES_DIR') ?? databases.directory,
        attachments: databases.attachments,
        joinKey: getEnvString('DATABASES_JOIN_KEY') ?? databases.joinKey,
        busyTimeoutMs: getEnvInt('DATABASES_BUSY_TIMEOUT_MS') ?? databases.busyTimeoutMs,
      },

      pipeline: {
        maxAttempts: getEnvInt('PIPELINE_MAX_ATTEMPTS') ?? pipeline.maxAttempts,
        executionTimeoutMs:
          getEnvInt('PIPELINE_EXECUTION_TIMEOUT_MS') ?? pipeline.executionTimeoutMs,
        rowCap: getEnvInt('PIPELINE_ROW_CAP') ?? pipeline.rowCap,
        generatedRowLimit: getEnvInt('PIPELINE_GENERATED_ROW_LIMIT') ?? pipeline.generatedRowLimit,
        summaryRowCap: getEnvInt('PIPELINE_SUMMARY_ROW_CAP') ?? pipeline.summaryRowCap,
        intentConfidenceThreshold:
          getEnvFloat('PIPELINE_INTENT_CONFIDENCE_THRESHOLD') ?? pipeline.intentConfidenceThreshold,
        rewriteTurns: getEnvInt('PIPELINE_REWRITE_TURNS') ?? pipeline.rewriteTurns,
        piiEnabled: getEnvBool('PIPELINE_PII_ENABLED') ?? pipeline.piiEnabled,
        maskedColumns: getEnvList('PIPELINE_MASKED_COLUMNS') ?? pipeline.maskedColumns,
        intentPatternsPath: getEnvString('PIPELINE_INTENT_PATTERNS_PATH') ?? pipeline.intentPatternsPath,
        fewShotExamplesPath:
          getEnvString('PIPELINE_FEW_SHOT_EXAMPLES_PATH') ?? pipeline.fewShotExamplesPath,
      },

      conversation: {
        store: getEnvEnum('CONVERSATION_STORE', ConversationConfigSchema.shape.store.removeDefault()) ?? conversation.store,
        windowTurns: getEnvInt('CONVERSATION_WINDOW_TURNS') ?? conversation.windowTurns,
        retentionTurns: getEnvInt('CONVERSATION_RETENTION_TURNS') ?? conversation.retentionTurns,
      },

      logging: {
        level: getEnvEnum('LOG_LEVEL', LoggingConfigSchema.shape.level.removeDefault()) ?? logging.level,
        format: getEnvEnum('LOG_FORMAT', LoggingConfigSchema.shape.format.removeDefault()) ?? logging.format,
        fileEnabled: getEnvBool('LOG_FILE_ENABLED') ?? logging.fileEnabled,
        filePath: getEnvString('LOG_FILE_PATH') ?? logging.filePath,
      },

      configFilePath: this.configPath,
    };
  }

  /**
   * Get current configuration
   */
  public getConfig(): QuerywiseConfig {
    if (this.currentConfig === null) {
      throw new ConfigurationError('Configuration not loaded. Call load() first.');
    }
    return this.currentConfig;
  }

  public getConfigPath(): string {
    return this.configPath;
  }
}

// =============================================================================
// Singleton Instance
// =============================================================================

let configLoaderInstance: ConfigLoader | null = null;

export function getConfigLoader(configPath?: string): ConfigLoader {
  if (configLoaderInstance === null) {
    configLoaderInstance = new ConfigLoader(configPath);
  }
  return configLoaderInstance;
}

export async function loadConfig(configPath?: string): Promise<QuerywiseConfig> {
  const loader = getConfigLoader(configPath);
  return loader.load();
}

export function getConfig(): QuerywiseConfig {
  const loader = getConfigLoader();
  return loader.getConfig();
}

export default ConfigLoader;
