/**
 * Querywise - Configuration Module
 *
 * Barrel export file for configuration management
 */

export {
  ServerConfigSchema,
  PostgresConfigSchema,
  LLMConfigSchema,
  CatalogConfigSchema,
  DatabaseAttachmentSchema,
  DatabasesConfigSchema,
  PipelineConfigSchema,
  ConversationConfigSchema,
  LoggingConfigSchema,
  ConfigFileSchema,
  validateConfigFile,
  safeValidateConfigFile,
  formatValidationErrors,
} from './schema.js';

export type {
  LLMConfigInput,
  PipelineConfigInput,
  ConfigFileInput,
  ConfigFileOutput,
} from './schema.js';

export { ConfigLoader, loadConfig, getConfig, getConfigLoader } from './loader.js';
