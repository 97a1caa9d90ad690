/**
 * School SQL Guard - Configuration Module
 */

export {
  SemanticExtractorConfigSchema,
  PostgresConfigSchema,
  AuditConfigSchema,
  LoggingConfigSchema,
  ConfigFileSchema,
  OperationSchema,
  PolicyRuleEntrySchema,
  PolicyDocumentSchema,
  formatValidationErrors,
} from './schema.js';

export type {
  SemanticExtractorConfigInput,
  PostgresConfigInput,
  AuditConfigInput,
  LoggingConfigInput,
  ConfigFileInput,
  ConfigFileOutput,
  PolicyRuleEntry,
  PolicyDocumentInput,
  PolicyDocument,
} from './schema.js';

export { ConfigLoader, loadConfig, DEFAULT_CONFIG_PATH, DEFAULT_POLICY_PATH } from './loader.js';
