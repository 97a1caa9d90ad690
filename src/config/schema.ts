/**
 * School SQL Guard - Configuration Schema
 * Zod-based validation schemas for the application config and policy document
 */

import { z } from 'zod';

// =============================================================================
// Semantic Extractor Configuration Schema
// =============================================================================

export const SemanticExtractorConfigSchema = z.object({
  enabled: z.boolean().default(false),
  apiKey: z.string().default(''),
  model: z.string().min(1).default('gpt-4o-mini'),
  baseUrl: z.string().url().default('https://api.openai.com/v1'),
  timeoutMs: z.number().int().min(100).max(120000).default(10000),
  minConfidence: z.number().min(0).max(1).default(0.7),
});

// =============================================================================
// PostgreSQL Configuration Schema
// =============================================================================

export const PostgresConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.number().int().min(1).max(65535).default(5432),
  database: z.string().default('school'),
  user: z.string().default('school_guard'),
  password: z.string().default('dev_password'),
  ssl: z.boolean().default(false),
  poolMin: z.number().int().min(1).default(1),
  poolMax: z.number().int().min(1).default(10),
});

// =============================================================================
// Audit & Logging Configuration Schema
// =============================================================================

export const AuditConfigSchema = z.object({
  maxRecords: z.number().int().min(1).default(10000),
  logEnabled: z.boolean().default(true),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  format: z.enum(['json', 'pretty']).default('json'),
  fileEnabled: z.boolean().default(false),
  filePath: z.string().default('./logs/school-guard.log'),
});

// =============================================================================
// Main Configuration File Schema
// =============================================================================

export const ConfigFileSchema = z.object({
  policyFile: z.string().min(1).optional(),
  semantic: SemanticExtractorConfigSchema.partial().optional(),
  postgres: PostgresConfigSchema.partial().optional(),
  audit: AuditConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// =============================================================================
// Policy Document Schema
// =============================================================================

export const OperationSchema = z.enum(['SELECT', 'INSERT', 'UPDATE', 'DELETE']);

export const PolicyRuleEntrySchema = z.object({
  table: z.string().min(1),
  allowed_operations: z.array(OperationSchema).min(1),
  allowed_columns: z.union([z.literal('all'), z.literal('*'), z.array(z.string().min(1))]).default('all'),
  conditions: z.array(z.string().min(1)).default([]),
});

export const PolicyDocumentSchema = z
  .object({
    tables: z.array(z.string().min(1)).min(1),
    roles: z
      .object({
        student: z.array(PolicyRuleEntrySchema).optional(),
        teacher: z.array(PolicyRuleEntrySchema).optional(),
      })
      .strict(),
  })
  .strict();

// =============================================================================
// Type Exports
// =============================================================================

export type SemanticExtractorConfigInput = z.input<typeof SemanticExtractorConfigSchema>;
export type PostgresConfigInput = z.input<typeof PostgresConfigSchema>;
export type AuditConfigInput = z.input<typeof AuditConfigSchema>;
export type LoggingConfigInput = z.input<typeof LoggingConfigSchema>;
export type ConfigFileInput = z.input<typeof ConfigFileSchema>;
export type ConfigFileOutput = z.output<typeof ConfigFileSchema>;
export type PolicyRuleEntry = z.output<typeof PolicyRuleEntrySchema>;
export type PolicyDocumentInput = z.input<typeof PolicyDocumentSchema>;
export type PolicyDocument = z.output<typeof PolicyDocumentSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

/**
 * Format Zod validation errors into human-readable messages
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}
