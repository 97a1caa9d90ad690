/**
 * School SQL Guard - Core Type Definitions
 */

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

// =============================================================================
// Extractor Configuration Types
// =============================================================================

export interface SemanticExtractorConfig {
  enabled: boolean;
  apiKey: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
  minConfidence: number;
}

// =============================================================================
// Audit & Logging Configuration Types
// =============================================================================

export interface AuditConfig {
  maxRecords: number;
  logEnabled: boolean;
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'http' | 'debug';
  format: 'json' | 'pretty';
  fileEnabled: boolean;
  filePath: string;
}

// =============================================================================
// Main Configuration Type
// =============================================================================

export interface GuardConfig {
  policyFilePath: string;
  semantic: SemanticExtractorConfig;
  postgres: PostgresConfig;
  audit: AuditConfig;
  logging: LoggingConfig;
  nodeEnv: 'development' | 'production' | 'test';
  configFilePath: string;
}

// =============================================================================
// Error Types
// =============================================================================

export class GuardError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code = 'INTERNAL_ERROR', isOperational = true) {
    super(message);
    this.code = code;
    this.isOperational = isOperational;
    this.name = 'GuardError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Malformed configuration or policy. Fatal at startup.
 */
export class ConfigError extends GuardError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'CONFIG_ERROR', false);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class ExtractionFailure extends GuardError {
  public readonly strategy: string;

  constructor(strategy: string, message: string) {
    super(message, 'EXTRACTION_FAILURE', true);
    this.name = 'ExtractionFailure';
    this.strategy = strategy;
  }
}

export class RewriteError extends GuardError {
  constructor(message: string) {
    super(message, 'REWRITE_ERROR', true);
    this.name = 'RewriteError';
  }
}

export class IdentityNotFoundError extends GuardError {
  public readonly userId: string;

  constructor(userId: string) {
    super(`No student or teacher is linked to user '${userId}'`, 'IDENTITY_NOT_FOUND', true);
    this.name = 'IdentityNotFoundError';
    this.userId = userId;
  }
}

export class RequestCancelledError extends GuardError {
  constructor(message = 'Request was cancelled') {
    super(message, 'REQUEST_CANCELLED', true);
    this.name = 'RequestCancelledError';
  }
}

export class DatabaseError extends GuardError {
  constructor(message: string) {
    super(message, 'DATABASE_ERROR', true);
    this.name = 'DatabaseError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
