/**
 * School SQL Guard - Bootstrap
 *
 * Wires configuration, policy, extractors, audit and storage into a
 * ready AccessGuard.
 */

import 'dotenv/config';

import { CompositeAuditLog, InMemoryAuditLog, LoggerAuditLog, type AuditLog } from './audit/index.js';
import { loadConfig } from './config/loader.js';
import {
  ExtractorChain,
  OpenAIReasoningClient,
  PatternExtractor,
  SemanticExtractor,
  type IntentExtractor,
  type ReasoningClient,
} from './extractor/index.js';
import { AccessGuard, GuardedExecutor } from './guard/index.js';
import { DirectoryIdentityResolver } from './identity/resolver.js';
import { loadPolicyFile, type PolicyStore } from './policy/index.js';
import { initializePostgres, type DatabaseClient } from './storage/index.js';
import logger, { logLifecycle } from './utils/logger.js';
import { errorMessage, type GuardConfig } from './utils/types.js';

// =============================================================================
// Types
// =============================================================================

export interface GuardRuntime {
  config: GuardConfig;
  store: PolicyStore;
  guard: AccessGuard;
  /** In-process audit trail, bounded by audit.maxRecords */
  auditTrail: InMemoryAuditLog;
  /** Present when a database client is available */
  executor: GuardedExecutor | null;
  close(): Promise<void>;
}

export interface RuntimeOptions {
  db?: DatabaseClient;
  /** Overrides the OpenAI client built from config.semantic */
  reasoningClient?: ReasoningClient;
}

export interface BootstrapOptions {
  configPath?: string;
  /** Connect to PostgreSQL from config.postgres; defaults to true */
  connectDatabase?: boolean;
}

// =============================================================================
// Wiring
// =============================================================================

/**
 * Build the guard from an already-loaded configuration.
 * Throws ConfigError when the policy file is missing or invalid.
 */
export function createGuardFromConfig(config: GuardConfig, options: RuntimeOptions = {}): GuardRuntime {
  const store = loadPolicyFile(config.policyFilePath);

  const strategies: IntentExtractor[] = [];
  const reasoningClient = options.reasoningClient ?? buildReasoningClient(config);
  if (reasoningClient !== null) {
    strategies.push(
      new SemanticExtractor({
        client: reasoningClient,
        timeoutMs: config.semantic.timeoutMs,
        minConfidence: config.semantic.minConfidence,
        knownTables: store.knownTables(),
      })
    );
  }
  strategies.push(new PatternExtractor());

  const auditTrail = new InMemoryAuditLog(config.audit.maxRecords);
  const sinks: AuditLog[] = [auditTrail];
  if (config.audit.logEnabled) {
    sinks.push(new LoggerAuditLog());
  }

  const db = options.db;
  const guard = new AccessGuard({
    store,
    extractor: new ExtractorChain(strategies),
    audit: new CompositeAuditLog(sinks),
    ...(db ? { identityResolver: new DirectoryIdentityResolver(db) } : {}),
  });

  logLifecycle('ready', 'Access guard ready', {
    extractors: strategies.map((strategy) => strategy.name),
    tables: store.knownTables().length,
    database: db !== undefined,
  });

  return {
    config,
    store,
    guard,
    auditTrail,
    executor: db ? new GuardedExecutor(guard, db) : null,
    close: async () => {
      if (db) {
        await db.close();
      }
    },
  };
}

function buildReasoningClient(config: GuardConfig): ReasoningClient | null {
  if (!config.semantic.enabled) {
    return null;
  }
  if (config.semantic.apiKey === '') {
    logger.warn('Semantic extractor enabled without an API key; using the pattern extractor only');
    return null;
  }
  return new OpenAIReasoningClient({
    apiKey: config.semantic.apiKey,
    model: config.semantic.model,
    baseUrl: config.semantic.baseUrl,
  });
}

// =============================================================================
// Application Startup
// =============================================================================

/**
 * Load configuration, connect storage and build the guard
 */
export async function bootstrap(options: BootstrapOptions = {}): Promise<GuardRuntime> {
  logLifecycle('startup', 'School SQL Guard starting up...');

  try {
    const config = await loadConfig(options.configPath);
    logLifecycle('startup', 'Configuration loaded', {
      environment: config.nodeEnv,
      policyFile: config.policyFilePath,
      semanticExtractor: config.semantic.enabled,
    });

    let db: DatabaseClient | undefined;
    if (options.connectDatabase ?? true) {
      try {
        db = await initializePostgres(config.postgres);
      } catch (storageError) {
        logger.warn('Could not connect to PostgreSQL - running in validation-only mode', {
          error: errorMessage(storageError),
        });
      }
    }

    return createGuardFromConfig(config, db ? { db } : {});
  } catch (error) {
    logLifecycle('error', 'Failed to start School SQL Guard', { error: errorMessage(error) });
    throw error;
  }
}
