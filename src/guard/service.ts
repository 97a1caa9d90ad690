/**
 * School SQL Guard - Access Guard
 *
 * The inbound validate() operation. Runs extract → evaluate → rewrite →
 * audit for one statement and turns every per-request error into a Deny.
 */

import { CompositeAuditLog, createAuditRecord, type AuditLog, type AuditRecordInput } from '../audit/index.js';
import {
  AuthorizationEvaluator,
  DENY_REASONS,
  deny,
  rewrite,
  type Decision,
  type DenyReason,
} from '../authz/index.js';
import { ExtractorChain, type ExtractorName, type IntentOperation, type QueryIntent } from '../extractor/index.js';
import { assertNever, type Identity, type IdentityResolver } from '../identity/types.js';
import type { PolicyStore } from '../policy/store.js';
import { generateRequestId } from '../utils/helpers.js';
import logger, { logDecision } from '../utils/logger.js';
import {
  ConfigError,
  IdentityNotFoundError,
  RequestCancelledError,
  RewriteError,
  errorMessage,
} from '../utils/types.js';

// =============================================================================
// Types
// =============================================================================

export interface AccessGuardOptions {
  store: PolicyStore;
  /** Defaults to the pattern strategy alone */
  extractor?: ExtractorChain;
  audit?: AuditLog;
  identityResolver?: IdentityResolver;
}

export interface ValidateOptions {
  signal?: AbortSignal;
  requestId?: string;
}

export interface ValidationResult {
  readonly requestId: string;
  /** Statement to execute; empty when denied */
  readonly finalSql: string;
  readonly decision: Decision;
  readonly operation: IntentOperation | null;
  readonly extractor: ExtractorName;
}

// =============================================================================
// Access Guard
// =============================================================================

export class AccessGuard {
  private readonly extractor: ExtractorChain;
  private readonly evaluator: AuthorizationEvaluator;
  private readonly audit: AuditLog;
  private readonly identityResolver: IdentityResolver | undefined;

  constructor(options: AccessGuardOptions) {
    this.extractor = options.extractor ?? new ExtractorChain();
    this.evaluator = new AuthorizationEvaluator(options.store);
    this.audit = options.audit ?? new CompositeAuditLog([]);
    this.identityResolver = options.identityResolver;
  }

  /**
   * Decide whether `rawSql` may run for `identity`, rewriting it when
   * row scoping has to be injected
   */
  public async validate(
    identity: Identity,
    rawSql: string,
    options: ValidateOptions = {}
  ): Promise<ValidationResult> {
    const requestId = options.requestId ?? generateRequestId();
    const startTime = Date.now();

    let intent: QueryIntent | null = null;
    let extractor: ExtractorName = 'none';
    let decision: Decision;
    let finalSql = '';

    try {
      if (options.signal?.aborted) {
        throw new RequestCancelledError();
      }

      const extraction = await this.extractor.extract(rawSql, options.signal);
      intent = extraction.intent;
      extractor = extraction.extractor;

      if (options.signal?.aborted) {
        throw new RequestCancelledError();
      }

      ({ decision, finalSql } = this.finalize(this.evaluator.evaluate(identity, intent), rawSql, requestId));
    } catch (error) {
      decision = deny(this.denyReasonFor(error, requestId));
      finalSql = '';
    }

    return this.complete(
      { requestId, userId: identity.userId, identity, rawText: rawSql, intent, decision, finalSql, extractor },
      startTime
    );
  }

  /**
   * Resolve the login user first, then validate
   */
  public async validateForUser(
    userId: string,
    rawSql: string,
    options: ValidateOptions = {}
  ): Promise<ValidationResult> {
    if (this.identityResolver === undefined) {
      throw new ConfigError('AccessGuard has no identity resolver');
    }

    const requestId = options.requestId ?? generateRequestId();
    const startTime = Date.now();

    let identity: Identity;
    try {
      identity = await this.identityResolver.resolve(userId);
    } catch (error) {
      return this.complete(
        {
          requestId,
          userId,
          identity: null,
          rawText: rawSql,
          intent: null,
          decision: deny(this.denyReasonFor(error, requestId)),
          finalSql: '',
          extractor: 'none',
        },
        startTime
      );
    }

    return this.validate(identity, rawSql, { ...options, requestId });
  }

  /**
   * Turn an evaluator decision into the statement to run
   */
  private finalize(decision: Decision, rawSql: string, requestId: string): { decision: Decision; finalSql: string } {
    switch (decision.kind) {
      case 'allow':
        return { decision, finalSql: rawSql };
      case 'allow_with_rewrite':
        try {
          return { decision, finalSql: rewrite(rawSql, decision.predicate) };
        } catch (error) {
          if (!(error instanceof RewriteError)) {
            throw error;
          }
          logger.debug('Rewrite refused', { requestId, error: error.message });
          return { decision: deny(DENY_REASONS.rewriteFailed), finalSql: '' };
        }
      case 'deny':
        return { decision, finalSql: '' };
      default:
        return assertNever(decision);
    }
  }

  private denyReasonFor(error: unknown, requestId: string): DenyReason {
    if (error instanceof RequestCancelledError) {
      return DENY_REASONS.cancelled;
    }
    if (error instanceof IdentityNotFoundError) {
      return DENY_REASONS.identityNotFound;
    }

    logger.error('Validation failed', {
      requestId,
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return DENY_REASONS.internal;
  }

  /**
   * Audit and log a finished request
   */
  private complete(input: AuditRecordInput, startTime: number): ValidationResult {
    try {
      this.audit.append(createAuditRecord(input));
    } catch (error) {
      logger.error('Failed to append audit record', {
        requestId: input.requestId,
        error: errorMessage(error),
      });
    }

    logDecision({
      requestId: input.requestId,
      userId: input.userId,
      role: input.identity?.role ?? 'unknown',
      operation: input.intent?.operation ?? 'NONE',
      tables: input.intent?.tables ?? [],
      decision: input.decision.kind,
      reason: input.decision.kind === 'deny' ? input.decision.reason : undefined,
      extractor: input.extractor,
      durationMs: Date.now() - startTime,
    });

    const result: ValidationResult = {
      requestId: input.requestId,
      finalSql: input.finalSql,
      decision: input.decision,
      operation: input.intent?.operation ?? null,
      extractor: input.extractor,
    };
    return Object.freeze(result);
  }
}
