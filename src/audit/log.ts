/**
 * School SQL Guard - Decision Audit Log
 *
 * Append-only record of every evaluated request. Records are deeply
 * frozen when created and each append is a single synchronous write.
 */

import type winston from 'winston';

import type { Decision } from '../authz/types.js';
import type { ExtractorName, QueryIntent } from '../extractor/types.js';
import type { Identity } from '../identity/types.js';
import { deepFreeze, generateRequestId } from '../utils/helpers.js';
import logger from '../utils/logger.js';
import { errorMessage } from '../utils/types.js';

// =============================================================================
// Types
// =============================================================================

export interface AuditRecord {
  readonly id: string;
  readonly requestId: string;
  readonly userId: string;
  /** Null when the user could not be resolved to an identity */
  readonly identity: Identity | null;
  readonly rawText: string;
  /** Null when the request was refused before extraction */
  readonly intent: QueryIntent | null;
  readonly decision: Decision;
  readonly finalSql: string;
  readonly extractor: ExtractorName;
  /** ISO-8601 */
  readonly timestamp: string;
}

export type AuditRecordInput = Omit<AuditRecord, 'id' | 'timestamp'> & { timestamp?: Date };

export interface AuditLog {
  append(record: AuditRecord): void;
}

/**
 * Build a frozen record. Identity, intent and decision are copied, so the
 * caller's own objects are left as they were.
 */
export function createAuditRecord(input: AuditRecordInput): AuditRecord {
  const { timestamp, identity, intent, decision, ...rest } = input;
  const record: AuditRecord = {
    ...rest,
    identity: identity === null ? null : { ...identity },
    intent: intent === null ? null : { ...intent, tables: [...intent.tables], columns: [...intent.columns] },
    decision: { ...decision },
    id: generateRequestId(),
    timestamp: (timestamp ?? new Date()).toISOString(),
  };
  return deepFreeze(record);
}

// =============================================================================
// In-Memory Log
// =============================================================================

export const DEFAULT_MAX_AUDIT_RECORDS = 10000;

/**
 * Bounded in-process log; the oldest records are dropped first
 */
export class InMemoryAuditLog implements AuditLog {
  private readonly entries: AuditRecord[] = [];
  private readonly maxRecords: number;

  constructor(maxRecords = DEFAULT_MAX_AUDIT_RECORDS) {
    this.maxRecords = Math.max(1, maxRecords);
  }

  public append(record: AuditRecord): void {
    this.entries.push(record);
    if (this.entries.length > this.maxRecords) {
      this.entries.splice(0, this.entries.length - this.maxRecords);
    }
  }

  public records(): readonly AuditRecord[] {
    return [...this.entries];
  }

  public get size(): number {
    return this.entries.length;
  }
}

// =============================================================================
// Logger-backed Log
// =============================================================================

/**
 * Writes each record as one structured log entry
 */
export class LoggerAuditLog implements AuditLog {
  private readonly target: winston.Logger;

  constructor(target: winston.Logger = logger) {
    this.target = target;
  }

  public append(record: AuditRecord): void {
    this.target.info('Audit record', {
      type: 'audit',
      auditId: record.id,
      requestId: record.requestId,
      userId: record.userId,
      role: record.identity?.role ?? null,
      rawText: record.rawText,
      operation: record.intent?.operation ?? null,
      tables: record.intent?.tables ?? [],
      decision: record.decision.kind,
      reason: record.decision.kind === 'deny' ? record.decision.reason : undefined,
      finalSql: record.finalSql,
      extractor: record.extractor,
      timestamp: record.timestamp,
    });
  }
}

// =============================================================================
// Fan-out
// =============================================================================

export class CompositeAuditLog implements AuditLog {
  private readonly logs: readonly AuditLog[];

  constructor(logs: readonly AuditLog[]) {
    this.logs = logs;
  }

  /**
   * A failing sink is logged and skipped; the others still receive the record
   */
  public append(record: AuditRecord): void {
    for (const log of this.logs) {
      try {
        log.append(record);
      } catch (error) {
        logger.error('Audit sink failed', { auditId: record.id, error: errorMessage(error) });
      }
    }
  }
}
