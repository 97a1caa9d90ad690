/**
 * School SQL Guard - Guarded Executor
 *
 * Runs a statement only after the access guard permits it, and only in
 * its final (possibly rewritten) form.
 */

import { isPermitted, type Decision } from '../authz/types.js';
import type { Identity } from '../identity/types.js';
import type { DatabaseClient, Row } from '../storage/postgres.js';
import logger from '../utils/logger.js';

import type { AccessGuard, ValidateOptions, ValidationResult } from './service.js';

export type ExecutionOutcome =
  | {
      readonly executed: false;
      readonly requestId: string;
      readonly decision: Decision;
    }
  | {
      readonly executed: true;
      readonly requestId: string;
      readonly decision: Decision;
      readonly finalSql: string;
      /** Rows returned by a SELECT; empty for writes */
      readonly rows: readonly Row[];
      /** Rows returned or affected */
      readonly rowCount: number;
    };

export class GuardedExecutor {
  private readonly guard: AccessGuard;
  private readonly db: DatabaseClient;

  constructor(guard: AccessGuard, db: DatabaseClient) {
    this.guard = guard;
    this.db = db;
  }

  public async run(identity: Identity, rawSql: string, options: ValidateOptions = {}): Promise<ExecutionOutcome> {
    return this.execute(await this.guard.validate(identity, rawSql, options));
  }

  public async runForUser(userId: string, rawSql: string, options: ValidateOptions = {}): Promise<ExecutionOutcome> {
    return this.execute(await this.guard.validateForUser(userId, rawSql, options));
  }

  private async execute(validation: ValidationResult): Promise<ExecutionOutcome> {
    const { requestId, decision, finalSql, operation } = validation;

    if (!isPermitted(decision) || finalSql === '') {
      return { executed: false, requestId, decision };
    }

    if (operation === 'SELECT') {
      const rows = await this.db.query(finalSql);
      logger.debug('Statement executed', { requestId, operation, rowCount: rows.length });
      return { executed: true, requestId, decision, finalSql, rows, rowCount: rows.length };
    }

    const rowCount = await this.db.execute(finalSql);
    logger.debug('Statement executed', { requestId, operation, rowCount });
    return { executed: true, requestId, decision, finalSql, rows: [], rowCount };
  }
}
