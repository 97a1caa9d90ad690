/**
 * School SQL Guard - Semantic Extractor
 *
 * Asks an external reasoning service to describe a statement. The reply
 * is untrusted: it is schema-checked and confidence-gated, and every
 * problem surfaces as ExtractionFailure so the chain can fall back.
 */

import { z } from 'zod';

import { formatValidationErrors } from '../config/schema.js';
import { stripCodeFence } from '../utils/helpers.js';
import { ExtractionFailure, RequestCancelledError, errorMessage } from '../utils/types.js';

import {
  createIntent,
  type IntentExtractor,
  type QueryIntent,
  type ReasoningClient,
  type ReasoningPrompt,
  type StrategyName,
} from './types.js';

// =============================================================================
// Reply Schema
// =============================================================================

export const SemanticReplySchema = z.object({
  operation: z
    .string()
    .transform((value) => value.trim().toUpperCase())
    .pipe(z.enum(['SELECT', 'INSERT', 'UPDATE', 'DELETE', 'OTHER'])),
  tables: z.array(z.string().trim().min(1)).min(1),
  columns: z.array(z.string().trim().min(1)).default([]),
  has_where_clause: z.boolean(),
  confidence: z.number().min(0).max(1),
});

export type SemanticReply = z.output<typeof SemanticReplySchema>;

// =============================================================================
// Extractor
// =============================================================================

export interface SemanticExtractorOptions {
  client: ReasoningClient;
  timeoutMs: number;
  minConfidence: number;
  /** Table names offered to the service as context */
  knownTables?: readonly string[];
}

export class SemanticExtractor implements IntentExtractor {
  public readonly name: StrategyName = 'semantic';
  private readonly client: ReasoningClient;
  private readonly timeoutMs: number;
  private readonly minConfidence: number;
  private readonly knownTables: readonly string[];

  constructor(options: SemanticExtractorOptions) {
    this.client = options.client;
    this.timeoutMs = options.timeoutMs;
    this.minConfidence = options.minConfidence;
    this.knownTables = options.knownTables ?? [];
  }

  public async extract(rawSql: string, signal?: AbortSignal): Promise<QueryIntent> {
    if (signal?.aborted) {
      throw new RequestCancelledError();
    }

    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let reply: string;
    try {
      reply = await raceAbort(this.client.complete(this.buildPrompt(rawSql), controller.signal), controller.signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new RequestCancelledError();
      }
      if (controller.signal.aborted) {
        throw new ExtractionFailure(this.name, `Reasoning service timed out after ${this.timeoutMs}ms`);
      }
      throw new ExtractionFailure(this.name, `Reasoning service error: ${errorMessage(error)}`);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }

    return this.parseReply(reply, rawSql);
  }

  /**
   * Validate a raw service reply and turn it into an intent
   */
  public parseReply(reply: string, rawSql: string): QueryIntent {
    let payload: unknown;
    try {
      payload = JSON.parse(stripCodeFence(reply));
    } catch {
      throw new ExtractionFailure(this.name, 'Reply is not valid JSON');
    }

    const parsed = SemanticReplySchema.safeParse(payload);
    if (!parsed.success) {
      throw new ExtractionFailure(
        this.name,
        `Reply failed validation: ${formatValidationErrors(parsed.error).join('; ')}`
      );
    }

    const { operation, tables, columns, has_where_clause, confidence } = parsed.data;
    if (operation === 'OTHER') {
      throw new ExtractionFailure(this.name, 'Service could not classify the statement');
    }
    if (confidence < this.minConfidence) {
      throw new ExtractionFailure(
        this.name,
        `Confidence ${confidence} is below the minimum ${this.minConfidence}`
      );
    }

    return createIntent({
      operation,
      tables,
      columns: columns.filter((column) => column !== '*' && !column.endsWith('.*')),
      hasWhereClause: has_where_clause,
      rawText: rawSql,
    });
  }

  private buildPrompt(rawSql: string): ReasoningPrompt {
    const tables =
      this.knownTables.length > 0 ? `\nKnown tables: ${this.knownTables.join(', ')}\n` : '';

    return {
      system: `You describe SQL statements for an access-control checker.
Do not execute, fix or rewrite the statement. Report only what it touches.
${tables}
RESPONSE FORMAT:
Respond ONLY with valid JSON in this exact format:
{
  "operation": "SELECT|INSERT|UPDATE|DELETE|OTHER",
  "tables": ["Table1"],
  "columns": ["Column1", "Table2.Column2"],
  "has_where_clause": true,
  "confidence": 0.95
}
Use "OTHER" for anything that is not a single SELECT, INSERT, UPDATE or DELETE.
List the columns read by SELECT, assigned by UPDATE ... SET, or named in the INSERT column list.
Use an empty "columns" list for SELECT *.`,
      user: rawSql,
    };
  }
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new Error('Aborted'));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });

    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
