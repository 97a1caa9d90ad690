/**
 * School SQL Guard - Intent Extractor Types
 */

import type { Operation } from '../policy/types.js';

export type IntentOperation = Operation | 'OTHER';

export interface QueryIntent {
  readonly operation: IntentOperation;
  /** Deduplicated, first-seen order */
  readonly tables: readonly string[];
  /** Empty means all columns are implied; qualified columns read `Table.Column` */
  readonly columns: readonly string[];
  readonly hasWhereClause: boolean;
  readonly rawText: string;
}

export type StrategyName = 'semantic' | 'pattern';

/** Strategy that produced an intent; 'none' for the terminal unparseable intent */
export type ExtractorName = StrategyName | 'none';

export interface ExtractionResult {
  readonly intent: QueryIntent;
  readonly extractor: ExtractorName;
}

export interface IntentExtractor {
  readonly name: StrategyName;
  /**
   * Rejects with ExtractionFailure when the statement cannot be described
   */
  extract(rawSql: string, signal?: AbortSignal): Promise<QueryIntent>;
}

export interface ReasoningPrompt {
  readonly system: string;
  readonly user: string;
}

/**
 * External reasoning service used by the semantic strategy
 */
export interface ReasoningClient {
  complete(prompt: ReasoningPrompt, signal: AbortSignal): Promise<string>;
}

export interface IntentInput {
  operation: IntentOperation;
  tables: readonly string[];
  columns?: readonly string[];
  hasWhereClause?: boolean;
  rawText: string;
}

/**
 * Build a frozen intent; tables and columns are deduplicated case-insensitively
 */
export function createIntent(input: IntentInput): QueryIntent {
  const intent: QueryIntent = {
    operation: input.operation,
    tables: Object.freeze(dedupe(input.tables)),
    columns: Object.freeze(dedupe(input.columns ?? [])),
    hasWhereClause: input.hasWhereClause ?? false,
    rawText: input.rawText,
  };
  return Object.freeze(intent);
}

/**
 * Intent the evaluator always denies
 */
export function unparseableIntent(rawText: string): QueryIntent {
  return createIntent({ operation: 'OTHER', tables: [], rawText });
}

function dedupe(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const key = value.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      result.push(value);
    }
  }
  return result;
}
