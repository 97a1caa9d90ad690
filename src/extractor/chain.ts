/**
 * School SQL Guard - Extractor Chain
 *
 * Tries each strategy in order. A failure or an OTHER result moves on to
 * the next one; when none succeeds the terminal unparseable intent is
 * returned. Cancellation is the only error that escapes.
 */

import logger from '../utils/logger.js';
import { RequestCancelledError, errorMessage } from '../utils/types.js';

import { PatternExtractor } from './pattern.js';
import { unparseableIntent, type ExtractionResult, type IntentExtractor } from './types.js';

export class ExtractorChain {
  private readonly strategies: readonly IntentExtractor[];

  /**
   * @param strategies - tried in order; defaults to the pattern strategy alone
   */
  constructor(strategies: readonly IntentExtractor[] = [new PatternExtractor()]) {
    this.strategies = strategies;
  }

  public strategyNames(): string[] {
    return this.strategies.map((strategy) => strategy.name);
  }

  public async extract(rawSql: string, signal?: AbortSignal): Promise<ExtractionResult> {
    for (const strategy of this.strategies) {
      if (signal?.aborted) {
        throw new RequestCancelledError();
      }

      try {
        const intent = await strategy.extract(rawSql, signal);
        if (intent.operation !== 'OTHER') {
          return { intent, extractor: strategy.name };
        }
        logger.debug('Extractor could not classify statement', { strategy: strategy.name });
      } catch (error) {
        if (error instanceof RequestCancelledError) {
          throw error;
        }
        logger.debug('Extractor failed, falling back', {
          strategy: strategy.name,
          error: errorMessage(error),
        });
      }
    }

    return { intent: unparseableIntent(rawSql), extractor: 'none' };
  }
}
