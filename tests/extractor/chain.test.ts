/**
 * School SQL Guard - Extractor Chain Tests
 */

import { describe, it, expect, jest } from '@jest/globals';

import { ExtractorChain } from '../../src/extractor/chain.js';
import { PatternExtractor } from '../../src/extractor/pattern.js';
import {
  createIntent,
  unparseableIntent,
  type IntentExtractor,
  type QueryIntent,
} from '../../src/extractor/types.js';
import { ExtractionFailure, RequestCancelledError } from '../../src/utils/types.js';

function stubStrategy(implementation: (rawSql: string) => Promise<QueryIntent>) {
  const extract = jest.fn(implementation);
  const strategy: IntentExtractor = { name: 'semantic', extract };
  return { strategy, extract };
}

// =============================================================================
// Ordering and Fallback
// =============================================================================

describe('ExtractorChain', () => {
  it('should use the pattern strategy by default', async () => {
    const chain = new ExtractorChain();

    expect(chain.strategyNames()).toEqual(['pattern']);
    await expect(chain.extract('SELECT * FROM Students')).resolves.toMatchObject({ extractor: 'pattern' });
  });

  it('should return the first successful strategy', async () => {
    const semantic = stubStrategy(async (rawSql) =>
      createIntent({ operation: 'SELECT', tables: ['Students'], rawText: rawSql })
    );
    const pattern = new PatternExtractor();
    const patternExtract = jest.spyOn(pattern, 'extract');

    const result = await new ExtractorChain([semantic.strategy, pattern]).extract('SELECT * FROM Students');

    expect(result.extractor).toBe('semantic');
    expect(patternExtract).not.toHaveBeenCalled();
  });

  it('should fall back when a strategy fails', async () => {
    const semantic = stubStrategy(() => Promise.reject(new ExtractionFailure('semantic', 'timed out')));

    const result = await new ExtractorChain([semantic.strategy, new PatternExtractor()]).extract('SELECT * FROM Courses');

    expect(semantic.extract).toHaveBeenCalledTimes(1);
    expect(result.extractor).toBe('pattern');
    expect(result.intent.tables).toEqual(['Courses']);
  });

  it('should fall back when a strategy returns OTHER', async () => {
    const semantic = stubStrategy(async (rawSql) => unparseableIntent(rawSql));

    const result = await new ExtractorChain([semantic.strategy, new PatternExtractor()]).extract('SELECT * FROM Courses');

    expect(result.extractor).toBe('pattern');
  });

  it('should return the unparseable intent when every strategy fails', async () => {
    const chain = new ExtractorChain([
      stubStrategy(() => Promise.reject(new Error('offline'))).strategy,
      new PatternExtractor(),
    ]);

    await expect(chain.extract('SELEC * FORM Students')).resolves.toEqual({
      intent: unparseableIntent('SELEC * FORM Students'),
      extractor: 'none',
    });
    await expect(chain.extract("SELECT 'open")).resolves.toMatchObject({ extractor: 'none' });
  });
});

// =============================================================================
// Cancellation
// =============================================================================

describe('ExtractorChain cancellation', () => {
  it('should not start a strategy after cancellation', async () => {
    const semantic = stubStrategy(async (rawSql) => unparseableIntent(rawSql));
    const controller = new AbortController();
    controller.abort();

    await expect(
      new ExtractorChain([semantic.strategy]).extract('SELECT * FROM Students', controller.signal)
    ).rejects.toThrow(RequestCancelledError);
    expect(semantic.extract).not.toHaveBeenCalled();
  });

  it('should propagate cancellation raised by a strategy', async () => {
    const semantic = stubStrategy(() => Promise.reject(new RequestCancelledError()));

    await expect(
      new ExtractorChain([semantic.strategy, new PatternExtractor()]).extract('SELECT * FROM Students')
    ).rejects.toThrow(RequestCancelledError);
  });
});
