/**
 * School SQL Guard - Semantic Extractor Tests
 */

import { describe, it, expect } from '@jest/globals';

import { SemanticExtractor } from '../../src/extractor/semantic.js';
import type { ReasoningClient } from '../../src/extractor/types.js';
import { ExtractionFailure, RequestCancelledError } from '../../src/utils/types.js';
import { ScriptedReasoningClient, SilentReasoningClient } from '../fixtures/school.js';

const SQL = 'SELECT FullName FROM Students';

const reply = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  operation: 'select',
  tables: ['Students'],
  columns: ['FullName'],
  has_where_clause: false,
  confidence: 0.92,
  ...overrides,
});

const createExtractor = (client: ReasoningClient, timeoutMs = 1000): SemanticExtractor =>
  new SemanticExtractor({ client, timeoutMs, minConfidence: 0.7, knownTables: ['Students', 'Classes'] });

// =============================================================================
// Valid Replies
// =============================================================================

describe('SemanticExtractor', () => {
  it('should turn a valid reply into an intent', async () => {
    const intent = await createExtractor(new ScriptedReasoningClient(reply())).extract(SQL);

    expect(intent).toEqual({
      operation: 'SELECT',
      tables: ['Students'],
      columns: ['FullName'],
      hasWhereClause: false,
      rawText: SQL,
    });
  });

  it('should accept a reply wrapped in a code fence and drop star columns', async () => {
    const fenced = '```json\n' + JSON.stringify(reply({ columns: ['FullName', '*', 's.*'] })) + '\n```';
    const intent = await createExtractor(new ScriptedReasoningClient(fenced)).extract(SQL);

    expect(intent.columns).toEqual(['FullName']);
  });

  it('should send the statement and the known tables', async () => {
    const client = new ScriptedReasoningClient(reply());
    await createExtractor(client).extract(SQL);

    expect(client.prompts).toHaveLength(1);
    expect(client.prompts[0]?.user).toBe(SQL);
    expect(client.prompts[0]?.system).toContain('Known tables: Students, Classes');
  });
});

// =============================================================================
// Rejected Replies
// =============================================================================

describe('SemanticExtractor failures', () => {
  it('should reject a reply that is not JSON', async () => {
    await expect(createExtractor(new ScriptedReasoningClient('SELECT it is')).extract(SQL)).rejects.toThrow(
      'Reply is not valid JSON'
    );
  });

  it('should reject a reply that fails the schema', async () => {
    await expect(
      createExtractor(new ScriptedReasoningClient(reply({ tables: [] }))).extract(SQL)
    ).rejects.toThrow('Reply failed validation');
  });

  it('should reject an unclassified statement', async () => {
    await expect(
      createExtractor(new ScriptedReasoningClient(reply({ operation: 'OTHER' }))).extract(SQL)
    ).rejects.toThrow('Service could not classify the statement');
  });

  it('should reject a low-confidence reply', async () => {
    await expect(
      createExtractor(new ScriptedReasoningClient(reply({ confidence: 0.5 }))).extract(SQL)
    ).rejects.toThrow('Confidence 0.5 is below the minimum 0.7');
  });

  it('should wrap service errors', async () => {
    const client: ReasoningClient = {
      complete: () => Promise.reject(new Error('quota exceeded')),
    };

    await expect(createExtractor(client).extract(SQL)).rejects.toThrow(
      new ExtractionFailure('semantic', 'Reasoning service error: quota exceeded')
    );
  });

  it('should give up after the timeout', async () => {
    await expect(createExtractor(new SilentReasoningClient(), 20).extract(SQL)).rejects.toThrow(
      'Reasoning service timed out after 20ms'
    );
  });
});

// =============================================================================
// Cancellation
// =============================================================================

describe('SemanticExtractor cancellation', () => {
  it('should not call the service once the request is cancelled', async () => {
    const client = new SilentReasoningClient();
    const controller = new AbortController();
    controller.abort();

    await expect(createExtractor(client).extract(SQL, controller.signal)).rejects.toThrow(RequestCancelledError);
    expect(client.calls).toBe(0);
  });

  it('should stop waiting when the request is cancelled mid-call', async () => {
    const client = new SilentReasoningClient();
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    await expect(createExtractor(client).extract(SQL, controller.signal)).rejects.toThrow(RequestCancelledError);
    expect(client.calls).toBe(1);
  });
});
