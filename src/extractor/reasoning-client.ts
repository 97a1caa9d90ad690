/**
 * School SQL Guard - OpenAI Reasoning Client
 *
 * ReasoningClient backed by an OpenAI-compatible chat-completions endpoint.
 */

import { z } from 'zod';

import logger from '../utils/logger.js';

import type { ReasoningClient, ReasoningPrompt } from './types.js';

// =============================================================================
// Configuration
// =============================================================================

export interface OpenAIReasoningClientConfig {
  /**
   * OpenAI API key
   */
  apiKey: string;

  /**
   * Model to use
   */
  model: string;

  /**
   * API base URL, without the trailing /chat/completions
   */
  baseUrl: string;

  /**
   * Maximum tokens for the reply
   */
  maxTokens: number;
}

export const DEFAULT_REASONING_CLIENT_CONFIG: OpenAIReasoningClientConfig = {
  apiKey: '',
  model: 'gpt-4o-mini',
  baseUrl: 'https://api.openai.com/v1',
  maxTokens: 500,
};

const CompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
      })
    )
    .default([]),
});

const ErrorResponseSchema = z.object({
  error: z.object({ message: z.string() }).optional(),
});

// =============================================================================
// Client
// =============================================================================

export class OpenAIReasoningClient implements ReasoningClient {
  private readonly config: OpenAIReasoningClientConfig;

  constructor(config: Partial<OpenAIReasoningClientConfig> = {}) {
    this.config = { ...DEFAULT_REASONING_CLIENT_CONFIG, ...config };
  }

  public async complete(prompt: ReasoningPrompt, signal: AbortSignal): Promise<string> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/chat/completions`;

    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify({
        model: this.config.model,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
        max_tokens: this.config.maxTokens,
        temperature: 0,
      }),
      signal,
    });

    if (!response.ok) {
      const body: unknown = await response.json().catch(() => ({}));
      const parsed = ErrorResponseSchema.safeParse(body);
      const message = parsed.success ? parsed.data.error?.message : undefined;
      logger.debug('Reasoning service returned an error', { status: response.status });
      throw new Error(message ?? `Reasoning service error: ${response.status}`);
    }

    const parsed = CompletionResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Reasoning service returned an unexpected response');
    }

    return parsed.data.choices[0]?.message?.content ?? '';
  }
}
