/**
 * LLM Chat Client
 *
 * Minimal client for an OpenAI-compatible /chat/completions endpoint.
 * Uses native fetch, same conventions as the GitHub client.
 */

import type { LlmCredentials } from '../config/types.js';
import type { ChatCompletionResponse } from './types.js';

const DEFAULT_TIMEOUT_MS = 30_000;

export class LlmClientError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public retryable: boolean
  ) {
    super(message);
    this.name = 'LlmClientError';
  }
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export class LlmClient {
  constructor(private credentials: LlmCredentials) {}

  /**
   * Send a conversation and return the first choice's text.
   */
  async complete(
    messages: ChatMessage[],
    options: { temperature?: number; maxTokens?: number } = {}
  ): Promise<string> {
    const url = `${this.credentials.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), DEFAULT_TIMEOUT_MS);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.credentials.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.credentials.model,
          messages,
          temperature: options.temperature ?? 0.4,
          max_tokens: options.maxTokens ?? 500,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;
        throw new LlmClientError(
          `LLM API error: ${response.status} ${response.statusText}`,
          response.status,
          retryable
        );
      }

      const data = (await response.json()) as ChatCompletionResponse;
      const content = data.choices[0]?.message.content;
      if (!content) {
        throw new LlmClientError('LLM API returned no content', response.status, false);
      }
      return content;
    } finally {
      clearTimeout(timeout);
    }
  }
}
