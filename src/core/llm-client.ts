/**
 * Completion clients
 *
 * A single request/response call: system instruction + one user message in,
 * raw text out. OpenAI is the default provider; Anthropic is selectable with
 * CARDSCAN_PROVIDER=anthropic.
 */

import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';

import type { Provider } from './config.js';

export interface CompletionRequest {
  model: string;
  system: string;
  user: string;
  maxTokens: number;
}

export interface CompletionClient {
  /** Returns null when the service answered without any text. */
  complete(request: CompletionRequest): Promise<string | null>;
}

// ============================================================================
// OpenAI
// ============================================================================

export class OpenAICompletionClient implements CompletionClient {
  private client: OpenAI | null = null;
  private readonly apiKey: string;

  constructor(apiKey: string) {
    this.apiKey = apiKey;
  }

  private getOpenAI(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({ apiKey: this.apiKey, maxRetries: 0 });
    }
    return this.client;
  }

  async complete(request: CompletionRequest): Promise<string | null> {
    const response = await this.getOpenAI().chat.completions.create({
      model: request.model,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.user },
      ],
      max_tokens: request.maxTokens,
    });

    return response.choices[0]?.message?.content ?? null;
  }
}

// ============================================================================
// Anthropic
// ============================================================================

export class AnthropicCompletionClient implements CompletionClient {
  private client: Anthropic | null = null;
  private readonly apiKey: string;

  constructor(apiKey: string) {
    this.apiKey = apiKey;
  }

  private getAnthropic(): Anthropic {
    if (!this.client) {
      this.client = new Anthropic({ apiKey: this.apiKey, maxRetries: 0 });
    }
    return this.client;
  }

  async complete(request: CompletionRequest): Promise<string | null> {
    const response = await this.getAnthropic().messages.create({
      model: request.model,
      max_tokens: request.maxTokens,
      system: request.system,
      messages: [{ role: 'user', content: request.user }],
    });

    const text = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');

    return text === '' ? null : text;
  }
}

export function createCompletionClient(provider: Provider, apiKey: string): CompletionClient {
  switch (provider) {
    case 'openai':
      return new OpenAICompletionClient(apiKey);
    case 'anthropic':
      return new AnthropicCompletionClient(apiKey);
  }
}
