/**
 * cardscan - Contact Extraction
 *
 * Sends one text unit (card name, description or comment) to the completion
 * service with a fixed instruction and reads back a JSON object with name,
 * location and one field per phone category.
 *
 * Every call resolves to an ExtractionOutcome. Only `structured` carries
 * fields; the other kinds mean "no contact in this unit" and are logged by the
 * caller.
 */

import { z } from 'zod';
import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';

import type { CompletionClient } from './llm-client.js';
import type { RawContact } from './contact-validator.js';
import { normalizePhone } from './contact-validator.js';
import { upgradeContactFields } from './types.js';
import { errorMessage } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export type ExtractionOutcome =
  | { kind: 'structured'; fields: RawContact; raw: string }
  | { kind: 'unparsable'; raw: string; reason: string }
  | { kind: 'empty' }
  | { kind: 'failed'; error: string; transient: boolean; attempts: number };

export interface ContactExtractorOptions {
  model: string;
  /** Response-size hint passed to the service. */
  maxTokens?: number;
  /** Used in the instruction, e.g. "Australian" phone numbers. */
  phoneRegion?: string;
  /** Retries for transient failures. 0 means a failed call is final. */
  maxRetries?: number;
  retryDelayMs?: number;
}

const MAX_INPUT_CHARS = 8000;

// ============================================================================
// Prompt
// ============================================================================

export function buildSystemPrompt(phoneRegion: string): string {
  return `You are an assistant that extracts structured information from text, specifically ${phoneRegion} phone numbers.
Identify phone numbers, classify them as Mobile, Landline, or Business, normalize them into the E.164 format,
and output the result in the following JSON format:
{
  "name": "John Doe",
  "location": "Cochrane Rd, Drouin VIC 3818, Australia",
  "mobile": "e164 format",
  "landline": "e164 format",
  "business": "e164 format"
}`;
}

export function buildUserPrompt(text: string): string {
  return `Extract name, location, and phone from the following text:\n${text.substring(0, MAX_INPUT_CHARS)}.`;
}

// ============================================================================
// Response Parsing
// ============================================================================

const fieldValue = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : String(value)));

const responseSchema = z.object({
  name: fieldValue,
  location: fieldValue,
  mobile: fieldValue,
  landline: fieldValue,
  business: fieldValue,
  // Single-phone replies (schema 1 layout)
  phone: fieldValue,
});

/**
 * Parse the service's reply into contact fields.
 * Tolerates text around the JSON object (e.g. markdown fences).
 */
export function parseExtraction(content: string): ExtractionOutcome {
  const jsonMatch = content.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    return { kind: 'unparsable', raw: content, reason: 'No JSON object found in response' };
  }

  let json: unknown;
  try {
    json = JSON.parse(jsonMatch[0]);
  } catch (error) {
    return { kind: 'unparsable', raw: content, reason: errorMessage(error) };
  }

  const parsed = responseSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    return { kind: 'unparsable', raw: content, reason: issues };
  }

  const { phone, ...fields } = parsed.data;
  const hasTypedPhone = [fields.mobile, fields.landline, fields.business].some((p) => normalizePhone(p) !== null);

  if (!hasTypedPhone && normalizePhone(phone) !== null) {
    const upgraded = upgradeContactFields({
      schema: 1,
      name: fields.name ?? '',
      location: fields.location ?? '',
      phone: normalizePhone(phone),
    });
    return {
      kind: 'structured',
      raw: content,
      fields: {
        name: fields.name,
        location: fields.location,
        mobile: upgraded.mobile,
        landline: upgraded.landline,
        business: upgraded.business,
      },
    };
  }

  return { kind: 'structured', raw: content, fields };
}

// ============================================================================
// Failure Classification
// ============================================================================

/**
 * Network trouble, rate limits and 5xx responses. Anything else (bad request,
 * auth) will fail the same way on a retry.
 */
export function isTransientError(error: unknown): boolean {
  // Includes APIConnectionTimeoutError, which has no status
  if (error instanceof OpenAI.APIConnectionError || error instanceof Anthropic.APIConnectionError) {
    return true;
  }
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status === 429 || error.status >= 500;
  }
  const message = errorMessage(error);
  return (
    message.includes('Connection') ||
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('ECONNRESET') ||
    message.includes('rate limit')
  );
}

// ============================================================================
// Extractor
// ============================================================================

export class ContactExtractor {
  private readonly client: CompletionClient;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly systemPrompt: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(client: CompletionClient, options: ContactExtractorOptions) {
    this.client = client;
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 100;
    this.systemPrompt = buildSystemPrompt(options.phoneRegion ?? 'Australian');
    this.maxRetries = options.maxRetries ?? 0;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  async extract(text: string): Promise<ExtractionOutcome> {
    const userPrompt = buildUserPrompt(text);

    for (let attempt = 1; ; attempt++) {
      let content: string | null;
      try {
        content = await this.client.complete({
          model: this.model,
          system: this.systemPrompt,
          user: userPrompt,
          maxTokens: this.maxTokens,
        });
      } catch (error) {
        const transient = isTransientError(error);
        if (transient && attempt <= this.maxRetries) {
          const delay = Math.pow(2, attempt - 1) * this.retryDelayMs;
          console.error(`[extract] ${errorMessage(error)} (attempt ${attempt}), retrying in ${delay}ms`);
          await new Promise((resolve) => setTimeout(resolve, delay));
          continue;
        }
        return { kind: 'failed', error: errorMessage(error), transient, attempts: attempt };
      }

      if (content === null || content.trim() === '') {
        return { kind: 'empty' };
      }
      return parseExtraction(content);
    }
  }
}
