/**
 * Model-Based Field Extraction
 *
 * Sends the built prompt to an OpenAI-compatible chat endpoint (a local Ollama
 * server by default) and decodes the reply into FieldExtraction. Every failure
 * at this layer becomes the empty signal (null): the merge step then falls back
 * to pattern extraction. Nothing is retried here.
 */

import OpenAI from 'openai';
import type { Config } from '../config';
import { logger } from '../logger';
import {
  llmJsonRecoveryCounter,
  llmRequestDurationHistogram,
  llmRequestsCounter,
} from '../metrics';
import {
  FIELD_KEYS,
  emptyConfidence,
  type FieldConfidence,
  type FieldExtraction,
  type Page,
} from '../types';
import { formatPagesWithLimit, renderPrompt, type BuildPromptOptions } from './prompt-builder';
import type { ModelClient, ModelPrompt } from './types';

/** Placeholder key; Ollama ignores it but the SDK requires one */
const LOCAL_API_KEY = 'ollama';

/** Decoded JSON object from the model, keys not yet validated */
export type RawModelOutput = Record<string, unknown>;

/**
 * Create a model client for the configured endpoint.
 */
export function createOpenAIModelClient(
  config: Pick<Config, 'llmBaseUrl' | 'llmModel' | 'llmRequestTimeoutMs'>
): ModelClient {
  const openai = new OpenAI({
    apiKey: LOCAL_API_KEY,
    baseURL: config.llmBaseUrl,
    timeout: config.llmRequestTimeoutMs,
    maxRetries: 0, // A failed call falls back to pattern extraction instead
  });

  return {
    model: config.llmModel,

    async complete(prompt: ModelPrompt): Promise<string> {
      const startTime = Date.now();

      try {
        const response = await openai.chat.completions.create({
          model: config.llmModel,
          messages: [
            { role: 'system', content: prompt.system },
            { role: 'user', content: prompt.user },
          ],
          stream: false,
          response_format: { type: 'json_object' },
          temperature: 0,
        });

        const duration = (Date.now() - startTime) / 1000;
        llmRequestDurationHistogram.observe({ model: config.llmModel }, duration);
        llmRequestsCounter.inc({ model: config.llmModel, status: 'success' });

        logger.info('LLM request complete', {
          model: config.llmModel,
          request_id: response.id,
          duration_seconds: duration,
          tokens_used: response.usage?.total_tokens,
        });

        return response.choices[0]?.message?.content ?? '';
      } catch (error) {
        const duration = (Date.now() - startTime) / 1000;
        llmRequestDurationHistogram.observe({ model: config.llmModel }, duration);
        llmRequestsCounter.inc({ model: config.llmModel, status: 'error' });
        throw error;
      }
    },
  };
}

function isJsonObject(value: unknown): value is RawModelOutput {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Parse the model's reply text.
 *
 * Tries the whole reply first, then the first-to-last brace span for replies
 * wrapped in prose or code fences. The second path can pick up the wrong span
 * when the reply holds several objects, so it is logged and counted.
 *
 * @returns the decoded object, or null when the reply holds no usable object
 */
export function parseModelReply(raw: string): RawModelOutput | null {
  let parsed = tryParseJson(raw);

  if (!parsed.ok) {
    const braceSpan = raw.match(/\{[\s\S]*\}/);
    if (!braceSpan) {
      logger.warn('LLM reply is not JSON', { reply_length: raw.length });
      return null;
    }

    parsed = tryParseJson(braceSpan[0]);
    if (!parsed.ok) {
      logger.warn('LLM reply is not JSON, brace span did not parse either', {
        reply_length: raw.length,
      });
      return null;
    }

    llmJsonRecoveryCounter.inc();
    logger.warn('Recovered JSON object from wrapped LLM reply', {
      reply_length: raw.length,
      span_length: braceSpan[0].length,
    });
  }

  const value = parsed.value;
  if (!isJsonObject(value) || Object.keys(value).length === 0) {
    logger.warn('LLM reply holds no JSON object with fields', {
      reply_type: Array.isArray(value) ? 'array' : typeof value,
    });
    return null;
  }

  return value;
}

function decodeString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function decodeScore(value: unknown): number {
  const score = typeof value === 'string' ? parseFloat(value) : value;
  if (typeof score !== 'number' || !Number.isFinite(score)) {
    return 0;
  }
  return Math.min(1, Math.max(0, score));
}

function decodeConfidence(value: unknown): FieldConfidence {
  const confidence = emptyConfidence();
  if (!isJsonObject(value)) {
    return confidence;
  }
  for (const field of FIELD_KEYS) {
    confidence[field] = decodeScore(value[field]);
  }
  return confidence;
}

function decodeEvidence(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((entry): entry is string => typeof entry === 'string');
}

/**
 * Map a parsed model object onto FieldExtraction, defaulting absent or
 * malformed keys. The dob is passed through as written; the merge step
 * canonicalizes it.
 */
export function decodeModelOutput(output: RawModelOutput): FieldExtraction {
  return {
    doctor_name: decodeString(output.doctor_name),
    patient_name: decodeString(output.patient_name),
    dob: decodeString(output.dob),
    confidence: decodeConfidence(output.confidence),
    evidence: decodeEvidence(output.evidence),
  };
}

export type ModelExtractionOptions = BuildPromptOptions;

/**
 * Ask the model for the three fields.
 *
 * @returns the decoded fields, or null when the endpoint failed or its reply was unusable
 */
export async function extractWithModel(
  pages: readonly Page[],
  client: ModelClient,
  options: ModelExtractionOptions = {}
): Promise<FieldExtraction | null> {
  const formatted = formatPagesWithLimit(pages, options.maxChars);
  const prompt = renderPrompt(formatted.text, options.template);

  logger.info('Extracting fields with LLM', {
    model: client.model,
    page_count: pages.length,
    included_pages: formatted.includedPages,
    truncated: formatted.truncated,
    prompt_length: prompt.user.length,
  });

  let reply: string;
  try {
    reply = await client.complete(prompt);
  } catch (error) {
    logger.error('LLM request failed', error, { model: client.model });
    return null;
  }

  const output = parseModelReply(reply);
  if (!output) {
    return null;
  }

  return decodeModelOutput(output);
}
