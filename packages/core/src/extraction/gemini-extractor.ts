/**
 * Gemini Candidate Extractor
 *
 * Asks the Gemini `generateContent` endpoint for a JSON guess of the money
 * movement described by a message. Only the syntactic shape of the reply is
 * checked here; the normalizer validates the fields. No retries.
 */

import { z } from 'zod';
import {
  extractionFailure,
  type CandidateExtractor,
  type CandidateRecord,
  type ExtractOptions,
  type ExtractionResult,
} from './extraction-types.js';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';
export const DEFAULT_GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

export interface GeminiExtractorOptions {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  /**
   * Category labels offered to the model when the caller passes none
   */
  categories?: readonly string[];
  fetch?: typeof fetch;
}

const GenerateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string().optional() })).min(1),
        }),
      })
    )
    .min(1),
});

const CandidateObjectSchema = z.record(z.unknown());

const CODE_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

export class GeminiExtractor implements CandidateExtractor {
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: GeminiExtractorOptions) {
    this.model = options.model ?? DEFAULT_GEMINI_MODEL;
    this.baseUrl = (options.baseUrl ?? DEFAULT_GEMINI_BASE_URL).replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async extract(rawText: string, options: ExtractOptions = {}): Promise<ExtractionResult> {
    const { signal } = options;
    const categories = options.categoryHints ?? this.options.categories ?? [];

    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint(), {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(buildRequest(rawText, categories)),
        ...(signal && { signal }),
      });
    } catch (error) {
      return failureFromThrown(error, signal, 'Extraction service unreachable');
    }

    if (!response.ok) {
      // Release the connection; the error body is not used
      await response.body?.cancel();
      return extractionFailure(
        'unreachable',
        `Extraction service responded with HTTP ${response.status}`,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (isAbort(error, signal)) {
        return extractionFailure('timeout', 'Extraction request timed out');
      }
      return extractionFailure('malformed', 'Extraction response is not JSON');
    }

    const envelope = GenerateContentResponseSchema.safeParse(body);
    const text = envelope.success ? envelope.data.candidates[0]?.content.parts[0]?.text : undefined;
    if (!text) {
      return extractionFailure('malformed', 'Extraction response has no candidate text');
    }

    return parseCandidateText(text);
  }

  private endpoint(): string {
    const key = encodeURIComponent(this.options.apiKey);
    return `${this.baseUrl}/models/${this.model}:generateContent?key=${key}`;
  }
}

/**
 * Parse the model's text part into a candidate record
 */
export function parseCandidateText(text: string): ExtractionResult {
  const trimmed = text.trim();
  const unfenced = CODE_FENCE.exec(trimmed)?.[1] ?? trimmed;

  let parsed: unknown;
  try {
    parsed = JSON.parse(unfenced);
  } catch {
    return extractionFailure('malformed', 'Candidate text is not valid JSON');
  }

  const object = CandidateObjectSchema.safeParse(parsed);
  if (!object.success) {
    return extractionFailure('malformed', 'Candidate text is not a JSON object');
  }

  const { amount, description, category, type } = object.data;
  const candidate: CandidateRecord = { amount, description, category, type };
  return { ok: true, candidate };
}

function buildRequest(rawText: string, categories: readonly string[]) {
  const categoryList = categories.map((category) => `'${category}'`).join(', ');

  return {
    contents: [
      {
        role: 'user',
        parts: [
          {
            text:
              'Extract expense/income data from the following message. ' +
              "Reply ONLY with a JSON object containing 'description' (string), " +
              `'category' (string${categoryList ? `, one of ${categoryList}` : ''}), ` +
              "'amount' (number) and 'type' (string, either 'expense' or 'income'). " +
              'Leave out any field the message does not state.\n\n' +
              `Message: ${rawText}`,
          },
        ],
      },
    ],
    generationConfig: {
      responseMimeType: 'application/json',
      responseSchema: {
        type: 'OBJECT',
        properties: {
          description: { type: 'STRING' },
          category: { type: 'STRING' },
          amount: { type: 'NUMBER' },
          type: { type: 'STRING', enum: ['expense', 'income'] },
        },
      },
      temperature: 0.0,
      maxOutputTokens: 500,
    },
  };
}

function failureFromThrown(
  error: unknown,
  signal: AbortSignal | undefined,
  message: string
): ExtractionResult {
  if (isAbort(error, signal)) {
    return extractionFailure('timeout', 'Extraction request timed out');
  }
  const detail = error instanceof Error ? `: ${error.message}` : '';
  return extractionFailure('unreachable', `${message}${detail}`);
}

function isAbort(error: unknown, signal: AbortSignal | undefined): boolean {
  if (signal?.aborted) {
    return true;
  }
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}
