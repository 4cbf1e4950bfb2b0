/**
 * Gemini Extractor Tests
 *
 * The HTTP client is replaced by a fake `fetch`; nothing leaves the process.
 */

import { describe, it, expect, vi } from 'vitest';
import { GeminiExtractor, parseCandidateText } from '../gemini-extractor.js';

function geminiReply(text: string): Response {
  return new Response(JSON.stringify({ candidates: [{ content: { parts: [{ text }] } }] }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

function extractorWith(fetch: typeof globalThis.fetch) {
  return new GeminiExtractor({
    apiKey: 'test-secret',
    baseUrl: 'https://example.test/v1beta/',
    fetch,
  });
}

describe('GeminiExtractor', () => {
  it('should return the candidate the model produced', async () => {
    const fetch = vi.fn<typeof globalThis.fetch>(async () =>
      geminiReply('{"amount":300,"description":"Diapers","category":"Baby Care","type":"expense"}')
    );

    const result = await extractorWith(fetch).extract('Spent 300 on diapers');

    expect(result).toEqual({
      ok: true,
      candidate: { amount: 300, description: 'Diapers', category: 'Baby Care', type: 'expense' },
    });
  });

  it('should post the message and category hints to generateContent', async () => {
    const fetch = vi.fn<typeof globalThis.fetch>(async () => geminiReply('{}'));

    await extractorWith(fetch).extract('Spent 300 on diapers', {
      categoryHints: ['Rent', 'Baby Care'],
    });

    expect(fetch).toHaveBeenCalledOnce();
    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe(
      'https://example.test/v1beta/models/gemini-2.0-flash:generateContent?key=test-secret'
    );
    expect(init?.method).toBe('POST');
    const prompt = JSON.parse(String(init?.body)).contents[0].parts[0].text;
    expect(prompt).toContain("one of 'Rent', 'Baby Care'");
    expect(prompt.endsWith('Message: Spent 300 on diapers')).toBe(true);
  });

  it('should report HTTP errors as unreachable with the status', async () => {
    const fetch = vi.fn<typeof globalThis.fetch>(
      async () => new Response('overloaded', { status: 503 })
    );

    const result = await extractorWith(fetch).extract('coffee 40');

    expect(result).toEqual({
      ok: false,
      failure: {
        kind: 'unreachable',
        message: 'Extraction service responded with HTTP 503',
        retryable: true,
        status: 503,
      },
    });
  });

  it('should cancel the unread body of an error response', async () => {
    const cancel = vi.fn();
    const body = new ReadableStream<Uint8Array>({
      pull() {
        // Never yields; only a cancel ends it
      },
      cancel,
    });
    const fetch = vi.fn<typeof globalThis.fetch>(async () => new Response(body, { status: 500 }));

    const result = await extractorWith(fetch).extract('coffee 40');

    expect(result).toMatchObject({ ok: false, failure: { kind: 'unreachable', status: 500 } });
    expect(cancel).toHaveBeenCalledOnce();
  });

  it('should report network errors as unreachable', async () => {
    const fetch = vi.fn<typeof globalThis.fetch>(async () => {
      throw new TypeError('fetch failed');
    });

    const result = await extractorWith(fetch).extract('coffee 40');

    expect(result).toEqual({
      ok: false,
      failure: {
        kind: 'unreachable',
        message: 'Extraction service unreachable: fetch failed',
        retryable: true,
      },
    });
  });

  it('should report an aborted call as a timeout', async () => {
    const controller = new AbortController();
    const fetch = vi.fn<typeof globalThis.fetch>(async () => {
      controller.abort();
      throw new DOMException('This operation was aborted', 'AbortError');
    });

    const result = await extractorWith(fetch).extract('coffee 40', { signal: controller.signal });

    expect(result).toEqual({
      ok: false,
      failure: { kind: 'timeout', message: 'Extraction request timed out', retryable: true },
    });
  });

  it('should report a body that is not JSON as malformed', async () => {
    const fetch = vi.fn<typeof globalThis.fetch>(
      async () => new Response('<html></html>', { status: 200 })
    );

    const result = await extractorWith(fetch).extract('coffee 40');

    expect(result).toMatchObject({
      ok: false,
      failure: { kind: 'malformed', message: 'Extraction response is not JSON' },
    });
  });

  it('should report a reply without candidate text as malformed', async () => {
    const fetch = vi.fn<typeof globalThis.fetch>(
      async () => new Response(JSON.stringify({ candidates: [] }), { status: 200 })
    );

    const result = await extractorWith(fetch).extract('coffee 40');

    expect(result).toMatchObject({
      ok: false,
      failure: { kind: 'malformed', message: 'Extraction response has no candidate text' },
    });
  });
});

describe('parseCandidateText', () => {
  it('should unwrap a fenced JSON block', () => {
    expect(parseCandidateText('```json\n{"amount": "₹300"}\n```')).toEqual({
      ok: true,
      candidate: { amount: '₹300' },
    });
  });

  it('should keep only the candidate fields', () => {
    const result = parseCandidateText('{"amount": 1, "description": "Gum", "note": "x"}');

    expect(result).toEqual({ ok: true, candidate: { amount: 1, description: 'Gum' } });
    expect(result.ok && 'note' in result.candidate).toBe(false);
  });

  it('should reject text that is not JSON', () => {
    expect(parseCandidateText('Sure! Here you go')).toMatchObject({
      ok: false,
      failure: { kind: 'malformed', message: 'Candidate text is not valid JSON' },
    });
  });

  it('should reject JSON that is not an object', () => {
    expect(parseCandidateText('[300, "diapers"]')).toMatchObject({
      ok: false,
      failure: { kind: 'malformed', message: 'Candidate text is not a JSON object' },
    });
  });
});
