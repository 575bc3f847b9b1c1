import { describe, it, expect, vi } from 'vitest';
import { OllamaReportGenerator } from './ollama-report-generator';
import { isReportError } from './report-generator';
import type { ReportExcerpt } from '../excerpt/excerpt-formatter';

const EXCERPT: ReportExcerpt = {
  text: '| Date | close | SMA_5 |\n| --- | ---: | ---: |\n| 2024-03-01 | 10.00 | 9.80 |',
  rows: 1,
  columns: ['close', 'SMA_5'],
  selection: 'rows',
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createGenerator(fetchFn: typeof fetch): OllamaReportGenerator {
  return new OllamaReportGenerator({
    host: 'http://ollama.test:11434/',
    model: 'test-model',
    maxTokens: 256,
    timeoutMs: 1000,
    fetchFn,
  });
}

describe('OllamaReportGenerator', () => {
  it('posts a non-streaming generate request and returns the trimmed report', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () =>
      jsonResponse({ model: 'test-model', response: '  Bullish crossover.  \n', done: true })
    );

    const report = await createGenerator(fetchFn).generate(EXCERPT, 30);

    expect(report).toBe('Bullish crossover.');
    expect(fetchFn).toHaveBeenCalledTimes(1);
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe('http://ollama.test:11434/api/generate');
    expect(init?.method).toBe('POST');
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({
      model: 'test-model',
      stream: false,
      options: { num_predict: 256 },
    });
    const prompt = typeof body === 'object' && body !== null && 'prompt' in body ? body.prompt : '';
    expect(prompt).toContain('(last 30 rows)');
    expect(prompt).toContain('these indicators: SMA_5.');
  });

  it('returns an ERROR: string on a non-OK status', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => new Response('model not found', { status: 404 }));

    const report = await createGenerator(fetchFn).generate(EXCERPT, 30);

    expect(report).toBe('ERROR: Report model request failed with status 404');
    expect(isReportError(report)).toBe(true);
  });

  it('returns an ERROR: string when the response shape is unexpected', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => jsonResponse({ message: 'hi' }));

    const report = await createGenerator(fetchFn).generate(EXCERPT, 30);

    expect(report).toBe('ERROR: Report model returned an unexpected response');
  });

  it('returns an ERROR: string for an empty report', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => jsonResponse({ response: '   ' }));

    expect(await createGenerator(fetchFn).generate(EXCERPT, 30)).toBe(
      'ERROR: Report model returned an empty report'
    );
  });

  it('returns an ERROR: string instead of throwing when the request fails', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => {
      throw new Error('connect ECONNREFUSED');
    });

    const report = await createGenerator(fetchFn).generate(EXCERPT, 30);

    expect(report).toBe(
      'ERROR: Failed to generate report due to an unexpected error: connect ECONNREFUSED'
    );
  });
});
