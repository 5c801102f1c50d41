import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConfigError, HttpError, NoopLogger, RateLimitError, TimeoutError } from '@gamemind/shared';
import { OllamaAdapter } from './adapter';
import type { AdapterContext } from '../types';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('OllamaAdapter', () => {
  const fetchMock = vi.fn();
  const ctx: AdapterContext = { runId: 'test-run', logger: new NoopLogger() };

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const adapter = () =>
    new OllamaAdapter({ baseUrl: 'http://localhost:11434/', model: 'llama2' });

  it('rejects an empty base URL', () => {
    expect(() => new OllamaAdapter({ baseUrl: '', model: 'llama2' })).toThrow(ConfigError);
  });

  it('posts a non-streaming generate request', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ response: '1. Find trees', prompt_eval_count: 12, eval_count: 5 }),
    );

    const result = await adapter().generate(
      { messages: [{ role: 'user', content: 'Plan: collect wood' }], maxTokens: 128, temperature: 0.7 },
      ctx,
    );

    expect(result.text).toBe('1. Find trees');
    expect(result.usage).toEqual({ inputTokens: 12, outputTokens: 5, totalTokens: 17 });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:11434/api/generate');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'llama2',
      prompt: 'Plan: collect wood',
      stream: false,
      options: { num_predict: 128, temperature: 0.7, top_p: 0.9, repeat_penalty: 1.1 },
    });
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('sends a bearer token when configured', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ response: 'ok' }));
    const withKey = new OllamaAdapter({
      baseUrl: 'http://localhost:11434',
      model: 'llama2',
      apiKey: 'test-secret',
    });

    await withKey.generate({ messages: [{ role: 'user', content: 'hi' }] }, ctx);

    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
  });

  it('treats a missing response field as empty text', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ done: true }));

    const result = await adapter().generate({ messages: [{ role: 'user', content: 'hi' }] }, ctx);

    expect(result.text).toBe('');
    expect(result.usage).toBeUndefined();
  });

  it.each([
    [429, RateLimitError],
    [401, ConfigError],
    [500, HttpError],
  ])('maps status %i', async (status, ErrorClass) => {
    fetchMock.mockResolvedValue(new Response('nope', { status }));

    await expect(
      adapter().generate({ messages: [{ role: 'user', content: 'hi' }] }, ctx),
    ).rejects.toBeInstanceOf(ErrorClass);
  });

  it('surfaces its own timeout', async () => {
    fetchMock.mockImplementation(
      (_url: string, init?: RequestInit) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')));
        }),
    );

    await expect(
      adapter().generate({ messages: [{ role: 'user', content: 'hi' }] }, { ...ctx, timeoutMs: 10 }),
    ).rejects.toBeInstanceOf(TimeoutError);
  });

  describe('probe', () => {
    it('lists installed models', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ models: [{ name: 'llama2:latest', size: 1 }, { name: 'mistral:7b' }] }),
      );

      expect(await adapter().probe(100)).toEqual({
        available: true,
        models: ['llama2:latest', 'mistral:7b'],
      });
      expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:11434/api/tags');
      expect(fetchMock.mock.calls[0][1]?.method).toBe('GET');
    });

    it('reports an error status as unavailable', async () => {
      fetchMock.mockResolvedValue(new Response('down', { status: 503 }));

      expect(await adapter().probe(100)).toEqual({
        available: false,
        models: [],
        error: 'Ollama server returned status 503',
      });
    });

    it('reports connection failures as unavailable', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      expect(await adapter().probe(100)).toEqual({
        available: false,
        models: [],
        error: 'fetch failed',
      });
    });
  });

  it('describes itself', () => {
    expect(adapter().id()).toBe('ollama');
  });
});
