import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ModelUnavailableError, ValidationError } from '../../src/core/errors.js';
import { EmbeddingService, normalizeEmbeddingLength } from '../../src/services/embedding-service.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('normalizeEmbeddingLength', () => {
  it('truncates long vectors and zero-pads short ones', () => {
    expect(normalizeEmbeddingLength([1, 2, 3, 4], 3)).toEqual([1, 2, 3]);
    expect(normalizeEmbeddingLength([1], 3)).toEqual([1, 0, 0]);
  });
});

describe('EmbeddingService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('calls the OpenAI-compatible endpoint first', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ data: [{ embedding: [0.1, 0.2, 0.3, 0.4] }] }));
    const service = new EmbeddingService({
      dimensions: 3,
      apiKey: 'test-secret',
      apiUrl: 'https://embeddings.test/v1/embeddings',
      fetchFn,
    });

    await expect(service.embed('  hello  ')).resolves.toEqual([0.1, 0.2, 0.3]);

    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe('https://embeddings.test/v1/embeddings');
    expect(init?.body).toBe(JSON.stringify({ model: 'text-embedding-3-small', input: 'hello' }));
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-secret');
  });

  it('falls back to Ollama when the first provider fails', async () => {
    const fetchFn = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(jsonResponse({ error: 'unavailable' }, 503))
      .mockResolvedValueOnce(jsonResponse({ embedding: [0.5, 0.5] }));
    const service = new EmbeddingService({
      dimensions: 3,
      apiKey: 'test-secret',
      ollamaBaseUrl: 'http://ollama.test:11434/',
      fetchFn,
    });

    await expect(service.embed('hello')).resolves.toEqual([0.5, 0.5, 0]);
    expect(fetchFn.mock.calls[1]?.[0]).toBe('http://ollama.test:11434/api/embeddings');
  });

  it('tries Ollama first when preferred', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ embedding: [1, 0, 0] }));
    const service = new EmbeddingService({ dimensions: 3, preferredProvider: 'ollama', fetchFn });

    await service.embed('hello');

    expect(fetchFn.mock.calls[0]?.[0]).toBe('http://localhost:11434/api/embeddings');
  });

  it('raises ModelUnavailableError when every provider fails', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ unexpected: true }));
    const service = new EmbeddingService({ dimensions: 3, fetchFn });

    // no API key: OpenAI fails before fetching, Ollama returns no embedding
    await expect(service.embed('hello')).rejects.toBeInstanceOf(ModelUnavailableError);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('rejects empty text and invalid dimensions', async () => {
    expect(() => new EmbeddingService({ dimensions: 0 })).toThrow(ValidationError);
    await expect(new EmbeddingService({ dimensions: 3 }).embed('   ')).rejects.toBeInstanceOf(ValidationError);
  });
});
