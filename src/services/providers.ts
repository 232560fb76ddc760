import { AuthError, ModelUnavailableError, classifyError, errorFromStatus } from '../core/errors.js';
import type { ModelProfile, ProviderKind } from '../types/model-routing.js';
import { scrubSensitiveText } from '../utils/logger.js';

export interface ProviderRequest {
  model: ModelProfile;
  prompt: string;
  /** Conversation context assembled from history and recalled memories. */
  context: string;
  maxTokens: number;
  signal: AbortSignal;
}

/** Uniform invocation contract; failures are thrown as `OrchestratorError`s. */
export interface Provider {
  readonly kind: ProviderKind;
  invoke(request: ProviderRequest): Promise<string>;
}

/** One provider per kind, selected by `ModelProfile.providerKind`. */
export type ProviderSet = Readonly<Record<ProviderKind, Provider>>;

export function providerFor(providers: ProviderSet, model: ModelProfile): Provider {
  return providers[model.providerKind];
}

export function parseRetryAfterMs(rawHeader: string | null, now: number = Date.now()): number | null {
  if (!rawHeader) {
    return null;
  }

  const asSeconds = Number(rawHeader);
  if (Number.isFinite(asSeconds) && asSeconds >= 0) {
    return Math.floor(asSeconds * 1_000);
  }

  const asDateMs = Date.parse(rawHeader);
  if (!Number.isFinite(asDateMs)) {
    return null;
  }
  return Math.max(0, asDateMs - now);
}

async function readErrorDetail(response: Response): Promise<string> {
  try {
    return scrubSensitiveText((await response.text()).slice(0, 500));
  } catch {
    return response.statusText;
  }
}

async function send(fetchFn: typeof fetch, url: string, init: RequestInit): Promise<Response> {
  try {
    return await fetchFn(url, init);
  } catch (error) {
    throw classifyError(error);
  }
}

function extractChatContent(body: unknown): string | null {
  if (typeof body !== 'object' || body === null || !('choices' in body) || !Array.isArray(body.choices)) {
    return null;
  }
  const first: unknown = body.choices[0];
  if (typeof first !== 'object' || first === null || !('message' in first)) {
    return null;
  }
  const message: unknown = first.message;
  if (typeof message !== 'object' || message === null || !('content' in message) || typeof message.content !== 'string') {
    return null;
  }
  return message.content;
}

function extractGeneratedText(body: unknown): string | null {
  if (typeof body !== 'object' || body === null || !('response' in body) || typeof body.response !== 'string') {
    return null;
  }
  return body.response;
}

export interface CloudApiProviderOptions {
  apiKey: string | null;
  /** OpenAI-compatible chat completions endpoint. */
  baseUrl: string;
  fetchFn?: typeof fetch;
}

/** OpenRouter (or any OpenAI-compatible) chat completions. */
export class CloudApiProvider implements Provider {
  readonly kind = 'cloud_api' as const;
  readonly #options: CloudApiProviderOptions;
  readonly #fetch: typeof fetch;

  constructor(options: CloudApiProviderOptions) {
    this.#options = options;
    this.#fetch = options.fetchFn ?? fetch;
  }

  async invoke(request: ProviderRequest): Promise<string> {
    if (!this.#options.apiKey) {
      throw new AuthError('OPENROUTER_API_KEY is not configured.');
    }

    const messages = [
      ...(request.context ? [{ role: 'system', content: request.context }] : []),
      { role: 'user', content: request.prompt },
    ];
    const response = await send(this.#fetch, this.#options.baseUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.#options.apiKey}`,
        'X-Title': 'Waypoint',
      },
      body: JSON.stringify({ model: request.model.name, messages, max_tokens: request.maxTokens }),
      signal: request.signal,
    });

    if (!response.ok) {
      const detail = await readErrorDetail(response);
      throw errorFromStatus(response.status, `${request.model.id}: ${detail}`, parseRetryAfterMs(response.headers.get('retry-after')));
    }

    const content = extractChatContent(await response.json());
    if (content === null || !content.trim()) {
      throw new ModelUnavailableError(`Model ${request.model.id} returned an empty choices payload.`);
    }
    return content;
  }
}

export interface LocalInferenceProviderOptions {
  baseUrl: string;
  fetchFn?: typeof fetch;
}

/** Ollama `/api/generate`, non-streaming. */
export class LocalInferenceProvider implements Provider {
  readonly kind = 'local_inference' as const;
  readonly #endpoint: string;
  readonly #fetch: typeof fetch;

  constructor(options: LocalInferenceProviderOptions) {
    this.#endpoint = `${options.baseUrl.replace(/\/$/, '')}/api/generate`;
    this.#fetch = options.fetchFn ?? fetch;
  }

  async invoke(request: ProviderRequest): Promise<string> {
    const prompt = request.context ? `${request.context}\n\n${request.prompt}` : request.prompt;
    const response = await send(this.#fetch, this.#endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: request.model.name,
        prompt,
        stream: false,
        options: { num_predict: request.maxTokens },
      }),
      signal: request.signal,
    });

    if (!response.ok) {
      const detail = await readErrorDetail(response);
      throw errorFromStatus(response.status, `${request.model.id}: ${detail}`);
    }

    const text = extractGeneratedText(await response.json());
    if (text === null || !text.trim()) {
      throw new ModelUnavailableError(`Local model ${request.model.id} returned no text.`);
    }
    return text;
  }
}
