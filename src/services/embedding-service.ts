import { ModelUnavailableError, ValidationError, errorFromStatus } from '../core/errors.js';
import { withTimeout } from '../utils/retry.js';

export type EmbeddingProvider = 'openai' | 'ollama';

/** Text to fixed-dimension vector. */
export interface Embedder {
    readonly dimensions: number;
    embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface EmbeddingServiceOptions {
    dimensions: number;
    /** Tried first; the other provider is the fallback. @default 'openai' */
    preferredProvider?: EmbeddingProvider | '';
    apiKey?: string | null;
    apiUrl?: string;
    model?: string;
    ollamaBaseUrl?: string;
    ollamaModel?: string;
    /** @default 10000 */
    timeoutMs?: number;
    fetchFn?: typeof fetch;
}

const DEFAULT_OPENAI_URL = 'https://api.openai.com/v1/embeddings';
const DEFAULT_OPENAI_MODEL = 'text-embedding-3-small';
const DEFAULT_OLLAMA_URL = 'http://localhost:11434';
const DEFAULT_OLLAMA_MODEL = 'all-minilm';

/** Truncate or zero-pad so every vector has the configured dimension. */
export function normalizeEmbeddingLength(embedding: number[], expectedDimensions: number): number[] {
    if (embedding.length === expectedDimensions) {
        return embedding;
    }

    if (embedding.length > expectedDimensions) {
        return embedding.slice(0, expectedDimensions);
    }

    return [...embedding, ...new Array<number>(expectedDimensions - embedding.length).fill(0)];
}

function readNumberArray(value: unknown): number[] | null {
    if (!Array.isArray(value) || !value.every((item) => typeof item === 'number')) {
        return null;
    }
    return value.filter((item): item is number => typeof item === 'number');
}

function extractOpenAiEmbedding(body: unknown): number[] | null {
    if (typeof body !== 'object' || body === null || !('data' in body) || !Array.isArray(body.data)) {
        return null;
    }
    const first: unknown = body.data[0];
    if (typeof first !== 'object' || first === null || !('embedding' in first)) {
        return null;
    }
    return readNumberArray(first.embedding);
}

function extractOllamaEmbedding(body: unknown): number[] | null {
    if (typeof body !== 'object' || body === null || !('embedding' in body)) {
        return null;
    }
    return readNumberArray(body.embedding);
}

/** OpenAI-compatible and Ollama embeddings, tried in preference order. */
export class EmbeddingService implements Embedder {
    readonly dimensions: number;
    private readonly options: EmbeddingServiceOptions;
    private readonly fetchFn: typeof fetch;
    private readonly timeoutMs: number;

    constructor(options: EmbeddingServiceOptions) {
        if (!Number.isInteger(options.dimensions) || options.dimensions <= 0) {
            throw new ValidationError(`Embedding dimensions must be a positive integer, got ${options.dimensions}.`);
        }
        this.dimensions = options.dimensions;
        this.options = options;
        this.fetchFn = options.fetchFn ?? fetch;
        this.timeoutMs = Math.max(1, options.timeoutMs ?? 10_000);
    }

    public async embed(text: string, signal?: AbortSignal): Promise<number[]> {
        const normalizedInput = text.trim();
        if (!normalizedInput) {
            throw new ValidationError('Cannot embed empty text.');
        }

        const failures: string[] = [];
        for (const provider of this.getProviderOrder()) {
            try {
                const embedding = await withTimeout(
                    (innerSignal) =>
                        provider === 'ollama'
                            ? this.embedWithOllama(normalizedInput, innerSignal)
                            : this.embedWithOpenAI(normalizedInput, innerSignal),
                    this.timeoutMs,
                    `embedding:${provider}`,
                    signal,
                );

                if (embedding.length > 0) {
                    return normalizeEmbeddingLength(embedding, this.dimensions);
                }
                failures.push(`${provider}: empty embedding`);
            } catch (error) {
                if (signal?.aborted) {
                    throw error;
                }
                const message = error instanceof Error ? error.message : String(error);
                console.warn(`[EmbeddingService] Provider '${provider}' failed: ${message}`);
                failures.push(`${provider}: ${message}`);
            }
        }

        throw new ModelUnavailableError(`No embedding provider produced a vector (${failures.join('; ')}).`);
    }

    private getProviderOrder(): EmbeddingProvider[] {
        return this.options.preferredProvider === 'ollama' ? ['ollama', 'openai'] : ['openai', 'ollama'];
    }

    private async embedWithOpenAI(input: string, signal: AbortSignal): Promise<number[]> {
        const apiKey = this.options.apiKey ?? '';
        if (!apiKey) {
            throw new ValidationError('Missing EMBEDDING_API_KEY or OPENAI_API_KEY.');
        }

        const response = await this.fetchFn(this.options.apiUrl ?? DEFAULT_OPENAI_URL, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                Authorization: `Bearer ${apiKey}`,
            },
            body: JSON.stringify({
                model: this.options.model ?? DEFAULT_OPENAI_MODEL,
                input,
            }),
            signal,
        });

        if (!response.ok) {
            throw errorFromStatus(response.status, 'OpenAI embeddings request failed.');
        }

        const embedding = extractOpenAiEmbedding(await response.json());
        if (!embedding) {
            throw new ModelUnavailableError('OpenAI embeddings response did not contain an embedding array.');
        }
        return embedding;
    }

    private async embedWithOllama(input: string, signal: AbortSignal): Promise<number[]> {
        const baseUrl = this.options.ollamaBaseUrl ?? DEFAULT_OLLAMA_URL;
        const endpoint = `${baseUrl.replace(/\/$/, '')}/api/embeddings`;

        const response = await this.fetchFn(endpoint, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
            },
            body: JSON.stringify({
                model: this.options.ollamaModel ?? DEFAULT_OLLAMA_MODEL,
                prompt: input,
            }),
            signal,
        });

        if (!response.ok) {
            throw errorFromStatus(response.status, 'Ollama embeddings request failed.');
        }

        const embedding = extractOllamaEmbedding(await response.json());
        if (!embedding) {
            throw new ModelUnavailableError('Ollama embeddings response did not contain an embedding array.');
        }
        return embedding;
    }
}
