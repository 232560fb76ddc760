import type { EmbeddingProvider } from '../services/embedding-service.js';
import { getConfigValue } from './json-config.js';

/** Fully resolved runtime settings handed to the orchestrator at startup. */
export interface OrchestratorSettings {
    apiPort: number;
    apiHost: string;
    resourcePollSec: number;
    reconcileIntervalSec: number;
    modelProfilesPath: string;
    minConfidence: number;
    memConstrainedPercent: number;
    cpuConstrainedPercent: number;
    routingCacheTtlMs: number;
    maxStalenessMs: number;
    modelTimeoutMs: number;
    maxRetries: number;
    backoffBaseMs: number;
    backoffFactor: number;
    jitterRatio: number;
    maxTokens: number;
    failureThreshold: number;
    resetTimeoutMs: number;
    sqlitePath: string;
    redisUrl: string | null;
    storageTimeoutMs: number;
    reconcileBatchSize: number;
    embeddingDim: number;
    defaultK: number;
    maxK: number;
    vectorTimeoutMs: number;
    nativeVectorEnabled: boolean;
    openRouterApiKey: string | null;
    openRouterBaseUrl: string;
    ollamaBaseUrl: string;
    connectivityProbeHost: string;
    connectivityProbeTimeoutMs: number;
    /** Null when neither an API key nor a provider is configured; semantic recall is then off. */
    embeddingProvider: EmbeddingProvider | null;
    embeddingApiKey: string | null;
    embeddingApiUrl: string;
    embeddingModel: string;
    ollamaEmbeddingModel: string;
}

function readNumber(key: string, fallback: number, min = 0): number {
    const raw = getConfigValue(key);
    const parsed = raw === undefined ? Number.NaN : Number(raw);
    return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

function readString(key: string, fallback: string): string {
    return getConfigValue(key)?.trim() || fallback;
}

function readOptionalString(key: string, sensitive = false): string | null {
    return getConfigValue(key, sensitive)?.trim() || null;
}

function readBoolean(key: string, fallback: boolean): boolean {
    const raw = getConfigValue(key)?.trim().toLowerCase();
    if (raw === 'true' || raw === '1' || raw === 'yes') return true;
    if (raw === 'false' || raw === '0' || raw === 'no') return false;
    return fallback;
}

function readEmbeddingProvider(apiKey: string | null): EmbeddingProvider | null {
    const raw = getConfigValue('EMBEDDING_PROVIDER')?.trim().toLowerCase();
    if (raw === 'openai' || raw === 'ollama') return raw;
    return apiKey ? 'openai' : null;
}

export function resolveSettings(): OrchestratorSettings {
    const embeddingApiKey = readOptionalString('EMBEDDING_API_KEY', true) ?? readOptionalString('OPENAI_API_KEY', true);
    return {
        apiPort: readNumber('API_PORT', 3200, 1),
        apiHost: readString('API_HOST', '127.0.0.1'),
        resourcePollSec: readNumber('RESOURCE_POLL_SEC', 10, 1),
        reconcileIntervalSec: readNumber('RECONCILE_INTERVAL_SEC', 60, 1),
        modelProfilesPath: readString('MODEL_PROFILES_PATH', 'data/model-profiles.json'),
        minConfidence: readNumber('ROUTING_MIN_CONFIDENCE', 0.5),
        memConstrainedPercent: readNumber('ROUTING_MEM_CONSTRAINED_PERCENT', 80),
        cpuConstrainedPercent: readNumber('ROUTING_CPU_CONSTRAINED_PERCENT', 90),
        routingCacheTtlMs: readNumber('ROUTING_CACHE_TTL_MS', 10_000),
        maxStalenessMs: readNumber('RESOURCE_MAX_STALENESS_MS', 30_000, 1),
        modelTimeoutMs: readNumber('MODEL_TIMEOUT_MS', 30_000, 1),
        maxRetries: Math.floor(readNumber('MODEL_MAX_RETRIES', 2)),
        backoffBaseMs: readNumber('MODEL_BACKOFF_BASE_MS', 1_000),
        backoffFactor: readNumber('MODEL_BACKOFF_FACTOR', 2, 1),
        jitterRatio: readNumber('MODEL_BACKOFF_JITTER', 0.2),
        maxTokens: Math.floor(readNumber('MODEL_MAX_TOKENS', 1_024, 1)),
        failureThreshold: Math.floor(readNumber('BREAKER_FAILURE_THRESHOLD', 3, 1)),
        resetTimeoutMs: readNumber('BREAKER_RESET_TIMEOUT_MS', 30_000, 1),
        sqlitePath: readString('SQLITE_PATH', 'memory/waypoint.db'),
        redisUrl: readOptionalString('REDIS_URL', true),
        storageTimeoutMs: readNumber('STORAGE_TIMEOUT_MS', 5_000, 1),
        reconcileBatchSize: Math.floor(readNumber('RECONCILE_BATCH_SIZE', 50, 1)),
        embeddingDim: Math.floor(readNumber('MEMORY_EMBEDDING_DIM', 384, 1)),
        defaultK: Math.floor(readNumber('VECTOR_DEFAULT_K', 5, 1)),
        maxK: Math.floor(readNumber('VECTOR_MAX_K', 50, 1)),
        vectorTimeoutMs: readNumber('VECTOR_TIMEOUT_MS', 5_000, 1),
        nativeVectorEnabled: readBoolean('VECTOR_NATIVE_ENABLED', true),
        openRouterApiKey: readOptionalString('OPENROUTER_API_KEY', true),
        openRouterBaseUrl: readString('OPENROUTER_BASE_URL', 'https://openrouter.ai/api/v1/chat/completions'),
        ollamaBaseUrl: readString('OLLAMA_BASE_URL', 'http://localhost:11434'),
        connectivityProbeHost: readString('CONNECTIVITY_PROBE_HOST', 'openrouter.ai'),
        connectivityProbeTimeoutMs: readNumber('CONNECTIVITY_PROBE_TIMEOUT_MS', 1_500, 1),
        embeddingProvider: readEmbeddingProvider(embeddingApiKey),
        embeddingApiKey,
        embeddingApiUrl: readString('EMBEDDING_API_URL', 'https://api.openai.com/v1/embeddings'),
        embeddingModel: readString('EMBEDDING_MODEL', 'text-embedding-3-small'),
        ollamaEmbeddingModel: readString('OLLAMA_EMBEDDING_MODEL', 'all-minilm'),
    };
}
