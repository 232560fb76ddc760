import * as fs from 'fs/promises';
import { existsSync, readFileSync } from 'fs';
import * as path from 'path';

export interface WaypointConfig {
    runtime: {
        apiPort: number;
        apiHost: string;
        resourcePollSec: number;
        reconcileIntervalSec: number;
    };
    routing: {
        modelProfilesPath: string;
        minConfidence: number;
        memConstrainedPercent: number;
        cpuConstrainedPercent: number;
        cacheTtlMs: number;
        maxStalenessMs: number;
    };
    invocation: {
        modelTimeoutMs: number;
        maxRetries: number;
        backoffBaseMs: number;
        backoffFactor: number;
        jitterRatio: number;
        maxTokens: number;
    };
    resilience: {
        failureThreshold: number;
        resetTimeoutMs: number;
    };
    storage: {
        sqlitePath: string;
        redisUrl: string;
        storageTimeoutMs: number;
        reconcileBatchSize: number;
    };
    vector: {
        embeddingDim: number;
        defaultK: number;
        maxK: number;
        vectorTimeoutMs: number;
        nativeEnabled: boolean;
    };
    providers: {
        openRouterApiKey: string;
        openRouterBaseUrl: string;
        ollamaBaseUrl: string;
    };
    connectivity: {
        probeHost: string;
        probeTimeoutMs: number;
    };
    integration: {
        embeddingProvider: 'openai' | 'ollama' | '';
        embeddingApiKey: string;
        openaiApiKey: string;
        embeddingApiUrl: string;
        embeddingModel: string;
        ollamaEmbeddingModel: string;
    };
}

export const DEFAULT_CONFIG: WaypointConfig = {
    runtime: {
        apiPort: 3200,
        apiHost: '127.0.0.1',
        resourcePollSec: 10,
        reconcileIntervalSec: 60,
    },
    routing: {
        modelProfilesPath: 'data/model-profiles.json',
        minConfidence: 0.5,
        memConstrainedPercent: 80,
        cpuConstrainedPercent: 90,
        cacheTtlMs: 10_000,
        maxStalenessMs: 30_000,
    },
    invocation: {
        modelTimeoutMs: 30_000,
        maxRetries: 2,
        backoffBaseMs: 1_000,
        backoffFactor: 2,
        jitterRatio: 0.2,
        maxTokens: 1_024,
    },
    resilience: {
        failureThreshold: 3,
        resetTimeoutMs: 30_000,
    },
    storage: {
        sqlitePath: 'memory/waypoint.db',
        redisUrl: '',
        storageTimeoutMs: 5_000,
        reconcileBatchSize: 50,
    },
    vector: {
        embeddingDim: 384,
        defaultK: 5,
        maxK: 50,
        vectorTimeoutMs: 5_000,
        nativeEnabled: true,
    },
    providers: {
        openRouterApiKey: '',
        openRouterBaseUrl: 'https://openrouter.ai/api/v1/chat/completions',
        ollamaBaseUrl: 'http://localhost:11434',
    },
    connectivity: {
        probeHost: 'openrouter.ai',
        probeTimeoutMs: 1_500,
    },
    integration: {
        embeddingProvider: '',
        embeddingApiKey: '',
        openaiApiKey: '',
        embeddingApiUrl: 'https://api.openai.com/v1/embeddings',
        embeddingModel: 'text-embedding-3-small',
        ollamaEmbeddingModel: 'all-minilm',
    },
};

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.WAYPOINT_CONFIG_PATH) {
        return path.resolve(process.env.WAYPOINT_CONFIG_PATH);
    }
    return path.resolve('waypoint.json');
}

export async function readConfig(overridePath?: string): Promise<WaypointConfig> {
    const targetPath = getConfigPath(overridePath);
    try {
        const rawData = await fs.readFile(targetPath, 'utf-8');
        return mergeWithDefaults(JSON.parse(rawData));
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return mergeWithDefaults({});
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to parse config file at ${targetPath}: ${message}`);
    }
}

export async function writeConfig(config: WaypointConfig, overridePath?: string): Promise<void> {
    const targetPath = getConfigPath(overridePath);
    await fs.mkdir(path.dirname(targetPath), { recursive: true });
    const tempPath = `${targetPath}.${Date.now()}.tmp`;
    try {
        await fs.writeFile(tempPath, JSON.stringify(config, null, 2), { encoding: 'utf-8', mode: 0o600 });
        await fs.rename(tempPath, targetPath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to save config to ${targetPath}: ${message}`);
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Overlay the keys of `incoming` that `defaults` declares, when the value has the default's type. */
function mergeSection<T extends object>(defaults: T, incoming: unknown): T {
    if (!isRecord(incoming)) return { ...defaults };
    const expectedTypes = new Map(Object.entries(defaults).map(([key, value]) => [key, typeof value]));
    const accepted = Object.entries(incoming).filter(([key, value]) => expectedTypes.get(key) === typeof value);
    return Object.assign({ ...defaults }, Object.fromEntries(accepted));
}

/** Shallow-merge each known section over the defaults. */
export function mergeWithDefaults(loaded: unknown): WaypointConfig {
    const source = isRecord(loaded) ? loaded : {};
    return {
        runtime: mergeSection(DEFAULT_CONFIG.runtime, source.runtime),
        routing: mergeSection(DEFAULT_CONFIG.routing, source.routing),
        invocation: mergeSection(DEFAULT_CONFIG.invocation, source.invocation),
        resilience: mergeSection(DEFAULT_CONFIG.resilience, source.resilience),
        storage: mergeSection(DEFAULT_CONFIG.storage, source.storage),
        vector: mergeSection(DEFAULT_CONFIG.vector, source.vector),
        providers: mergeSection(DEFAULT_CONFIG.providers, source.providers),
        connectivity: mergeSection(DEFAULT_CONFIG.connectivity, source.connectivity),
        integration: mergeSection(DEFAULT_CONFIG.integration, source.integration),
    };
}

// ── Flat KV Adapter ─────────────────────────────────────────────────────────

let cachedConfig: WaypointConfig | null = null;
const legacyWarningEmitted = new Set<string>();

export function clearConfigCacheForTests(): void {
    cachedConfig = null;
    legacyWarningEmitted.clear();
}

export function reloadConfigSync(): WaypointConfig {
    const configPath = getConfigPath();
    try {
        if (existsSync(configPath)) {
            cachedConfig = mergeWithDefaults(JSON.parse(readFileSync(configPath, 'utf8')));
            return cachedConfig;
        }
    } catch (error) {
        console.error(`[Waypoint Config] Failed to parse JSON config at ${configPath}:`, error);
    }
    cachedConfig = mergeWithDefaults({});
    return cachedConfig;
}

function lookupConfigValue(config: WaypointConfig, key: string): unknown {
    switch (key) {
        case 'API_PORT': return config.runtime.apiPort;
        case 'API_HOST': return config.runtime.apiHost;
        case 'RESOURCE_POLL_SEC': return config.runtime.resourcePollSec;
        case 'RECONCILE_INTERVAL_SEC': return config.runtime.reconcileIntervalSec;

        case 'MODEL_PROFILES_PATH': return config.routing.modelProfilesPath;
        case 'ROUTING_MIN_CONFIDENCE': return config.routing.minConfidence;
        case 'ROUTING_MEM_CONSTRAINED_PERCENT': return config.routing.memConstrainedPercent;
        case 'ROUTING_CPU_CONSTRAINED_PERCENT': return config.routing.cpuConstrainedPercent;
        case 'ROUTING_CACHE_TTL_MS': return config.routing.cacheTtlMs;
        case 'RESOURCE_MAX_STALENESS_MS': return config.routing.maxStalenessMs;

        case 'MODEL_TIMEOUT_MS': return config.invocation.modelTimeoutMs;
        case 'MODEL_MAX_RETRIES': return config.invocation.maxRetries;
        case 'MODEL_BACKOFF_BASE_MS': return config.invocation.backoffBaseMs;
        case 'MODEL_BACKOFF_FACTOR': return config.invocation.backoffFactor;
        case 'MODEL_BACKOFF_JITTER': return config.invocation.jitterRatio;
        case 'MODEL_MAX_TOKENS': return config.invocation.maxTokens;

        case 'BREAKER_FAILURE_THRESHOLD': return config.resilience.failureThreshold;
        case 'BREAKER_RESET_TIMEOUT_MS': return config.resilience.resetTimeoutMs;

        case 'SQLITE_PATH': return config.storage.sqlitePath;
        case 'REDIS_URL': return config.storage.redisUrl;
        case 'STORAGE_TIMEOUT_MS': return config.storage.storageTimeoutMs;
        case 'RECONCILE_BATCH_SIZE': return config.storage.reconcileBatchSize;

        case 'MEMORY_EMBEDDING_DIM': return config.vector.embeddingDim;
        case 'VECTOR_DEFAULT_K': return config.vector.defaultK;
        case 'VECTOR_MAX_K': return config.vector.maxK;
        case 'VECTOR_TIMEOUT_MS': return config.vector.vectorTimeoutMs;
        case 'VECTOR_NATIVE_ENABLED': return config.vector.nativeEnabled;

        case 'OPENROUTER_API_KEY': return config.providers.openRouterApiKey;
        case 'OPENROUTER_BASE_URL': return config.providers.openRouterBaseUrl;
        case 'OLLAMA_BASE_URL': return config.providers.ollamaBaseUrl;

        case 'CONNECTIVITY_PROBE_HOST': return config.connectivity.probeHost;
        case 'CONNECTIVITY_PROBE_TIMEOUT_MS': return config.connectivity.probeTimeoutMs;

        case 'EMBEDDING_PROVIDER': return config.integration.embeddingProvider;
        case 'EMBEDDING_API_KEY': return config.integration.embeddingApiKey;
        case 'OPENAI_API_KEY': return config.integration.openaiApiKey;
        case 'EMBEDDING_API_URL': return config.integration.embeddingApiUrl;
        case 'EMBEDDING_MODEL': return config.integration.embeddingModel;
        case 'OLLAMA_EMBEDDING_MODEL': return config.integration.ollamaEmbeddingModel;
        default: return undefined;
    }
}

function isPresent(value: unknown): boolean {
    return value !== undefined && value !== null && String(value).trim() !== '';
}

/**
 * Gets a configured value either from `waypoint.json` (mapped) or `process.env`.
 */
export function getConfigValue(key: string, sensitive: boolean = false): string | undefined {
    const config = cachedConfig ?? reloadConfigSync();
    const jsonValue = lookupConfigValue(config, key);

    // 1. Explicit environment overrides win
    if (isAllowedOverride(key) && isPresent(process.env[key])) {
        return String(process.env[key]);
    }

    // 2. waypoint.json merged with defaults
    if (isPresent(jsonValue)) {
        return String(jsonValue);
    }

    // 3. Legacy process.env fallback, with a one-time deprecation warning
    const envValue = process.env[key];
    if (isPresent(envValue)) {
        if (!sensitive && !legacyWarningEmitted.has(key)) {
            console.warn(`[Waypoint Config] Loaded configuration key '${key}' from process.env. Prefer setting it in waypoint.json.`);
            legacyWarningEmitted.add(key);
        }
        return String(envValue);
    }

    return undefined;
}

function isAllowedOverride(key: string): boolean {
    return [
        'WAYPOINT_CONFIG_PATH',
        'API_PORT',
        'API_HOST',
        'SQLITE_PATH',
        'REDIS_URL',
        'OLLAMA_BASE_URL',
        'OPENROUTER_API_KEY',
        'EMBEDDING_API_KEY',
        'OPENAI_API_KEY',
        'MODEL_PROFILES_PATH',
        'VECTOR_NATIVE_ENABLED',
        'NODE_ENV',
    ].includes(key);
}
