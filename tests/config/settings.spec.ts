import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { clearConfigCacheForTests } from '../../src/config/json-config.js';
import { resolveSettings } from '../../src/config/settings.js';

const ENV_KEYS = [
    'API_PORT',
    'API_HOST',
    'SQLITE_PATH',
    'REDIS_URL',
    'OLLAMA_BASE_URL',
    'OPENROUTER_API_KEY',
    'EMBEDDING_API_KEY',
    'OPENAI_API_KEY',
    'EMBEDDING_PROVIDER',
    'MODEL_PROFILES_PATH',
    'VECTOR_NATIVE_ENABLED',
];

describe('resolveSettings', () => {
    let tempDir: string;
    let configPath: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'waypoint-settings-'));
        configPath = path.join(tempDir, 'waypoint.json');
        vi.stubEnv('WAYPOINT_CONFIG_PATH', configPath);
        for (const key of ENV_KEYS) {
            vi.stubEnv(key, '');
        }
        clearConfigCacheForTests();
    });

    afterEach(async () => {
        vi.unstubAllEnvs();
        clearConfigCacheForTests();
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('resolves defaults without a config file', () => {
        const settings = resolveSettings();

        expect(settings).toMatchObject({
            apiPort: 3200,
            apiHost: '127.0.0.1',
            sqlitePath: 'memory/waypoint.db',
            redisUrl: null,
            maxRetries: 2,
            failureThreshold: 3,
            nativeVectorEnabled: true,
            openRouterApiKey: null,
            embeddingProvider: null,
            embeddingApiKey: null,
        });
    });

    it('reads values from waypoint.json', async () => {
        await fs.writeFile(
            configPath,
            JSON.stringify({
                invocation: { maxRetries: 4 },
                routing: { minConfidence: 0.7 },
                vector: { nativeEnabled: false },
                storage: { redisUrl: 'redis://cache.test:6379' },
            }),
            'utf8',
        );

        const settings = resolveSettings();

        expect(settings.maxRetries).toBe(4);
        expect(settings.minConfidence).toBe(0.7);
        expect(settings.nativeVectorEnabled).toBe(false);
        expect(settings.redisUrl).toBe('redis://cache.test:6379');
    });

    it('falls back when an override is not a usable number', () => {
        vi.stubEnv('API_PORT', 'abc');
        expect(resolveSettings().apiPort).toBe(3200);

        vi.stubEnv('API_PORT', '0');
        expect(resolveSettings().apiPort).toBe(3200);
    });

    it('enables OpenAI embeddings when an API key is present', () => {
        vi.stubEnv('OPENAI_API_KEY', 'test-secret');

        const settings = resolveSettings();

        expect(settings.embeddingProvider).toBe('openai');
        expect(settings.embeddingApiKey).toBe('test-secret');
    });

    it('honours an explicitly configured embedding provider', async () => {
        await fs.writeFile(configPath, JSON.stringify({ integration: { embeddingProvider: 'ollama' } }), 'utf8');

        expect(resolveSettings().embeddingProvider).toBe('ollama');
    });
});
