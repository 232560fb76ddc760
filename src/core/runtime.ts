import * as path from 'node:path';
import type { OrchestratorSettings } from '../config/settings.js';
import { AdaptiveRouter } from '../services/adaptive-router.js';
import { ChatHistoryService, parseChatTurnPayload } from '../services/chat-history.js';
import { CircuitBreakerRegistry } from '../services/circuit-breaker.js';
import { createDatabase, type SqliteDatabase } from '../services/db.js';
import { EmbeddingService } from '../services/embedding-service.js';
import { EmbeddingIntentClassifier, KeywordIntentClassifier } from '../services/intent-classifier.js';
import { InvocationExecutor, providerBreakerName } from '../services/invocation-executor.js';
import { JobScheduler } from '../services/job-scheduler.js';
import { loadModelProfiles } from '../services/model-profiles.js';
import { CloudApiProvider, LocalInferenceProvider } from '../services/providers.js';
import { PrimaryBackupRepository } from '../services/repositories/primary-backup-repository.js';
import { RedisRepository, createRedisClient } from '../services/repositories/redis-repository.js';
import { SqliteRepository } from '../services/repositories/sqlite-repository.js';
import { ResourceMonitor, SystemResourceSampler } from '../services/resource-monitor.js';
import { RouterState } from '../services/router-state.js';
import { VectorStore } from '../services/vector-store.js';
import type { ChatTurnPayload, Repository } from '../types/persistence.js';
import { Orchestrator } from './orchestrator.js';

const INTENT_KEYWORDS_PATH = 'data/intent-keywords.json';
const INTENT_PROTOTYPES_PATH = 'data/intent-prototypes.json';

/** Sibling file for the local tier when no networked primary is configured. */
export function backupDatabasePath(sqlitePath: string): string {
  if (sqlitePath === ':memory:') return sqlitePath;
  const parsed = path.parse(sqlitePath);
  return path.join(parsed.dir, `${parsed.name}.backup${parsed.ext || '.db'}`);
}

/** Wire the production components from resolved settings. */
export function createOrchestrator(settings: OrchestratorSettings): Orchestrator {
  const db = createDatabase(settings.sqlitePath);
  const databases: SqliteDatabase[] = [db];

  const breakers = new CircuitBreakerRegistry({
    failureThreshold: settings.failureThreshold,
    resetTimeoutMs: settings.resetTimeoutMs,
  });
  const state = new RouterState(settings.routingCacheTtlMs);
  const scheduler = new JobScheduler();

  const monitor = new ResourceMonitor(
    new SystemResourceSampler({
      connectivityHost: settings.connectivityProbeHost,
      ollamaBaseUrl: settings.ollamaBaseUrl,
      probeTimeoutMs: settings.connectivityProbeTimeoutMs,
    }),
    {
      maxStalenessMs: settings.maxStalenessMs,
      pollIntervalSec: settings.resourcePollSec,
      thresholds: {
        memConstrainedPercent: settings.memConstrainedPercent,
        cpuConstrainedPercent: settings.cpuConstrainedPercent,
      },
    },
  );

  let primary: Repository<ChatTurnPayload>;
  let backup: Repository<ChatTurnPayload>;
  if (settings.redisUrl) {
    primary = new RedisRepository(createRedisClient(settings.redisUrl), parseChatTurnPayload);
    backup = new SqliteRepository(db, parseChatTurnPayload);
  } else {
    console.warn('[Runtime] REDIS_URL is not set; using a second SQLite file as the primary tier.');
    const backupDb = createDatabase(backupDatabasePath(settings.sqlitePath));
    databases.push(backupDb);
    primary = new SqliteRepository(db, parseChatTurnPayload, 'sqlite-primary');
    backup = new SqliteRepository(backupDb, parseChatTurnPayload, 'sqlite-backup');
  }

  const repository = new PrimaryBackupRepository<ChatTurnPayload>({
    primary,
    backup,
    breakers,
    storageTimeoutMs: settings.storageTimeoutMs,
    reconcileBatchSize: settings.reconcileBatchSize,
  });

  const vectorStore = new VectorStore({
    db,
    dimensions: settings.embeddingDim,
    defaultK: settings.defaultK,
    maxK: settings.maxK,
    timeoutMs: settings.vectorTimeoutMs,
    nativeEnabled: settings.nativeVectorEnabled,
  });

  const embedder = settings.embeddingProvider
    ? new EmbeddingService({
        dimensions: settings.embeddingDim,
        preferredProvider: settings.embeddingProvider,
        apiKey: settings.embeddingApiKey,
        apiUrl: settings.embeddingApiUrl,
        model: settings.embeddingModel,
        ollamaBaseUrl: settings.ollamaBaseUrl,
        ollamaModel: settings.ollamaEmbeddingModel,
      })
    : undefined;

  const keywordClassifier = KeywordIntentClassifier.fromFile(INTENT_KEYWORDS_PATH);
  const classifier = embedder ? EmbeddingIntentClassifier.fromFile(embedder, INTENT_PROTOTYPES_PATH) : keywordClassifier;

  const router = new AdaptiveRouter({
    profiles: loadModelProfiles(settings.modelProfilesPath),
    classifier,
    keywordClassifier,
    state,
    resources: monitor,
    minConfidence: settings.minConfidence,
    thresholds: monitor.thresholds,
    isModelAvailable: (modelId) => {
      const name = providerBreakerName(modelId);
      return breakers.has(name) ? breakers.get(name).isCallPermitted() : true;
    },
  });

  const executor = new InvocationExecutor({
    router,
    providers: {
      cloud_api: new CloudApiProvider({ apiKey: settings.openRouterApiKey, baseUrl: settings.openRouterBaseUrl }),
      local_inference: new LocalInferenceProvider({ baseUrl: settings.ollamaBaseUrl }),
    },
    breakers,
    state,
    resources: monitor,
    modelTimeoutMs: settings.modelTimeoutMs,
    maxRetries: settings.maxRetries,
    backoffBaseMs: settings.backoffBaseMs,
    backoffFactor: settings.backoffFactor,
    jitterRatio: settings.jitterRatio,
    maxTokens: settings.maxTokens,
  });

  const history = new ChatHistoryService({ repository, vectorStore, embedder });

  return new Orchestrator({
    monitor,
    breakers,
    state,
    router,
    executor,
    repository,
    history,
    vectorStore,
    scheduler,
    reconcileIntervalSec: settings.reconcileIntervalSec,
    onShutdown: () => {
      for (const database of databases) {
        database.close();
      }
    },
  });
}
