import { beforeEach, describe, expect, it, vi } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApiApp } from '../../src/api/router.js';
import { CircuitOpenError, ModelUnavailableError, ValidationError } from '../../src/core/errors.js';
import type { AskResult, OrchestratorStatus } from '../../src/core/orchestrator.js';
import type { OrchestratorApi } from '../../src/types/api.js';
import type { RoutingDecision } from '../../src/types/model-routing.js';
import type { ChatTurnPayload, ReadEnvelope } from '../../src/types/persistence.js';
import type { ScoredVectorRecord } from '../../src/types/vector.js';

const DECISION: RoutingDecision = {
  selectedModelId: 'code-specialist',
  intent: 'code',
  confidence: 1,
  intentSource: 'classifier',
  fallbackChainConsidered: ['code-specialist', 'local-phi', 'leader'],
  resourceBucket: 'normal',
  decidedAt: '2026-05-01T10:00:00.000Z',
  cacheKey: 'abc:normal:code',
  cached: false,
};

function status(overrides: Partial<OrchestratorStatus> = {}): OrchestratorStatus {
  return {
    resources: {
      cpuPercent: 12,
      memAvailableMb: 4_096,
      memPercent: 45,
      connectivity: true,
      localInferenceAvailable: true,
      capturedAt: Date.parse('2026-05-01T10:00:00.000Z'),
      stale: false,
      bucket: 'normal',
    },
    breakers: [],
    usage: [],
    routingCache: { size: 0, hits: 0, misses: 0, ttlMs: 10_000 },
    vector: {
      backendOrigin: 'fallback',
      nativeAvailable: false,
      downgradedAt: null,
      downgradeReason: null,
      dimensions: 384,
      records: 0,
    },
    persistence: {
      primary: 'redis',
      backup: 'sqlite',
      reconciling: false,
      pendingBackupMirrors: 0,
      droppedBackupMirrors: 0,
      lastReconciliation: null,
      pendingPrimary: 0,
    },
    jobs: [],
    inFlightSessions: 0,
    ...overrides,
  };
}

class FakeOrchestrator implements OrchestratorApi {
  readonly route = vi.fn(async (_query: string, _explicitModelId?: string): Promise<RoutingDecision> => DECISION);
  readonly ask = vi.fn(
    async (_sessionId: string, _query: string, _options?: { explicitModelId?: string; signal?: AbortSignal }): Promise<AskResult> => ({
      success: true,
      text: 'xs.sort()',
      modelId: 'code-specialist',
      errorKind: null,
      decision: DECISION,
      attempts: 1,
      modelsTried: ['code-specialist'],
      persisted: true,
      historyDegraded: false,
      command: null,
    }),
  );
  readonly historyRead = vi.fn(
    async (_id: string): Promise<ReadEnvelope<ChatTurnPayload>> => ({ entity: null, degraded: false, source: 'primary' }),
  );
  readonly semanticSearch = vi.fn(async (_text: string, _k?: number): Promise<ScoredVectorRecord[]> => []);
  readonly getStatus = vi.fn(async (): Promise<OrchestratorStatus> => status());
}

describe('control-plane API', () => {
  let orchestrator: FakeOrchestrator;
  let app: Express;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    orchestrator = new FakeOrchestrator();
    app = createApiApp({ orchestrator });
  });

  describe('GET /health', () => {
    it('reports ok with a correlation id', async () => {
      const res = await request(app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body.ok).toBe(true);
      expect(typeof res.body.correlationId).toBe('string');
      expect(res.body.data).toMatchObject({
        status: 'ok',
        resourceBucket: 'normal',
        resourcesStale: false,
        openBreakers: [],
        vectorBackend: 'fallback',
        pendingPrimary: 0,
      });
    });

    it('reports degraded while a breaker is open or writes await the primary', async () => {
      orchestrator.getStatus.mockResolvedValueOnce(
        status({
          breakers: [
            {
              dependencyName: 'provider:leader',
              state: 'open',
              failureCount: 3,
              lastFailureAt: '2026-05-01T09:59:00.000Z',
              openedAt: '2026-05-01T09:59:00.000Z',
              lastError: 'timeout',
              remainingOpenMs: 20_000,
              trialInFlight: false,
            },
          ],
        }),
      );

      const res = await request(app).get('/health');

      expect(res.body.data.status).toBe('degraded');
      expect(res.body.data.openBreakers).toEqual(['provider:leader']);
    });
  });

  it('GET /status returns the full snapshot', async () => {
    const res = await request(app).get('/status');

    expect(res.status).toBe(200);
    expect(res.body.data.persistence.primary).toBe('redis');
    expect(res.body.data.routingCache.ttlMs).toBe(10_000);
  });

  describe('POST /route', () => {
    it('returns the routing decision', async () => {
      const res = await request(app).post('/route').send({ query: 'write code', explicitModelId: '  docs-writer ' });

      expect(res.status).toBe(200);
      expect(res.body.data.selectedModelId).toBe('code-specialist');
      expect(orchestrator.route).toHaveBeenCalledWith('write code', 'docs-writer');
    });

    it('rejects a missing query', async () => {
      const res = await request(app).post('/route').send({});

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("'query' must be a non-empty string.");
      expect(orchestrator.route).not.toHaveBeenCalled();
    });

    it('maps orchestrator errors to status codes', async () => {
      orchestrator.route.mockRejectedValueOnce(new ValidationError('Query must be a non-empty string.'));
      orchestrator.route.mockRejectedValueOnce(new CircuitOpenError('provider:leader'));

      expect((await request(app).post('/route').send({ query: 'a' })).status).toBe(400);
      const res = await request(app).post('/route').send({ query: 'b' });
      expect(res.status).toBe(503);
      expect(res.body.error).toBe("Circuit for 'provider:leader' is open.");
    });

    it('answers 500 with a scrubbed message for unexpected errors', async () => {
      orchestrator.route.mockRejectedValueOnce(new Error('lookup failed with token=abc12345'));

      const res = await request(app).post('/route').send({ query: 'a' });

      expect(res.status).toBe(500);
      expect(res.body.error).toBe('lookup failed with token=[REDACTED]');
    });
  });

  describe('POST /ask', () => {
    it('passes the session, query and an abort signal through', async () => {
      const res = await request(app).post('/ask').send({ sessionId: 's1', query: 'sort a list' });

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({ success: true, text: 'xs.sort()', persisted: true });
      const [sessionId, query, options] = orchestrator.ask.mock.calls[0] ?? [];
      expect(sessionId).toBe('s1');
      expect(query).toBe('sort a list');
      expect(options?.explicitModelId).toBeUndefined();
      expect(options?.signal).toBeInstanceOf(AbortSignal);
      expect(options?.signal?.aborted).toBe(false);
    });

    it('requires a session id', async () => {
      const res = await request(app).post('/ask').send({ query: 'sort a list' });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("'sessionId' must be a non-empty string.");
    });
  });

  describe('GET /history/:id', () => {
    it('answers 404 for unknown ids', async () => {
      const res = await request(app).get('/history/missing');

      expect(res.status).toBe(404);
      expect(res.body.error).toBe("No entry with id 'missing'.");
    });

    it('returns the envelope with its degraded flag', async () => {
      orchestrator.historyRead.mockResolvedValueOnce({
        entity: {
          id: 't1',
          ownerSessionId: 's1',
          kind: 'chat_turn',
          payload: { role: 'user', content: 'hello' },
          createdAt: '2026-05-01T10:00:00.000Z',
          syncState: 'pending_primary',
        },
        degraded: true,
        source: 'backup',
      });

      const res = await request(app).get('/history/t1');

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({ degraded: true, source: 'backup', entity: { id: 't1' } });
      expect(orchestrator.historyRead).toHaveBeenCalledWith('t1');
    });
  });

  describe('POST /search', () => {
    it('returns matches without their embeddings', async () => {
      orchestrator.semanticSearch.mockResolvedValueOnce([
        {
          record: {
            id: 't1',
            embedding: [1, 0, 0],
            metadata: { sessionId: 's1', text: 'my cat' },
            createdAt: 1_700_000_000_000,
            backendOrigin: 'fallback',
          },
          score: 0.9,
        },
      ]);

      const res = await request(app).post('/search').send({ text: 'cats', k: 3 });

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual([
        {
          id: 't1',
          score: 0.9,
          metadata: { sessionId: 's1', text: 'my cat' },
          createdAt: 1_700_000_000_000,
          backendOrigin: 'fallback',
        },
      ]);
      expect(orchestrator.semanticSearch).toHaveBeenCalledWith('cats', 3);
    });

    it('rejects a non-integer k', async () => {
      const res = await request(app).post('/search').send({ text: 'cats', k: 1.5 });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("'k' must be a positive integer when provided.");
    });

    it('answers 503 when semantic search is unavailable', async () => {
      orchestrator.semanticSearch.mockRejectedValueOnce(new ModelUnavailableError('Semantic search needs an embedding provider.'));

      const res = await request(app).post('/search').send({ text: 'cats' });

      expect(res.status).toBe(503);
    });
  });

  it('answers 404 for unknown routes', async () => {
    const res = await request(app).get('/nope');

    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({ ok: false, error: 'Not found.' });
  });

  it('answers 400 for malformed JSON', async () => {
    const res = await request(app).post('/route').set('Content-Type', 'application/json').send('{"query": ');

    expect(res.status).toBe(400);
    expect(res.body.error).toMatch(/^Invalid request: /);
  });
});
