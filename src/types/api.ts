import type { Orchestrator } from '../core/orchestrator.js';
import type { ResourceBucket } from './resource.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok' | 'degraded';
    uptimeSec: number;
    memoryUsageMb: number;
    resourceBucket: ResourceBucket;
    resourcesStale: boolean;
    openBreakers: string[];
    vectorBackend: 'native' | 'fallback';
    pendingPrimary: number | null;
}

// ── Requests ────────────────────────────────────────────────────────────────

export interface RouteRequestBody {
    query: string;
    explicitModelId?: string;
}

export interface AskRequestBody {
    sessionId: string;
    query: string;
    explicitModelId?: string;
}

export interface SearchRequestBody {
    text: string;
    k?: number;
}

/** The orchestrator surface the HTTP layer depends on. */
export type OrchestratorApi = Pick<Orchestrator, 'route' | 'ask' | 'historyRead' | 'semanticSearch' | 'getStatus'>;
