import type { Request, Response } from 'express';
import type { HealthData, OrchestratorApi } from '../../types/api.js';
import { respondWithErrors, sendOk } from '../shared.js';

const startTime = Date.now();

export interface HealthDeps {
    orchestrator: OrchestratorApi;
}

/** GET /health - Degraded when resources are stale, a breaker is open or writes await reconciliation. */
export function handleHealth(deps: HealthDeps) {
    return async (_req: Request, res: Response): Promise<void> => {
        await respondWithErrors(res, 'GET /health', async () => {
            const status = await deps.orchestrator.getStatus();
            const openBreakers = status.breakers
                .filter((breaker) => breaker.state !== 'closed')
                .map((breaker) => breaker.dependencyName);
            const pendingPrimary = status.persistence.pendingPrimary;

            const data: HealthData = {
                status:
                    status.resources.stale ||
                    openBreakers.length > 0 ||
                    status.vector.downgradedAt !== null ||
                    (pendingPrimary ?? 0) > 0
                        ? 'degraded'
                        : 'ok',
                uptimeSec: Math.floor((Date.now() - startTime) / 1000),
                memoryUsageMb: Math.round(process.memoryUsage().rss / 1024 / 1024),
                resourceBucket: status.resources.bucket,
                resourcesStale: status.resources.stale,
                openBreakers,
                vectorBackend: status.vector.backendOrigin,
                pendingPrimary,
            };
            sendOk(res, data);
        });
    };
}

/** GET /status - Full orchestrator snapshot. */
export function handleStatus(deps: HealthDeps) {
    return async (_req: Request, res: Response): Promise<void> => {
        await respondWithErrors(res, 'GET /status', async () => {
            sendOk(res, await deps.orchestrator.getStatus());
        });
    };
}
