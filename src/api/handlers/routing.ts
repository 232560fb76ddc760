import type { Request, Response } from 'express';
import type { OrchestratorApi } from '../../types/api.js';
import { readJsonBody, readOptionalString, readRequiredString, respondWithErrors, sendOk } from '../shared.js';

export interface RoutingDeps {
    orchestrator: OrchestratorApi;
}

/** POST /route - Routing decision for a query without invoking a model. */
export function handleRoute(deps: RoutingDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        await respondWithErrors(res, 'POST /route', async () => {
            const body = readJsonBody(req.body);
            const decision = await deps.orchestrator.route(
                readRequiredString(body, 'query'),
                readOptionalString(body, 'explicitModelId'),
            );
            sendOk(res, decision);
        });
    };
}

/**
 * POST /ask - Route, invoke and persist one turn.
 * Model failures still answer 200 with `success: false` and a user-facing message.
 */
export function handleAsk(deps: RoutingDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        await respondWithErrors(res, 'POST /ask', async () => {
            const body = readJsonBody(req.body);
            const sessionId = readRequiredString(body, 'sessionId');
            const query = readRequiredString(body, 'query');
            const explicitModelId = readOptionalString(body, 'explicitModelId');

            const controller = new AbortController();
            const abortOnDisconnect = (): void => {
                if (!res.writableEnded) controller.abort();
            };
            res.on('close', abortOnDisconnect);
            try {
                const result = await deps.orchestrator.ask(sessionId, query, { explicitModelId, signal: controller.signal });
                sendOk(res, result);
            } finally {
                res.off('close', abortOnDisconnect);
            }
        });
    };
}
