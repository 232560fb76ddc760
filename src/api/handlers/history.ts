import type { Request, Response } from 'express';
import { ValidationError } from '../../core/errors.js';
import type { OrchestratorApi } from '../../types/api.js';
import { readJsonBody, readRequiredString, respondWithErrors, sendError, sendOk } from '../shared.js';

export interface HistoryDeps {
    orchestrator: OrchestratorApi;
}

/** GET /history/:id - One stored turn, flagged `degraded` when served by the backup tier. */
export function handleHistoryRead(deps: HistoryDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        await respondWithErrors(res, 'GET /history/:id', async () => {
            const envelope = await deps.orchestrator.historyRead(req.params.id ?? '');
            if (!envelope.entity) {
                sendError(res, `No entry with id '${req.params.id}'.`, 404);
                return;
            }
            sendOk(res, envelope);
        });
    };
}

function readK(body: Record<string, unknown>): number | undefined {
    const value = body.k;
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
        throw new ValidationError("'k' must be a positive integer when provided.");
    }
    return value;
}

/** POST /search - Nearest stored turns for a text; embeddings are left out of the response. */
export function handleSearch(deps: HistoryDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        await respondWithErrors(res, 'POST /search', async () => {
            const body = readJsonBody(req.body);
            const matches = await deps.orchestrator.semanticSearch(readRequiredString(body, 'text'), readK(body));
            sendOk(
                res,
                matches.map(({ record, score }) => ({
                    id: record.id,
                    score,
                    metadata: record.metadata,
                    createdAt: record.createdAt,
                    backendOrigin: record.backendOrigin,
                })),
            );
        });
    };
}
