import { createServer, type Server } from 'node:http';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { handleHealth, handleStatus } from './handlers/health.js';
import { handleHistoryRead, handleSearch } from './handlers/history.js';
import { handleAsk, handleRoute } from './handlers/routing.js';
import { requestLogger, sendError } from './shared.js';
import type { OrchestratorApi } from '../types/api.js';
import { logThought } from '../utils/logger.js';

export interface ApiServerDeps {
    orchestrator: OrchestratorApi;
}

/**
 * Build the control-plane HTTP API.
 *
 * Endpoints:
 *   GET  /health      - Health summary
 *   GET  /status      - Resources, breakers, usage, cache, vector and storage state
 *   POST /route       - Routing decision for a query
 *   POST /ask         - Route, invoke and persist one conversation turn
 *   GET  /history/:id - Read one stored turn
 *   POST /search      - Semantic search over stored turns
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();
    app.use(express.json({ limit: '1mb' }));
    app.use(requestLogger);

    app.get('/health', handleHealth(deps));
    app.get('/status', handleStatus(deps));
    app.post('/route', handleRoute(deps));
    app.post('/ask', handleAsk(deps));
    app.get('/history/:id', handleHistoryRead(deps));
    app.post('/search', handleSearch(deps));

    app.use((_req: Request, res: Response) => {
        sendError(res, 'Not found.', 404);
    });

    // Malformed JSON bodies surface here from express.json().
    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        const message = err instanceof Error ? err.message : String(err);
        sendError(res, `Invalid request: ${message}`, 400);
    });

    return app;
}

/** Create and start the control-plane HTTP server. */
export function startApiServer(deps: ApiServerDeps, port: number, host: string): Server {
    const server = createServer(createApiApp(deps));
    server.listen(port, host, () => {
        console.log(`[API] Control plane listening on http://${host}:${port}`);
        void logThought(`[API] HTTP server started on ${host}:${port}.`);
    });
    return server;
}
