import { resolveSettings } from './config/settings.js';
import { createOrchestrator } from './core/runtime.js';
import { startApiServer } from './api/router.js';
import { logThought } from './utils/logger.js';

const settings = resolveSettings();
const orchestrator = createOrchestrator(settings);

console.log('Waypoint orchestrator initialized.');

await orchestrator.start();
const server = startApiServer({ orchestrator }, settings.apiPort, settings.apiHost);

// ── Signal Handlers ──────────────────────────────────────────────────────────

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    server.close();
    await orchestrator.shutdown();
    await logThought(`Waypoint process received ${signal}; services stopped.`);
    process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
        shutdown(signal).catch((err: unknown) => {
            const message = err instanceof Error ? err.message : String(err);
            console.error(`[Waypoint] Shutdown failed: ${message}`);
            process.exit(1);
        });
    });
}
