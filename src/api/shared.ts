import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'node:crypto';
import { OrchestratorError, ValidationError, type OrchestratorErrorKind } from '../core/errors.js';
import type { ApiEnvelope } from '../types/api.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';

// ── Response Helpers ────────────────────────────────────────────────────────

function readCorrelationId(res: Response): string | undefined {
    const value: unknown = res.locals.correlationId;
    return typeof value === 'string' ? value : undefined;
}

/** Send a successful JSON response using the standard envelope. */
export function sendOk<T>(res: Response, data: T, status = 200): void {
    const body: ApiEnvelope<T> = {
        ok: true,
        data,
        correlationId: readCorrelationId(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

/** Send an error JSON response using the standard envelope. */
export function sendError(res: Response, message: string, status = 400): void {
    const body: ApiEnvelope = {
        ok: false,
        error: scrubSensitiveText(message),
        correlationId: readCorrelationId(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

// ── Body Parsing ────────────────────────────────────────────────────────────

export function readJsonBody(body: unknown): Record<string, unknown> {
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        throw new ValidationError('Request body must be a JSON object.');
    }
    return Object.fromEntries(Object.entries(body));
}

export function readRequiredString(body: Record<string, unknown>, key: string): string {
    const value = body[key];
    if (typeof value !== 'string' || !value.trim()) {
        throw new ValidationError(`'${key}' must be a non-empty string.`);
    }
    return value;
}

export function readOptionalString(body: Record<string, unknown>, key: string): string | undefined {
    const value = body[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
        throw new ValidationError(`'${key}' must be a string when provided.`);
    }
    return value.trim() || undefined;
}

// ── Error Mapping ───────────────────────────────────────────────────────────

const STATUS_BY_KIND: Readonly<Record<OrchestratorErrorKind, number>> = {
    validation: 400,
    cancelled: 409,
    auth: 502,
    rate_limit: 503,
    connectivity: 503,
    model_unavailable: 503,
    storage_unavailable: 503,
    circuit_open: 503,
    timeout: 504,
};

/** Map a caught error to a status code and message. */
export function mapError(err: unknown): { status: number; message: string } {
    if (err instanceof OrchestratorError) {
        return { status: STATUS_BY_KIND[err.kind], message: scrubSensitiveText(err.message) };
    }
    if (err instanceof Error) {
        return { status: 500, message: scrubSensitiveText(err.message) };
    }
    return { status: 500, message: scrubSensitiveText(String(err)) };
}

/** Run an async handler body and answer any thrown error through {@link mapError}. */
export async function respondWithErrors(res: Response, label: string, body: () => Promise<void>): Promise<void> {
    try {
        await body();
    } catch (err) {
        const { status, message } = mapError(err);
        if (status >= 500) {
            void logThought(`[API] ${label} failed (${status}): ${message}`);
        }
        sendError(res, message, status);
    }
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every incoming request and inject a correlation ID. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const correlationId = randomUUID();
    res.locals.correlationId = correlationId;
    const method = req.method;
    const path = req.path;
    console.log(`[API] [${correlationId}] ${method} ${path}`);
    void logThought(`[API] [${correlationId}] ${method} ${path}`);
    next();
}
