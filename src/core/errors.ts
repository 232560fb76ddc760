export type OrchestratorErrorKind =
    | 'connectivity'
    | 'auth'
    | 'rate_limit'
    | 'timeout'
    | 'model_unavailable'
    | 'storage_unavailable'
    | 'circuit_open'
    | 'validation'
    | 'cancelled';

const RETRYABLE_KINDS: ReadonlySet<OrchestratorErrorKind> = new Set(['connectivity', 'rate_limit', 'timeout']);
const FATAL_KINDS: ReadonlySet<OrchestratorErrorKind> = new Set(['auth', 'validation']);

/** Base class for every error the routing and persistence core raises on purpose. */
export class OrchestratorError extends Error {
    readonly kind: OrchestratorErrorKind;

    constructor(kind: OrchestratorErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.kind = kind;
    }

    get retryable(): boolean {
        return RETRYABLE_KINDS.has(this.kind);
    }

    get fatal(): boolean {
        return FATAL_KINDS.has(this.kind);
    }
}

export class ConnectivityError extends OrchestratorError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('connectivity', message, options);
    }
}

export class AuthError extends OrchestratorError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('auth', message, options);
    }
}

export class RateLimitError extends OrchestratorError {
    readonly retryAfterMs: number | null;

    constructor(message: string, retryAfterMs: number | null = null, options?: { cause?: unknown }) {
        super('rate_limit', message, options);
        this.retryAfterMs = retryAfterMs;
    }
}

export class TimeoutError extends OrchestratorError {
    readonly timeoutMs: number;

    constructor(message: string, timeoutMs: number, options?: { cause?: unknown }) {
        super('timeout', message, options);
        this.timeoutMs = timeoutMs;
    }
}

export class ModelUnavailableError extends OrchestratorError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('model_unavailable', message, options);
    }
}

export class StorageUnavailableError extends OrchestratorError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('storage_unavailable', message, options);
    }
}

export class CircuitOpenError extends OrchestratorError {
    readonly dependencyName: string;

    constructor(dependencyName: string, message?: string) {
        super('circuit_open', message ?? `Circuit for '${dependencyName}' is open.`);
        this.dependencyName = dependencyName;
    }
}

export class ValidationError extends OrchestratorError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('validation', message, options);
    }
}

export class CancelledError extends OrchestratorError {
    constructor(message = 'Operation was cancelled.', options?: { cause?: unknown }) {
        super('cancelled', message, options);
    }
}

const NETWORK_ERROR_CODES = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'ENOTFOUND',
    'EAI_AGAIN',
    'EHOSTUNREACH',
    'ENETUNREACH',
    'EPIPE',
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_SOCKET',
]);

function readErrorCode(error: Error): string | null {
    for (const candidate of [error, error.cause]) {
        if (typeof candidate === 'object' && candidate !== null && 'code' in candidate && typeof candidate.code === 'string') {
            return candidate.code;
        }
    }
    return null;
}

/** Map an HTTP status from a provider or store endpoint onto an error kind. */
export function errorFromStatus(status: number, detail: string, retryAfterMs: number | null = null): OrchestratorError {
    if (status === 401 || status === 403) {
        return new AuthError(`Upstream rejected credentials (${status}): ${detail}`);
    }
    if (status === 429) {
        return new RateLimitError(`Upstream rate limited the request (429): ${detail}`, retryAfterMs);
    }
    if (status === 400 || status === 422) {
        return new ValidationError(`Upstream rejected the request (${status}): ${detail}`);
    }
    if (status === 408 || status === 504) {
        return new TimeoutError(`Upstream timed out (${status}): ${detail}`, 0);
    }
    if (status === 404) {
        return new ModelUnavailableError(`Upstream model not found (404): ${detail}`);
    }
    if (status >= 500) {
        return new ConnectivityError(`Upstream failure (${status}): ${detail}`);
    }
    return new ModelUnavailableError(`Unexpected upstream status (${status}): ${detail}`);
}

/**
 * Normalise any thrown value into an {@link OrchestratorError}.
 * Unknown failures are treated as model unavailability, which routes around them.
 */
export function classifyError(error: unknown): OrchestratorError {
    if (error instanceof OrchestratorError) {
        return error;
    }

    if (error instanceof Error) {
        if (error.name === 'AbortError') {
            return new CancelledError(error.message || undefined, { cause: error });
        }
        if (error.name === 'TimeoutError') {
            return new TimeoutError(error.message, 0, { cause: error });
        }

        const code = readErrorCode(error);
        if (code && NETWORK_ERROR_CODES.has(code)) {
            return new ConnectivityError(`${code}: ${error.message}`, { cause: error });
        }
        if (error instanceof TypeError && /fetch failed|network/i.test(error.message)) {
            return new ConnectivityError(error.message, { cause: error });
        }
        return new ModelUnavailableError(error.message, { cause: error });
    }

    return new ModelUnavailableError(String(error));
}

const USER_MESSAGES: Record<OrchestratorErrorKind, string> = {
    connectivity: 'I could not reach any model provider. Check your network connection and try again.',
    auth: 'A model provider rejected the configured credentials. Check your API keys.',
    rate_limit: 'Every available model is rate limited right now. Please try again shortly.',
    timeout: 'The models took too long to respond. Please try again.',
    model_unavailable: 'No model is available to answer right now. Please try again later.',
    storage_unavailable: 'Conversation storage is unavailable. Your message was not saved.',
    circuit_open: 'Model providers are recovering from repeated failures. Please try again shortly.',
    validation: 'The request was rejected as invalid. Please rephrase and try again.',
    cancelled: 'The request was cancelled.',
};

export function toUserMessage(kind: OrchestratorErrorKind): string {
    return USER_MESSAGES[kind];
}
