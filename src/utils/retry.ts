import { CancelledError, TimeoutError, classifyError } from '../core/errors.js';
import { logThought } from './logger.js';

/** Configuration for the retry helper. */
export interface RetryOptions {
    /** Maximum number of attempts (including the first). @default 3 */
    maxAttempts?: number;
    /** Base delay in ms before the first retry. @default 1000 */
    baseDelayMs?: number;
    /** Multiplier applied to the delay after each failed attempt. @default 2 */
    backoffFactor?: number;
    /** Maximum delay cap in ms. @default 15000 */
    maxDelayMs?: number;
    /** Symmetric jitter ratio applied to every delay (0.2 = ±20%). @default 0 */
    jitterRatio?: number;
    /** Label used in log messages for traceability. */
    label?: string;
    /** Decides whether a failure is worth another attempt. Defaults to always. */
    shouldRetry?: (error: unknown, attempt: number) => boolean;
    /** Aborts the backoff wait and stops further attempts. */
    signal?: AbortSignal;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
    random?: () => number;
}

/** Result of a retried operation. */
export interface RetryResult<T> {
    ok: boolean;
    value?: T;
    error?: string;
    /** The raw value thrown by the last failed attempt. */
    lastError?: unknown;
    attempts: number;
    totalDurationMs: number;
}

const DEFAULTS = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 15_000,
    jitterRatio: 0,
};

/** Delay before retry number `attempt` (1-based), jitter included. */
export function computeBackoffDelay(
    attempt: number,
    options: Pick<RetryOptions, 'baseDelayMs' | 'backoffFactor' | 'maxDelayMs' | 'jitterRatio'>,
    random: () => number = Math.random,
): number {
    const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    const backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    const jitterRatio = Math.max(0, Math.min(1, options.jitterRatio ?? DEFAULTS.jitterRatio));

    const raw = Math.min(baseDelayMs * backoffFactor ** (attempt - 1), maxDelayMs);
    const jitter = raw * jitterRatio * (random() * 2 - 1);
    return Math.max(0, Math.round(raw + jitter));
}

/**
 * Execute an async function with bounded exponential backoff retry.
 *
 * - Retries up to `maxAttempts` times while `shouldRetry` agrees.
 * - Delay grows by `backoffFactor` after each attempt (capped at `maxDelayMs`), with optional jitter.
 * - An aborted `signal` ends the loop immediately.
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   (attempt) => provider.invoke(request),
 *   { maxAttempts: 3, jitterRatio: 0.2, label: 'provider:code-specialist' },
 * );
 * ```
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions = {},
): Promise<RetryResult<T>> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULTS.maxAttempts);
    const label = options.label ?? 'unnamed';
    const sleepFn = options.sleep ?? abortableSleep;
    const random = options.random ?? Math.random;
    const shouldRetry = options.shouldRetry ?? (() => true);

    const start = Date.now();
    let lastError: unknown;
    let attempts = 0;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        if (options.signal?.aborted) {
            lastError = new CancelledError(`${label} cancelled before attempt ${attempt}.`);
            break;
        }

        attempts = attempt;
        try {
            const value = await fn(attempt);
            const totalDurationMs = Date.now() - start;

            if (attempt > 1) {
                void logThought(
                    `[Retry] ${label} succeeded on attempt ${attempt}/${maxAttempts} (${totalDurationMs}ms).`,
                );
            }

            return { ok: true, value, attempts: attempt, totalDurationMs };
        } catch (err) {
            lastError = err;
            const message = describeError(err);

            if (attempt < maxAttempts && shouldRetry(err, attempt)) {
                const delay = computeBackoffDelay(attempt, options, random);
                void logThought(
                    `[Retry] ${label} attempt ${attempt}/${maxAttempts} failed: ${message}. Retrying in ${delay}ms.`,
                );
                try {
                    await sleepFn(delay, options.signal);
                } catch (sleepError) {
                    lastError = sleepError;
                    break;
                }
            } else {
                void logThought(`[Retry] ${label} stopped after attempt ${attempt}/${maxAttempts}. Last error: ${message}.`);
                break;
            }
        }
    }

    return {
        ok: false,
        error: describeError(lastError),
        lastError,
        attempts,
        totalDurationMs: Date.now() - start,
    };
}

/**
 * Run `fn` with a deadline. The signal handed to `fn` aborts when the deadline
 * passes or when the caller's `signal` aborts; a missed deadline rejects with {@link TimeoutError}.
 */
export async function withTimeout<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    label: string,
    signal?: AbortSignal,
): Promise<T> {
    if (signal?.aborted) {
        throw new CancelledError(`${label} cancelled.`);
    }

    const controller = new AbortController();
    const onParentAbort = (): void => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onParentAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
            const error = new TimeoutError(`${label} timed out after ${timeoutMs}ms.`, timeoutMs);
            controller.abort(error);
            reject(error);
        }, timeoutMs);
    });
    const cancelled = new Promise<never>((_resolve, reject) => {
        controller.signal.addEventListener(
            'abort',
            () => {
                if (signal?.aborted) {
                    reject(new CancelledError(`${label} cancelled.`));
                }
            },
            { once: true },
        );
    });

    try {
        return await Promise.race([fn(controller.signal), deadline, cancelled]);
    } catch (error) {
        if (error instanceof TimeoutError || error instanceof CancelledError) {
            throw error;
        }
        throw classifyError(error);
    } finally {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onParentAbort);
    }
}

/** Sleep that rejects with {@link CancelledError} as soon as `signal` aborts. */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
        return Promise.reject(new CancelledError('Backoff wait cancelled.'));
    }

    return new Promise((resolve, reject) => {
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(new CancelledError('Backoff wait cancelled.'));
        };
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
