import { CircuitOpenError, OrchestratorError } from '../core/errors.js';
import type {
  CircuitBreakerOptions,
  CircuitBreakerSnapshot,
  CircuitState,
  CircuitTransition,
} from '../types/circuit-breaker.js';
import { logThought } from '../utils/logger.js';

const DEFAULT_FAILURE_THRESHOLD = 3;
const DEFAULT_RESET_TIMEOUT_MS = 30_000;

export type CircuitTransitionListener = (transition: CircuitTransition) => void;

export interface CircuitExecuteOptions {
  /**
   * Whether a thrown error counts against the dependency. Validation and
   * cancellation errors say nothing about the dependency's health.
   */
  countsAsFailure?: (error: unknown) => boolean;
}

function defaultCountsAsFailure(error: unknown): boolean {
  if (error instanceof OrchestratorError) {
    return error.kind !== 'validation' && error.kind !== 'cancelled';
  }
  return true;
}

/**
 * Failure-counting guard around a single dependency.
 *
 * closed: calls pass; `failureThreshold` consecutive failures open the circuit.
 * open: calls fail fast with {@link CircuitOpenError} until `resetTimeoutMs` has elapsed.
 * half_open: exactly one trial call passes; success closes, failure re-opens with a fresh timer.
 *
 * Every transition happens synchronously between awaits, so concurrent callers
 * on the event loop always observe a consistent state.
 */
export class CircuitBreaker {
  readonly dependencyName: string;
  readonly #failureThreshold: number;
  readonly #resetTimeoutMs: number;
  readonly #now: () => number;
  readonly #listeners = new Set<CircuitTransitionListener>();

  #state: CircuitState = 'closed';
  #failureCount = 0;
  #lastFailureAt: number | null = null;
  #openedAt: number | null = null;
  #lastError: string | null = null;
  #trialInFlight = false;

  constructor(dependencyName: string, options: CircuitBreakerOptions = {}) {
    this.dependencyName = dependencyName;
    this.#failureThreshold = Math.max(1, Math.floor(options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD));
    this.#resetTimeoutMs = Math.max(0, options.resetTimeoutMs ?? DEFAULT_RESET_TIMEOUT_MS);
    this.#now = options.now ?? (() => Date.now());
  }

  /** Current state, with an expired open period already promoted to half_open. */
  get state(): CircuitState {
    this.#checkOpenTimeout();
    return this.#state;
  }

  /** True when a call made right now would be let through. */
  isCallPermitted(): boolean {
    const state = this.state;
    return state === 'closed' || (state === 'half_open' && !this.#trialInFlight);
  }

  onTransition(listener: CircuitTransitionListener): () => void {
    this.#listeners.add(listener);
    return () => {
      this.#listeners.delete(listener);
    };
  }

  async execute<T>(fn: () => Promise<T>, options: CircuitExecuteOptions = {}): Promise<T> {
    this.#checkOpenTimeout();

    if (this.#state === 'open') {
      throw new CircuitOpenError(
        this.dependencyName,
        `Circuit for '${this.dependencyName}' is open (${this.#failureCount} consecutive failures).`,
      );
    }

    const isTrial = this.#state === 'half_open';
    if (isTrial) {
      if (this.#trialInFlight) {
        throw new CircuitOpenError(
          this.dependencyName,
          `Circuit for '${this.dependencyName}' is half-open and its trial call is still running.`,
        );
      }
      this.#trialInFlight = true;
    }

    try {
      const result = await fn();
      this.#recordSuccess(isTrial);
      return result;
    } catch (error) {
      const countsAsFailure = options.countsAsFailure ?? defaultCountsAsFailure;
      if (countsAsFailure(error)) {
        this.#recordFailure(error, isTrial);
      } else if (isTrial) {
        // An inconclusive trial leaves the circuit half-open for the next caller.
        this.#lastError = describeError(error);
      }
      throw error;
    } finally {
      if (isTrial) {
        this.#trialInFlight = false;
      }
    }
  }

  /** Force the breaker back to closed, clearing its counters. */
  reset(): void {
    this.#failureCount = 0;
    this.#openedAt = null;
    this.#trialInFlight = false;
    this.#transition('closed', 'Manual reset.');
  }

  snapshot(): CircuitBreakerSnapshot {
    const state = this.state;
    const remainingOpenMs =
      state === 'open' && this.#openedAt !== null
        ? Math.max(0, this.#resetTimeoutMs - (this.#now() - this.#openedAt))
        : 0;

    return {
      dependencyName: this.dependencyName,
      state,
      failureCount: this.#failureCount,
      lastFailureAt: this.#lastFailureAt === null ? null : new Date(this.#lastFailureAt).toISOString(),
      openedAt: this.#openedAt === null ? null : new Date(this.#openedAt).toISOString(),
      lastError: this.#lastError,
      remainingOpenMs,
      trialInFlight: this.#trialInFlight,
    };
  }

  #checkOpenTimeout(): void {
    if (this.#state !== 'open' || this.#openedAt === null) {
      return;
    }
    if (this.#now() - this.#openedAt >= this.#resetTimeoutMs) {
      this.#transition('half_open', `Reset timeout of ${this.#resetTimeoutMs}ms elapsed.`);
    }
  }

  #recordSuccess(isTrial: boolean): void {
    if (isTrial) {
      this.#failureCount = 0;
      this.#openedAt = null;
      this.#transition('closed', 'Trial call succeeded.');
      return;
    }
    if (this.#state === 'closed') {
      this.#failureCount = 0;
    }
  }

  #recordFailure(error: unknown, isTrial: boolean): void {
    const now = this.#now();
    this.#lastFailureAt = now;
    this.#lastError = describeError(error);

    if (isTrial) {
      this.#failureCount += 1;
      this.#openedAt = now;
      this.#transition('open', `Trial call failed: ${this.#lastError}`);
      return;
    }

    if (this.#state !== 'closed') {
      return;
    }

    this.#failureCount += 1;
    if (this.#failureCount >= this.#failureThreshold) {
      this.#openedAt = now;
      this.#transition(
        'open',
        `Failure threshold ${this.#failureThreshold} reached. Last error: ${this.#lastError}`,
      );
    }
  }

  #transition(to: CircuitState, reason: string): void {
    const from = this.#state;
    this.#state = to;
    if (from === to) {
      return;
    }

    const transition: CircuitTransition = { dependencyName: this.dependencyName, from, to, reason };
    void logThought(`[CircuitBreaker] '${this.dependencyName}' ${from} -> ${to}. ${reason}`);
    for (const listener of this.#listeners) {
      try {
        listener(transition);
      } catch (listenerErr) {
        console.error('[CircuitBreaker] Transition listener threw an error:', listenerErr);
      }
    }
  }
}

/** Owns one breaker per dependency name; callers only ever see snapshots. */
export class CircuitBreakerRegistry {
  readonly #breakers = new Map<string, CircuitBreaker>();
  readonly #defaults: CircuitBreakerOptions;

  constructor(defaults: CircuitBreakerOptions = {}) {
    this.#defaults = defaults;
  }

  get(dependencyName: string, overrides: CircuitBreakerOptions = {}): CircuitBreaker {
    let breaker = this.#breakers.get(dependencyName);
    if (!breaker) {
      breaker = new CircuitBreaker(dependencyName, { ...this.#defaults, ...overrides });
      breaker.onTransition((transition) => {
        if (transition.to === 'open') {
          console.warn(`[CircuitBreaker] '${transition.dependencyName}' opened: ${transition.reason}`);
        }
      });
      this.#breakers.set(dependencyName, breaker);
    }
    return breaker;
  }

  has(dependencyName: string): boolean {
    return this.#breakers.has(dependencyName);
  }

  snapshot(): CircuitBreakerSnapshot[] {
    return [...this.#breakers.values()]
      .map((breaker) => breaker.snapshot())
      .sort((left, right) => left.dependencyName.localeCompare(right.dependencyName));
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
