import { classifyError, toUserMessage, type OrchestratorErrorKind } from '../core/errors.js';
import type { InvocationResult, RoutingDecision } from '../types/model-routing.js';
import { logThought } from '../utils/logger.js';
import { withRetry, withTimeout } from '../utils/retry.js';
import type { AdaptiveRouter, SnapshotSource } from './adaptive-router.js';
import type { CircuitBreakerRegistry } from './circuit-breaker.js';
import { providerFor, type ProviderSet } from './providers.js';
import type { RouterState } from './router-state.js';

export interface InvocationExecutorOptions {
  router: AdaptiveRouter;
  providers: ProviderSet;
  breakers: CircuitBreakerRegistry;
  state: RouterState;
  resources: SnapshotSource;
  /** @default 30000 */
  modelTimeoutMs?: number;
  /** Attempts per model, the first one included, before escalating. @default 2 */
  maxRetries?: number;
  /** @default 1000 */
  backoffBaseMs?: number;
  /** @default 2 */
  backoffFactor?: number;
  /** @default 0.2 */
  jitterRatio?: number;
  /** @default 1024 */
  maxTokens?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  now?: () => number;
}

export interface InvokeOptions {
  context?: string;
  signal?: AbortSignal;
}

export function providerBreakerName(modelId: string): string {
  return `provider:${modelId}`;
}

/**
 * Calls the provider behind a routing decision with per-attempt timeouts and
 * retries, escalating down the fallback chain. Always resolves to an
 * {@link InvocationResult}; nothing a provider does escapes as an exception.
 */
export class InvocationExecutor {
  readonly #router: AdaptiveRouter;
  readonly #providers: ProviderSet;
  readonly #breakers: CircuitBreakerRegistry;
  readonly #state: RouterState;
  readonly #resources: SnapshotSource;
  readonly #modelTimeoutMs: number;
  readonly #maxRetries: number;
  readonly #backoffBaseMs: number;
  readonly #backoffFactor: number;
  readonly #jitterRatio: number;
  readonly #maxTokens: number;
  readonly #sleep: InvocationExecutorOptions['sleep'];
  readonly #random: InvocationExecutorOptions['random'];
  readonly #now: () => number;

  constructor(options: InvocationExecutorOptions) {
    this.#router = options.router;
    this.#providers = options.providers;
    this.#breakers = options.breakers;
    this.#state = options.state;
    this.#resources = options.resources;
    this.#modelTimeoutMs = Math.max(1, options.modelTimeoutMs ?? 30_000);
    this.#maxRetries = Math.max(1, Math.floor(options.maxRetries ?? 2));
    this.#backoffBaseMs = Math.max(0, options.backoffBaseMs ?? 1_000);
    this.#backoffFactor = Math.max(1, options.backoffFactor ?? 2);
    this.#jitterRatio = Math.max(0, options.jitterRatio ?? 0.2);
    this.#maxTokens = Math.max(1, Math.floor(options.maxTokens ?? 1_024));
    this.#sleep = options.sleep;
    this.#random = options.random;
    this.#now = options.now ?? (() => Date.now());
  }

  async invoke(decision: RoutingDecision, prompt: string, options: InvokeOptions = {}): Promise<InvocationResult> {
    const { signal } = options;
    const excluded = new Set<string>();
    const modelsTried: string[] = [];
    let attempts = 0;
    let lastKind: OrchestratorErrorKind = 'model_unavailable';
    let current: RoutingDecision | null = decision;

    const fail = (errorKind: OrchestratorErrorKind): InvocationResult => ({
      success: false,
      errorKind,
      userMessage: toUserMessage(errorKind),
      attempts,
      modelsTried,
      decision: current ?? decision,
    });

    while (current) {
      if (signal?.aborted) {
        return fail('cancelled');
      }

      const modelId: string = current.selectedModelId;
      const profile = this.#router.profiles.profiles.get(modelId);
      const breaker = this.#breakers.get(providerBreakerName(modelId));

      if (!profile || !breaker.isCallPermitted()) {
        lastKind = profile ? 'circuit_open' : 'model_unavailable';
        void logThought(`[InvocationExecutor] Skipping '${modelId}' (${lastKind}).`);
      } else {
        modelsTried.push(modelId);
        const provider = providerFor(this.#providers, profile);
        const result = await withRetry(
          () => {
            attempts += 1;
            return breaker.execute(() =>
              withTimeout(
                (attemptSignal) =>
                  provider.invoke({
                    model: profile,
                    prompt,
                    context: options.context ?? '',
                    maxTokens: this.#maxTokens,
                    signal: attemptSignal,
                  }),
                this.#modelTimeoutMs,
                providerBreakerName(modelId),
                signal,
              ),
            );
          },
          {
            maxAttempts: this.#maxRetries,
            baseDelayMs: this.#backoffBaseMs,
            backoffFactor: this.#backoffFactor,
            jitterRatio: this.#jitterRatio,
            label: providerBreakerName(modelId),
            shouldRetry: (error) => classifyError(error).retryable,
            signal,
            sleep: this.#sleep,
            random: this.#random,
          },
        );

        if (result.ok && result.value !== undefined) {
          this.#state.recordInvocation(modelId, { success: true }, this.#now());
          return {
            success: true,
            modelId,
            text: result.value,
            attempts,
            modelsTried,
            decision: current,
          };
        }

        const error = classifyError(result.lastError);
        this.#state.recordInvocation(modelId, { success: false, error: error.message }, this.#now());
        lastKind = error.kind;

        if (error.kind === 'cancelled' || signal?.aborted) {
          return fail('cancelled');
        }
        if (error.fatal) {
          void logThought(`[InvocationExecutor] '${modelId}' failed with fatal ${error.kind}: ${error.message}`);
          return fail(error.kind);
        }
        void logThought(
          `[InvocationExecutor] '${modelId}' gave up after ${result.attempts} attempt(s) with ${error.kind}; escalating.`,
        );
      }

      excluded.add(modelId);
      try {
        current = this.#router.routeFrom(current, excluded, await this.#resources.snapshot());
      } catch (error) {
        return fail(classifyError(error).kind);
      }
    }

    void logThought(`[InvocationExecutor] Fallback chain exhausted after ${attempts} attempt(s); last error ${lastKind}.`);
    return fail(lastKind);
  }
}
