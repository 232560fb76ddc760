import { CancelledError, ValidationError, classifyError, toUserMessage, type OrchestratorErrorKind } from './errors.js';
import {
  HELP_TEXT,
  formatMemoryOverview,
  formatMemorySearch,
  formatStatus,
  parseLocalCommand,
  type LocalCommand,
  type LocalCommandName,
} from './local-commands.js';
import type { AdaptiveRouter } from '../services/adaptive-router.js';
import type { ChatHistoryService } from '../services/chat-history.js';
import type { CircuitBreakerRegistry } from '../services/circuit-breaker.js';
import type { InvocationExecutor } from '../services/invocation-executor.js';
import { everySeconds, type JobScheduler } from '../services/job-scheduler.js';
import type { PersistenceStatus, PrimaryBackupRepository } from '../services/repositories/primary-backup-repository.js';
import type { ResourceMonitor } from '../services/resource-monitor.js';
import type { RouterState } from '../services/router-state.js';
import type { VectorStore } from '../services/vector-store.js';
import type { CircuitBreakerSnapshot } from '../types/circuit-breaker.js';
import type {
  InvocationResult,
  ModelUsageSnapshot,
  RoutingCacheSnapshot,
  RoutingDecision,
} from '../types/model-routing.js';
import type { ChatTurnPayload, Entity, ReadEnvelope } from '../types/persistence.js';
import type { ResourceBucket, ResourceSnapshot } from '../types/resource.js';
import type { JobSnapshot } from '../types/scheduler.js';
import type { ScoredVectorRecord, VectorStoreStatus } from '../types/vector.js';
import { logThought } from '../utils/logger.js';

const CACHE_PRUNE_JOB_ID = 'routing-cache-prune';
const MEMORY_LISTING_LIMIT = 10;
const INTERACTION_LISTING_LIMIT = 5;

export interface OrchestratorDeps {
  monitor: ResourceMonitor;
  breakers: CircuitBreakerRegistry;
  state: RouterState;
  router: AdaptiveRouter;
  executor: InvocationExecutor;
  repository: PrimaryBackupRepository<ChatTurnPayload>;
  history: ChatHistoryService;
  vectorStore: VectorStore;
  scheduler: JobScheduler;
  /** @default 60 */
  reconcileIntervalSec?: number;
  /** Token budget for context assembled by `ask`. @default 500 */
  contextTokens?: number;
  /** Runs last during shutdown, after every store is closed. */
  onShutdown?: () => void | Promise<void>;
  now?: () => number;
}

export interface OrchestratorStatus {
  resources: ResourceSnapshot & { bucket: ResourceBucket };
  breakers: CircuitBreakerSnapshot[];
  usage: ModelUsageSnapshot[];
  routingCache: RoutingCacheSnapshot;
  vector: VectorStoreStatus;
  persistence: PersistenceStatus & { pendingPrimary: number | null };
  jobs: JobSnapshot[];
  inFlightSessions: number;
}

export interface AskOptions {
  explicitModelId?: string;
  signal?: AbortSignal;
}

export interface AskResult {
  success: boolean;
  /** Model output on success, otherwise the user-facing error message. */
  text: string;
  modelId: string | null;
  errorKind: OrchestratorErrorKind | null;
  decision: RoutingDecision | null;
  attempts: number;
  modelsTried: string[];
  /** False when the turn could not be written to either storage tier. */
  persisted: boolean;
  /** True when the context was read from the backup tier. */
  historyDegraded: boolean;
  /** Set when the query was a local command answered without a model. */
  command: LocalCommandName | null;
}

/**
 * Top-level facade over routing, invocation and persistence. Owns the router
 * state, breakers and stores, and the background jobs that keep them fresh.
 */
export class Orchestrator {
  readonly #deps: OrchestratorDeps;
  readonly #now: () => number;
  readonly #inFlight = new Map<string, AbortController>();
  #started = false;
  #stopped = false;

  constructor(deps: OrchestratorDeps) {
    this.#deps = deps;
    this.#now = deps.now ?? (() => Date.now());
  }

  async start(): Promise<void> {
    if (this.#started) return;
    this.#started = true;

    const { monitor, repository, scheduler, state } = this.#deps;
    await monitor.refresh();
    monitor.start(scheduler);
    repository.start(scheduler, this.#deps.reconcileIntervalSec ?? 60);
    scheduler.register({
      id: CACHE_PRUNE_JOB_ID,
      cronExpression: everySeconds(60),
      description: 'Drop expired routing cache entries',
      handler: async () => {
        state.prune(this.#now());
      },
    });
    void logThought('[Orchestrator] Started.');
  }

  route(query: string, explicitModelId?: string): Promise<RoutingDecision> {
    return this.#deps.router.route(query, { explicitModelId });
  }

  invoke(decision: RoutingDecision, prompt: string, context?: string, signal?: AbortSignal): Promise<InvocationResult> {
    return this.#deps.executor.invoke(decision, prompt, { context, signal });
  }

  historyWrite(entity: Entity<ChatTurnPayload>, signal?: AbortSignal): Promise<Entity<ChatTurnPayload>> {
    return this.#deps.history.write(entity, signal);
  }

  historyRead(id: string, signal?: AbortSignal): Promise<ReadEnvelope<ChatTurnPayload>> {
    return this.#deps.history.read(id, signal);
  }

  semanticSearch(text: string, k?: number, signal?: AbortSignal): Promise<ScoredVectorRecord[]> {
    return this.#deps.history.semanticSearch(text, k, signal);
  }

  async getStatus(): Promise<OrchestratorStatus> {
    const { monitor, breakers, state, vectorStore, repository, scheduler } = this.#deps;
    const snapshot = monitor.current();

    let pendingPrimary: number | null = null;
    try {
      pendingPrimary = await repository.pendingPrimaryCount();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      void logThought(`[Orchestrator] Could not count pending reconciliation entries: ${message}`);
    }

    return {
      resources: { ...snapshot, bucket: monitor.bucket(snapshot) },
      breakers: breakers.snapshot(),
      usage: state.usageSnapshot(),
      routingCache: state.cacheSnapshot(),
      vector: await vectorStore.status(),
      persistence: { ...repository.status(), pendingPrimary },
      jobs: scheduler.listJobs(),
      inFlightSessions: this.#inFlight.size,
    };
  }

  /**
   * Context, routing, invocation and persistence for one user turn. A newer `ask`
   * on the same session cancels this one. Resolves to a result envelope for every
   * failure except invalid input. Local commands (`/remember`, `/memory`, `/clear`,
   * `/status`, `/help`) are answered here and never reach a model.
   */
  async ask(sessionId: string, query: string, options: AskOptions = {}): Promise<AskResult> {
    if (!sessionId.trim()) {
      throw new ValidationError('sessionId must be a non-empty string.');
    }
    if (!query.trim()) {
      throw new ValidationError('Query must be a non-empty string.');
    }
    if (this.#stopped || options.signal?.aborted) {
      return this.#failure('cancelled', null);
    }

    this.#inFlight.get(sessionId)?.abort(new CancelledError(`Superseded by a newer request in session '${sessionId}'.`));
    const controller = new AbortController();
    this.#inFlight.set(sessionId, controller);
    const forwardAbort = (): void => controller.abort(options.signal?.reason);
    options.signal?.addEventListener('abort', forwardAbort, { once: true });
    const { signal } = controller;

    try {
      const command = parseLocalCommand(query);
      if (command) {
        return await this.#runCommand(sessionId, command, signal);
      }

      const { history } = this.#deps;
      let historyDegraded = false;
      let context = '';
      try {
        const built = await history.buildContext(sessionId, query, this.#deps.contextTokens ?? 500, signal);
        context = built.text;
        historyDegraded = built.degraded;
      } catch (error) {
        if (signal.aborted) return this.#failure('cancelled', null);
        const message = error instanceof Error ? error.message : String(error);
        void logThought(`[Orchestrator] Context unavailable for session '${sessionId}': ${message}`);
      }

      let decision: RoutingDecision;
      try {
        decision = await this.#deps.router.route(query, { explicitModelId: options.explicitModelId });
      } catch (error) {
        if (error instanceof ValidationError) throw error;
        return this.#failure(classifyError(error).kind, null);
      }

      let persisted = await this.#persistTurn(sessionId, 'user', query, { intent: decision.intent }, signal);
      const result = await this.#deps.executor.invoke(decision, query, { context, signal });

      if (result.success) {
        persisted =
          (await this.#persistTurn(
            sessionId,
            'assistant',
            result.text,
            { modelId: result.modelId, intent: decision.intent },
            signal,
          )) && persisted;
        return {
          success: true,
          text: result.text,
          modelId: result.modelId,
          errorKind: null,
          decision: result.decision,
          attempts: result.attempts,
          modelsTried: result.modelsTried,
          persisted,
          historyDegraded,
          command: null,
        };
      }

      return {
        success: false,
        text: result.userMessage,
        modelId: null,
        errorKind: result.errorKind,
        decision: result.decision,
        attempts: result.attempts,
        modelsTried: result.modelsTried,
        persisted,
        historyDegraded,
        command: null,
      };
    } finally {
      options.signal?.removeEventListener('abort', forwardAbort);
      if (this.#inFlight.get(sessionId) === controller) {
        this.#inFlight.delete(sessionId);
      }
    }
  }

  /** Stops background jobs, cancels in-flight requests and closes the stores. */
  async shutdown(): Promise<void> {
    if (this.#stopped) return;
    this.#stopped = true;

    for (const controller of this.#inFlight.values()) {
      controller.abort(new CancelledError('Orchestrator is shutting down.'));
    }
    this.#inFlight.clear();

    const { monitor, scheduler, history, repository } = this.#deps;
    monitor.stop();
    scheduler.unregister(CACHE_PRUNE_JOB_ID);
    scheduler.stopAll();
    await history.drain();
    await repository.close();
    await this.#deps.onShutdown?.();
    void logThought('[Orchestrator] Shut down.');
  }

  async #runCommand(sessionId: string, command: LocalCommand, signal: AbortSignal): Promise<AskResult> {
    const { history } = this.#deps;
    try {
      switch (command.name) {
        case 'help':
          return this.#commandResult(command.name, HELP_TEXT);
        case 'status':
          return this.#commandResult(command.name, formatStatus(await this.getStatus()));
        case 'clear': {
          const removed = await history.clearSession(sessionId, signal);
          return this.#commandResult(command.name, `Cleared ${removed} ${removed === 1 ? 'entry' : 'entries'} from this session.`, {
            persisted: true,
          });
        }
        case 'remember': {
          const saved = await history.saveMemory(sessionId, command.category, command.content, signal);
          return this.#commandResult(command.name, `Saved to memory under '${saved.payload.category ?? command.category}'.`, {
            persisted: true,
          });
        }
        case 'memory': {
          const { memories, degraded } = await history.searchMemory(sessionId, command.query, MEMORY_LISTING_LIMIT, signal);
          if (command.query) {
            return this.#commandResult(command.name, formatMemorySearch(command.query, memories), { historyDegraded: degraded });
          }
          const recent = await history.recentInteractions(sessionId, INTERACTION_LISTING_LIMIT, signal);
          return this.#commandResult(command.name, formatMemoryOverview(memories, recent.interactions), {
            historyDegraded: degraded || recent.degraded,
          });
        }
      }
    } catch (error) {
      if (signal.aborted) return { ...this.#failure('cancelled', null), command: command.name };
      const { kind } = classifyError(error);
      const message = error instanceof Error ? error.message : String(error);
      void logThought(`[Orchestrator] Command '${command.name}' failed for session '${sessionId}': ${message}`);
      return { ...this.#failure(kind, null), command: command.name };
    }
  }

  #commandResult(
    command: LocalCommandName,
    text: string,
    flags: { persisted?: boolean; historyDegraded?: boolean } = {},
  ): AskResult {
    return {
      success: true,
      text,
      modelId: null,
      errorKind: null,
      decision: null,
      attempts: 0,
      modelsTried: [],
      persisted: flags.persisted ?? false,
      historyDegraded: flags.historyDegraded ?? false,
      command,
    };
  }

  async #persistTurn(
    sessionId: string,
    role: ChatTurnPayload['role'],
    content: string,
    metadata: { modelId?: string; intent?: string },
    signal: AbortSignal,
  ): Promise<boolean> {
    try {
      await this.#deps.history.appendTurn(sessionId, role, content, metadata, signal);
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[Orchestrator] Could not persist ${role} turn for session '${sessionId}': ${message}`);
      void logThought(`[Orchestrator] Could not persist ${role} turn for session '${sessionId}': ${message}`);
      return false;
    }
  }

  #failure(errorKind: OrchestratorErrorKind, decision: RoutingDecision | null): AskResult {
    return {
      success: false,
      text: toUserMessage(errorKind),
      modelId: null,
      errorKind,
      decision,
      attempts: 0,
      modelsTried: [],
      persisted: false,
      historyDegraded: false,
      command: null,
    };
  }
}
