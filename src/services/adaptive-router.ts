import { createHash } from 'node:crypto';
import { ValidationError } from '../core/errors.js';
import type {
  IntentClassification,
  IntentClassifier,
  IntentSource,
  ModelProfile,
  ModelProfileTable,
  RoutingDecision,
} from '../types/model-routing.js';
import type { ResourceBucket, ResourceSnapshot, ResourceThresholds } from '../types/resource.js';
import { logThought } from '../utils/logger.js';
import { COMMAND_INTENTS, GENERAL_INTENT } from './intent-classifier.js';
import { DEFAULT_RESOURCE_THRESHOLDS, bucketFor, isResourceConstrained } from './resource-monitor.js';
import type { RouterState } from './router-state.js';

export const EXPLICIT_INTENT = 'explicit';

export interface SnapshotSource {
  snapshot(): Promise<ResourceSnapshot>;
}

export interface AdaptiveRouterOptions {
  profiles: ModelProfileTable;
  classifier: IntentClassifier;
  /** Consulted when the primary classifier is unsure. */
  keywordClassifier?: IntentClassifier;
  state: RouterState;
  resources: SnapshotSource;
  /** @default 0.5 */
  minConfidence?: number;
  thresholds?: ResourceThresholds;
  /** False for models that should be skipped right now, such as ones behind an open breaker. */
  isModelAvailable?: (modelId: string) => boolean;
  now?: () => number;
}

export interface RouteOptions {
  explicitModelId?: string;
  /** Route against this snapshot instead of asking the resource monitor. */
  snapshot?: ResourceSnapshot;
}

export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function hashQuery(query: string): string {
  return createHash('sha256').update(normalizeQuery(query)).digest('hex');
}

/**
 * Picks a model for a query from intent, resource pressure and connectivity.
 * Stateless apart from the {@link RouterState} it is given.
 */
export class AdaptiveRouter {
  readonly #profiles: ModelProfileTable;
  readonly #classifier: IntentClassifier;
  readonly #keywordClassifier: IntentClassifier | undefined;
  readonly #state: RouterState;
  readonly #resources: SnapshotSource;
  readonly #minConfidence: number;
  readonly #thresholds: ResourceThresholds;
  readonly #isModelAvailable: (modelId: string) => boolean;
  readonly #now: () => number;

  constructor(options: AdaptiveRouterOptions) {
    this.#profiles = options.profiles;
    this.#classifier = options.classifier;
    this.#keywordClassifier = options.keywordClassifier;
    this.#state = options.state;
    this.#resources = options.resources;
    this.#minConfidence = options.minConfidence ?? 0.5;
    this.#thresholds = options.thresholds ?? DEFAULT_RESOURCE_THRESHOLDS;
    this.#isModelAvailable = options.isModelAvailable ?? (() => true);
    this.#now = options.now ?? (() => Date.now());
  }

  get profiles(): ModelProfileTable {
    return this.#profiles;
  }

  async route(query: string, options: RouteOptions = {}): Promise<RoutingDecision> {
    if (!query.trim()) {
      throw new ValidationError('Query must be a non-empty string.');
    }

    const snapshot = options.snapshot ?? (await this.#resources.snapshot());
    const bucket = bucketFor(snapshot, this.#thresholds);
    const queryHash = hashQuery(query);

    if (options.explicitModelId) {
      const explicit = this.#routeExplicit(options.explicitModelId, queryHash, snapshot, bucket);
      if (explicit) {
        return this.#finish(explicit, 'explicit model');
      }
    }

    // A bucket can hide a second constraint (offline under memory pressure), so a
    // cached pick is re-checked against the current snapshot before it is reused.
    const cached = this.#state.lookup(queryHash, bucket, this.#now());
    if (cached && this.#stillEligible(cached.selectedModelId, snapshot)) {
      return this.#finish({ ...cached, cached: true }, 'cache hit');
    }

    const { intent, confidence, intentSource } = await this.#resolveIntent(query);
    const chain = this.#survivors(this.#candidateChain(intent), snapshot);
    const decision = this.#decide({
      intent,
      confidence,
      intentSource,
      chain,
      bucket,
      cacheKey: this.#cacheKey(queryHash, bucket, intent),
    });

    this.#state.store(queryHash, decision, this.#now());
    return this.#finish(decision, 'routed');
  }

  /**
   * Re-enter selection with the models in `excluded` removed from the decision's chain,
   * without classifying again. Null once even the safe default has been excluded.
   */
  routeFrom(decision: RoutingDecision, excluded: ReadonlySet<string>, snapshot: ResourceSnapshot): RoutingDecision | null {
    const remaining = decision.fallbackChainConsidered
      .filter((modelId) => !excluded.has(modelId))
      .map((modelId) => this.#profiles.profiles.get(modelId))
      .filter((profile): profile is ModelProfile => profile !== undefined);
    const chain = this.#survivors(remaining, snapshot);

    if (chain.length === 0 && excluded.has(this.#profiles.safeDefaultModelId)) {
      void logThought(`[AdaptiveRouter] Fallback chain exhausted for intent '${decision.intent}'.`);
      return null;
    }

    const next = this.#decide({
      intent: decision.intent,
      confidence: decision.confidence,
      intentSource: decision.intentSource,
      chain,
      bucket: bucketFor(snapshot, this.#thresholds),
      cacheKey: decision.cacheKey,
    });
    return this.#finish(next, `escalated past ${[...excluded].join(', ')}`);
  }

  /** Candidate profiles for an intent: matching specialists by priority, leader last. */
  #candidateChain(intent: string): ModelProfile[] {
    const leader = this.#profiles.profiles.get(this.#profiles.leaderModelId);
    if (COMMAND_INTENTS.has(intent)) {
      return leader ? [leader] : [];
    }

    const matching = [...this.#profiles.profiles.values()]
      .filter((profile) => profile.intents.has(intent))
      .sort((left, right) => left.priority - right.priority || left.id.localeCompare(right.id));
    if (leader && !matching.some((profile) => profile.id === leader.id)) {
      matching.push(leader);
    }
    return matching;
  }

  /** Resource, connectivity, local-runtime and availability filtering. */
  #survivors(candidates: ModelProfile[], snapshot: ResourceSnapshot): ModelProfile[] {
    const constrained = isResourceConstrained(snapshot, this.#thresholds);
    return candidates.filter(
      (profile) =>
        (!constrained || profile.resourceRequirement === 'low') &&
        (snapshot.connectivity || profile.offlineCapable) &&
        (profile.providerKind !== 'local_inference' || snapshot.localInferenceAvailable) &&
        this.#isModelAvailable(profile.id),
    );
  }

  #stillEligible(modelId: string, snapshot: ResourceSnapshot): boolean {
    const profile = this.#profiles.profiles.get(modelId);
    return profile !== undefined && this.#survivors([profile], snapshot).length === 1;
  }

  #decide(input: {
    intent: string;
    confidence: number;
    intentSource: IntentSource;
    chain: ModelProfile[];
    bucket: ResourceBucket;
    cacheKey: string;
  }): RoutingDecision {
    const chainIds = input.chain.map((profile) => profile.id);
    const selectedModelId = chainIds[0] ?? this.#profiles.safeDefaultModelId;
    return Object.freeze({
      selectedModelId,
      intent: input.intent,
      confidence: input.confidence,
      intentSource: input.intentSource,
      fallbackChainConsidered: Object.freeze(chainIds.length > 0 ? chainIds : [selectedModelId]),
      resourceBucket: input.bucket,
      decidedAt: new Date(this.#now()).toISOString(),
      cacheKey: input.cacheKey,
      cached: false,
    });
  }

  #routeExplicit(
    modelId: string,
    queryHash: string,
    snapshot: ResourceSnapshot,
    bucket: ResourceBucket,
  ): RoutingDecision | null {
    const profile = this.#profiles.profiles.get(modelId);
    if (!profile) {
      void logThought(`[AdaptiveRouter] Explicit model '${modelId}' is not a known profile; routing normally.`);
      return null;
    }
    const leader = this.#profiles.profiles.get(this.#profiles.leaderModelId);
    const chain = this.#survivors(leader && leader.id !== profile.id ? [profile, leader] : [profile], snapshot);
    if (chain[0]?.id !== profile.id) {
      void logThought(`[AdaptiveRouter] Explicit model '${modelId}' is incompatible with the '${bucket}' bucket; routing normally.`);
      return null;
    }

    return this.#decide({
      intent: EXPLICIT_INTENT,
      confidence: 1,
      intentSource: 'explicit',
      chain,
      bucket,
      cacheKey: this.#cacheKey(queryHash, bucket, EXPLICIT_INTENT),
    });
  }

  async #resolveIntent(query: string): Promise<IntentClassification & { intentSource: IntentSource }> {
    const primary = await this.#classifySafely(this.#classifier, query);
    if (primary && primary.confidence >= this.#minConfidence) {
      return { ...primary, intentSource: 'classifier' };
    }

    if (this.#keywordClassifier && this.#keywordClassifier !== this.#classifier) {
      const keyword = await this.#classifySafely(this.#keywordClassifier, query);
      if (keyword && keyword.confidence > 0 && keyword.intent !== GENERAL_INTENT) {
        return { ...keyword, intentSource: 'keyword' };
      }
    }

    return { intent: GENERAL_INTENT, confidence: primary?.confidence ?? 0, intentSource: 'default' };
  }

  async #classifySafely(classifier: IntentClassifier, query: string): Promise<IntentClassification | null> {
    try {
      const result = await classifier.classify(query);
      const confidence = Number.isFinite(result.confidence) ? Math.max(0, Math.min(1, result.confidence)) : 0;
      return { intent: result.intent.trim().toLowerCase() || GENERAL_INTENT, confidence };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      void logThought(`[AdaptiveRouter] Intent classifier failed: ${message}`);
      return null;
    }
  }

  #cacheKey(queryHash: string, bucket: ResourceBucket, intent: string): string {
    return `${queryHash}:${bucket}:${intent}`;
  }

  #finish(decision: RoutingDecision, reason: string): RoutingDecision {
    this.#state.recordSelection(decision.selectedModelId, this.#now());
    void logThought(
      `[AdaptiveRouter] ${reason}: intent='${decision.intent}' (${decision.intentSource}, ${decision.confidence.toFixed(2)}) ` +
        `bucket=${decision.resourceBucket} -> ${decision.selectedModelId} [${decision.fallbackChainConsidered.join(' > ')}]`,
    );
    return decision;
  }
}
