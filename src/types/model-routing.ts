import type { OrchestratorErrorKind } from '../core/errors.js';
import type { ResourceBucket } from './resource.js';

export type ProviderKind = 'cloud_api' | 'local_inference';

export type ResourceRequirement = 'low' | 'med' | 'high';

/** Static description of a routable model. Frozen once loaded. */
export interface ModelProfile {
  readonly id: string;
  /** Provider-side model name (e.g. `mistralai/mistral-small-24b-instruct-2501:free`). */
  readonly name: string;
  readonly providerKind: ProviderKind;
  readonly resourceRequirement: ResourceRequirement;
  readonly offlineCapable: boolean;
  /** Lower values are preferred. */
  readonly priority: number;
  readonly intents: ReadonlySet<string>;
}

export interface ModelProfileTable {
  readonly profiles: ReadonlyMap<string, ModelProfile>;
  /** Universal fallback appended to every candidate chain. */
  readonly leaderModelId: string;
  /** Always-available, lowest-requirement model used when every candidate is filtered out. */
  readonly safeDefaultModelId: string;
}

export interface IntentClassification {
  intent: string;
  confidence: number;
}

export interface IntentClassifier {
  classify(text: string): IntentClassification | Promise<IntentClassification>;
}

export type IntentSource = 'explicit' | 'classifier' | 'keyword' | 'default';

export interface RoutingDecision {
  readonly selectedModelId: string;
  readonly intent: string;
  readonly confidence: number;
  readonly intentSource: IntentSource;
  /** Ordered candidates that survived resource filtering; the selected model comes first. */
  readonly fallbackChainConsidered: readonly string[];
  readonly resourceBucket: ResourceBucket;
  readonly decidedAt: string;
  readonly cacheKey: string;
  readonly cached: boolean;
}

export interface ModelUsageSnapshot {
  modelId: string;
  selections: number;
  invocations: number;
  successes: number;
  failures: number;
  lastUsedAt: string | null;
  lastError: string | null;
}

export interface RoutingCacheSnapshot {
  size: number;
  hits: number;
  misses: number;
  ttlMs: number;
}

export interface InvocationSuccess {
  success: true;
  modelId: string;
  text: string;
  attempts: number;
  modelsTried: string[];
  decision: RoutingDecision;
}

export interface InvocationFailure {
  success: false;
  errorKind: OrchestratorErrorKind;
  userMessage: string;
  attempts: number;
  modelsTried: string[];
  decision: RoutingDecision;
}

export type InvocationResult = InvocationSuccess | InvocationFailure;
