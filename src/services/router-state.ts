import type { ResourceBucket } from '../types/resource.js';
import type { ModelUsageSnapshot, RoutingCacheSnapshot, RoutingDecision } from '../types/model-routing.js';

interface CacheEntry {
  decision: RoutingDecision;
  expiresAt: number;
}

interface UsageCounters {
  selections: number;
  invocations: number;
  successes: number;
  failures: number;
  lastUsedAt: number | null;
  lastError: string | null;
}

/**
 * The router's only mutable state: the short-TTL decision cache and the
 * per-model usage counters. Owned by the orchestrator and handed to the router.
 */
export class RouterState {
  readonly ttlMs: number;
  readonly #cache = new Map<string, CacheEntry>();
  /** `queryHash|bucket` to the full cache key, so a hit needs no classification. */
  readonly #keyByQuery = new Map<string, string>();
  readonly #usage = new Map<string, UsageCounters>();
  #hits = 0;
  #misses = 0;

  constructor(ttlMs = 10_000) {
    this.ttlMs = Math.max(0, ttlMs);
  }

  lookup(queryHash: string, bucket: ResourceBucket, now: number): RoutingDecision | null {
    const indexKey = `${queryHash}|${bucket}`;
    const cacheKey = this.#keyByQuery.get(indexKey);
    const entry = cacheKey === undefined ? undefined : this.#cache.get(cacheKey);
    if (!entry || entry.expiresAt <= now) {
      if (cacheKey !== undefined) {
        this.#cache.delete(cacheKey);
        this.#keyByQuery.delete(indexKey);
      }
      this.#misses += 1;
      return null;
    }
    this.#hits += 1;
    return entry.decision;
  }

  store(queryHash: string, decision: RoutingDecision, now: number): void {
    if (this.ttlMs === 0) return;
    this.#keyByQuery.set(`${queryHash}|${decision.resourceBucket}`, decision.cacheKey);
    this.#cache.set(decision.cacheKey, { decision, expiresAt: now + this.ttlMs });
  }

  /** Drop expired cache entries. */
  prune(now: number): number {
    let removed = 0;
    for (const [key, entry] of this.#cache) {
      if (entry.expiresAt <= now) {
        this.#cache.delete(key);
        removed += 1;
      }
    }
    for (const [indexKey, cacheKey] of this.#keyByQuery) {
      if (!this.#cache.has(cacheKey)) {
        this.#keyByQuery.delete(indexKey);
      }
    }
    return removed;
  }

  clearCache(): void {
    this.#cache.clear();
    this.#keyByQuery.clear();
  }

  recordSelection(modelId: string, now: number): void {
    const usage = this.#usageFor(modelId);
    usage.selections += 1;
    usage.lastUsedAt = now;
  }

  recordInvocation(modelId: string, outcome: { success: true } | { success: false; error: string }, now: number): void {
    const usage = this.#usageFor(modelId);
    usage.invocations += 1;
    usage.lastUsedAt = now;
    if (outcome.success) {
      usage.successes += 1;
    } else {
      usage.failures += 1;
      usage.lastError = outcome.error;
    }
  }

  usageSnapshot(): ModelUsageSnapshot[] {
    return [...this.#usage.entries()]
      .map(([modelId, usage]) => ({
        modelId,
        selections: usage.selections,
        invocations: usage.invocations,
        successes: usage.successes,
        failures: usage.failures,
        lastUsedAt: usage.lastUsedAt === null ? null : new Date(usage.lastUsedAt).toISOString(),
        lastError: usage.lastError,
      }))
      .sort((left, right) => left.modelId.localeCompare(right.modelId));
  }

  cacheSnapshot(): RoutingCacheSnapshot {
    return { size: this.#cache.size, hits: this.#hits, misses: this.#misses, ttlMs: this.ttlMs };
  }

  #usageFor(modelId: string): UsageCounters {
    let usage = this.#usage.get(modelId);
    if (!usage) {
      usage = { selections: 0, invocations: 0, successes: 0, failures: 0, lastUsedAt: null, lastError: null };
      this.#usage.set(modelId, usage);
    }
    return usage;
  }
}
