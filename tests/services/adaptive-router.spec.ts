import { describe, expect, it, vi } from 'vitest';
import { ValidationError } from '../../src/core/errors.js';
import { AdaptiveRouter, hashQuery, normalizeQuery } from '../../src/services/adaptive-router.js';
import { KeywordIntentClassifier } from '../../src/services/intent-classifier.js';
import { loadModelProfiles } from '../../src/services/model-profiles.js';
import { RouterState } from '../../src/services/router-state.js';
import type { IntentClassifier } from '../../src/types/model-routing.js';
import type { ResourceSnapshot } from '../../src/types/resource.js';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
}));

const NOW = Date.parse('2026-03-01T12:00:00.000Z');
const profiles = loadModelProfiles('data/model-profiles.json');
const keywords = KeywordIntentClassifier.fromFile('data/intent-keywords.json');

function snapshot(overrides: Partial<ResourceSnapshot> = {}): ResourceSnapshot {
  return {
    cpuPercent: 20,
    memAvailableMb: 8_192,
    memPercent: 40,
    connectivity: true,
    localInferenceAvailable: true,
    capturedAt: NOW,
    stale: false,
    ...overrides,
  };
}

function buildRouter(options: {
  classifier?: IntentClassifier;
  keywordClassifier?: IntentClassifier;
  resources?: ResourceSnapshot;
  isModelAvailable?: (modelId: string) => boolean;
} = {}) {
  const state = new RouterState(10_000);
  const current = options.resources ?? snapshot();
  const router = new AdaptiveRouter({
    profiles,
    classifier: options.classifier ?? keywords,
    keywordClassifier: options.keywordClassifier,
    state,
    resources: { snapshot: async () => current },
    isModelAvailable: options.isModelAvailable,
    now: () => NOW,
  });
  return { router, state };
}

describe('query normalisation', () => {
  it('collapses case and whitespace before hashing', () => {
    expect(normalizeQuery('  Write   a\tTypeScript function ')).toBe('write a typescript function');
    expect(hashQuery('Write a TypeScript function')).toBe(hashQuery(' write a  typescript FUNCTION'));
  });
});

describe('AdaptiveRouter.route', () => {
  it('routes a coding request to the code specialist under normal load', async () => {
    const { router } = buildRouter();

    const decision = await router.route('write a typescript function to sort a list');

    expect(decision).toMatchObject({
      selectedModelId: 'code-specialist',
      intent: 'code',
      confidence: 1,
      intentSource: 'classifier',
      fallbackChainConsidered: ['code-specialist', 'local-phi', 'leader'],
      resourceBucket: 'normal',
      decidedAt: '2026-03-01T12:00:00.000Z',
      cached: false,
    });
  });

  it('falls to the safe default when memory pressure filters every candidate', async () => {
    const { router } = buildRouter({ resources: snapshot({ memPercent: 95 }) });

    const decision = await router.route('write a typescript function to sort a list');

    expect(decision.selectedModelId).toBe('local-lite');
    expect(decision.fallbackChainConsidered).toEqual(['local-lite']);
    expect(decision.resourceBucket).toBe('memory_constrained');
  });

  it('keeps only offline-capable models without connectivity', async () => {
    const { router } = buildRouter({ resources: snapshot({ connectivity: false }) });

    const decision = await router.route('write a typescript function to sort a list');

    expect(decision.selectedModelId).toBe('local-phi');
    expect(decision.fallbackChainConsidered).toEqual(['local-phi']);
    expect(decision.resourceBucket).toBe('offline');
  });

  it('routes command intents to the leader only', async () => {
    const { router } = buildRouter();

    const decision = await router.route('show status');

    expect(decision.intent).toBe('status');
    expect(decision.fallbackChainConsidered).toEqual(['leader']);
  });

  it('defaults to the general intent when nothing is confident', async () => {
    const { router } = buildRouter();

    const decision = await router.route('good morning sunshine');

    expect(decision).toMatchObject({
      selectedModelId: 'leader',
      intent: 'general',
      confidence: 0,
      intentSource: 'default',
      fallbackChainConsidered: ['leader', 'local-phi', 'local-lite'],
    });
  });

  it('consults the keyword classifier when the primary one is unsure', async () => {
    const unsure: IntentClassifier = { classify: () => ({ intent: 'explain', confidence: 0.2 }) };
    const { router } = buildRouter({ classifier: unsure, keywordClassifier: keywords });

    const decision = await router.route('debug the crash');

    expect(decision.intent).toBe('debug');
    expect(decision.intentSource).toBe('keyword');
    expect(decision.fallbackChainConsidered).toEqual(['code-specialist', 'troubleshooter', 'leader']);
  });

  it('survives a classifier that throws', async () => {
    const broken: IntentClassifier = {
      classify: () => {
        throw new Error('classifier offline');
      },
    };
    const { router } = buildRouter({ classifier: broken, keywordClassifier: keywords });

    const decision = await router.route('summarize the readme');

    expect(decision.intent).toBe('docs');
    expect(decision.selectedModelId).toBe('docs-writer');
  });

  it('skips models reported unavailable', async () => {
    const { router } = buildRouter({ isModelAvailable: (modelId) => modelId !== 'code-specialist' });

    const decision = await router.route('write a typescript function to sort a list');

    expect(decision.fallbackChainConsidered).toEqual(['local-phi', 'leader']);
  });

  it('serves repeated queries from the cache without classifying again', async () => {
    const classify = vi.fn(() => ({ intent: 'code', confidence: 0.9 }));
    const { router, state } = buildRouter({ classifier: { classify } });

    const first = await router.route('write a typescript function');
    const second = await router.route('  WRITE a typescript   function ');

    expect(second).toEqual({ ...first, cached: true });
    expect(classify).toHaveBeenCalledTimes(1);
    expect(state.usageSnapshot()[0]).toMatchObject({ modelId: 'code-specialist', selections: 2 });
  });

  it('honours an explicit model compatible with the bucket', async () => {
    const { router } = buildRouter();

    const decision = await router.route('anything at all', { explicitModelId: 'docs-writer' });

    expect(decision).toMatchObject({
      selectedModelId: 'docs-writer',
      intent: 'explicit',
      intentSource: 'explicit',
      confidence: 1,
      fallbackChainConsidered: ['docs-writer', 'leader'],
    });
  });

  it('ignores an explicit model that the bucket rules out', async () => {
    const { router } = buildRouter({ resources: snapshot({ memPercent: 95 }) });

    const decision = await router.route('write a typescript function', { explicitModelId: 'local-phi' });

    expect(decision.intentSource).toBe('classifier');
    expect(decision.selectedModelId).toBe('local-lite');
  });

  it('ignores unknown explicit models', async () => {
    const { router } = buildRouter();

    const decision = await router.route('write a typescript function', { explicitModelId: 'nonexistent' });

    expect(decision.selectedModelId).toBe('code-specialist');
  });

  it('routes against a supplied snapshot', async () => {
    const { router } = buildRouter();

    const decision = await router.route('write a typescript function', { snapshot: snapshot({ cpuPercent: 99 }) });

    expect(decision.resourceBucket).toBe('cpu_constrained');
    expect(decision.selectedModelId).toBe('local-lite');
  });

  it('keeps only low-requirement offline models when offline and under memory pressure', async () => {
    const { router } = buildRouter({ resources: snapshot({ connectivity: false, memPercent: 95 }) });

    const decision = await router.route('explain how closures work');

    expect(decision).toMatchObject({
      selectedModelId: 'local-lite',
      intent: 'explain',
      fallbackChainConsidered: ['local-lite'],
      resourceBucket: 'offline',
    });
  });

  it('drops local models while the local inference runtime is unreachable', async () => {
    const { router } = buildRouter({ resources: snapshot({ localInferenceAvailable: false }) });

    const decision = await router.route('write a typescript function to sort a list');

    expect(decision.fallbackChainConsidered).toEqual(['code-specialist', 'leader']);
  });

  it('rejects a cached pick that the current resources rule out within the same bucket', async () => {
    const classify = vi.fn((text: string) => keywords.classify(text));
    const { router } = buildRouter({ classifier: { classify } });

    const relaxed = await router.route('explain how closures work', {
      snapshot: snapshot({ connectivity: false, memPercent: 40 }),
    });
    const pressured = await router.route('explain how closures work', {
      snapshot: snapshot({ connectivity: false, memPercent: 95 }),
    });

    expect(relaxed.selectedModelId).toBe('local-phi');
    expect(pressured).toMatchObject({ selectedModelId: 'local-lite', resourceBucket: 'offline', cached: false });
    expect(classify).toHaveBeenCalledTimes(2);
  });

  it('re-routes a cached local pick once the local runtime goes away', async () => {
    const { router } = buildRouter();

    await router.route('explain how closures work', { snapshot: snapshot({ connectivity: false }) });
    const decision = await router.route('explain how closures work', {
      snapshot: snapshot({ connectivity: false, localInferenceAvailable: false }),
    });

    expect(decision).toMatchObject({ selectedModelId: 'local-lite', fallbackChainConsidered: ['local-lite'], cached: false });
  });

  it('reuses a cached pick across a resource change that still admits it', async () => {
    const classify = vi.fn((text: string) => keywords.classify(text));
    const { router } = buildRouter({ classifier: { classify } });

    await router.route('explain how closures work', { snapshot: snapshot({ connectivity: false, memPercent: 40 }) });
    const decision = await router.route('explain how closures work', {
      snapshot: snapshot({ connectivity: false, memPercent: 70 }),
    });

    expect(decision).toMatchObject({ selectedModelId: 'local-phi', cached: true });
    expect(classify).toHaveBeenCalledTimes(1);
  });

  it('rejects blank queries', async () => {
    const { router } = buildRouter();

    await expect(router.route('   ')).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('AdaptiveRouter.routeFrom', () => {
  it('moves down the chain past excluded models', async () => {
    const { router } = buildRouter();
    const decision = await router.route('write a typescript function to sort a list');

    const next = router.routeFrom(decision, new Set(['code-specialist']), snapshot());

    expect(next?.selectedModelId).toBe('local-phi');
    expect(next?.fallbackChainConsidered).toEqual(['local-phi', 'leader']);
    expect(next?.cacheKey).toBe(decision.cacheKey);
  });

  it('lands on the safe default once the chain is used up, then gives up', async () => {
    const { router } = buildRouter();
    const decision = await router.route('write a typescript function to sort a list');
    const tried = new Set(['code-specialist', 'local-phi', 'leader']);

    const safe = router.routeFrom(decision, tried, snapshot());
    expect(safe?.selectedModelId).toBe('local-lite');

    tried.add('local-lite');
    expect(safe && router.routeFrom(safe, tried, snapshot())).toBeNull();
  });
});
