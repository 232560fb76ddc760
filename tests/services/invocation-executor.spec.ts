import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AuthError, ConnectivityError, ModelUnavailableError, TimeoutError, toUserMessage } from '../../src/core/errors.js';
import { AdaptiveRouter } from '../../src/services/adaptive-router.js';
import { CircuitBreakerRegistry } from '../../src/services/circuit-breaker.js';
import { KeywordIntentClassifier } from '../../src/services/intent-classifier.js';
import { InvocationExecutor, providerBreakerName } from '../../src/services/invocation-executor.js';
import { loadModelProfiles } from '../../src/services/model-profiles.js';
import { RouterState } from '../../src/services/router-state.js';
import type { ResourceSnapshot } from '../../src/types/resource.js';
import { ScriptedProvider, hangUntilAborted } from '../harness/scripted-provider.js';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
}));

const SNAPSHOT: ResourceSnapshot = {
  cpuPercent: 10,
  memAvailableMb: 8_192,
  memPercent: 30,
  connectivity: true,
  localInferenceAvailable: true,
  capturedAt: 0,
  stale: false,
};

function setup(options: { maxRetries?: number; modelTimeoutMs?: number } = {}) {
  const breakers = new CircuitBreakerRegistry();
  const state = new RouterState();
  const resources = { snapshot: async () => SNAPSHOT };
  const router = new AdaptiveRouter({
    profiles: loadModelProfiles('data/model-profiles.json'),
    classifier: KeywordIntentClassifier.fromFile('data/intent-keywords.json'),
    state,
    resources,
    isModelAvailable: (modelId) => {
      const name = providerBreakerName(modelId);
      return breakers.has(name) ? breakers.get(name).isCallPermitted() : true;
    },
  });
  const cloud = new ScriptedProvider('cloud_api');
  const local = new ScriptedProvider('local_inference');
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => undefined);
  const executor = new InvocationExecutor({
    router,
    providers: { cloud_api: cloud, local_inference: local },
    breakers,
    state,
    resources,
    modelTimeoutMs: options.modelTimeoutMs ?? 1_000,
    maxRetries: options.maxRetries,
    maxTokens: 256,
    sleep,
    random: () => 0.5,
  });
  return { breakers, state, router, cloud, local, sleep, executor };
}

const CODE_QUERY = 'write a typescript function to sort a list';

describe('InvocationExecutor', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the first model answer and passes the context through', async () => {
    const { router, cloud, executor } = setup();
    cloud.behaviours.set('code-specialist', async () => 'const sortList = (xs) => [...xs].sort()');

    const decision = await router.route(CODE_QUERY);
    const result = await executor.invoke(decision, CODE_QUERY, { context: 'Recent conversation:\nuser: hi' });

    expect(result).toMatchObject({
      success: true,
      modelId: 'code-specialist',
      text: 'const sortList = (xs) => [...xs].sort()',
      attempts: 1,
      modelsTried: ['code-specialist'],
    });
    expect(cloud.requests[0]).toMatchObject({
      prompt: CODE_QUERY,
      context: 'Recent conversation:\nuser: hi',
      maxTokens: 256,
    });
  });

  it('escalates past a model that times out on both of its attempts, even if a third would answer', async () => {
    const { router, cloud, local, sleep, state, breakers, executor } = setup();
    let calls = 0;
    cloud.behaviours.set('code-specialist', async () => {
      calls += 1;
      if (calls <= 2) {
        throw new TimeoutError('code-specialist timed out', 1_000);
      }
      return 'late answer';
    });
    local.behaviours.set('local-phi', async () => 'xs.sort()');

    const decision = await router.route(CODE_QUERY);
    const result = await executor.invoke(decision, CODE_QUERY);

    expect(result).toMatchObject({
      success: true,
      modelId: 'local-phi',
      text: 'xs.sort()',
      attempts: 3,
      modelsTried: ['code-specialist', 'local-phi'],
    });
    expect(calls).toBe(2);
    expect(result.decision.selectedModelId).toBe('local-phi');
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1_000]);
    expect(breakers.get(providerBreakerName('code-specialist')).snapshot()).toMatchObject({
      state: 'closed',
      failureCount: 2,
    });
    expect(state.usageSnapshot().find((usage) => usage.modelId === 'code-specialist')).toMatchObject({
      invocations: 1,
      failures: 1,
      lastError: 'code-specialist timed out',
    });
  });

  it('opens the model breaker when its attempts reach the failure threshold', async () => {
    const { router, cloud, local, sleep, breakers, executor } = setup({ maxRetries: 3 });
    cloud.behaviours.set('code-specialist', async () => {
      throw new TimeoutError('code-specialist timed out', 1_000);
    });
    local.behaviours.set('local-phi', async () => 'xs.sort()');

    const result = await executor.invoke(await router.route(CODE_QUERY), CODE_QUERY);

    expect(result).toMatchObject({ success: true, modelId: 'local-phi', attempts: 4 });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1_000, 2_000]);
    expect(breakers.get(providerBreakerName('code-specialist')).isCallPermitted()).toBe(false);
  });

  it('enforces the per-attempt deadline', async () => {
    const { router, cloud, local, executor } = setup({ maxRetries: 1, modelTimeoutMs: 10 });
    cloud.behaviours.set('code-specialist', hangUntilAborted);
    local.behaviours.set('local-phi', async () => 'xs.sort()');

    const result = await executor.invoke(await router.route(CODE_QUERY), CODE_QUERY);

    expect(result).toMatchObject({ success: true, modelId: 'local-phi', attempts: 2 });
  });

  it('escalates immediately on a non-retryable failure', async () => {
    const { router, cloud, local, sleep, executor } = setup();
    cloud.behaviours.set('code-specialist', async () => {
      throw new ModelUnavailableError('model not found');
    });
    local.behaviours.set('local-phi', async () => 'xs.sort()');

    const result = await executor.invoke(await router.route(CODE_QUERY), CODE_QUERY);

    expect(result).toMatchObject({ success: true, modelId: 'local-phi', attempts: 2 });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('stops on an auth failure without escalating', async () => {
    const { router, cloud, executor } = setup();
    cloud.behaviours.set('code-specialist', async () => {
      throw new AuthError('bad key');
    });

    const result = await executor.invoke(await router.route(CODE_QUERY), CODE_QUERY);

    expect(result).toMatchObject({
      success: false,
      errorKind: 'auth',
      userMessage: toUserMessage('auth'),
      attempts: 1,
      modelsTried: ['code-specialist'],
    });
  });

  it('reports the last error kind once every model, safe default included, has failed', async () => {
    const { router, executor } = setup({ maxRetries: 1 });

    const decision = await router.route(CODE_QUERY);
    const result = await executor.invoke(decision, CODE_QUERY);

    expect(result).toMatchObject({
      success: false,
      errorKind: 'connectivity',
      userMessage: toUserMessage('connectivity'),
      attempts: 4,
      modelsTried: ['code-specialist', 'local-phi', 'leader', 'local-lite'],
    });
    expect(result.decision).toBe(decision);
  });

  it('skips a model whose breaker is already open', async () => {
    const { router, cloud, local, breakers, executor } = setup();
    local.behaviours.set('local-phi', async () => 'xs.sort()');
    const decision = await router.route(CODE_QUERY);
    const breaker = breakers.get(providerBreakerName('code-specialist'));
    for (let i = 0; i < 3; i += 1) {
      await expect(breaker.execute(async () => Promise.reject(new ConnectivityError('down')))).rejects.toThrow('down');
    }

    const result = await executor.invoke(decision, CODE_QUERY);

    expect(result).toMatchObject({ success: true, modelId: 'local-phi', attempts: 1, modelsTried: ['local-phi'] });
    expect(cloud.requests).toHaveLength(0);
  });

  it('returns cancelled without calling a provider when the signal is already aborted', async () => {
    const { router, cloud, executor } = setup();
    const controller = new AbortController();
    controller.abort();

    const result = await executor.invoke(await router.route(CODE_QUERY), CODE_QUERY, { signal: controller.signal });

    expect(result).toMatchObject({ success: false, errorKind: 'cancelled', attempts: 0, modelsTried: [] });
    expect(cloud.requests).toHaveLength(0);
  });

  it('returns cancelled when the caller aborts mid-call, without tripping the breaker', async () => {
    const { router, cloud, breakers, executor } = setup();
    const controller = new AbortController();
    cloud.behaviours.set('code-specialist', (request) => {
      const pending = hangUntilAborted(request);
      controller.abort();
      return pending;
    });

    const result = await executor.invoke(await router.route(CODE_QUERY), CODE_QUERY, { signal: controller.signal });

    expect(result).toMatchObject({ success: false, errorKind: 'cancelled', attempts: 1 });
    expect(breakers.get(providerBreakerName('code-specialist')).snapshot().failureCount).toBe(0);
  });
});
