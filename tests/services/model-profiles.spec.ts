import { describe, expect, it } from 'vitest';
import { ValidationError } from '../../src/core/errors.js';
import { loadModelProfiles, parseModelProfileTable } from '../../src/services/model-profiles.js';

function profile(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'local-lite',
    name: 'tinyllama',
    providerKind: 'local_inference',
    resourceRequirement: 'low',
    offlineCapable: true,
    priority: 90,
    intents: ['General', 'chat'],
    ...overrides,
  };
}

describe('loadModelProfiles', () => {
  it('loads the bundled profile table', () => {
    const table = loadModelProfiles('data/model-profiles.json');

    expect(table.leaderModelId).toBe('leader');
    expect(table.safeDefaultModelId).toBe('local-lite');
    expect([...table.profiles.keys()]).toEqual([
      'leader',
      'code-specialist',
      'troubleshooter',
      'docs-writer',
      'brainstormer',
      'local-phi',
      'local-lite',
    ]);
    expect(table.profiles.get('code-specialist')?.intents.has('debug')).toBe(true);
  });

  it('wraps unreadable files in a ValidationError', () => {
    expect(() => loadModelProfiles('data/does-not-exist.json')).toThrow(ValidationError);
  });
});

describe('parseModelProfileTable', () => {
  it('lower-cases intents and freezes profiles', () => {
    const table = parseModelProfileTable({
      leaderModelId: 'local-lite',
      safeDefaultModelId: 'local-lite',
      profiles: [profile()],
    });
    const parsed = table.profiles.get('local-lite');

    expect(parsed?.intents.has('general')).toBe(true);
    expect(Object.isFrozen(parsed)).toBe(true);
  });

  it('rejects duplicate ids', () => {
    expect(() =>
      parseModelProfileTable({
        leaderModelId: 'local-lite',
        safeDefaultModelId: 'local-lite',
        profiles: [profile(), profile()],
      }),
    ).toThrow("Model profile 'local-lite' is declared twice.");
  });

  it('rejects unknown provider kinds', () => {
    expect(() =>
      parseModelProfileTable({
        leaderModelId: 'local-lite',
        safeDefaultModelId: 'local-lite',
        profiles: [profile({ providerKind: 'grpc' })],
      }),
    ).toThrow("Model profile 'local-lite' has an unknown providerKind.");
  });

  it('requires the leader to be declared', () => {
    expect(() =>
      parseModelProfileTable({ leaderModelId: 'leader', safeDefaultModelId: 'local-lite', profiles: [profile()] }),
    ).toThrow('leaderModelId must name a declared model profile.');
  });

  it('requires a low-requirement, offline-capable safe default', () => {
    expect(() =>
      parseModelProfileTable({
        leaderModelId: 'local-lite',
        safeDefaultModelId: 'local-lite',
        profiles: [profile({ resourceRequirement: 'med' })],
      }),
    ).toThrow("Safe default model 'local-lite' must be low-requirement and offline-capable.");
  });

  it('rejects an empty profile list', () => {
    expect(() => parseModelProfileTable({ profiles: [] })).toThrow('Model profile document lists no models.');
  });
});
