import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import { ValidationError } from '../core/errors.js';
import type {
  ModelProfile,
  ModelProfileTable,
  ProviderKind,
  ResourceRequirement,
} from '../types/model-routing.js';

const PROVIDER_KINDS: ReadonlySet<string> = new Set<ProviderKind>(['cloud_api', 'local_inference']);
const REQUIREMENTS: ReadonlySet<string> = new Set<ResourceRequirement>(['low', 'med', 'high']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isProviderKind(value: unknown): value is ProviderKind {
  return typeof value === 'string' && PROVIDER_KINDS.has(value);
}

function isRequirement(value: unknown): value is ResourceRequirement {
  return typeof value === 'string' && REQUIREMENTS.has(value);
}

function parseProfile(raw: unknown, index: number): ModelProfile {
  if (!isRecord(raw)) {
    throw new ValidationError(`Model profile #${index} must be an object.`);
  }

  const { id, name, providerKind, resourceRequirement, offlineCapable, priority, intents } = raw;
  if (typeof id !== 'string' || !id.trim()) {
    throw new ValidationError(`Model profile #${index} is missing an id.`);
  }
  if (typeof name !== 'string' || !name.trim()) {
    throw new ValidationError(`Model profile '${id}' is missing a provider-side name.`);
  }
  if (!isProviderKind(providerKind)) {
    throw new ValidationError(`Model profile '${id}' has an unknown providerKind.`);
  }
  if (!isRequirement(resourceRequirement)) {
    throw new ValidationError(`Model profile '${id}' has an unknown resourceRequirement.`);
  }
  if (typeof offlineCapable !== 'boolean') {
    throw new ValidationError(`Model profile '${id}' must declare offlineCapable.`);
  }
  if (typeof priority !== 'number' || !Number.isFinite(priority)) {
    throw new ValidationError(`Model profile '${id}' must declare a numeric priority.`);
  }
  if (!Array.isArray(intents) || !intents.every((intent) => typeof intent === 'string')) {
    throw new ValidationError(`Model profile '${id}' must list its intents as strings.`);
  }

  return Object.freeze({
    id,
    name,
    providerKind,
    resourceRequirement,
    offlineCapable,
    priority,
    intents: new Set(intents.map((intent: string) => intent.trim().toLowerCase())),
  });
}

/**
 * Validate a decoded profile document. The safe default must be a low-requirement,
 * offline-capable model, so step 6 of routing can never come back empty.
 */
export function parseModelProfileTable(raw: unknown): ModelProfileTable {
  if (!isRecord(raw) || !Array.isArray(raw.profiles)) {
    throw new ValidationError('Model profile document must contain a "profiles" array.');
  }
  if (raw.profiles.length === 0) {
    throw new ValidationError('Model profile document lists no models.');
  }

  const profiles = new Map<string, ModelProfile>();
  raw.profiles.forEach((entry: unknown, index: number) => {
    const profile = parseProfile(entry, index);
    if (profiles.has(profile.id)) {
      throw new ValidationError(`Model profile '${profile.id}' is declared twice.`);
    }
    profiles.set(profile.id, profile);
  });

  const { leaderModelId, safeDefaultModelId } = raw;
  if (typeof leaderModelId !== 'string' || !profiles.has(leaderModelId)) {
    throw new ValidationError('leaderModelId must name a declared model profile.');
  }
  if (typeof safeDefaultModelId !== 'string') {
    throw new ValidationError('safeDefaultModelId must name a declared model profile.');
  }
  const safeDefault = profiles.get(safeDefaultModelId);
  if (!safeDefault) {
    throw new ValidationError('safeDefaultModelId must name a declared model profile.');
  }
  if (safeDefault.resourceRequirement !== 'low' || !safeDefault.offlineCapable) {
    throw new ValidationError(
      `Safe default model '${safeDefaultModelId}' must be low-requirement and offline-capable.`,
    );
  }

  return Object.freeze({ profiles, leaderModelId, safeDefaultModelId });
}

export function loadModelProfiles(filePath: string): ModelProfileTable {
  const resolved = path.resolve(filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(resolved, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Failed to read model profiles at ${resolved}: ${message}`, { cause: error });
  }
  return parseModelProfileTable(raw);
}
