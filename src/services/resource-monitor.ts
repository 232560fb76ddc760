import { lookup } from 'node:dns/promises';
import * as si from 'systeminformation';
import type {
  ResourceBucket,
  ResourceSample,
  ResourceSampler,
  ResourceSnapshot,
  ResourceThresholds,
} from '../types/resource.js';
import { logThought } from '../utils/logger.js';
import { withTimeout } from '../utils/retry.js';
import { everySeconds, type JobScheduler } from './job-scheduler.js';

const RESOURCE_REFRESH_JOB_ID = 'resource-refresh';
const BYTES_PER_MB = 1024 * 1024;

export const DEFAULT_RESOURCE_THRESHOLDS: ResourceThresholds = {
  memConstrainedPercent: 80,
  cpuConstrainedPercent: 90,
};

/** Served until the first successful sample lands. */
const BOOTSTRAP_SAMPLE: ResourceSample = {
  cpuPercent: 0,
  memAvailableMb: 4_000,
  memPercent: 50,
  connectivity: true,
  localInferenceAvailable: false,
};

/**
 * Coarse resource state used for cache keys and filtering.
 * Precedence: offline, then memory pressure, then CPU pressure.
 */
export function bucketFor(
  snapshot: ResourceSnapshot,
  thresholds: ResourceThresholds = DEFAULT_RESOURCE_THRESHOLDS,
): ResourceBucket {
  if (!snapshot.connectivity) return 'offline';
  if (snapshot.memPercent > thresholds.memConstrainedPercent) return 'memory_constrained';
  if (snapshot.cpuPercent > thresholds.cpuConstrainedPercent) return 'cpu_constrained';
  return 'normal';
}

export function isResourceConstrained(
  snapshot: ResourceSnapshot,
  thresholds: ResourceThresholds = DEFAULT_RESOURCE_THRESHOLDS,
): boolean {
  return (
    snapshot.memPercent > thresholds.memConstrainedPercent ||
    snapshot.cpuPercent > thresholds.cpuConstrainedPercent
  );
}

export interface SystemResourceSamplerOptions {
  connectivityHost: string;
  ollamaBaseUrl: string;
  probeTimeoutMs: number;
}

/** Samples the host through `systeminformation`, DNS and the local Ollama endpoint. */
export class SystemResourceSampler implements ResourceSampler {
  readonly #options: SystemResourceSamplerOptions;

  constructor(options: SystemResourceSamplerOptions) {
    this.#options = options;
  }

  async sample(): Promise<ResourceSample> {
    const { probeTimeoutMs } = this.#options;
    const [load, mem, connectivity, localInferenceAvailable] = await Promise.all([
      withTimeout(() => si.currentLoad(), probeTimeoutMs, 'cpu-sample'),
      withTimeout(() => si.mem(), probeTimeoutMs, 'memory-sample'),
      this.#checkConnectivity(),
      this.#checkLocalInference(),
    ]);

    const memPercent = mem.total > 0 ? ((mem.total - mem.available) / mem.total) * 100 : 0;
    return {
      cpuPercent: round(load.currentLoad),
      memAvailableMb: Math.round(mem.available / BYTES_PER_MB),
      memPercent: round(memPercent),
      connectivity,
      localInferenceAvailable,
    };
  }

  async #checkConnectivity(): Promise<boolean> {
    try {
      await withTimeout(() => lookup(this.#options.connectivityHost), this.#options.probeTimeoutMs, 'connectivity-probe');
      return true;
    } catch {
      return false;
    }
  }

  async #checkLocalInference(): Promise<boolean> {
    const endpoint = `${this.#options.ollamaBaseUrl.replace(/\/$/, '')}/api/tags`;
    try {
      const response = await withTimeout(
        (signal) => fetch(endpoint, { signal }),
        this.#options.probeTimeoutMs,
        'local-inference-probe',
      );
      return response.ok;
    } catch {
      return false;
    }
  }
}

export interface ResourceMonitorOptions {
  /** A snapshot older than this is refreshed before being handed to a caller. @default 30000 */
  maxStalenessMs?: number;
  /** Background refresh period. @default 10 */
  pollIntervalSec?: number;
  thresholds?: Partial<ResourceThresholds>;
  now?: () => number;
}

/**
 * Keeps one cached {@link ResourceSnapshot}, refreshed in the background and
 * replaced wholesale. Sampling failures keep the previous values flagged `stale`.
 */
export class ResourceMonitor {
  readonly #sampler: ResourceSampler;
  readonly #maxStalenessMs: number;
  readonly #pollIntervalSec: number;
  readonly #now: () => number;
  readonly thresholds: ResourceThresholds;
  #current: ResourceSnapshot;
  #inFlight: Promise<ResourceSnapshot> | null = null;
  #lastError: string | null = null;
  #scheduler: JobScheduler | null = null;

  constructor(sampler: ResourceSampler, options: ResourceMonitorOptions = {}) {
    this.#sampler = sampler;
    this.#maxStalenessMs = Math.max(1, options.maxStalenessMs ?? 30_000);
    this.#pollIntervalSec = Math.max(1, options.pollIntervalSec ?? 10);
    this.#now = options.now ?? (() => Date.now());
    this.thresholds = { ...DEFAULT_RESOURCE_THRESHOLDS, ...options.thresholds };
    this.#current = Object.freeze({ ...BOOTSTRAP_SAMPLE, capturedAt: 0, stale: true });
  }

  get lastError(): string | null {
    return this.#lastError;
  }

  /** The cached snapshot as-is, without any refresh. */
  current(): ResourceSnapshot {
    return this.#current;
  }

  stalenessMs(): number {
    return this.#now() - this.#current.capturedAt;
  }

  /**
   * The cached snapshot, refreshed first when it is older than `maxStalenessMs`.
   * Concurrent callers share a single in-flight refresh.
   */
  async snapshot(): Promise<ResourceSnapshot> {
    if (this.stalenessMs() <= this.#maxStalenessMs) {
      return this.#current;
    }
    return this.refresh();
  }

  bucket(snapshot: ResourceSnapshot = this.#current): ResourceBucket {
    return bucketFor(snapshot, this.thresholds);
  }

  /** Re-sample now. Never rejects. */
  refresh(): Promise<ResourceSnapshot> {
    if (!this.#inFlight) {
      this.#inFlight = this.#sample().finally(() => {
        this.#inFlight = null;
      });
    }
    return this.#inFlight;
  }

  start(scheduler: JobScheduler): void {
    if (scheduler.getJob(RESOURCE_REFRESH_JOB_ID)) {
      return;
    }
    this.#scheduler = scheduler;
    scheduler.register({
      id: RESOURCE_REFRESH_JOB_ID,
      cronExpression: everySeconds(this.#pollIntervalSec),
      description: 'Re-sample CPU, memory, connectivity and local inference availability',
      handler: async () => {
        await this.refresh();
      },
    });
  }

  stop(): void {
    this.#scheduler?.unregister(RESOURCE_REFRESH_JOB_ID);
    this.#scheduler = null;
  }

  async #sample(): Promise<ResourceSnapshot> {
    try {
      const sample = await this.#sampler.sample();
      this.#current = Object.freeze({ ...sample, capturedAt: this.#now(), stale: false });
      this.#lastError = null;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (this.#lastError !== message) {
        console.warn(`[ResourceMonitor] Sampling failed, serving last snapshot as stale: ${message}`);
        void logThought(`[ResourceMonitor] Sampling failed: ${message}`);
      }
      this.#lastError = message;
      this.#current = Object.freeze({ ...this.#current, stale: true });
    }
    return this.#current;
  }
}

function round(value: number): number {
  return Math.round(value * 10) / 10;
}
