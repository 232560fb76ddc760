/** Point-in-time read of system load and reachability used to gate model selection. */
export interface ResourceSnapshot {
  readonly cpuPercent: number;
  readonly memAvailableMb: number;
  readonly memPercent: number;
  readonly connectivity: boolean;
  readonly localInferenceAvailable: boolean;
  /** Epoch milliseconds of the sample the values come from. */
  readonly capturedAt: number;
  /** True when the latest sampling attempt failed and older values are being served. */
  readonly stale: boolean;
}

export type ResourceBucket = 'normal' | 'memory_constrained' | 'cpu_constrained' | 'offline';

export interface ResourceThresholds {
  memConstrainedPercent: number;
  cpuConstrainedPercent: number;
}

/** Raw readings gathered by a {@link ResourceSampler}. */
export interface ResourceSample {
  cpuPercent: number;
  memAvailableMb: number;
  memPercent: number;
  connectivity: boolean;
  localInferenceAvailable: boolean;
}

export interface ResourceSampler {
  sample(): Promise<ResourceSample>;
}
