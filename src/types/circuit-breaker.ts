export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerOptions {
  /** Consecutive failures that trip the breaker. @default 3 */
  failureThreshold?: number;
  /** How long the breaker stays open before allowing a trial call. @default 30000 */
  resetTimeoutMs?: number;
  now?: () => number;
}

/** Read-only view of a breaker; the live state is owned by the breaker itself. */
export interface CircuitBreakerSnapshot {
  dependencyName: string;
  state: CircuitState;
  failureCount: number;
  lastFailureAt: string | null;
  openedAt: string | null;
  lastError: string | null;
  remainingOpenMs: number;
  trialInFlight: boolean;
}

export interface CircuitTransition {
  dependencyName: string;
  from: CircuitState;
  to: CircuitState;
  reason: string;
}
