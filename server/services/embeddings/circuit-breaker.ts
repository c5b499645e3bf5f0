export type CircuitBreakerSnapshot = {
  name: string;
  open: boolean;
  failures: number;
  openedUntil: number;
  lastError?: string;
};

export type CircuitBreakerOptions = {
  name: string;
  /** Consecutive failures that open the breaker; 0 disables it. */
  failureThreshold: number;
  cooldownMs: number;
  now?: () => number;
};

export type CircuitBreaker = ReturnType<typeof createCircuitBreaker>;

export const createCircuitBreaker = (options: CircuitBreakerOptions) => {
  const now = options.now ?? Date.now;
  const state: { failures: number; openedUntil: number; lastError?: string } = {
    failures: 0,
    openedUntil: 0,
  };

  const reset = () => {
    state.failures = 0;
    state.openedUntil = 0;
    state.lastError = undefined;
  };

  // Once the cooldown passes the breaker closes and the next call tries the provider again.
  const isOpen = (): boolean => {
    if (options.failureThreshold <= 0 || !state.openedUntil) return false;
    if (now() < state.openedUntil) return true;
    reset();
    return false;
  };

  const recordFailure = (error?: unknown) => {
    if (options.failureThreshold <= 0) return;
    state.failures += 1;
    state.lastError = (error instanceof Error ? error.message : String(error ?? "")).slice(0, 280);
    if (state.failures >= options.failureThreshold) {
      state.openedUntil = now() + Math.max(0, options.cooldownMs);
    }
  };

  const recordSuccess = () => {
    if (options.failureThreshold <= 0) return;
    reset();
  };

  const snapshot = (): CircuitBreakerSnapshot => ({
    name: options.name,
    open: isOpen(),
    failures: state.failures,
    openedUntil: state.openedUntil,
    lastError: state.lastError,
  });

  return { isOpen, recordFailure, recordSuccess, snapshot };
};
