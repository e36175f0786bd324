import CircuitBreaker from "opossum";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed. Default: 30000 */
  timeout?: number;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 5000 */
  resetTimeout?: number;
  /** Calls in the rolling window before the error rate can open the circuit. Default: 5 */
  volumeThreshold?: number;
  /** Rolling count timeout in milliseconds. Default: 10000 */
  rollingCountTimeout?: number;
  /** Number of buckets in the rolling window. Default: 10 */
  rollingCountBuckets?: number;
}

export type CircuitStateListener = (name: string, state: "open" | "halfOpen" | "close") => void;

/**
 * A lone failure never opens the circuit, and an open circuit half-opens
 * before the query queue's last retry is due.
 */
export const DEFAULT_BREAKER_OPTIONS: Required<
  Pick<CircuitBreakerOptions, "timeout" | "errorThresholdPercentage" | "resetTimeout" | "volumeThreshold">
> = {
  timeout: 30_000,
  errorThresholdPercentage: 50,
  resetTimeout: 5_000,
  volumeThreshold: 5,
};

function warnOnStateChange(name: string, state: "open" | "halfOpen" | "close"): void {
  console.warn(`[circuit-breaker] ${name}: circuit ${state}`);
}

/**
 * Wrap a remote backend call in an opossum breaker. While the circuit is open
 * calls fail fast with opossum's "Breaker is open" error, which the owning
 * service turns into its own error kind.
 */
export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  name: string,
  fn: (...args: TArgs) => Promise<TResult>,
  options?: CircuitBreakerOptions,
  onStateChange: CircuitStateListener = warnOnStateChange,
): CircuitBreaker<TArgs, TResult> {
  const mergedOptions = { ...DEFAULT_BREAKER_OPTIONS, ...options, name };

  const breaker = new CircuitBreaker<TArgs, TResult>(fn, mergedOptions);

  breaker.on("open", () => onStateChange(name, "open"));
  breaker.on("halfOpen", () => onStateChange(name, "halfOpen"));
  breaker.on("close", () => onStateChange(name, "close"));

  return breaker;
}
