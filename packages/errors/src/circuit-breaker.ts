import CircuitBreaker from "opossum";
import type { Logger } from "@lexrag/logger";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed. Default: 30000 */
  timeout?: number;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  /** Minimum number of calls in the rolling window before the circuit may open. Default: 5 */
  volumeThreshold?: number;
  /** Rolling count timeout in milliseconds. Default: 10000 */
  rollingCountTimeout?: number;
}

const DEFAULT_OPTIONS: Required<
  Pick<
    CircuitBreakerOptions,
    "timeout" | "errorThresholdPercentage" | "resetTimeout" | "volumeThreshold"
  >
> = {
  timeout: 30_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
  volumeThreshold: 5,
};

export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  name: string,
  fn: (...args: TArgs) => Promise<TResult>,
  options?: CircuitBreakerOptions,
  logger?: Logger,
): CircuitBreaker<TArgs, TResult> {
  const mergedOptions = { ...DEFAULT_OPTIONS, ...options, name };

  const breaker = new CircuitBreaker(fn, mergedOptions);

  breaker.on("open", () => {
    logger?.warn({ breaker: name }, "circuit opened, requests will be short-circuited");
  });

  breaker.on("halfOpen", () => {
    logger?.warn({ breaker: name }, "circuit half-open, next request is a probe");
  });

  breaker.on("close", () => {
    logger?.info({ breaker: name }, "circuit closed");
  });

  breaker.on("timeout", () => {
    logger?.warn({ breaker: name, timeoutMs: mergedOptions.timeout }, "call timed out");
  });

  return breaker;
}
