import {
  CircuitState as PolicyState,
  ConsecutiveBreaker,
  ExponentialBackoff,
  circuitBreaker,
  handleAll,
  handleWhen,
  isBrokenCircuitError,
  noJitterGenerator,
  retry,
  wrap,
  type CircuitBreakerPolicy,
  type RetryPolicy,
} from "cockatiel";
import { KnowledgeSourceError, errorMessage } from "../errors.js";
import { getLogger, type Logger } from "../logger.js";
import type { CircuitState } from "./types.js";

export interface CircuitBreakerOpts {
  failureThreshold?: number;
  recoveryTimeoutMs?: number;
  logger?: Logger;
}

export class CircuitOpenError extends KnowledgeSourceError {
  constructor(options?: { cause?: unknown }) {
    super("Circuit breaker is open", options);
    this.name = "CircuitOpenError";
  }
}

function mapState(state: PolicyState): CircuitState {
  switch (state) {
    case PolicyState.Closed:
      return "closed";
    case PolicyState.Open:
    case PolicyState.Isolated:
      return "open";
    case PolicyState.HalfOpen:
      return "half-open";
  }
}

async function failFastWhenOpen<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (isBrokenCircuitError(err)) throw new CircuitOpenError({ cause: err });
    throw err;
  }
}

/**
 * Opens after `failureThreshold` consecutive failures. While open, calls
 * fail fast with CircuitOpenError until `recoveryTimeoutMs` has passed;
 * then one half-open trial call decides whether to close again.
 */
export class CircuitBreaker {
  readonly policy: CircuitBreakerPolicy;

  constructor(opts: CircuitBreakerOpts = {}) {
    const logger = (opts.logger ?? getLogger()).child({ component: "circuit-breaker" });

    this.policy = circuitBreaker(handleAll, {
      halfOpenAfter: opts.recoveryTimeoutMs ?? 60_000,
      breaker: new ConsecutiveBreaker(opts.failureThreshold ?? 5),
    });

    this.policy.onStateChange((state) => {
      const mapped = mapState(state);
      if (mapped === "open") logger.warn({ state: mapped }, "Circuit breaker opened");
      else logger.info({ state: mapped }, "Circuit breaker state change");
    });
  }

  get state(): CircuitState {
    return mapState(this.policy.state);
  }

  call<T>(fn: () => Promise<T>): Promise<T> {
    return failFastWhenOpen(() => this.policy.execute(() => fn()));
  }
}

export interface RetryOpts {
  /** Total attempts, including the first (default 3) */
  attempts?: number;
  /** Delay before the first retry; doubles after each one (default 1000) */
  initialDelayMs?: number;
  logger?: Logger;
}

/** Exponential backoff without jitter. An open circuit is never retried. */
export function createRetryPolicy(opts: RetryOpts = {}): RetryPolicy {
  const logger = opts.logger ?? getLogger();
  const maxAttempts = (opts.attempts ?? 3) - 1;

  const policy = retry(
    handleWhen((err) => !isBrokenCircuitError(err)),
    {
      maxAttempts,
      backoff: new ExponentialBackoff({ initialDelay: opts.initialDelayMs ?? 1000, generator: noJitterGenerator }),
    }
  );

  policy.onRetry((event) => {
    logger.warn(
      {
        attempt: event.attempt,
        attempts: maxAttempts + 1,
        delayMs: event.delay,
        err: "error" in event ? errorMessage(event.error) : undefined,
      },
      "Retrying"
    );
  });

  return policy;
}

/** Run `fn` under the retry policy. The last error is rethrown. */
export function callWithRetry<T>(fn: () => Promise<T>, policy: RetryPolicy = createRetryPolicy()): Promise<T> {
  return failFastWhenOpen(() => policy.execute(() => fn()));
}

/** Retries wrapped around the breaker, so each attempt counts against the circuit. */
export function callGuarded<T>(fn: () => Promise<T>, retryPolicy: RetryPolicy, breaker: CircuitBreaker): Promise<T> {
  return failFastWhenOpen(() => wrap(retryPolicy, breaker.policy).execute(() => fn()));
}
