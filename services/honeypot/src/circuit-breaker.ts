import { createLogger } from "./logger";
import { errorMessage, HoneypotError } from "./errors";

const logger = createLogger("circuit-breaker");

/**
 * Circuit breaker states.
 */
export enum CircuitState {
  CLOSED = "closed", // Normal operation
  OPEN = "open", // Failing, rejecting calls
  HALF_OPEN = "half_open", // Probing whether the dependency recovered
}

export interface CircuitBreakerConfig {
  /** Name of the protected dependency, used in logs and metrics */
  name: string;
  threshold: number; // Consecutive failures before opening
  resetTimeout: number; // ms before an open circuit lets a probe through
  halfOpenMaxAttempts?: number; // Successful probes needed to close (default: 1)
  now?: () => number;
}

export interface CircuitSnapshot {
  name: string;
  state: CircuitState;
  failure_count: number;
}

export class CircuitOpenError extends HoneypotError {
  readonly code = "circuit_open";

  constructor(public readonly circuit: string) {
    super(`Circuit ${circuit} is open`);
  }
}

/**
 * Circuit breaker for the generator and the callback endpoint.
 *
 * States:
 * - CLOSED: calls pass through
 * - OPEN: calls fail fast with CircuitOpenError, callers fall back locally
 * - HALF_OPEN: one probe at a time passes through
 */
export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private probeInFlight = false;
  private lastFailureTime = 0;
  private readonly config: Required<CircuitBreakerConfig>;

  constructor(config: CircuitBreakerConfig) {
    this.config = {
      ...config,
      halfOpenMaxAttempts: config.halfOpenMaxAttempts ?? 1,
      now: config.now ?? Date.now,
    };

    logger.info(
      {
        circuit: this.config.name,
        threshold: this.config.threshold,
        reset_timeout_ms: this.config.resetTimeout,
      },
      "Circuit breaker initialized"
    );
  }

  public getState(): CircuitState {
    return this.state;
  }

  public getFailureCount(): number {
    return this.failureCount;
  }

  public snapshot(): CircuitSnapshot {
    return {
      name: this.config.name,
      state: this.state,
      failure_count: this.failureCount,
    };
  }

  /**
   * Execute a call with circuit breaker protection.
   *
   * @throws CircuitOpenError when the circuit rejects the call
   */
  public async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === CircuitState.OPEN) {
      const sinceFailure = this.config.now() - this.lastFailureTime;
      if (sinceFailure < this.config.resetTimeout) {
        logger.debug(
          {
            circuit: this.config.name,
            time_until_retry_ms: this.config.resetTimeout - sinceFailure,
          },
          "Circuit breaker is OPEN, failing fast"
        );
        throw new CircuitOpenError(this.config.name);
      }
      logger.info({ circuit: this.config.name }, "Circuit breaker transitioning to HALF_OPEN");
      this.state = CircuitState.HALF_OPEN;
      this.successCount = 0;
    }

    const probing = this.state === CircuitState.HALF_OPEN;
    if (probing) {
      if (this.probeInFlight) {
        throw new CircuitOpenError(this.config.name);
      }
      this.probeInFlight = true;
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure(error);
      throw error;
    } finally {
      if (probing) {
        this.probeInFlight = false;
      }
    }
  }

  private onSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.config.halfOpenMaxAttempts) {
        logger.info({ circuit: this.config.name }, "Circuit breaker closing (recovered)");
        this.state = CircuitState.CLOSED;
        this.failureCount = 0;
        this.successCount = 0;
      }
    } else if (this.failureCount > 0) {
      this.failureCount = 0;
    }
  }

  private onFailure(error: unknown): void {
    this.failureCount++;
    this.lastFailureTime = this.config.now();

    logger.warn(
      {
        circuit: this.config.name,
        state: this.state,
        failure_count: this.failureCount,
        threshold: this.config.threshold,
        error: errorMessage(error),
      },
      "Circuit breaker recorded failure"
    );

    if (this.state === CircuitState.HALF_OPEN) {
      logger.warn({ circuit: this.config.name }, "Circuit breaker failed in HALF_OPEN, reopening");
      this.state = CircuitState.OPEN;
      this.successCount = 0;
    } else if (this.failureCount >= this.config.threshold) {
      logger.error(
        {
          circuit: this.config.name,
          failure_count: this.failureCount,
          threshold: this.config.threshold,
        },
        "Circuit breaker opening due to failures"
      );
      this.state = CircuitState.OPEN;
    }
  }

  /**
   * Manually reset circuit breaker.
   */
  public reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.probeInFlight = false;
    this.lastFailureTime = 0;
  }

  public isOpen(): boolean {
    return this.state === CircuitState.OPEN;
  }
}
