/**
 * Circuit breaker around the LeetCode GraphQL call.
 * After repeated transport failures the circuit opens and requests are
 * rejected locally until the open timeout elapses.
 */

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export interface CircuitBreakerOptions {
  failureThreshold: number; // consecutive failures before opening
  successThreshold: number; // half-open successes needed to close
  timeout: number;          // ms to stay open
  resetTimeout: number;     // ms after which a stale failure count is dropped
}

export interface CircuitBreakerStats {
  state: CircuitState;
  failures: number;
  successes: number;
  lastFailureTime: number | null;
  lastStateChangeTime: number;
  totalRequests: number;
  totalFailures: number;
  totalSuccesses: number;
  totalRejected: number;
}

export class CircuitOpenError extends Error {
  constructor(state: CircuitState) {
    super(`Circuit breaker is ${state}: service unavailable`);
    this.name = 'CircuitOpenError';
  }
}

/** Decides whether a thrown error counts against the circuit. */
export type FailurePredicate = (error: unknown) => boolean;

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private lastStateChangeTime: number = Date.now();
  private nextAttemptTime = 0;

  private totalRequests = 0;
  private totalFailures = 0;
  private totalSuccesses = 0;
  private totalRejected = 0;

  private readonly options: CircuitBreakerOptions;

  constructor(
    options?: Partial<CircuitBreakerOptions>,
    private readonly isFailure: FailurePredicate = () => true,
    private readonly name = 'CircuitBreaker',
  ) {
    this.options = {
      failureThreshold: options?.failureThreshold ?? 5,
      successThreshold: options?.successThreshold ?? 2,
      timeout: options?.timeout ?? 60000,
      resetTimeout: options?.resetTimeout ?? 30000,
    };
  }

  isOpen(): boolean {
    if (this.state !== CircuitState.OPEN) {
      return false;
    }
    if (Date.now() >= this.nextAttemptTime) {
      this.transitionTo(CircuitState.HALF_OPEN);
      this.successCount = 0;
      return false;
    }
    return true;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.isOpen()) {
      this.totalRejected++;
      throw new CircuitOpenError(this.state);
    }

    this.totalRequests++;

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      if (this.isFailure(error)) {
        this.onFailure();
      } else {
        this.onSuccess();
      }
      throw error;
    }
    this.onSuccess();
    return result;
  }

  private onSuccess(): void {
    this.totalSuccesses++;

    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.options.successThreshold) {
        this.transitionTo(CircuitState.CLOSED);
        this.successCount = 0;
        this.failureCount = 0;
      }
      return;
    }

    this.failureCount = 0;
    this.lastFailureTime = null;
  }

  private onFailure(): void {
    const now = Date.now();
    this.totalFailures++;

    // A failure long after the previous one starts a fresh count.
    if (this.lastFailureTime !== null && now - this.lastFailureTime > this.options.resetTimeout) {
      this.failureCount = 0;
    }
    this.failureCount++;
    this.lastFailureTime = now;

    if (
      this.state === CircuitState.HALF_OPEN ||
      (this.state === CircuitState.CLOSED && this.failureCount >= this.options.failureThreshold)
    ) {
      this.transitionTo(CircuitState.OPEN);
      this.nextAttemptTime = now + this.options.timeout;
    }
  }

  private transitionTo(newState: CircuitState): void {
    const oldState = this.state;
    this.state = newState;
    this.lastStateChangeTime = Date.now();

    console.log(
      `[${this.name}] State transition: ${oldState} -> ${newState} ` +
      `(failures: ${this.failureCount}, successes: ${this.successCount})`
    );
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
    this.lastStateChangeTime = Date.now();
    this.nextAttemptTime = 0;
  }

  getStats(): CircuitBreakerStats {
    return {
      state: this.state,
      failures: this.failureCount,
      successes: this.successCount,
      lastFailureTime: this.lastFailureTime,
      lastStateChangeTime: this.lastStateChangeTime,
      totalRequests: this.totalRequests,
      totalFailures: this.totalFailures,
      totalSuccesses: this.totalSuccesses,
      totalRejected: this.totalRejected,
    };
  }

  getState(): CircuitState {
    return this.state;
  }
}
