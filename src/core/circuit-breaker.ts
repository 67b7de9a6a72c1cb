import type { Logger } from '../types/logger.js';
import { BotError } from './errors.js';

/**
 * Circuit breaker states.
 */
export enum CircuitState {
  /** Sends go through */
  CLOSED = 'closed',
  /** Sends are rejected without touching the platform */
  OPEN = 'open',
  /** One trial send is let through */
  HALF_OPEN = 'half_open',
}

export interface CircuitBreakerConfig {
  /** Consecutive failures that open the circuit */
  maxFailures: number;
  /** How long the circuit stays open before a trial send, in ms */
  resetTimeout: number;
  /** Per-operation deadline in ms */
  timeout: number;
  /** Shown in errors and log lines */
  name: string;
  logger?: Logger;
  /** Clock, injectable for tests */
  now?: () => number;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  maxFailures: 3,
  resetTimeout: 60_000,
  timeout: 10_000,
  name: 'unnamed',
};

/**
 * Snapshot of a breaker, exposed for health reporting.
 */
export interface CircuitBreakerStats {
  state: CircuitState;
  consecutiveFailures: number;
  /** Epoch ms the circuit last opened, null while closed */
  openedAt: number | null;
}

/**
 * A send was skipped because the platform kept failing.
 */
export class CircuitOpenError extends BotError {
  constructor(public readonly circuit: string) {
    super(`Circuit breaker "${circuit}" is open`, 'DELIVERY_FAILED');
    this.name = 'CircuitOpenError';
  }
}

/**
 * A send did not settle within its deadline.
 */
export class TimeoutError extends BotError {
  constructor(public readonly timeoutMs: number) {
    super(`Operation timed out after ${String(timeoutMs)}ms`, 'DELIVERY_FAILED');
    this.name = 'TimeoutError';
  }
}

/**
 * Guards calls to the chat platform.
 *
 * closed -> open after `maxFailures` consecutive failures (a timeout counts)
 * open -> half_open once `resetTimeout` has passed
 * half_open -> closed when the trial send succeeds, open again when it fails
 */
export class CircuitBreaker {
  private readonly config: CircuitBreakerConfig;
  private readonly now: () => number;
  private state = CircuitState.CLOSED;
  private consecutiveFailures = 0;
  private openedAt: number | null = null;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.now = this.config.now ?? Date.now;
  }

  getState(): CircuitState {
    if (
      this.state === CircuitState.OPEN &&
      this.openedAt !== null &&
      this.now() - this.openedAt >= this.config.resetTimeout
    ) {
      this.transition(CircuitState.HALF_OPEN);
    }
    return this.state;
  }

  /**
   * Run `operation` unless the circuit is open.
   *
   * @throws CircuitOpenError while open
   * @throws TimeoutError when the deadline passes first
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    if (this.getState() === CircuitState.OPEN) {
      throw new CircuitOpenError(this.config.name);
    }

    let result: T;
    try {
      result = await this.race(operation());
    } catch (error) {
      this.recordFailure();
      throw error;
    }

    this.consecutiveFailures = 0;
    if (this.state !== CircuitState.CLOSED) {
      this.transition(CircuitState.CLOSED);
    }
    return result;
  }

  reset(): void {
    this.consecutiveFailures = 0;
    this.transition(CircuitState.CLOSED);
  }

  getStats(): CircuitBreakerStats {
    return {
      state: this.getState(),
      consecutiveFailures: this.consecutiveFailures,
      openedAt: this.openedAt,
    };
  }

  private recordFailure(): void {
    this.consecutiveFailures++;
    if (
      this.state === CircuitState.HALF_OPEN ||
      this.consecutiveFailures >= this.config.maxFailures
    ) {
      this.transition(CircuitState.OPEN);
    }
  }

  private transition(next: CircuitState): void {
    const previous = this.state;
    this.state = next;
    if (next === CircuitState.OPEN) {
      this.openedAt = this.now();
    } else if (next === CircuitState.CLOSED) {
      this.openedAt = null;
    }

    if (previous === next) return;
    this.config.logger?.warn(
      { circuit: this.config.name, from: previous, to: next, failures: this.consecutiveFailures },
      'Circuit state changed'
    );
  }

  private async race<T>(promise: Promise<T>): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new TimeoutError(this.config.timeout));
      }, this.config.timeout);
    });

    try {
      return await Promise.race([promise, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
}

export function createCircuitBreaker(config: Partial<CircuitBreakerConfig> = {}): CircuitBreaker {
  return new CircuitBreaker(config);
}
