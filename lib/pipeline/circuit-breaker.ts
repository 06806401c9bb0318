/**
 * Circuit Breaker Registry - one breaker per dependency class, shared by every
 * stage executor that calls that dependency.
 *
 * State changes go through compareAndSet(), which only applies a transition
 * when the breaker is still in the expected state. Every public method runs
 * synchronously to completion, so a check and the transition it guards can
 * never interleave with another caller's; in particular only one caller can
 * claim the half-open probe.
 */

import {
  BreakerState,
  CircuitBreakerConfig,
  CircuitBreakerSnapshot,
  DependencyClass,
} from '../types';
import { Logger } from '../utils';

export const DEFAULT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  windowMs: 60_000,
  cooldownMs: 30_000,
};

export type BreakerPermit =
  | { granted: true; probe: boolean }
  | { granted: false; retryAfterMs: number };

export type GrantedPermit = Extract<BreakerPermit, { granted: true }>;

export class CircuitBreaker {
  private state: BreakerState = 'closed';
  private consecutiveFailures = 0;
  private lastFailureAt: number | null = null;
  private openedAt: number | null = null;
  private probeInFlight = false;

  constructor(
    readonly dependency: DependencyClass,
    private readonly config: CircuitBreakerConfig = DEFAULT_BREAKER_CONFIG,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Asks permission for one call. An open breaker whose cooldown has elapsed
   * moves to half_open and hands the probe to this caller.
   */
  tryAcquire(): BreakerPermit {
    if (this.state === 'closed') {
      return { granted: true, probe: false };
    }

    if (this.state === 'open') {
      const elapsed = this.now() - (this.openedAt ?? 0);
      if (elapsed < this.config.cooldownMs) {
        return { granted: false, retryAfterMs: this.config.cooldownMs - elapsed };
      }
      this.compareAndSet('open', 'half_open');
    }

    if (this.probeInFlight) {
      return { granted: false, retryAfterMs: 0 };
    }
    this.probeInFlight = true;
    return { granted: true, probe: true };
  }

  recordSuccess(permit: GrantedPermit): void {
    if (permit.probe) {
      this.probeInFlight = false;
      if (this.compareAndSet('half_open', 'closed')) {
        this.consecutiveFailures = 0;
        this.lastFailureAt = null;
        this.openedAt = null;
      }
      return;
    }

    if (this.state === 'closed') {
      this.consecutiveFailures = 0;
      this.lastFailureAt = null;
    }
  }

  recordFailure(permit: GrantedPermit): void {
    const now = this.now();

    if (permit.probe) {
      this.probeInFlight = false;
      if (this.compareAndSet('half_open', 'open')) {
        this.openedAt = now;
      }
      return;
    }

    // Late results from calls admitted before the breaker opened are ignored.
    if (this.state !== 'closed') {
      return;
    }

    if (this.lastFailureAt !== null && now - this.lastFailureAt > this.config.windowMs) {
      this.consecutiveFailures = 0;
    }
    this.consecutiveFailures++;
    this.lastFailureAt = now;

    if (this.consecutiveFailures >= this.config.failureThreshold && this.compareAndSet('closed', 'open')) {
      this.openedAt = now;
    }
  }

  /**
   * Gives a permit back without counting the call either way (cancelled calls,
   * defects in the stage wrapper).
   */
  release(permit: GrantedPermit): void {
    if (permit.probe) {
      this.probeInFlight = false;
    }
  }

  snapshot(): CircuitBreakerSnapshot {
    return {
      dependency: this.dependency,
      state: this.state,
      consecutive_failures: this.consecutiveFailures,
      opened_at: this.openedAt,
      probe_in_flight: this.probeInFlight,
    };
  }

  private compareAndSet(expected: BreakerState, next: BreakerState): boolean {
    if (this.state !== expected) {
      return false;
    }
    this.state = next;

    const details = {
      dependency: this.dependency,
      from: expected,
      to: next,
      consecutive_failures: this.consecutiveFailures,
    };
    if (next === 'open') {
      Logger.warn('Circuit breaker opened', details);
    } else {
      Logger.info('Circuit breaker state change', details);
    }
    return true;
  }
}

export class CircuitBreakerRegistry {
  private breakers: Map<DependencyClass, CircuitBreaker> = new Map();

  constructor(
    private readonly config: CircuitBreakerConfig = DEFAULT_BREAKER_CONFIG,
    private readonly now: () => number = Date.now
  ) {}

  get(dependency: DependencyClass): CircuitBreaker {
    let breaker = this.breakers.get(dependency);
    if (!breaker) {
      breaker = new CircuitBreaker(dependency, this.config, this.now);
      this.breakers.set(dependency, breaker);
    }
    return breaker;
  }

  snapshot(): CircuitBreakerSnapshot[] {
    return Array.from(this.breakers.values()).map(breaker => breaker.snapshot());
  }
}
