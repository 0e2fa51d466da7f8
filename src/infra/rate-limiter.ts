/**
 * Rate Limiter
 *
 * Per-model call quotas over a rolling minute window and a UTC calendar day.
 * A minute limit clears by waiting on the same model; a day limit needs a
 * model with separate quota.
 */

import type { ModelSpec } from '../types/index.js';
import { systemClock, type Clock } from './clock.js';

export const MINUTE_WINDOW_MS = 60_000;

/**
 * Call counters for one model
 */
export interface RateState {
  /** Calls made since minuteWindowStart */
  callsThisMinute: number;
  /** Calls made since dayWindowStart */
  callsToday: number;
  /** Start of the current minute window (epoch ms) */
  minuteWindowStart: number;
  /** Start of the current day window (epoch ms) */
  dayWindowStart: number;
  /** Last successful call (epoch ms, null before the first) */
  lastSuccessAt: number | null;
}

export type RateLimitCheck =
  | { status: 'proceed' }
  | { status: 'minute_limit'; waitMs: number }
  | { status: 'day_limit' };

function utcDay(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

/**
 * RateState keyed by model name.
 *
 * A RateLimiter owns a private ledger unless one is passed in. Passing the
 * same ledger to several limiters makes them share quota, which is what you
 * want when they all call through one API key.
 */
export class QuotaLedger {
  private states: Map<string, RateState> = new Map();

  constructor(private readonly clock: Clock = systemClock) {}

  stateFor(model: string): RateState {
    let state = this.states.get(model);
    if (!state) {
      state = this.freshState();
      this.states.set(model, state);
    }
    return state;
  }

  reset(model: string): RateState {
    const state = this.freshState();
    this.states.set(model, state);
    return state;
  }

  models(): string[] {
    return Array.from(this.states.keys());
  }

  private freshState(): RateState {
    const now = this.clock.now();
    return {
      callsThisMinute: 0,
      callsToday: 0,
      minuteWindowStart: now,
      dayWindowStart: now,
      lastSuccessAt: null,
    };
  }
}

export interface RateLimiterOptions {
  clock?: Clock;
  /** Shared ledger; omit for quota isolated to this limiter */
  ledger?: QuotaLedger;
}

export class RateLimiter {
  private model: ModelSpec;
  private clock: Clock;
  private ledger: QuotaLedger;
  private readonly shared: boolean;

  constructor(model: ModelSpec, options: RateLimiterOptions = {}) {
    this.model = model;
    this.clock = options.clock ?? systemClock;
    this.shared = options.ledger !== undefined;
    this.ledger = options.ledger ?? new QuotaLedger(this.clock);

    if (!this.shared) {
      this.ledger.reset(model.name);
    }
  }

  private get current(): RateState {
    return this.ledger.stateFor(this.model.name);
  }

  /**
   * Decide whether the next call on the current model may go out now
   */
  check(): RateLimitCheck {
    const state = this.current;
    const now = this.clock.now();

    if (utcDay(now) !== utcDay(state.dayWindowStart)) {
      state.callsToday = 0;
      state.dayWindowStart = now;
    }

    let elapsed = now - state.minuteWindowStart;
    if (elapsed > MINUTE_WINDOW_MS) {
      state.callsThisMinute = 0;
      state.minuteWindowStart = now;
      elapsed = 0;
    }

    if (state.callsToday >= this.model.maxCallsPerDay) {
      console.warn(`[RateLimiter] ${this.model.name} reached day limit (${state.callsToday}/${this.model.maxCallsPerDay})`);
      return { status: 'day_limit' };
    }

    if (state.callsThisMinute >= this.model.maxCallsPerMinute) {
      const waitMs = MINUTE_WINDOW_MS - elapsed;
      console.warn(
        `[RateLimiter] ${this.model.name} reached minute limit ` +
        `(${state.callsThisMinute}/${this.model.maxCallsPerMinute}), wait ${Math.ceil(waitMs / 1000)}s`
      );
      return { status: 'minute_limit', waitMs };
    }

    return { status: 'proceed' };
  }

  /**
   * Count a call that is about to be sent. Call only after check() returned
   * proceed, with no await in between.
   */
  recordAttempt(): void {
    const state = this.current;
    state.callsThisMinute++;
    state.callsToday++;
  }

  recordSuccess(): void {
    this.current.lastSuccessAt = this.clock.now();
  }

  /**
   * Start a new minute window after waiting out a minute limit
   */
  resetMinuteWindow(): void {
    const state = this.current;
    state.callsThisMinute = 0;
    state.minuteWindowStart = this.clock.now();
  }

  /**
   * Point the limiter at a new model. Isolated limiters start the new model
   * from zero; shared ledgers keep whatever the credential already used.
   */
  resetForModel(model: ModelSpec): void {
    this.model = model;
    if (!this.shared) {
      this.ledger.reset(model.name);
    }
  }

  /**
   * Milliseconds since the last successful call, null if there was none
   */
  msSinceLastSuccess(): number | null {
    const { lastSuccessAt } = this.current;
    return lastSuccessAt === null ? null : this.clock.now() - lastSuccessAt;
  }

  get modelName(): string {
    return this.model.name;
  }

  get isShared(): boolean {
    return this.shared;
  }

  state(): RateState {
    return { ...this.current };
  }
}
