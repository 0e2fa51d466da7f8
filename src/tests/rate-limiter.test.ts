/**
 * Rate Limiter Tests
 *
 * Minute and day windows are driven by a manual clock.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { QuotaLedger, RateLimiter } from '../infra/rate-limiter.js';
import type { ModelSpec } from '../types/index.js';
import { ManualClock, START_TIME } from './fixtures/transport.fixtures.js';

const limited: ModelSpec = { name: 'limited', maxCallsPerMinute: 2, maxCallsPerDay: 5 };
const other: ModelSpec = { name: 'other', maxCallsPerMinute: 2, maxCallsPerDay: 5 };

describe('RateLimiter', () => {
  let clock: ManualClock;

  beforeEach(() => {
    clock = new ManualClock();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('minute window', () => {
    it('should proceed while under the minute limit', () => {
      const limiter = new RateLimiter(limited, { clock });

      expect(limiter.check()).toEqual({ status: 'proceed' });
      limiter.recordAttempt();
      expect(limiter.check()).toEqual({ status: 'proceed' });
    });

    it('should report the time left in the window', () => {
      const limiter = new RateLimiter(limited, { clock });
      limiter.recordAttempt();
      limiter.recordAttempt();

      expect(limiter.check()).toEqual({ status: 'minute_limit', waitMs: 60_000 });

      clock.advance(20_000);
      expect(limiter.check()).toEqual({ status: 'minute_limit', waitMs: 40_000 });
    });

    it('should keep the window open at exactly sixty seconds', () => {
      const limiter = new RateLimiter(limited, { clock });
      limiter.recordAttempt();
      limiter.recordAttempt();

      clock.advance(60_000);
      expect(limiter.check()).toEqual({ status: 'minute_limit', waitMs: 0 });
    });

    it('should roll the window once sixty seconds have passed', () => {
      const limiter = new RateLimiter(limited, { clock });
      limiter.recordAttempt();
      limiter.recordAttempt();

      clock.advance(60_001);
      expect(limiter.check()).toEqual({ status: 'proceed' });
      expect(limiter.state().callsThisMinute).toBe(0);
      expect(limiter.state().minuteWindowStart).toBe(START_TIME + 60_001);
    });

    it('should start a fresh window after resetMinuteWindow', () => {
      const limiter = new RateLimiter(limited, { clock });
      limiter.recordAttempt();
      limiter.recordAttempt();
      clock.advance(5_000);

      limiter.resetMinuteWindow();

      expect(limiter.check()).toEqual({ status: 'proceed' });
      expect(limiter.state().minuteWindowStart).toBe(START_TIME + 5_000);
      expect(limiter.state().callsToday).toBe(2);
    });
  });

  describe('day window', () => {
    it('should report day_limit once the daily ceiling is reached', () => {
      const limiter = new RateLimiter(limited, { clock });
      limiter.recordAttempt();
      limiter.recordAttempt();
      clock.advance(61_000);
      limiter.check();
      limiter.recordAttempt();
      limiter.recordAttempt();
      clock.advance(61_000);
      limiter.check();
      limiter.recordAttempt();

      expect(limiter.state().callsToday).toBe(5);
      expect(limiter.check()).toEqual({ status: 'day_limit' });
    });

    it('should report day_limit before minute_limit', () => {
      const tight: ModelSpec = { name: 'tight', maxCallsPerMinute: 2, maxCallsPerDay: 2 };
      const limiter = new RateLimiter(tight, { clock });
      limiter.recordAttempt();
      limiter.recordAttempt();

      expect(limiter.check()).toEqual({ status: 'day_limit' });
    });

    it('should reset the daily count when the UTC date changes', () => {
      const tight: ModelSpec = { name: 'tight', maxCallsPerMinute: 5, maxCallsPerDay: 2 };
      const limiter = new RateLimiter(tight, { clock });
      limiter.recordAttempt();
      limiter.recordAttempt();
      expect(limiter.check()).toEqual({ status: 'day_limit' });

      // 08:00 + 16h = 00:00 next day
      clock.advance(16 * 60 * 60 * 1000);

      expect(limiter.check()).toEqual({ status: 'proceed' });
      expect(limiter.state().callsToday).toBe(0);
    });
  });

  describe('success tracking', () => {
    it('should report time since the last success', () => {
      const limiter = new RateLimiter(limited, { clock });
      expect(limiter.msSinceLastSuccess()).toBeNull();

      limiter.recordSuccess();
      clock.advance(1_500);

      expect(limiter.msSinceLastSuccess()).toBe(1_500);
      expect(limiter.state().lastSuccessAt).toBe(START_TIME);
    });
  });

  describe('model switching', () => {
    it('should start an isolated limiter from zero on the new model', () => {
      const limiter = new RateLimiter(limited, { clock });
      limiter.recordAttempt();
      limiter.recordAttempt();

      limiter.resetForModel(other);

      expect(limiter.modelName).toBe('other');
      expect(limiter.isShared).toBe(false);
      expect(limiter.state()).toEqual({
        callsThisMinute: 0,
        callsToday: 0,
        minuteWindowStart: START_TIME,
        dayWindowStart: START_TIME,
        lastSuccessAt: null,
      });
    });

    it('should return a copy of its state', () => {
      const limiter = new RateLimiter(limited, { clock });
      const snapshot = limiter.state();
      limiter.recordAttempt();

      expect(snapshot.callsThisMinute).toBe(0);
      expect(limiter.state().callsThisMinute).toBe(1);
    });
  });

  describe('shared ledger', () => {
    it('should share counts between limiters on the same ledger', () => {
      const ledger = new QuotaLedger(clock);
      const first = new RateLimiter(limited, { clock, ledger });
      const second = new RateLimiter(limited, { clock, ledger });

      first.recordAttempt();
      second.recordAttempt();

      expect(first.isShared).toBe(true);
      expect(first.check()).toEqual({ status: 'minute_limit', waitMs: 60_000 });
      expect(second.state().callsToday).toBe(2);
    });

    it('should keep quota already used when switching onto a shared model', () => {
      const ledger = new QuotaLedger(clock);
      const first = new RateLimiter(other, { clock, ledger });
      first.recordAttempt();

      const second = new RateLimiter(limited, { clock, ledger });
      second.resetForModel(other);

      expect(second.state().callsToday).toBe(1);
      expect(ledger.models()).toEqual(['other']);
    });
  });
});
