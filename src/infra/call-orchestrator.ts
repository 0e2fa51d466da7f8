/**
 * Call Orchestrator
 *
 * Every outbound LLM call, session establishment included, goes through one
 * bounded loop that consults the rate limiter, waits out minute limits,
 * retries failures on the same model and fails over to the next model when
 * a day limit or the consecutive-failure ceiling is hit.
 *
 *   check ──day_limit──────▶ SWITCH_MODEL ──▶ (re-establish) ──▶ check
 *     │  ──minute_limit───▶ WAIT_MINUTE ─────────────────────▶ check
 *     └──proceed──▶ ATTEMPTING ──ok──▶ SUCCEEDED
 *                        └──error──▶ SWITCH_MODEL | RETRY_AFTER_ERROR ──▶ check
 *
 * After any model switch the conversation is stale: the next attempt is
 * always a re-establishment with the original content, never the pending
 * analysis call.
 */

import type { ModelSpec } from '../types/index.js';
import { systemClock, type Clock } from './clock.js';
import {
  AttemptBudgetExhaustedError,
  OrchestrationAbortedError,
  toError,
} from './errors.js';
import type { ModelPoolManager } from './model-pool.js';
import type { RateLimiter } from './rate-limiter.js';

/**
 * The conversation the orchestrator keeps in step with the active model
 */
export interface SessionBinding {
  establish(model: ModelSpec): Promise<unknown>;
  teardown(): void;
}

export type SwitchReason = 'day_limit' | 'max_retries';

export type OrchestratorEvent =
  | { type: 'attempt'; label: string; model: string; attempt: number }
  | { type: 'succeeded'; label: string; model: string; attempts: number }
  | { type: 'minute_wait'; label: string; model: string; waitMs: number }
  | {
      type: 'retry_scheduled';
      label: string;
      model: string;
      delayMs: number;
      consecutiveFailures: number;
      error: Error;
    }
  | { type: 'model_switched'; label: string; from: string; to: string; reason: SwitchReason };

export interface OrchestratorConfig {
  /** Consecutive failures on one model before switching (default: 3) */
  retryMaxNum: number;
  /** Fixed delay before retrying after a failure (default: 60000) */
  retryDelayMs: number;
  /** Remote attempts allowed per orchestrated call (default: 30) */
  maxAttempts: number;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  retryMaxNum: 3,
  retryDelayMs: 60_000,
  maxAttempts: 30,
};

export interface CallOrchestratorOptions extends Partial<OrchestratorConfig> {
  pool: ModelPoolManager;
  rateLimiter: RateLimiter;
  session: SessionBinding;
  clock?: Clock;
  signal?: AbortSignal;
  onEvent?: (event: OrchestratorEvent) => void;
}

const ESTABLISH = 'establish';

export class CallOrchestrator {
  private pool: ModelPoolManager;
  private rateLimiter: RateLimiter;
  private session: SessionBinding;
  private config: OrchestratorConfig;
  private clock: Clock;
  private signal?: AbortSignal;
  private onEvent?: (event: OrchestratorEvent) => void;
  private sessionReady = false;

  constructor(options: CallOrchestratorOptions) {
    this.pool = options.pool;
    this.rateLimiter = options.rateLimiter;
    this.session = options.session;
    this.config = {
      retryMaxNum: options.retryMaxNum ?? DEFAULT_ORCHESTRATOR_CONFIG.retryMaxNum,
      retryDelayMs: options.retryDelayMs ?? DEFAULT_ORCHESTRATOR_CONFIG.retryDelayMs,
      maxAttempts: options.maxAttempts ?? DEFAULT_ORCHESTRATOR_CONFIG.maxAttempts,
    };
    this.clock = options.clock ?? systemClock;
    this.signal = options.signal;
    this.onEvent = options.onEvent;
  }

  /**
   * Establish the conversation on the current model.
   * Returns the model it ended up established on.
   */
  async open(): Promise<ModelSpec> {
    this.sessionReady = false;
    return this.drive(ESTABLISH, async model => model, true);
  }

  /**
   * Run a remote call under rate limiting, retry and failover.
   * `call` receives the model the conversation is currently bound to.
   */
  async execute<T>(label: string, call: (model: ModelSpec) => Promise<T>): Promise<T> {
    return this.drive(label, call, false);
  }

  get currentModel(): ModelSpec {
    return this.pool.current();
  }

  get isSessionReady(): boolean {
    return this.sessionReady;
  }

  private async drive<T>(
    label: string,
    call: (model: ModelSpec) => Promise<T>,
    establishOnly: boolean
  ): Promise<T> {
    let attempts = 0;
    let lastError: Error | null = null;

    for (;;) {
      this.throwIfAborted(label);

      if (attempts >= this.config.maxAttempts) {
        throw new AttemptBudgetExhaustedError(label, attempts, lastError);
      }

      const step = this.sessionReady ? label : ESTABLISH;
      const model = this.pool.current();
      const check = this.rateLimiter.check();

      if (check.status === 'day_limit') {
        this.switchModel(step, 'day_limit');
        continue;
      }

      if (check.status === 'minute_limit') {
        this.emit({ type: 'minute_wait', label: step, model: model.name, waitMs: check.waitMs });
        await this.sleep(check.waitMs, label);
        this.rateLimiter.resetMinuteWindow();
        continue;
      }

      attempts++;
      this.rateLimiter.recordAttempt();
      this.emit({ type: 'attempt', label: step, model: model.name, attempt: attempts });

      try {
        if (!this.sessionReady) {
          await this.session.establish(model);
          this.recordSuccess();
          this.sessionReady = true;
          this.emit({ type: 'succeeded', label: ESTABLISH, model: model.name, attempts });

          if (establishOnly) {
            return await call(model);
          }
          continue;
        }

        const value = await call(model);
        this.recordSuccess();
        this.emit({ type: 'succeeded', label, model: model.name, attempts });
        return value;
      } catch (error) {
        lastError = toError(error);
        const failures = this.pool.recordFailure();

        console.warn(`[CallOrchestrator] ${step} failed on ${model.name} (${failures} consecutive): ${lastError.message}`);

        if (this.pool.shouldAdvance(this.config.retryMaxNum)) {
          this.switchModel(step, 'max_retries');
          continue;
        }

        this.emit({
          type: 'retry_scheduled',
          label: step,
          model: model.name,
          delayMs: this.config.retryDelayMs,
          consecutiveFailures: failures,
          error: lastError,
        });
        await this.sleep(this.config.retryDelayMs, label);
      }
    }
  }

  /**
   * Success bookkeeping: retry count is reset before the success timestamp
   */
  private recordSuccess(): void {
    this.pool.recordSuccess();
    this.rateLimiter.recordSuccess();
  }

  private switchModel(label: string, reason: SwitchReason): void {
    const from = this.pool.current().name;
    const next = this.pool.advance();

    this.rateLimiter.resetForModel(next);
    this.session.teardown();
    this.sessionReady = false;

    this.emit({ type: 'model_switched', label, from, to: next.name, reason });
  }

  private async sleep(ms: number, label: string): Promise<void> {
    this.throwIfAborted(label);
    try {
      await this.clock.sleep(ms, this.signal);
    } catch (error) {
      if (this.signal?.aborted) {
        throw new OrchestrationAbortedError(label);
      }
      throw error;
    }
  }

  private throwIfAborted(label: string): void {
    if (this.signal?.aborted) {
      throw new OrchestrationAbortedError(label);
    }
  }

  private emit(event: OrchestratorEvent): void {
    this.onEvent?.(event);
  }
}
