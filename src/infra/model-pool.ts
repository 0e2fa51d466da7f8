/**
 * Model Pool Manager
 *
 * Ordered fallback list of models. The head of the pool is the current
 * model; exhausted models are popped off the front and never come back.
 */

import type { ModelSpec } from '../types/index.js';
import { ConfigurationError, NoAvailableModelError } from './errors.js';

export interface ModelPoolSnapshot {
  current: string;
  remaining: string[];
  consecutiveFailures: number;
}

export class ModelPoolManager {
  private pool: ModelSpec[];
  private failures = 0;

  constructor(catalog: readonly ModelSpec[]) {
    if (catalog.length === 0) {
      throw new ConfigurationError('Model pool cannot be empty');
    }
    this.pool = [...catalog];
  }

  current(): ModelSpec {
    return this.pool[0];
  }

  /**
   * Drop the current model and make the next one current.
   * Resets the failure count for the new model.
   */
  advance(): ModelSpec {
    const exhausted = this.pool[0];
    if (this.pool.length <= 1) {
      throw new NoAvailableModelError(exhausted.name);
    }

    this.pool.shift();
    this.failures = 0;

    const next = this.pool[0];
    console.warn(`[ModelPool] ${exhausted.name} exhausted, switched to ${next.name} (${this.pool.length} left)`);
    return next;
  }

  recordFailure(): number {
    this.failures++;
    return this.failures;
  }

  recordSuccess(): void {
    this.failures = 0;
  }

  shouldAdvance(maxRetries: number): boolean {
    return this.failures >= maxRetries;
  }

  hasFallback(): boolean {
    return this.pool.length > 1;
  }

  get remaining(): number {
    return this.pool.length;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  snapshot(): ModelPoolSnapshot {
    return {
      current: this.pool[0].name,
      remaining: this.pool.map(m => m.name),
      consecutiveFailures: this.failures,
    };
  }
}
