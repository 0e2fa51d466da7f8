/**
 * Annotation Session
 *
 * One session per piece of content. Owns its model pool, rate limiter,
 * conversation and orchestrator; every label request goes through the
 * orchestrator and may wait, retry or fail over before it returns.
 */

import type { AnalysisKind, Category, ModelSpec, Sentiment } from '../types/index.js';
import type { LlmTransport } from '../chat/types.js';
import { ConversationSession } from '../chat/session.js';
import { ANALYSIS_OPERATIONS, type AnalysisOperation } from '../analysis/index.js';
import {
  CallOrchestrator,
  DEFAULT_ORCHESTRATOR_CONFIG,
  type OrchestratorEvent,
} from '../infra/call-orchestrator.js';
import { ModelPoolManager } from '../infra/model-pool.js';
import { RateLimiter, type QuotaLedger, type RateState } from '../infra/rate-limiter.js';
import { EmptyContentError, MissingCredentialError } from '../infra/errors.js';
import type { Clock } from '../infra/clock.js';
import { DEFAULT_MODEL_CATALOG, loadModelCatalog } from '../config/index.js';
import { getConfig } from '../config.js';
import { createAnthropicTransport } from '../clients/anthropic/client.js';

export interface AnnotationSessionOptions {
  transport: LlmTransport;
  /** Models in fallback order (default: built-in catalog) */
  catalog?: readonly ModelSpec[];
  retryMaxNum?: number;
  retryDelayMs?: number;
  maxAttempts?: number;
  maxTokens?: number;
  clock?: Clock;
  signal?: AbortSignal;
  /** Share quota with other sessions using the same credential */
  quotaLedger?: QuotaLedger;
  onEvent?: (event: OrchestratorEvent) => void;
}

export class AnnotationSession {
  private readonly conversation: ConversationSession;
  private readonly pool: ModelPoolManager;
  private readonly rateLimiter: RateLimiter;
  private readonly orchestrator: CallOrchestrator;

  private constructor(content: string, options: AnnotationSessionOptions) {
    this.pool = new ModelPoolManager(options.catalog ?? DEFAULT_MODEL_CATALOG);
    this.rateLimiter = new RateLimiter(this.pool.current(), {
      clock: options.clock,
      ledger: options.quotaLedger,
    });
    this.conversation = new ConversationSession(options.transport, content, {
      maxTokens: options.maxTokens,
    });
    this.orchestrator = new CallOrchestrator({
      pool: this.pool,
      rateLimiter: this.rateLimiter,
      session: this.conversation,
      retryMaxNum: options.retryMaxNum ?? DEFAULT_ORCHESTRATOR_CONFIG.retryMaxNum,
      retryDelayMs: options.retryDelayMs ?? DEFAULT_ORCHESTRATOR_CONFIG.retryDelayMs,
      maxAttempts: options.maxAttempts ?? DEFAULT_ORCHESTRATOR_CONFIG.maxAttempts,
      clock: options.clock,
      signal: options.signal,
      onEvent: options.onEvent,
    });
  }

  /**
   * Validate the content and establish the conversation on the first
   * model that will take it.
   */
  static async open(content: string, options: AnnotationSessionOptions): Promise<AnnotationSession> {
    if (!content || !content.trim()) {
      throw new EmptyContentError();
    }

    const session = new AnnotationSession(content, options);
    await session.orchestrator.open();
    return session;
  }

  async tags(): Promise<string[]> {
    return this.run(ANALYSIS_OPERATIONS.tags);
  }

  async category(): Promise<Category> {
    return this.run(ANALYSIS_OPERATIONS.category);
  }

  async sentiment(): Promise<Sentiment> {
    return this.run(ANALYSIS_OPERATIONS.sentiment);
  }

  async isHotspot(): Promise<boolean> {
    return this.run(ANALYSIS_OPERATIONS.hotspot);
  }

  async isCreative(): Promise<boolean> {
    return this.run(ANALYSIS_OPERATIONS.creative);
  }

  get currentModel(): ModelSpec {
    return this.pool.current();
  }

  get consecutiveFailures(): number {
    return this.pool.consecutiveFailures;
  }

  get rateState(): RateState {
    return this.rateLimiter.state();
  }

  get conversationTurns(): number {
    return this.conversation.turnCount;
  }

  private run<T>(operation: AnalysisOperation<T>): Promise<T> {
    const kind: AnalysisKind = operation.kind;
    return this.orchestrator.execute(kind, () => operation.execute(this.conversation));
  }
}

/**
 * Open a session against the real Anthropic API using environment config.
 * Explicit options win over the environment.
 */
export async function createAnnotationSession(
  content: string,
  overrides: Partial<AnnotationSessionOptions> = {}
): Promise<AnnotationSession> {
  if (!content || !content.trim()) {
    throw new EmptyContentError();
  }

  const config = getConfig();
  if (!overrides.transport && !config.apiKey) {
    throw new MissingCredentialError('ANTHROPIC_API_KEY');
  }

  const transport = overrides.transport ?? createAnthropicTransport(config.apiKey ?? undefined);
  const catalog = overrides.catalog ?? await loadModelCatalog(config.catalogPath ?? undefined);

  return AnnotationSession.open(content, {
    retryMaxNum: config.retryMaxNum,
    retryDelayMs: config.retryDelayMs,
    maxAttempts: config.maxAttempts,
    maxTokens: config.maxTokens,
    ...overrides,
    transport,
    catalog,
  });
}
