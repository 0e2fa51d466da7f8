/**
 * Infrastructure Utilities
 *
 * Quota tracking, model failover and the orchestration loop that ties them
 * to a conversation.
 */

export {
  NoAvailableModelError,
  AttemptBudgetExhaustedError,
  OrchestrationAbortedError,
  EmptyContentError,
  MissingCredentialError,
  ConfigurationError,
  SessionNotEstablishedError,
  isNoAvailableModelError,
  isAttemptBudgetExhaustedError,
  isOrchestrationAbortedError,
  isFatalOrchestrationError,
  toError,
} from './errors.js';

export { systemClock, type Clock } from './clock.js';

export { ModelPoolManager, type ModelPoolSnapshot } from './model-pool.js';

export {
  RateLimiter,
  QuotaLedger,
  MINUTE_WINDOW_MS,
  type RateState,
  type RateLimitCheck,
  type RateLimiterOptions,
} from './rate-limiter.js';

export {
  CallOrchestrator,
  DEFAULT_ORCHESTRATOR_CONFIG,
  type CallOrchestratorOptions,
  type OrchestratorConfig,
  type OrchestratorEvent,
  type SessionBinding,
  type SwitchReason,
} from './call-orchestrator.js';
