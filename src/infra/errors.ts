/**
 * Orchestration Errors
 *
 * Only the errors in this file ever reach a caller of an annotation session;
 * quota waits, retries and parse failures are absorbed below it.
 */

/**
 * Thrown when the model pool has no fallback left to switch to
 */
export class NoAvailableModelError extends Error {
  /** Model that was current when the pool ran out */
  readonly lastModel: string;

  constructor(lastModel: string) {
    super(`No fallback model left in the pool (last model: ${lastModel})`);
    this.name = 'NoAvailableModelError';
    this.lastModel = lastModel;
  }
}

/**
 * Thrown when a single orchestrated call used up its attempt ceiling
 */
export class AttemptBudgetExhaustedError extends Error {
  readonly label: string;
  readonly attempts: number;
  readonly lastError: Error | null;

  constructor(label: string, attempts: number, lastError: Error | null) {
    super(
      `${label} gave up after ${attempts} attempt(s)` +
      (lastError ? `: ${lastError.message}` : '')
    );
    this.name = 'AttemptBudgetExhaustedError';
    this.label = label;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class OrchestrationAbortedError extends Error {
  readonly label: string;

  constructor(label: string) {
    super(`${label} was aborted`);
    this.name = 'OrchestrationAbortedError';
    this.label = label;
  }
}

export class EmptyContentError extends Error {
  constructor() {
    super('Content text cannot be empty');
    this.name = 'EmptyContentError';
  }
}

export class MissingCredentialError extends Error {
  readonly variable: string;

  constructor(variable: string) {
    super(`${variable} is required for real LLM calls`);
    this.name = 'MissingCredentialError';
    this.variable = variable;
  }
}

export class ConfigurationError extends Error {
  /** Individual problems found while validating */
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class SessionNotEstablishedError extends Error {
  constructor() {
    super('Conversation session is not established');
    this.name = 'SessionNotEstablishedError';
  }
}

export function isNoAvailableModelError(error: unknown): error is NoAvailableModelError {
  return error instanceof NoAvailableModelError;
}

export function isAttemptBudgetExhaustedError(error: unknown): error is AttemptBudgetExhaustedError {
  return error instanceof AttemptBudgetExhaustedError;
}

export function isOrchestrationAbortedError(error: unknown): error is OrchestrationAbortedError {
  return error instanceof OrchestrationAbortedError;
}

/**
 * True for errors that end an orchestrated call for good
 */
export function isFatalOrchestrationError(
  error: unknown
): error is NoAvailableModelError | AttemptBudgetExhaustedError | OrchestrationAbortedError {
  return (
    isNoAvailableModelError(error) ||
    isAttemptBudgetExhaustedError(error) ||
    isOrchestrationAbortedError(error)
  );
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
