/**
 * Error definitions for Cadence
 * Provides the structured error hierarchy used across the engine
 */

/** Base error class for all Cadence errors */
export class CadenceError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'CadenceError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CadenceError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/**
 * A remote dependency (pattern store, health probe target) is unreachable.
 * Recovered locally through the fallback queue; never surfaced to the user.
 */
export class TransientStoreError extends CadenceError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'TRANSIENT_STORE_ERROR', context)
    this.name = 'TransientStoreError'
  }
}

/** A review gate or intent check failed; recovered through fix-and-retry */
export class ValidationFailureError extends CadenceError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'VALIDATION_FAILURE', context)
    this.name = 'ValidationFailureError'
  }
}

/** A proposed action conflicts with an anti-goal or constraint */
export class IntentConflictError extends CadenceError {
  constructor(reason: string, context: Record<string, unknown> = {}) {
    super(`Intent conflict: ${reason}`, 'INTENT_CONFLICT', { reason, ...context })
    this.name = 'IntentConflictError'
  }
}

/** Retries are exhausted; automatic progression needs an operator */
export class EscalationRequiredError extends CadenceError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'ESCALATION_REQUIRED', context)
    this.name = 'EscalationRequiredError'
  }
}

/** A completion signal refers to a phase the namespace has already left */
export class StaleSignalError extends CadenceError {
  constructor(signalId: string, signalPhase: string, currentPhase: string) {
    super(
      `Signal ${signalId} refers to phase "${signalPhase}" but the project is in "${currentPhase}"`,
      'STALE_SIGNAL',
      { signalId, signalPhase, currentPhase }
    )
    this.name = 'StaleSignalError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends CadenceError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** A requested phase transition is not allowed from the current state */
export class InvalidTransitionError extends CadenceError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'INVALID_TRANSITION', context)
    this.name = 'InvalidTransitionError'
  }
}

/** No project is registered under the given namespace */
export class ProjectNotFoundError extends CadenceError {
  constructor(namespace: string) {
    super(`Project not found: ${namespace}`, 'PROJECT_NOT_FOUND', { namespace })
    this.name = 'ProjectNotFoundError'
  }
}

/** An asynchronous operation exceeded its time budget */
export class TimeoutError extends CadenceError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${String(timeoutMs)}ms`, 'TIMEOUT', {
      operation,
      timeoutMs,
    })
    this.name = 'TimeoutError'
  }
}
