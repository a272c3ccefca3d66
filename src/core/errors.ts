/**
 * Error definitions for the generation lifecycle.
 * Provides a structured error hierarchy for all coordination operations.
 */

/** Base error class for all lifecycle errors */
export class LifecycleError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'LifecycleError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LifecycleError)
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

/** Error thrown when a required collaborator or setting is missing or invalid */
export class ConfigurationError extends LifecycleError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIGURATION_ERROR', context)
    this.name = 'ConfigurationError'
  }
}

/** Operations of the external job-status provider */
export type ProviderOperation = 'create' | 'get' | 'cancel'

/** Error thrown when a call to the external generation service fails */
export class ExternalServiceError extends LifecycleError {
  public readonly operation: ProviderOperation

  constructor(
    operation: ProviderOperation,
    message: string,
    context: Record<string, unknown> = {}
  ) {
    super(message, 'EXTERNAL_SERVICE_ERROR', { operation, ...context })
    this.name = 'ExternalServiceError'
    this.operation = operation
  }
}

/** Error describing a job that never reached a terminal state within its budget */
export class JobTimeoutError extends LifecycleError {
  public readonly attempts: number

  constructor(jobId: string, attempts: number) {
    super(
      `Prediction ${jobId} timed out after ${String(attempts)} polling attempts`,
      'JOB_TIMEOUT',
      { jobId, attempts }
    )
    this.name = 'JobTimeoutError'
    this.attempts = attempts
  }
}

/** Error thrown when a persistence gateway call fails */
export class PersistenceError extends LifecycleError {
  public readonly operation: string

  constructor(operation: string, message: string, context: Record<string, unknown> = {}) {
    super(message, 'PERSISTENCE_ERROR', { operation, ...context })
    this.name = 'PersistenceError'
    this.operation = operation
  }
}

/** Error raised by an event handler during delivery; never reaches the publisher */
export class SubscriberError extends LifecycleError {
  constructor(kind: string, handler: string, cause: unknown) {
    super(
      `Subscriber "${handler}" failed while handling ${kind}: ${toErrorMessage(cause)}`,
      'SUBSCRIBER_ERROR',
      { kind, handler }
    )
    this.name = 'SubscriberError'
  }
}

/** Steps of order creation, named in OrderCreationError */
export type OrderCreationStep =
  | 'persist-order'
  | 'create-job'
  | 'persist-generation'
  | 'mark-processing'
  | 'watch-job'

/** Error thrown when createOrder aborts part-way through */
export class OrderCreationError extends LifecycleError {
  public readonly step: OrderCreationStep
  public override readonly cause: unknown

  constructor(step: OrderCreationStep, cause: unknown, context: Record<string, unknown> = {}) {
    super(
      `Order creation failed at step "${step}": ${toErrorMessage(cause)}`,
      'ORDER_CREATION_FAILED',
      { step, ...context }
    )
    this.name = 'OrderCreationError'
    this.step = step
    this.cause = cause
  }
}

/** Error thrown when a status change would move an entity backwards or sideways */
export class InvalidTransitionError extends LifecycleError {
  constructor(entity: 'order' | 'generation', id: string, from: string, to: string) {
    super(`Cannot move ${entity} ${id} from ${from} to ${to}`, 'INVALID_TRANSITION', {
      entity,
      id,
      from,
      to,
    })
    this.name = 'InvalidTransitionError'
  }
}

/** Error thrown when a second poller is requested for a job that is already watched */
export class JobAlreadyActiveError extends LifecycleError {
  constructor(jobId: string) {
    super(`Job ${jobId} is already being polled`, 'JOB_ALREADY_ACTIVE', { jobId })
    this.name = 'JobAlreadyActiveError'
  }
}

/**
 * Render any thrown value as a non-empty message.
 */
export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message.trim().length > 0 ? err.message : 'Unexpected error'
  }
  if (typeof err === 'string' && err.trim().length > 0) return err
  if (err === undefined || err === null) return 'Unexpected error'
  const rendered = String(err)
  return rendered.trim().length > 0 ? rendered : 'Unexpected error'
}
