/**
 * Error taxonomy shared by the routing core and its collaborators.
 *
 * The pipeline turns every one of these into a RoutingOutcome except
 * RoutingCancelledError, which is the only error `route()` lets escape.
 */

export class ValidationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ValidationError'
  }
}

/** The extractor could not turn text into an event (or reply was unusable) */
export class ExtractionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ExtractionError'
  }
}

/** Persistence unavailable or the write was rejected */
export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StoreError'
  }
}

export class DeliveryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'DeliveryError'
  }
}

export class CollaboratorTimeoutError extends Error {
  readonly operation: string
  readonly timeoutMs: number

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`)
    this.name = 'CollaboratorTimeoutError'
    this.operation = operation
    this.timeoutMs = timeoutMs
  }
}

export class RoutingCancelledError extends Error {
  constructor(stage: string) {
    super(`Routing cancelled before ${stage}`)
    this.name = 'RoutingCancelledError'
  }
}

/** Message of any thrown value, for logs and outcome reasons */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
