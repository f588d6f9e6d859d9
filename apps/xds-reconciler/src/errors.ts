import type { ResourceKind } from './resources/types.js'

export const RECONCILE_ERROR_CODES = {
  TYPE_MISMATCH: 'TYPE_MISMATCH',
  DUPLICATE_NAME: 'DUPLICATE_NAME',
  MISSING_NAME: 'MISSING_NAME',
  UNSUPPORTED_TYPE: 'UNSUPPORTED_TYPE',
  PORT_ALLOCATION_FAILURE: 'PORT_ALLOCATION_FAILURE',
  VALIDATION_FAILURE: 'VALIDATION_FAILURE',
  PUSH_REJECTED: 'PUSH_REJECTED',
  PUSH_TIMEOUT: 'PUSH_TIMEOUT',
  CANCELLED: 'CANCELLED',
} as const

export type ReconcileErrorCode = (typeof RECONCILE_ERROR_CODES)[keyof typeof RECONCILE_ERROR_CODES]

/**
 * `pre-mutation` errors are raised before anything reaches the push channel
 * and need no rollback. `barrier` errors surface while awaiting
 * acknowledgments and are returned only after the batch was rolled back.
 */
export type ErrorStage = 'pre-mutation' | 'barrier'

export class ReconcileError extends Error {
  readonly code: ReconcileErrorCode
  readonly stage: ErrorStage

  constructor(code: ReconcileErrorCode, stage: ErrorStage, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ReconcileError'
    this.code = code
    this.stage = stage
  }
}

/** Payload does not have the shape of its declared type tag. */
export class TypeMismatchError extends ReconcileError {
  constructor(
    readonly typeUrl: string,
    detail: string
  ) {
    super(RECONCILE_ERROR_CODES.TYPE_MISMATCH, 'pre-mutation', `Invalid ${typeUrl}: ${detail}`)
    this.name = 'TypeMismatchError'
  }
}

export class DuplicateNameError extends ReconcileError {
  constructor(
    readonly kind: ResourceKind,
    readonly resourceName: string
  ) {
    super(
      RECONCILE_ERROR_CODES.DUPLICATE_NAME,
      'pre-mutation',
      `Duplicate ${kind} name "${resourceName}"`
    )
    this.name = 'DuplicateNameError'
  }
}

export class MissingNameError extends ReconcileError {
  constructor(readonly kind: ResourceKind) {
    super(RECONCILE_ERROR_CODES.MISSING_NAME, 'pre-mutation', `${kind} name not provided`)
    this.name = 'MissingNameError'
  }
}

export class UnsupportedTypeError extends ReconcileError {
  constructor(readonly typeUrl: string) {
    super(RECONCILE_ERROR_CODES.UNSUPPORTED_TYPE, 'pre-mutation', `Unsupported type: ${typeUrl}`)
    this.name = 'UnsupportedTypeError'
  }
}

export class PortAllocationError extends ReconcileError {
  constructor(
    readonly listenerName: string,
    reason: string
  ) {
    super(
      RECONCILE_ERROR_CODES.PORT_ALLOCATION_FAILURE,
      'pre-mutation',
      `Listener port allocation for "${listenerName}" failed: ${reason}`
    )
    this.name = 'PortAllocationError'
  }
}

/** Raised by a resource validator; carries the offending resource for diagnosis. */
export class ValidationError extends ReconcileError {
  constructor(
    readonly kind: ResourceKind,
    readonly resourceName: string,
    readonly resource: unknown,
    reason: string
  ) {
    super(
      RECONCILE_ERROR_CODES.VALIDATION_FAILURE,
      'pre-mutation',
      `Could not validate ${kind} "${resourceName}": ${reason}`
    )
    this.name = 'ValidationError'
  }
}

/** The data plane declined a pushed resource. */
export class PushRejectedError extends ReconcileError {
  constructor(
    readonly kind: ResourceKind,
    readonly resourceName: string,
    detail: string,
    options?: ErrorOptions
  ) {
    super(
      RECONCILE_ERROR_CODES.PUSH_REJECTED,
      'barrier',
      `${kind} "${resourceName}" rejected: ${detail}`,
      options
    )
    this.name = 'PushRejectedError'
  }
}

export class PushTimeoutError extends ReconcileError {
  constructor(readonly timeoutMs: number) {
    super(
      RECONCILE_ERROR_CODES.PUSH_TIMEOUT,
      'barrier',
      `No acknowledgment within ${timeoutMs}ms`
    )
    this.name = 'PushTimeoutError'
  }
}

export class CancelledError extends ReconcileError {
  constructor(reason = 'Operation cancelled') {
    super(RECONCILE_ERROR_CODES.CANCELLED, 'barrier', reason)
    this.name = 'CancelledError'
  }
}

export function isReconcileError(err: unknown): err is ReconcileError {
  return err instanceof ReconcileError
}
