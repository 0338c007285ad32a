export type ReconcileErrorCode =
  | 'INVALID_IP'
  | 'INVALID_SCOPE'
  | 'INVALID_PORT'
  | 'TICKET_NOT_FOUND'
  | 'TICKET_CLOSED'
  | 'ALREADY_FALSE_POSITIVE'
  | 'INVALID_FALSE_POSITIVE'

export class ReconcileError extends Error {
  readonly code: ReconcileErrorCode

  constructor(code: ReconcileErrorCode, message: string) {
    super(message)
    this.name = 'ReconcileError'
    this.code = code
  }
}

export function isReconcileError(err: unknown): err is ReconcileError {
  return err instanceof ReconcileError
}
