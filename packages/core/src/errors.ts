export type ErrorCode = 'VALIDATION_FAILED' | 'NOT_FOUND' | 'INVARIANT_VIOLATION' | 'STORAGE_UNAVAILABLE'

export interface ValidationIssue {
  path: string
  message: string
}

export class JfindError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

export class ValidationError extends JfindError {
  readonly issues: ValidationIssue[]

  constructor(message: string, issues: ValidationIssue[] = []) {
    super('VALIDATION_FAILED', message)
    this.issues = issues
  }
}

export class NotFoundError extends JfindError {
  constructor(message: string) {
    super('NOT_FOUND', message)
  }
}

// The single-current-snapshot-per-host rule was observed broken. Never a caller mistake.
export class ConflictError extends JfindError {
  readonly computerName: string

  constructor(computerName: string, message: string, options?: { cause?: unknown }) {
    super('INVARIANT_VIOLATION', message, options)
    this.computerName = computerName
  }
}

export class StorageUnavailableError extends JfindError {
  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super('STORAGE_UNAVAILABLE', `storage failure during ${operation}: ${reason}`, { cause })
  }
}
