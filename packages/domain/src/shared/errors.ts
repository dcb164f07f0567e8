// ---------------------------------------------------------------------------
// Domain error taxonomy
//
// Every failure the engine reports is one of these three. Callers translate
// `code` into their own presentation (the api maps it to an HTTP status).
// ---------------------------------------------------------------------------

export type DomainErrorCode = 'NOT_FOUND' | 'VALIDATION_ERROR' | 'CONFLICT'

export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode

  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** A referenced owner, cab, profile, attribute type, shift or record does not exist. */
export class NotFoundError extends DomainError {
  readonly code = 'NOT_FOUND' as const
  readonly entity: string
  readonly id: string

  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`)
    this.entity = entity
    this.id = id
  }
}

/** Malformed input or a rule the record would break (end before start, in-use profile, …). */
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR' as const
}

/** The record's date range overlaps another record that holds the same key. */
export class ConflictError extends DomainError {
  readonly code = 'CONFLICT' as const
  readonly conflictingId: string | undefined

  constructor(message: string, conflictingId?: string) {
    super(message)
    this.conflictingId = conflictingId
  }
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError
}
