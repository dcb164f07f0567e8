// ---------------------------------------------------------------------------
// Error → HTTP response mapping shared by every handler.
// Body shape is always { error, code }.
// ---------------------------------------------------------------------------

import type { Context } from 'hono'
import { ZodError } from 'zod'
import { isDomainError, type DomainErrorCode } from '@cabdesk/domain'

const STATUS_BY_CODE = {
  NOT_FOUND: 404,
  VALIDATION_ERROR: 422,
  CONFLICT: 409,
} as const satisfies Record<DomainErrorCode, number>

export function handleError(c: Context, error: unknown) {
  if (isDomainError(error)) {
    return c.json({ error: error.message, code: error.code }, STATUS_BY_CODE[error.code])
  }
  // Path and query parameters are parsed inside the handler body.
  if (error instanceof ZodError) {
    return c.json({ error: error.message, code: 'VALIDATION_ERROR' }, 400)
  }
  console.error(`[api] ${c.req.method} ${c.req.path} failed`, error)
  return c.json({ error: 'Internal server error', code: 'INTERNAL_ERROR' }, 500)
}
