// ---------------------------------------------------------------------------
// Lease rates handler: the rate a driver pays for one shift on one date
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import type { AppEnv } from '../types'
import { handleError } from '../lib/errors'
import { cabCategory, cabId, calendarDate, driverId, queryBoolean, shiftType } from '../lib/validation'

const ResolveQuery = z.object({
  ownerId: driverId,
  cabId,
  shiftType,
  date: calendarDate,
  cabCategory,
  hasAirportLicense: queryBoolean.default('false'),
  distance: z.coerce.number().nonnegative().optional(),
})

export const leaseRatesHandler = new Hono<AppEnv>()

leaseRatesHandler.get(
  '/resolve',
  validator('query', (value, c) => {
    const r = ResolveQuery.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const query = c.req.valid('query')
      const data = await c.get('services').leaseRates.resolveLeaseRate(query)
      if (!data) {
        return c.json({ error: 'No override or rate plan entry applies', code: 'NOT_FOUND' }, 404)
      }
      return c.json({ data })
    } catch (error) {
      return handleError(c, error)
    }
  },
)
