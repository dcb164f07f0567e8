// ---------------------------------------------------------------------------
// Lease rate overrides handler: owner-defined custom rates and their lookup
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import type { AppEnv } from '../types'
import { handleError } from '../lib/errors'
import { cabId, calendarDate, dayOfWeek, driverId, overrideId, shiftType } from '../lib/validation'

const OverrideFields = z.object({
  cabId: cabId.nullable().optional(),
  shiftType: shiftType.nullable().optional(),
  leaseRate: z.number().nonnegative(),
  startDate: calendarDate.optional(),
  endDate: calendarDate.nullable().optional(),
  isActive: z.boolean().optional(),
  notes: z.string().max(1000).nullable().optional(),
  createdBy: z.string().min(1).nullable().optional(),
})

const CreateOverrideBody = OverrideFields.extend({
  ownerId: driverId,
  dayOfWeek: dayOfWeek.nullable().optional(),
})

const CreateBulkBody = OverrideFields.extend({
  ownerId: driverId,
  daysOfWeek: z.array(dayOfWeek).min(1),
})

const UpdateOverrideBody = z.object({
  cabId: cabId.nullable().optional(),
  shiftType: shiftType.nullable().optional(),
  dayOfWeek: dayOfWeek.nullable().optional(),
  leaseRate: z.number().nonnegative().optional(),
  startDate: calendarDate.optional(),
  endDate: calendarDate.nullable().optional(),
  isActive: z.boolean().optional(),
  notes: z.string().max(1000).nullable().optional(),
  updatedBy: z.string().min(1).nullable().optional(),
})

const EndOverrideBody = z.object({ endDate: calendarDate })

const LookupQuery = z.object({
  ownerId: driverId,
  cabId,
  shiftType,
  date: calendarDate,
})

const ActiveQuery = z.object({ date: calendarDate.optional() })

const ExpiringQuery = z.object({ days: z.coerce.number().int().min(0).max(365).default(7) })

export const leaseRateOverridesHandler = new Hono<AppEnv>()

leaseRateOverridesHandler.get('/', async (c) => {
  try {
    const data = await c.get('services').overrides.listOverrides()
    return c.json({ data, meta: { count: data.length } })
  } catch (error) {
    return handleError(c, error)
  }
})

leaseRateOverridesHandler.get('/owner/:ownerId', async (c) => {
  try {
    const ownerId = driverId.parse(c.req.param('ownerId'))
    const data = await c.get('services').overrides.listOverrides({ ownerId })
    return c.json({ data, meta: { count: data.length } })
  } catch (error) {
    return handleError(c, error)
  }
})

leaseRateOverridesHandler.get(
  '/active',
  validator('query', (value, c) => {
    const r = ActiveQuery.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const { date } = c.req.valid('query')
      const data = await c.get('services').overrides.listActiveOverrides(date)
      return c.json({ data, meta: { count: data.length } })
    } catch (error) {
      return handleError(c, error)
    }
  },
)

leaseRateOverridesHandler.get(
  '/expiring',
  validator('query', (value, c) => {
    const r = ExpiringQuery.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const { days } = c.req.valid('query')
      const data = await c.get('services').overrides.listExpiringSoon(days)
      return c.json({ data, meta: { count: data.length, days } })
    } catch (error) {
      return handleError(c, error)
    }
  },
)

leaseRateOverridesHandler.get(
  '/lookup',
  validator('query', (value, c) => {
    const r = LookupQuery.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const lookup = c.req.valid('query')
      const override = await c.get('services').leaseRates.resolveOverride(lookup)
      return c.json({ data: { leaseRate: override?.leaseRate ?? null, override } })
    } catch (error) {
      return handleError(c, error)
    }
  },
)

leaseRateOverridesHandler.get('/:id', async (c) => {
  try {
    const id = overrideId.parse(c.req.param('id'))
    const data = await c.get('services').overrides.getOverride(id)
    return c.json({ data })
  } catch (error) {
    return handleError(c, error)
  }
})

leaseRateOverridesHandler.post(
  '/',
  validator('json', (value, c) => {
    const r = CreateOverrideBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const data = await c.get('services').overrides.createOverride(c.req.valid('json'))
      return c.json({ data }, 201)
    } catch (error) {
      return handleError(c, error)
    }
  },
)

leaseRateOverridesHandler.post(
  '/bulk',
  validator('json', (value, c) => {
    const r = CreateBulkBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const result = await c.get('services').overrides.createBulkOverrides(c.req.valid('json'))
      const failed = result.failed.map(({ dayOfWeek: day, error }) => ({
        dayOfWeek: day,
        error: error.message,
        code: error.code,
      }))
      return c.json({ data: { created: result.created, failed } }, result.created.length > 0 ? 201 : 422)
    } catch (error) {
      return handleError(c, error)
    }
  },
)

leaseRateOverridesHandler.put(
  '/:id',
  validator('json', (value, c) => {
    const r = UpdateOverrideBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const id = overrideId.parse(c.req.param('id'))
      const data = await c.get('services').overrides.updateOverride(id, c.req.valid('json'))
      return c.json({ data })
    } catch (error) {
      return handleError(c, error)
    }
  },
)

leaseRateOverridesHandler.post(
  '/:id/end',
  validator('json', (value, c) => {
    const r = EndOverrideBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const id = overrideId.parse(c.req.param('id'))
      const data = await c.get('services').overrides.endDateOverride(id, c.req.valid('json').endDate)
      return c.json({ data })
    } catch (error) {
      return handleError(c, error)
    }
  },
)

leaseRateOverridesHandler.post('/:id/activate', async (c) => {
  try {
    const id = overrideId.parse(c.req.param('id'))
    const data = await c.get('services').overrides.activateOverride(id)
    return c.json({ data })
  } catch (error) {
    return handleError(c, error)
  }
})

leaseRateOverridesHandler.post('/:id/deactivate', async (c) => {
  try {
    const id = overrideId.parse(c.req.param('id'))
    const data = await c.get('services').overrides.deactivateOverride(id)
    return c.json({ data })
  } catch (error) {
    return handleError(c, error)
  }
})

leaseRateOverridesHandler.delete('/:id', async (c) => {
  try {
    const id = overrideId.parse(c.req.param('id'))
    await c.get('services').overrides.deleteOverride(id)
    return c.body(null, 204)
  } catch (error) {
    return handleError(c, error)
  }
})
