// ---------------------------------------------------------------------------
// Shifts handler: a shift's profile assignment and its dynamic attributes
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import type { AppEnv } from '../types'
import { handleError } from '../lib/errors'
import { attributeTypeId, calendarDate, profileId, shiftId } from '../lib/validation'

const AssignProfileBody = z.object({
  profileId,
  startDate: calendarDate.optional(),
  reason: z.string().max(500).nullable().optional(),
  assignedBy: z.string().min(1).nullable().optional(),
})

const EndAssignmentBody = z.object({ endDate: calendarDate.optional() })

const AssignAttributeBody = z.object({
  attributeTypeId,
  value: z.string().max(500).nullable().optional(),
  startDate: calendarDate.optional(),
  endDate: calendarDate.nullable().optional(),
  notes: z.string().max(1000).nullable().optional(),
})

const DateQuery = z.object({ date: calendarDate.optional() })

export const shiftsHandler = new Hono<AppEnv>()

shiftsHandler.get('/:shiftId/profile', async (c) => {
  try {
    const id = shiftId.parse(c.req.param('shiftId'))
    const data = await c.get('services').profiles.getCurrentAssignment(id)
    return c.json({ data })
  } catch (error) {
    return handleError(c, error)
  }
})

shiftsHandler.post(
  '/:shiftId/profile',
  validator('json', (value, c) => {
    const r = AssignProfileBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const id = shiftId.parse(c.req.param('shiftId'))
      const data = await c.get('services').profiles.assignProfileToShift({ ...c.req.valid('json'), shiftId: id })
      return c.json({ data }, 201)
    } catch (error) {
      return handleError(c, error)
    }
  },
)

shiftsHandler.post(
  '/:shiftId/profile/end',
  validator('json', (value, c) => {
    const r = EndAssignmentBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const id = shiftId.parse(c.req.param('shiftId'))
      const data = await c.get('services').profiles.endProfileAssignment(id, c.req.valid('json').endDate)
      return c.json({ data })
    } catch (error) {
      return handleError(c, error)
    }
  },
)

shiftsHandler.post('/:shiftId/profile/reconcile', async (c) => {
  try {
    const id = shiftId.parse(c.req.param('shiftId'))
    const data = await c.get('services').profiles.reconcileCurrentProfile(id)
    return c.json({ data })
  } catch (error) {
    return handleError(c, error)
  }
})

shiftsHandler.get('/:shiftId/profile/history', async (c) => {
  try {
    const id = shiftId.parse(c.req.param('shiftId'))
    const data = await c.get('services').profiles.getAssignmentHistory(id)
    return c.json({ data, meta: { count: data.length } })
  } catch (error) {
    return handleError(c, error)
  }
})

shiftsHandler.get('/:shiftId/profile/suggestions', async (c) => {
  try {
    const id = shiftId.parse(c.req.param('shiftId'))
    const data = await c.get('services').profiles.suggestProfiles(id)
    return c.json({ data, meta: { count: data.length } })
  } catch (error) {
    return handleError(c, error)
  }
})

shiftsHandler.get(
  '/:shiftId/profile/matches/:profileId',
  validator('query', (value, c) => {
    const r = DateQuery.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const id = shiftId.parse(c.req.param('shiftId'))
      const profile = profileId.parse(c.req.param('profileId'))
      const data = await c.get('services').profiles.matcher.evaluate(id, profile, c.req.valid('query').date)
      return c.json({ data })
    } catch (error) {
      return handleError(c, error)
    }
  },
)

shiftsHandler.get(
  '/:shiftId/attributes',
  validator('query', (value, c) => {
    const r = DateQuery.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const id = shiftId.parse(c.req.param('shiftId'))
      const data = await c.get('services').attributes.findCurrentAttributeValues(id, c.req.valid('query').date)
      return c.json({ data, meta: { count: data.length } })
    } catch (error) {
      return handleError(c, error)
    }
  },
)

shiftsHandler.post(
  '/:shiftId/attributes',
  validator('json', (value, c) => {
    const r = AssignAttributeBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const id = shiftId.parse(c.req.param('shiftId'))
      const data = await c.get('services').attributes.assignShiftAttribute({ ...c.req.valid('json'), shiftId: id })
      return c.json({ data }, 201)
    } catch (error) {
      return handleError(c, error)
    }
  },
)
