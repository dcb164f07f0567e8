// ---------------------------------------------------------------------------
// Rate plans handler: dated default rate cards and their append-only entries
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import type { AppEnv } from '../types'
import { todayDate } from '@cabdesk/domain'
import { handleError } from '../lib/errors'
import { cabCategory, calendarDate, dayOfWeek, ratePlanId, shiftType } from '../lib/validation'

const RateEntryBody = z.object({
  cabCategory,
  hasAirportLicense: z.boolean(),
  shiftType,
  dayOfWeek,
  baseRate: z.number().nonnegative(),
  distanceRate: z.number().nonnegative().default(0),
  notes: z.string().max(1000).nullable().default(null),
})

const CreatePlanBody = z.object({
  name: z.string().min(1).max(200),
  effectiveFrom: calendarDate,
  effectiveTo: calendarDate.nullable().optional(),
  notes: z.string().max(1000).nullable().optional(),
  entries: z.array(RateEntryBody).optional().default([]),
})

const ClosePlanBody = z.object({ endDate: calendarDate })

const AddEntriesBody = z.object({ entries: z.array(RateEntryBody).min(1) })

const DateQuery = z.object({ date: calendarDate.optional() })

export const ratePlansHandler = new Hono<AppEnv>()

ratePlansHandler.get('/', async (c) => {
  try {
    const data = await c.get('services').ratePlans.listPlans()
    return c.json({ data, meta: { count: data.length } })
  } catch (error) {
    return handleError(c, error)
  }
})

ratePlansHandler.get(
  '/active',
  validator('query', (value, c) => {
    const r = DateQuery.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const { date } = c.req.valid('query')
      const data = await c.get('services').ratePlans.findPlanActiveOn(date ?? todayDate())
      if (!data) return c.json({ error: 'No rate plan is active on that date', code: 'NOT_FOUND' }, 404)
      return c.json({ data })
    } catch (error) {
      return handleError(c, error)
    }
  },
)

ratePlansHandler.post(
  '/deactivate-expired',
  validator('query', (value, c) => {
    const r = DateQuery.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const deactivated = await c.get('services').ratePlans.deactivateExpiredPlans(c.req.valid('query').date)
      return c.json({ data: { deactivated } })
    } catch (error) {
      return handleError(c, error)
    }
  },
)

ratePlansHandler.get('/:id', async (c) => {
  try {
    const id = ratePlanId.parse(c.req.param('id'))
    const data = await c.get('services').ratePlans.getPlan(id)
    return c.json({ data })
  } catch (error) {
    return handleError(c, error)
  }
})

ratePlansHandler.post(
  '/',
  validator('json', (value, c) => {
    const r = CreatePlanBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const data = await c.get('services').ratePlans.createPlan(c.req.valid('json'))
      return c.json({ data }, 201)
    } catch (error) {
      return handleError(c, error)
    }
  },
)

ratePlansHandler.post(
  '/:id/close',
  validator('json', (value, c) => {
    const r = ClosePlanBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const id = ratePlanId.parse(c.req.param('id'))
      const data = await c.get('services').ratePlans.closePlan(id, c.req.valid('json').endDate)
      return c.json({ data })
    } catch (error) {
      return handleError(c, error)
    }
  },
)

ratePlansHandler.post(
  '/:id/entries',
  validator('json', (value, c) => {
    const r = AddEntriesBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const id = ratePlanId.parse(c.req.param('id'))
      const data = await c.get('services').ratePlans.addEntries(id, c.req.valid('json').entries)
      return c.json({ data }, 201)
    } catch (error) {
      return handleError(c, error)
    }
  },
)
