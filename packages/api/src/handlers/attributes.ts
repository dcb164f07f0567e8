// ---------------------------------------------------------------------------
// Attributes handler: attribute type catalogue and ending a shift attribute
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import type { AppEnv } from '../types'
import { handleError } from '../lib/errors'
import { attributeValueId, calendarDate } from '../lib/validation'

const CreateAttributeTypeBody = z.object({
  code: z.string().min(1).max(50),
  name: z.string().min(1).max(200),
  description: z.string().max(1000).nullable().optional(),
})

const EndAttributeBody = z.object({ endDate: calendarDate })

export const attributeTypesHandler = new Hono<AppEnv>()

attributeTypesHandler.get('/', async (c) => {
  try {
    const data = await c.get('services').attributes.listAttributeTypes()
    return c.json({ data, meta: { count: data.length } })
  } catch (error) {
    return handleError(c, error)
  }
})

attributeTypesHandler.post(
  '/',
  validator('json', (value, c) => {
    const r = CreateAttributeTypeBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const data = await c.get('services').attributes.createAttributeType(c.req.valid('json'))
      return c.json({ data }, 201)
    } catch (error) {
      return handleError(c, error)
    }
  },
)

export const shiftAttributesHandler = new Hono<AppEnv>()

shiftAttributesHandler.post(
  '/:id/end',
  validator('json', (value, c) => {
    const r = EndAttributeBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const id = attributeValueId.parse(c.req.param('id'))
      const data = await c.get('services').attributes.endShiftAttribute(id, c.req.valid('json').endDate)
      return c.json({ data })
    } catch (error) {
      return handleError(c, error)
    }
  },
)
