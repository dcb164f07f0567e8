// ---------------------------------------------------------------------------
// Shift profiles handler: profile catalogue, requirements, static matching
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import type { AppEnv } from '../types'
import { handleError } from '../lib/errors'
import { attributeTypeId, cabCategory, profileId, shareCategory, shiftType } from '../lib/validation'

const RequirementBody = z.object({
  attributeTypeId,
  isRequired: z.boolean(),
  expectedValue: z.string().min(1).nullable().optional(),
})

const ProfileFields = {
  name: z.string().min(1).max(200),
  description: z.string().max(1000).nullable().optional(),
  cabCategory: cabCategory.nullable().optional(),
  shareCategory: shareCategory.nullable().optional(),
  hasAirportLicense: z.boolean().nullable().optional(),
  shiftType: shiftType.nullable().optional(),
  category: z.string().max(100).nullable().optional(),
  colorCode: z
    .string()
    .regex(/^#[0-9A-Fa-f]{6}$/, 'Expected a #RRGGBB colour')
    .nullable()
    .optional(),
  displayOrder: z.number().int().optional(),
  requirements: z.array(RequirementBody).optional(),
}

const CreateProfileBody = z.object({
  ...ProfileFields,
  code: z.string().min(1).max(50),
  isActive: z.boolean().optional(),
  createdBy: z.string().min(1).nullable().optional(),
})

const UpdateProfileBody = z.object({
  ...ProfileFields,
  name: ProfileFields.name.optional(),
  code: z.string().min(1).max(50).optional(),
  updatedBy: z.string().min(1).nullable().optional(),
})

const MatchBody = z.object({
  cabCategory,
  shareCategory,
  hasAirportLicense: z.boolean(),
  shiftType,
})

export const shiftProfilesHandler = new Hono<AppEnv>()

shiftProfilesHandler.get('/', async (c) => {
  try {
    const data = await c.get('services').profiles.listProfiles()
    return c.json({ data, meta: { count: data.length } })
  } catch (error) {
    return handleError(c, error)
  }
})

shiftProfilesHandler.post(
  '/match',
  validator('json', (value, c) => {
    const r = MatchBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const body = c.req.valid('json')
      const { matcher } = c.get('services').profiles
      const data = await matcher.findMatchingProfiles(
        body.cabCategory,
        body.shareCategory,
        body.hasAirportLicense,
        body.shiftType,
      )
      return c.json({ data, meta: { count: data.length } })
    } catch (error) {
      return handleError(c, error)
    }
  },
)

shiftProfilesHandler.get('/:id', async (c) => {
  try {
    const id = profileId.parse(c.req.param('id'))
    const data = await c.get('services').profiles.getProfile(id)
    return c.json({ data })
  } catch (error) {
    return handleError(c, error)
  }
})

shiftProfilesHandler.post(
  '/',
  validator('json', (value, c) => {
    const r = CreateProfileBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const data = await c.get('services').profiles.createProfile(c.req.valid('json'))
      return c.json({ data }, 201)
    } catch (error) {
      return handleError(c, error)
    }
  },
)

shiftProfilesHandler.put(
  '/:id',
  validator('json', (value, c) => {
    const r = UpdateProfileBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const id = profileId.parse(c.req.param('id'))
      const data = await c.get('services').profiles.updateProfile(id, c.req.valid('json'))
      return c.json({ data })
    } catch (error) {
      return handleError(c, error)
    }
  },
)

shiftProfilesHandler.delete('/:id', async (c) => {
  try {
    const id = profileId.parse(c.req.param('id'))
    await c.get('services').profiles.deleteProfile(id)
    return c.body(null, 204)
  } catch (error) {
    return handleError(c, error)
  }
})

shiftProfilesHandler.post('/:id/activate', async (c) => {
  try {
    const id = profileId.parse(c.req.param('id'))
    const data = await c.get('services').profiles.activateProfile(id)
    return c.json({ data })
  } catch (error) {
    return handleError(c, error)
  }
})

shiftProfilesHandler.post('/:id/deactivate', async (c) => {
  try {
    const id = profileId.parse(c.req.param('id'))
    const data = await c.get('services').profiles.deactivateProfile(id)
    return c.json({ data })
  } catch (error) {
    return handleError(c, error)
  }
})

shiftProfilesHandler.post(
  '/:id/requirements',
  validator('json', (value, c) => {
    const r = RequirementBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    try {
      const id = profileId.parse(c.req.param('id'))
      const data = await c.get('services').profiles.addRequirement(id, c.req.valid('json'))
      return c.json({ data }, 201)
    } catch (error) {
      return handleError(c, error)
    }
  },
)

shiftProfilesHandler.delete('/:id/requirements/:attributeTypeId', async (c) => {
  try {
    const id = profileId.parse(c.req.param('id'))
    const typeId = attributeTypeId.parse(c.req.param('attributeTypeId'))
    const data = await c.get('services').profiles.removeRequirement(id, typeId)
    return c.json({ data })
  } catch (error) {
    return handleError(c, error)
  }
})
