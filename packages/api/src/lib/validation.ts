// ---------------------------------------------------------------------------
// Shared zod building blocks for request bodies, path and query parameters.
// ---------------------------------------------------------------------------

import { z } from 'zod'
import {
  CAB_CATEGORIES,
  DAYS_OF_WEEK,
  SHARE_CATEGORIES,
  SHIFT_TYPES,
  isCalendarDate,
  toAttributeTypeId,
  toAttributeValueId,
  toCabId,
  toDriverId,
  toOverrideId,
  toProfileId,
  toRatePlanId,
  toShiftId,
  type CabCategory,
  type DayOfWeek,
  type ShareCategory,
  type ShiftType,
} from '@cabdesk/domain'

export const calendarDate = z.string().refine(isCalendarDate, { message: 'Expected a yyyy-MM-dd date' })

export const shiftType = z.custom<ShiftType>(
  (value) => SHIFT_TYPES.some((entry) => entry === value),
  { message: `Expected one of ${SHIFT_TYPES.join(', ')}` },
)
export const dayOfWeek = z.custom<DayOfWeek>(
  (value) => DAYS_OF_WEEK.some((entry) => entry === value),
  { message: `Expected one of ${DAYS_OF_WEEK.join(', ')}` },
)
export const cabCategory = z.custom<CabCategory>(
  (value) => CAB_CATEGORIES.some((entry) => entry === value),
  { message: `Expected one of ${CAB_CATEGORIES.join(', ')}` },
)
export const shareCategory = z.custom<ShareCategory>(
  (value) => SHARE_CATEGORIES.some((entry) => entry === value),
  { message: `Expected one of ${SHARE_CATEGORIES.join(', ')}` },
)

// Ids are UUIDs in the database; anything else is rejected before a query runs.
const uuid = z.string().uuid()

export const driverId = uuid.transform(toDriverId)
export const cabId = uuid.transform(toCabId)
export const shiftId = uuid.transform(toShiftId)
export const overrideId = uuid.transform(toOverrideId)
export const ratePlanId = uuid.transform(toRatePlanId)
export const profileId = uuid.transform(toProfileId)
export const attributeTypeId = uuid.transform(toAttributeTypeId)
export const attributeValueId = uuid.transform(toAttributeValueId)

/** Query-string booleans arrive as text. */
export const queryBoolean = z.enum(['true', 'false']).transform((value) => value === 'true')
