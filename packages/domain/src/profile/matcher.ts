// ---------------------------------------------------------------------------
// Profile matcher
//
//   findMatchingProfiles: static filters only, active profiles, display order.
//   matches:              static first, then every dynamic requirement
//                         against the shift's attributes on the date.
// ---------------------------------------------------------------------------

import type { CabCategory, ShareCategory, ShiftId, ShiftType } from '../shared/types'
import { todayDate, type CalendarDate } from '../shared/calendar-date'
import { NotFoundError } from '../shared/errors'
import { attributeValueMap } from '../attribute/index'
import {
  matchesStatic,
  rankStaticMatches,
  satisfiesRequirement,
  type ProfileAttributeRequirement,
  type ProfileId,
  type ShiftProfile,
} from './index'
import type { ProfileStore } from './ports'

export interface ProfileMatchResult {
  readonly shiftId: ShiftId
  readonly profileId: ProfileId
  readonly date: CalendarDate
  readonly staticMatch: boolean
  /** Requirements the shift fails; empty when the static check already failed. */
  readonly unsatisfied: readonly ProfileAttributeRequirement[]
  readonly matches: boolean
}

export interface ProfileMatcher {
  findMatchingProfiles(
    cabCategory: CabCategory,
    shareCategory: ShareCategory,
    hasAirportLicense: boolean,
    shiftType: ShiftType,
  ): Promise<ShiftProfile[]>
  matches(shiftId: ShiftId, profileId: ProfileId, date?: CalendarDate): Promise<boolean>
  evaluate(shiftId: ShiftId, profileId: ProfileId, date?: CalendarDate): Promise<ProfileMatchResult>
}

export interface ProfileMatcherDeps {
  readonly store: Pick<
    ProfileStore,
    'findActiveProfilesMatchingStatic' | 'findProfileById' | 'findShiftById' | 'findCurrentAttributeValues'
  >
  readonly today?: () => CalendarDate
}

export function createProfileMatcher(deps: ProfileMatcherDeps): ProfileMatcher {
  const { store } = deps
  const today = deps.today ?? (() => todayDate())

  async function evaluate(shiftId: ShiftId, profileId: ProfileId, date?: CalendarDate): Promise<ProfileMatchResult> {
    const onDate = date ?? today()
    const shift = await store.findShiftById(shiftId)
    if (!shift) throw new NotFoundError('Shift', shiftId)
    const profile = await store.findProfileById(profileId)
    if (!profile) throw new NotFoundError('Shift profile', profileId)

    if (!matchesStatic(profile, shift)) {
      return { shiftId, profileId, date: onDate, staticMatch: false, unsatisfied: [], matches: false }
    }
    if (profile.requirements.length === 0) {
      return { shiftId, profileId, date: onDate, staticMatch: true, unsatisfied: [], matches: true }
    }

    const values = attributeValueMap(await store.findCurrentAttributeValues(shiftId, onDate))
    const unsatisfied = profile.requirements.filter(
      (requirement) => !satisfiesRequirement(requirement, values.get(requirement.attributeTypeId) ?? null),
    )
    return {
      shiftId,
      profileId,
      date: onDate,
      staticMatch: true,
      unsatisfied,
      matches: unsatisfied.length === 0,
    }
  }

  return {
    async findMatchingProfiles(cabCategory, shareCategory, hasAirportLicense, shiftType) {
      const shift = { cabCategory, shareCategory, hasAirportLicense, shiftType }
      const candidates = await store.findActiveProfilesMatchingStatic(shift)
      // Stores narrow the candidates; matching and ordering are decided here.
      return rankStaticMatches(candidates, shift)
    },

    async matches(shiftId, profileId, date) {
      return (await evaluate(shiftId, profileId, date)).matches
    },

    evaluate,
  }
}
