// ---------------------------------------------------------------------------
// Profile bounded context
// Classifies shifts into reusable bundles of static and dynamic criteria
// used for billing and reporting.
// ---------------------------------------------------------------------------

import type {
  Brand,
  CabCategory,
  ShareCategory,
  ShiftId,
  ShiftStaticAttributes,
  ShiftType,
} from '../shared/types'
import type { CalendarDate } from '../shared/calendar-date'
import type { AttributeTypeId } from '../attribute/index'

// ---------------------------------------------------------------------------
// Branded ID types
// ---------------------------------------------------------------------------

/** Uniquely identifies a ShiftProfile aggregate. */
export type ProfileId = Brand<string, 'ProfileId'>

/** Uniquely identifies a ShiftProfileAssignment audit record. */
export type AssignmentId = Brand<string, 'AssignmentId'>

export const toProfileId = (raw: string): ProfileId => raw as ProfileId
export const toAssignmentId = (raw: string): AssignmentId => raw as AssignmentId

// ---------------------------------------------------------------------------
// Aggregates
// ---------------------------------------------------------------------------

/**
 * One dynamic-attribute rule of a profile.
 *
 * - `isRequired: true`  → the shift must carry the attribute
 * - `isRequired: false` → the shift must not carry it
 * - `expectedValue`     → when set, a required attribute must equal it
 *
 * @invariant At most one requirement per (profile, attribute type).
 */
export interface ProfileAttributeRequirement {
  readonly attributeTypeId: AttributeTypeId
  readonly isRequired: boolean
  readonly expectedValue: string | null
}

/** The four static filters of a profile; null matches any value. */
export interface ProfileStaticFilters {
  readonly cabCategory: CabCategory | null
  readonly shareCategory: ShareCategory | null
  readonly hasAirportLicense: boolean | null
  readonly shiftType: ShiftType | null
}

/**
 * The ShiftProfile aggregate root.
 *
 * System profiles are permanent: editable, never deletable.
 *
 * @invariant `code` is unique.
 * @invariant `usageCount` ≥ 0 and equals the number of open assignments.
 */
export interface ShiftProfile extends ProfileStaticFilters {
  readonly id: ProfileId
  readonly code: string
  readonly name: string
  readonly description: string | null
  readonly category: string | null
  readonly colorCode: string | null
  readonly displayOrder: number
  readonly isActive: boolean
  readonly isSystemProfile: boolean
  readonly usageCount: number
  readonly requirements: readonly ProfileAttributeRequirement[]
  readonly createdBy: string | null
  readonly updatedBy: string | null
  readonly createdAt: Date
  readonly updatedAt: Date
}

/**
 * Audit record of which profile applied to a shift over time. Append-mostly:
 * only `endDate` is ever written after creation.
 *
 * @invariant At most one assignment per shift has `endDate === null`.
 */
export interface ShiftProfileAssignment {
  readonly id: AssignmentId
  readonly shiftId: ShiftId
  readonly profileId: ProfileId
  readonly startDate: CalendarDate
  readonly endDate: CalendarDate | null
  readonly reason: string | null
  readonly assignedBy: string | null
  readonly createdAt: Date
}

// ---------------------------------------------------------------------------
// Domain functions
// ---------------------------------------------------------------------------

/**
 * Returns true when every non-null static filter of the profile equals the
 * shift's value.
 */
export function matchesStatic(profile: ProfileStaticFilters, shift: ShiftStaticAttributes): boolean {
  if (profile.cabCategory !== null && profile.cabCategory !== shift.cabCategory) return false
  if (profile.shareCategory !== null && profile.shareCategory !== shift.shareCategory) return false
  if (profile.hasAirportLicense !== null && profile.hasAirportLicense !== shift.hasAirportLicense) return false
  if (profile.shiftType !== null && profile.shiftType !== shift.shiftType) return false
  return true
}

/**
 * Decides one dynamic requirement against the shift's value for that
 * attribute (`null` = the shift does not carry it).
 *
 * | isRequired | present | expectedValue | result              |
 * |------------|---------|---------------|---------------------|
 * | true       | no      | any           | false               |
 * | true       | yes     | unset         | true                |
 * | true       | yes     | set           | actual === expected |
 * | false      | no      | any           | true                |
 * | false      | yes     | any           | false               |
 */
export function satisfiesRequirement(
  requirement: Pick<ProfileAttributeRequirement, 'isRequired' | 'expectedValue'>,
  actualValue: string | null,
): boolean {
  if (actualValue === null) return !requirement.isRequired
  if (!requirement.isRequired) return false
  if (requirement.expectedValue !== null) return actualValue === requirement.expectedValue
  return true
}

/** Active profiles statically matching the shift, by display order then code. */
export function rankStaticMatches(
  profiles: readonly ShiftProfile[],
  shift: ShiftStaticAttributes,
): ShiftProfile[] {
  return profiles
    .filter((profile) => profile.isActive && matchesStatic(profile, shift))
    .sort((a, b) => a.displayOrder - b.displayOrder || (a.code < b.code ? -1 : a.code > b.code ? 1 : 0))
}

/**
 * Returns the reason the profile cannot be deleted, or null when it can.
 *
 * @rule System profiles and profiles with assigned shifts cannot be deleted.
 */
export function profileDeletionBlocker(profile: Pick<ShiftProfile, 'code' | 'isSystemProfile' | 'usageCount'>): string | null {
  if (profile.isSystemProfile) return `Cannot delete system profile: ${profile.code}`
  if (profile.usageCount > 0) return `Cannot delete profile in use by ${profile.usageCount} shifts`
  return null
}

/** Returns the assignment with a null end date, if any. */
export function findOpenAssignment(
  assignments: readonly ShiftProfileAssignment[],
): ShiftProfileAssignment | undefined {
  return assignments.find((assignment) => assignment.endDate === null)
}
