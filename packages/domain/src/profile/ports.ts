// ---------------------------------------------------------------------------
// Profile collaborator contracts
// ---------------------------------------------------------------------------

import type { CabId, ShiftId, ShiftStaticAttributes } from '../shared/types'
import type { CalendarDate } from '../shared/calendar-date'
import type { AttributeTypeId, CurrentAttributeValue } from '../attribute/index'
import type {
  AssignmentId,
  ProfileAttributeRequirement,
  ProfileId,
  ShiftProfile,
  ShiftProfileAssignment,
} from './index'

/** A shift as the profile engine sees it. */
export interface ShiftRecord extends ShiftStaticAttributes {
  readonly id: ShiftId
  readonly cabId: CabId
  /** Cached from the open assignment; the assignment table wins on disagreement. */
  readonly currentProfileId: ProfileId | null
}

export type NewShiftProfile = Omit<
  ShiftProfile,
  'id' | 'usageCount' | 'requirements' | 'createdAt' | 'updatedAt'
> & { readonly requirements: readonly ProfileAttributeRequirement[] }

export type ShiftProfilePatch = Partial<
  Omit<ShiftProfile, 'id' | 'usageCount' | 'requirements' | 'isSystemProfile' | 'createdAt' | 'updatedAt' | 'createdBy'>
>

export type NewShiftProfileAssignment = Omit<ShiftProfileAssignment, 'id' | 'endDate' | 'createdAt'>

export interface ProfileStore {
  findProfileById(id: ProfileId): Promise<ShiftProfile | null>
  findProfileByCode(code: string): Promise<ShiftProfile | null>
  listProfiles(): Promise<ShiftProfile[]>
  /**
   * Active profiles whose static filters are null or equal to the shift's.
   * Order is not significant.
   */
  findActiveProfilesMatchingStatic(shift: ShiftStaticAttributes): Promise<ShiftProfile[]>
  insertProfile(input: NewShiftProfile): Promise<ShiftProfile>
  updateProfile(id: ProfileId, patch: ShiftProfilePatch): Promise<ShiftProfile>
  deleteProfile(id: ProfileId): Promise<void>
  /** Adds `delta` to the counter, never taking it below zero. */
  adjustUsageCount(id: ProfileId, delta: number): Promise<void>

  attributeTypeExists(id: AttributeTypeId): Promise<boolean>
  insertRequirement(profileId: ProfileId, requirement: ProfileAttributeRequirement): Promise<void>
  deleteRequirement(profileId: ProfileId, attributeTypeId: AttributeTypeId): Promise<boolean>
  replaceRequirements(profileId: ProfileId, requirements: readonly ProfileAttributeRequirement[]): Promise<void>

  findShiftById(id: ShiftId): Promise<ShiftRecord | null>
  /** Same as `findShiftById`, holding the shift row until the transaction ends. */
  lockShift(id: ShiftId): Promise<ShiftRecord | null>
  setCurrentProfile(shiftId: ShiftId, profileId: ProfileId | null): Promise<void>
  findCurrentAttributeValues(shiftId: ShiftId, date: CalendarDate): Promise<CurrentAttributeValue[]>

  findOpenAssignment(shiftId: ShiftId): Promise<ShiftProfileAssignment | null>
  listAssignments(shiftId: ShiftId): Promise<ShiftProfileAssignment[]>
  /** True when any assignment, open or ended, references the profile. */
  profileHasAssignments(profileId: ProfileId): Promise<boolean>
  insertAssignment(input: NewShiftProfileAssignment): Promise<ShiftProfileAssignment>
  endAssignment(id: AssignmentId, endDate: CalendarDate): Promise<ShiftProfileAssignment>
}
