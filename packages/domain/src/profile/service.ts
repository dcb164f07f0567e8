// ---------------------------------------------------------------------------
// Shift profile lifecycle and assignment
//
// Assignment write paths lock the shift first, so that concurrent assign/end
// calls on one shift serialize and leave exactly one open assignment, the
// usage counters and the shift's cached pointer in agreement.
// ---------------------------------------------------------------------------

import type {
  CabCategory,
  RunInTransaction,
  ShareCategory,
  ShiftId,
  ShiftType,
} from '../shared/types'
import { addDays, todayDate, type CalendarDate } from '../shared/calendar-date'
import { NotFoundError, ValidationError } from '../shared/errors'
import { silentLogger, type Logger } from '../shared/logger'
import { assertValidWindow } from '../temporal/index'
import type { AttributeTypeId } from '../attribute/index'
import {
  findOpenAssignment,
  matchesStatic,
  profileDeletionBlocker,
  type ProfileAttributeRequirement,
  type ProfileId,
  type ShiftProfile,
  type ShiftProfileAssignment,
} from './index'
import { createProfileMatcher, type ProfileMatcher } from './matcher'
import type { ProfileStore, ShiftProfilePatch, ShiftRecord } from './ports'

export interface RequirementInput {
  readonly attributeTypeId: AttributeTypeId
  readonly isRequired: boolean
  readonly expectedValue?: string | null
}

export interface CreateProfileInput {
  readonly code: string
  readonly name: string
  readonly description?: string | null
  readonly cabCategory?: CabCategory | null
  readonly shareCategory?: ShareCategory | null
  readonly hasAirportLicense?: boolean | null
  readonly shiftType?: ShiftType | null
  readonly category?: string | null
  readonly colorCode?: string | null
  readonly displayOrder?: number
  readonly isActive?: boolean
  readonly isSystemProfile?: boolean
  readonly requirements?: readonly RequirementInput[]
  readonly createdBy?: string | null
}

export interface UpdateProfileInput {
  readonly code?: string
  readonly name?: string
  readonly description?: string | null
  readonly cabCategory?: CabCategory | null
  readonly shareCategory?: ShareCategory | null
  readonly hasAirportLicense?: boolean | null
  readonly shiftType?: ShiftType | null
  readonly category?: string | null
  readonly colorCode?: string | null
  readonly displayOrder?: number
  /** Replaces every requirement when supplied. */
  readonly requirements?: readonly RequirementInput[]
  readonly updatedBy?: string | null
}

export interface AssignProfileInput {
  readonly shiftId: ShiftId
  readonly profileId: ProfileId
  /** Defaults to today. */
  readonly startDate?: CalendarDate
  readonly reason?: string | null
  readonly assignedBy?: string | null
}

export interface ReconcileResult {
  readonly shiftId: ShiftId
  readonly profileId: ProfileId | null
  readonly changed: boolean
}

export interface ProfileService {
  readonly matcher: ProfileMatcher
  createProfile(input: CreateProfileInput): Promise<ShiftProfile>
  updateProfile(id: ProfileId, input: UpdateProfileInput): Promise<ShiftProfile>
  deleteProfile(id: ProfileId): Promise<void>
  activateProfile(id: ProfileId): Promise<ShiftProfile>
  deactivateProfile(id: ProfileId): Promise<ShiftProfile>
  getProfile(id: ProfileId): Promise<ShiftProfile>
  listProfiles(): Promise<ShiftProfile[]>
  addRequirement(profileId: ProfileId, input: RequirementInput): Promise<ShiftProfile>
  removeRequirement(profileId: ProfileId, attributeTypeId: AttributeTypeId): Promise<ShiftProfile>
  assignProfileToShift(input: AssignProfileInput): Promise<ShiftProfileAssignment>
  endProfileAssignment(shiftId: ShiftId, endDate?: CalendarDate): Promise<ShiftProfileAssignment>
  getCurrentAssignment(shiftId: ShiftId): Promise<ShiftProfileAssignment | null>
  getAssignmentHistory(shiftId: ShiftId): Promise<ShiftProfileAssignment[]>
  suggestProfiles(shiftId: ShiftId): Promise<ShiftProfile[]>
  reconcileCurrentProfile(shiftId: ShiftId): Promise<ReconcileResult>
}

export interface ProfileServiceDeps {
  readonly store: ProfileStore
  readonly transaction: RunInTransaction<ProfileStore>
  readonly today?: () => CalendarDate
  readonly logger?: Logger
}

function normalizeCode(raw: string): string {
  const code = raw.trim().toUpperCase()
  if (code === '') throw new ValidationError('Profile code is required')
  return code
}

function normalizeName(raw: string): string {
  const name = raw.trim()
  if (name === '') throw new ValidationError('Profile name is required')
  return name
}

function byDisplayOrder(a: ShiftProfile, b: ShiftProfile): number {
  return a.displayOrder - b.displayOrder || (a.code < b.code ? -1 : a.code > b.code ? 1 : 0)
}

/** Newest first: start date, then creation time. */
function byStartDesc(a: ShiftProfileAssignment, b: ShiftProfileAssignment): number {
  if (a.startDate !== b.startDate) return a.startDate < b.startDate ? 1 : -1
  return b.createdAt.getTime() - a.createdAt.getTime()
}

async function validateRequirements(
  store: ProfileStore,
  inputs: readonly RequirementInput[],
): Promise<ProfileAttributeRequirement[]> {
  const requirements: ProfileAttributeRequirement[] = []
  for (const input of inputs) {
    if (requirements.some((existing) => existing.attributeTypeId === input.attributeTypeId)) {
      throw new ValidationError(`Attribute type listed twice: ${input.attributeTypeId}`)
    }
    if (!(await store.attributeTypeExists(input.attributeTypeId))) {
      throw new NotFoundError('Attribute type', input.attributeTypeId)
    }
    requirements.push({
      attributeTypeId: input.attributeTypeId,
      isRequired: input.isRequired,
      expectedValue: input.expectedValue ?? null,
    })
  }
  return requirements
}

export function createProfileService(deps: ProfileServiceDeps): ProfileService {
  const { store, transaction } = deps
  const today = deps.today ?? (() => todayDate())
  const logger = deps.logger ?? silentLogger
  const matcher = createProfileMatcher({ store, today })

  async function requireProfile(tx: ProfileStore, id: ProfileId): Promise<ShiftProfile> {
    const profile = await tx.findProfileById(id)
    if (!profile) throw new NotFoundError('Shift profile', id)
    return profile
  }

  async function requireShift(tx: ProfileStore, id: ShiftId, lock = false): Promise<ShiftRecord> {
    const shift = lock ? await tx.lockShift(id) : await tx.findShiftById(id)
    if (!shift) throw new NotFoundError('Shift', id)
    return shift
  }

  async function assertCodeFree(tx: ProfileStore, code: string, excludeId?: ProfileId): Promise<void> {
    const existing = await tx.findProfileByCode(code)
    if (existing && existing.id !== excludeId) {
      throw new ValidationError(`Profile code already exists: ${code}`)
    }
  }

  async function setActive(id: ProfileId, isActive: boolean): Promise<ShiftProfile> {
    return transaction(async (tx) => {
      const profile = await requireProfile(tx, id)
      if (profile.isActive === isActive) return profile
      const updated = await tx.updateProfile(id, { isActive })
      logger.info(isActive ? 'activated shift profile' : 'deactivated shift profile', { id, code: profile.code })
      return updated
    })
  }

  return {
    matcher,

    async createProfile(input) {
      const code = normalizeCode(input.code)
      const name = normalizeName(input.name)

      return transaction(async (tx) => {
        await assertCodeFree(tx, code)
        const requirements = await validateRequirements(tx, input.requirements ?? [])
        const created = await tx.insertProfile({
          code,
          name,
          description: input.description ?? null,
          cabCategory: input.cabCategory ?? null,
          shareCategory: input.shareCategory ?? null,
          hasAirportLicense: input.hasAirportLicense ?? null,
          shiftType: input.shiftType ?? null,
          category: input.category ?? null,
          colorCode: input.colorCode ?? null,
          displayOrder: input.displayOrder ?? 0,
          isActive: input.isActive ?? true,
          isSystemProfile: input.isSystemProfile ?? false,
          requirements,
          createdBy: input.createdBy ?? null,
          updatedBy: input.createdBy ?? null,
        })
        logger.info('created shift profile', { id: created.id, code })
        return created
      })
    },

    async updateProfile(id, input) {
      return transaction(async (tx) => {
        await requireProfile(tx, id)
        const patch: ShiftProfilePatch = {
          ...(input.code !== undefined ? { code: normalizeCode(input.code) } : {}),
          ...(input.name !== undefined ? { name: normalizeName(input.name) } : {}),
          ...(input.description !== undefined ? { description: input.description } : {}),
          ...(input.cabCategory !== undefined ? { cabCategory: input.cabCategory } : {}),
          ...(input.shareCategory !== undefined ? { shareCategory: input.shareCategory } : {}),
          ...(input.hasAirportLicense !== undefined ? { hasAirportLicense: input.hasAirportLicense } : {}),
          ...(input.shiftType !== undefined ? { shiftType: input.shiftType } : {}),
          ...(input.category !== undefined ? { category: input.category } : {}),
          ...(input.colorCode !== undefined ? { colorCode: input.colorCode } : {}),
          ...(input.displayOrder !== undefined ? { displayOrder: input.displayOrder } : {}),
          ...(input.updatedBy !== undefined ? { updatedBy: input.updatedBy } : {}),
        }
        if (patch.code !== undefined) await assertCodeFree(tx, patch.code, id)
        if (input.requirements !== undefined) {
          await tx.replaceRequirements(id, await validateRequirements(tx, input.requirements))
        }
        const updated = await tx.updateProfile(id, patch)
        logger.info('updated shift profile', { id, code: updated.code })
        return updated
      })
    },

    async deleteProfile(id) {
      await transaction(async (tx) => {
        const profile = await requireProfile(tx, id)
        const blocker = profileDeletionBlocker(profile)
        if (blocker !== null) throw new ValidationError(blocker)
        // Ended assignments are the shift's audit trail and keep their profile.
        if (await tx.profileHasAssignments(id)) {
          throw new ValidationError(`Cannot delete profile with assignment history: ${profile.code}. Deactivate it instead.`)
        }
        await tx.deleteProfile(id)
        logger.info('deleted shift profile', { id, code: profile.code })
      })
    },

    activateProfile: (id) => setActive(id, true),
    deactivateProfile: (id) => setActive(id, false),

    async getProfile(id) {
      return requireProfile(store, id)
    },

    async listProfiles() {
      return [...(await store.listProfiles())].sort(byDisplayOrder)
    },

    async addRequirement(profileId, input) {
      return transaction(async (tx) => {
        const profile = await requireProfile(tx, profileId)
        if (profile.requirements.some((existing) => existing.attributeTypeId === input.attributeTypeId)) {
          throw new ValidationError(
            `Profile ${profile.code} already has a requirement for attribute type ${input.attributeTypeId}`,
          )
        }
        const [requirement] = await validateRequirements(tx, [input])
        if (requirement) await tx.insertRequirement(profileId, requirement)
        return requireProfile(tx, profileId)
      })
    },

    async removeRequirement(profileId, attributeTypeId) {
      return transaction(async (tx) => {
        await requireProfile(tx, profileId)
        if (!(await tx.deleteRequirement(profileId, attributeTypeId))) {
          throw new NotFoundError('Profile requirement', `${profileId}/${attributeTypeId}`)
        }
        return requireProfile(tx, profileId)
      })
    },

    async assignProfileToShift(input) {
      const startDate = input.startDate ?? today()

      return transaction(async (tx) => {
        const shift = await requireShift(tx, input.shiftId, true)
        const profile = await requireProfile(tx, input.profileId)
        if (!profile.isActive) {
          throw new ValidationError(`Cannot assign inactive profile: ${profile.code}`)
        }
        // Dynamic attributes may be attached after assignment, so only the static criteria gate it.
        if (!matchesStatic(profile, shift)) {
          throw new ValidationError(`Shift ${shift.id} does not match the static criteria of profile ${profile.code}`)
        }

        const current = await tx.findOpenAssignment(shift.id)
        if (current) {
          if (startDate <= current.startDate) {
            throw new ValidationError(
              `New assignment must start after the current one (started ${current.startDate})`,
            )
          }
          await tx.endAssignment(current.id, addDays(startDate, -1))
          await tx.adjustUsageCount(current.profileId, -1)
        }

        const created = await tx.insertAssignment({
          shiftId: shift.id,
          profileId: profile.id,
          startDate,
          reason: input.reason ?? null,
          assignedBy: input.assignedBy ?? null,
        })
        await tx.adjustUsageCount(profile.id, 1)
        await tx.setCurrentProfile(shift.id, profile.id)
        logger.info('assigned shift profile', {
          shiftId: shift.id,
          profile: profile.code,
          startDate,
          previous: current?.profileId ?? null,
        })
        return created
      })
    },

    async endProfileAssignment(shiftId, endDate) {
      return transaction(async (tx) => {
        await requireShift(tx, shiftId, true)
        const current = await tx.findOpenAssignment(shiftId)
        if (!current) throw new NotFoundError('Active profile assignment for shift', shiftId)
        const closing = endDate ?? today()
        assertValidWindow({ startDate: current.startDate, endDate: closing }, 'Assignment')

        const ended = await tx.endAssignment(current.id, closing)
        await tx.adjustUsageCount(current.profileId, -1)
        await tx.setCurrentProfile(shiftId, null)
        logger.info('ended shift profile assignment', { shiftId, endDate: closing })
        return ended
      })
    },

    async getCurrentAssignment(shiftId) {
      await requireShift(store, shiftId)
      return store.findOpenAssignment(shiftId)
    },

    async getAssignmentHistory(shiftId) {
      await requireShift(store, shiftId)
      return [...(await store.listAssignments(shiftId))].sort(byStartDesc)
    },

    async suggestProfiles(shiftId) {
      const shift = await requireShift(store, shiftId)
      return matcher.findMatchingProfiles(shift.cabCategory, shift.shareCategory, shift.hasAirportLicense, shift.shiftType)
    },

    async reconcileCurrentProfile(shiftId) {
      return transaction(async (tx) => {
        const shift = await requireShift(tx, shiftId, true)
        const open = findOpenAssignment(await tx.listAssignments(shiftId))
        const profileId = open?.profileId ?? null
        const changed = shift.currentProfileId !== profileId
        if (changed) {
          await tx.setCurrentProfile(shiftId, profileId)
          logger.warn('repaired cached shift profile', { shiftId, was: shift.currentProfileId, now: profileId })
        }
        return { shiftId, profileId, changed }
      })
    },
  }
}
