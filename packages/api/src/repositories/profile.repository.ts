import { and, asc, desc, eq, inArray, isNull, or, sql } from 'drizzle-orm'
import type {
  AssignmentId,
  AttributeTypeId,
  CalendarDate,
  CurrentAttributeValue,
  NewShiftProfile,
  NewShiftProfileAssignment,
  ProfileAttributeRequirement,
  ProfileId,
  ProfileStore,
  ShiftId,
  ShiftProfile,
  ShiftProfileAssignment,
  ShiftProfilePatch,
  ShiftRecord,
  ShiftStaticAttributes,
} from '@cabdesk/domain'
import {
  toAssignmentId,
  toAttributeTypeId,
  toCabId,
  toCalendarDate,
  toProfileId,
  toShiftId,
} from '@cabdesk/domain'
import type { Executor } from '../db'
import {
  attributeTypes,
  cabShifts,
  profileAttributeRequirements,
  shiftProfileAssignments,
  shiftProfiles,
  type CabShiftRow,
  type ShiftProfileAssignmentRow,
  type ShiftProfileRow,
} from '../db/schema'
import { findCurrentAttributeValues } from './attribute.repository'

type RequirementRow = typeof profileAttributeRequirements.$inferSelect

// ---------------------------------------------------------------------------
// Mappers
// ---------------------------------------------------------------------------

function mapRequirement(row: RequirementRow): ProfileAttributeRequirement {
  return {
    attributeTypeId: toAttributeTypeId(row.attributeTypeId),
    isRequired: row.isRequired,
    expectedValue: row.expectedValue,
  }
}

function mapProfile(row: ShiftProfileRow, requirements: readonly RequirementRow[]): ShiftProfile {
  return {
    id: toProfileId(row.id),
    code: row.code,
    name: row.name,
    description: row.description,
    cabCategory: row.cabCategory,
    shareCategory: row.shareCategory,
    hasAirportLicense: row.hasAirportLicense,
    shiftType: row.shiftType,
    category: row.category,
    colorCode: row.colorCode,
    displayOrder: row.displayOrder,
    isActive: row.isActive,
    isSystemProfile: row.isSystemProfile,
    usageCount: row.usageCount,
    requirements: requirements.map(mapRequirement),
    createdBy: row.createdBy,
    updatedBy: row.updatedBy,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  }
}

function mapShift(row: CabShiftRow): ShiftRecord {
  return {
    id: toShiftId(row.id),
    cabId: toCabId(row.cabId),
    shiftType: row.shiftType,
    cabCategory: row.cabCategory,
    shareCategory: row.shareCategory,
    hasAirportLicense: row.hasAirportLicense,
    currentProfileId: row.currentProfileId != null ? toProfileId(row.currentProfileId) : null,
  }
}

function mapAssignment(row: ShiftProfileAssignmentRow): ShiftProfileAssignment {
  return {
    id: toAssignmentId(row.id),
    shiftId: toShiftId(row.shiftId),
    profileId: toProfileId(row.profileId),
    startDate: toCalendarDate(row.startDate),
    endDate: row.endDate != null ? toCalendarDate(row.endDate) : null,
    reason: row.reason,
    assignedBy: row.assignedBy,
    createdAt: row.createdAt,
  }
}

// ---------------------------------------------------------------------------
// Profiles
// ---------------------------------------------------------------------------

async function hydrateProfiles(db: Executor, rows: readonly ShiftProfileRow[]): Promise<ShiftProfile[]> {
  if (rows.length === 0) return []
  const requirementRows = await db
    .select()
    .from(profileAttributeRequirements)
    .where(
      inArray(
        profileAttributeRequirements.profileId,
        rows.map((row) => row.id),
      ),
    )
  const byProfile = new Map<string, RequirementRow[]>()
  for (const requirement of requirementRows) {
    const list = byProfile.get(requirement.profileId) ?? []
    list.push(requirement)
    byProfile.set(requirement.profileId, list)
  }
  return rows.map((row) => mapProfile(row, byProfile.get(row.id) ?? []))
}

export async function findProfileById(db: Executor, tenantId: string, id: ProfileId): Promise<ShiftProfile | null> {
  const rows = await db
    .select()
    .from(shiftProfiles)
    .where(and(eq(shiftProfiles.tenantId, tenantId), eq(shiftProfiles.id, id)))
    .limit(1)
  const [profile] = await hydrateProfiles(db, rows)
  return profile ?? null
}

export async function findProfileByCode(db: Executor, tenantId: string, code: string): Promise<ShiftProfile | null> {
  const rows = await db
    .select()
    .from(shiftProfiles)
    .where(and(eq(shiftProfiles.tenantId, tenantId), eq(shiftProfiles.code, code)))
    .limit(1)
  const [profile] = await hydrateProfiles(db, rows)
  return profile ?? null
}

export async function listProfiles(db: Executor, tenantId: string): Promise<ShiftProfile[]> {
  const rows = await db
    .select()
    .from(shiftProfiles)
    .where(eq(shiftProfiles.tenantId, tenantId))
    .orderBy(asc(shiftProfiles.displayOrder), asc(shiftProfiles.code))
  return hydrateProfiles(db, rows)
}

export async function findActiveProfilesMatchingStatic(
  db: Executor,
  tenantId: string,
  shift: ShiftStaticAttributes,
): Promise<ShiftProfile[]> {
  const rows = await db
    .select()
    .from(shiftProfiles)
    .where(
      and(
        eq(shiftProfiles.tenantId, tenantId),
        eq(shiftProfiles.isActive, true),
        or(isNull(shiftProfiles.cabCategory), eq(shiftProfiles.cabCategory, shift.cabCategory)),
        or(isNull(shiftProfiles.shareCategory), eq(shiftProfiles.shareCategory, shift.shareCategory)),
        or(isNull(shiftProfiles.hasAirportLicense), eq(shiftProfiles.hasAirportLicense, shift.hasAirportLicense)),
        or(isNull(shiftProfiles.shiftType), eq(shiftProfiles.shiftType, shift.shiftType)),
      ),
    )
  return hydrateProfiles(db, rows)
}

export async function insertProfile(db: Executor, tenantId: string, input: NewShiftProfile): Promise<ShiftProfile> {
  const { requirements, ...fields } = input
  const [row] = await db
    .insert(shiftProfiles)
    .values({ tenantId, ...fields })
    .returning()
  if (!row) throw new Error('Insert into shift_profiles returned no row')
  const id = toProfileId(row.id)
  await replaceRequirements(db, tenantId, id, requirements)
  return requireProfile(db, tenantId, id)
}

async function requireProfile(db: Executor, tenantId: string, id: ProfileId): Promise<ShiftProfile> {
  const profile = await findProfileById(db, tenantId, id)
  if (!profile) throw new Error(`Shift profile ${id} disappeared during update`)
  return profile
}

export async function updateProfile(
  db: Executor,
  tenantId: string,
  id: ProfileId,
  patch: ShiftProfilePatch,
): Promise<ShiftProfile> {
  await db
    .update(shiftProfiles)
    .set({ ...patch, updatedAt: new Date() })
    .where(and(eq(shiftProfiles.tenantId, tenantId), eq(shiftProfiles.id, id)))
  return requireProfile(db, tenantId, id)
}

export async function deleteProfile(db: Executor, tenantId: string, id: ProfileId): Promise<void> {
  await db.delete(shiftProfiles).where(and(eq(shiftProfiles.tenantId, tenantId), eq(shiftProfiles.id, id)))
}

export async function adjustUsageCount(db: Executor, tenantId: string, id: ProfileId, delta: number): Promise<void> {
  await db
    .update(shiftProfiles)
    .set({ usageCount: sql`GREATEST(${shiftProfiles.usageCount} + ${delta}, 0)` })
    .where(and(eq(shiftProfiles.tenantId, tenantId), eq(shiftProfiles.id, id)))
}

// ---------------------------------------------------------------------------
// Requirements
// ---------------------------------------------------------------------------

export async function attributeTypeExists(db: Executor, tenantId: string, id: AttributeTypeId): Promise<boolean> {
  const [row] = await db
    .select({ id: attributeTypes.id })
    .from(attributeTypes)
    .where(and(eq(attributeTypes.tenantId, tenantId), eq(attributeTypes.id, id)))
    .limit(1)
  return row !== undefined
}

/** Requirement rows carry no tenant column; every write first proves the profile is the tenant's. */
async function assertOwnedProfile(db: Executor, tenantId: string, profileId: ProfileId): Promise<void> {
  const [row] = await db
    .select({ id: shiftProfiles.id })
    .from(shiftProfiles)
    .where(and(eq(shiftProfiles.tenantId, tenantId), eq(shiftProfiles.id, profileId)))
    .limit(1)
  if (!row) throw new Error(`Shift profile ${profileId} does not belong to tenant ${tenantId}`)
}

export async function insertRequirement(
  db: Executor,
  tenantId: string,
  profileId: ProfileId,
  requirement: ProfileAttributeRequirement,
): Promise<void> {
  await assertOwnedProfile(db, tenantId, profileId)
  await db.insert(profileAttributeRequirements).values({ profileId, ...requirement })
}

export async function deleteRequirement(
  db: Executor,
  tenantId: string,
  profileId: ProfileId,
  attributeTypeId: AttributeTypeId,
): Promise<boolean> {
  await assertOwnedProfile(db, tenantId, profileId)
  const deleted = await db
    .delete(profileAttributeRequirements)
    .where(
      and(
        eq(profileAttributeRequirements.profileId, profileId),
        eq(profileAttributeRequirements.attributeTypeId, attributeTypeId),
      ),
    )
    .returning({ id: profileAttributeRequirements.id })
  return deleted.length > 0
}

export async function replaceRequirements(
  db: Executor,
  tenantId: string,
  profileId: ProfileId,
  requirements: readonly ProfileAttributeRequirement[],
): Promise<void> {
  await assertOwnedProfile(db, tenantId, profileId)
  await db.delete(profileAttributeRequirements).where(eq(profileAttributeRequirements.profileId, profileId))
  if (requirements.length > 0) {
    await db
      .insert(profileAttributeRequirements)
      .values(requirements.map((requirement) => ({ profileId, ...requirement })))
  }
}

// ---------------------------------------------------------------------------
// Shifts
// ---------------------------------------------------------------------------

export async function findShiftById(db: Executor, tenantId: string, id: ShiftId): Promise<ShiftRecord | null> {
  const [row] = await db
    .select()
    .from(cabShifts)
    .where(and(eq(cabShifts.tenantId, tenantId), eq(cabShifts.id, id)))
    .limit(1)
  return row ? mapShift(row) : null
}

/** SELECT … FOR UPDATE: concurrent assignments to one shift queue behind the first. */
export async function lockShift(db: Executor, tenantId: string, id: ShiftId): Promise<ShiftRecord | null> {
  const [row] = await db
    .select()
    .from(cabShifts)
    .where(and(eq(cabShifts.tenantId, tenantId), eq(cabShifts.id, id)))
    .limit(1)
    .for('update')
  return row ? mapShift(row) : null
}

export async function setCurrentProfile(
  db: Executor,
  tenantId: string,
  shiftId: ShiftId,
  profileId: ProfileId | null,
): Promise<void> {
  await db
    .update(cabShifts)
    .set({ currentProfileId: profileId })
    .where(and(eq(cabShifts.tenantId, tenantId), eq(cabShifts.id, shiftId)))
}

// ---------------------------------------------------------------------------
// Assignments
// ---------------------------------------------------------------------------

export async function findOpenAssignment(
  db: Executor,
  tenantId: string,
  shiftId: ShiftId,
): Promise<ShiftProfileAssignment | null> {
  const [row] = await db
    .select()
    .from(shiftProfileAssignments)
    .where(
      and(
        eq(shiftProfileAssignments.tenantId, tenantId),
        eq(shiftProfileAssignments.shiftId, shiftId),
        isNull(shiftProfileAssignments.endDate),
      ),
    )
    .limit(1)
  return row ? mapAssignment(row) : null
}

export async function listAssignments(
  db: Executor,
  tenantId: string,
  shiftId: ShiftId,
): Promise<ShiftProfileAssignment[]> {
  const rows = await db
    .select()
    .from(shiftProfileAssignments)
    .where(and(eq(shiftProfileAssignments.tenantId, tenantId), eq(shiftProfileAssignments.shiftId, shiftId)))
    .orderBy(desc(shiftProfileAssignments.startDate), desc(shiftProfileAssignments.createdAt))
  return rows.map(mapAssignment)
}

export async function profileHasAssignments(db: Executor, tenantId: string, profileId: ProfileId): Promise<boolean> {
  const [row] = await db
    .select({ id: shiftProfileAssignments.id })
    .from(shiftProfileAssignments)
    .where(and(eq(shiftProfileAssignments.tenantId, tenantId), eq(shiftProfileAssignments.profileId, profileId)))
    .limit(1)
  return row !== undefined
}

export async function insertAssignment(
  db: Executor,
  tenantId: string,
  input: NewShiftProfileAssignment,
): Promise<ShiftProfileAssignment> {
  const [row] = await db
    .insert(shiftProfileAssignments)
    .values({ tenantId, ...input })
    .returning()
  if (!row) throw new Error('Insert into shift_profile_assignments returned no row')
  return mapAssignment(row)
}

export async function endAssignment(
  db: Executor,
  tenantId: string,
  id: AssignmentId,
  endDate: CalendarDate,
): Promise<ShiftProfileAssignment> {
  const [row] = await db
    .update(shiftProfileAssignments)
    .set({ endDate })
    .where(and(eq(shiftProfileAssignments.tenantId, tenantId), eq(shiftProfileAssignments.id, id)))
    .returning()
  if (!row) throw new Error(`Profile assignment ${id} disappeared during update`)
  return mapAssignment(row)
}

// ---------------------------------------------------------------------------
// Port adapter
// ---------------------------------------------------------------------------

export function createProfileStore(db: Executor, tenantId: string): ProfileStore {
  return {
    findProfileById: (id) => findProfileById(db, tenantId, id),
    findProfileByCode: (code) => findProfileByCode(db, tenantId, code),
    listProfiles: () => listProfiles(db, tenantId),
    findActiveProfilesMatchingStatic: (shift) => findActiveProfilesMatchingStatic(db, tenantId, shift),
    insertProfile: (input) => insertProfile(db, tenantId, input),
    updateProfile: (id, patch) => updateProfile(db, tenantId, id, patch),
    deleteProfile: (id) => deleteProfile(db, tenantId, id),
    adjustUsageCount: (id, delta) => adjustUsageCount(db, tenantId, id, delta),
    attributeTypeExists: (id) => attributeTypeExists(db, tenantId, id),
    insertRequirement: (profileId, requirement) => insertRequirement(db, tenantId, profileId, requirement),
    deleteRequirement: (profileId, attributeTypeId) => deleteRequirement(db, tenantId, profileId, attributeTypeId),
    replaceRequirements: (profileId, requirements) => replaceRequirements(db, tenantId, profileId, requirements),
    findShiftById: (id) => findShiftById(db, tenantId, id),
    lockShift: (id) => lockShift(db, tenantId, id),
    setCurrentProfile: (shiftId, profileId) => setCurrentProfile(db, tenantId, shiftId, profileId),
    findCurrentAttributeValues: (shiftId, date): Promise<CurrentAttributeValue[]> =>
      findCurrentAttributeValues(db, tenantId, shiftId, date),
    findOpenAssignment: (shiftId) => findOpenAssignment(db, tenantId, shiftId),
    listAssignments: (shiftId) => listAssignments(db, tenantId, shiftId),
    profileHasAssignments: (profileId) => profileHasAssignments(db, tenantId, profileId),
    insertAssignment: (input) => insertAssignment(db, tenantId, input),
    endAssignment: (id, endDate) => endAssignment(db, tenantId, id, endDate),
  }
}
