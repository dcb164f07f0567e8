// ---------------------------------------------------------------------------
// In-memory implementation of every store port.
//
// Transactions run one at a time and roll the whole state back when the
// work rejects, which is enough to exercise the services' atomicity rules
// without a database.
// ---------------------------------------------------------------------------

import type {
  CabId,
  DriverId,
  RunInTransaction,
  ShiftId,
  ShiftStaticAttributes,
} from '../shared/types'
import type { CalendarDate } from '../shared/calendar-date'
import { activeOn } from '../temporal/index'
import {
  planCoversDate,
  sameEntryKey,
  toOverrideId,
  toRateEntryId,
  toRatePlanId,
  type OverrideId,
  type RateEntry,
  type RateEntryKey,
  type RateOverride,
  type RatePlan,
  type RatePlanId,
} from '../lease/index'
import type {
  DriverRecord,
  LeaseStore,
  NewRateEntry,
  NewRateOverride,
  NewRatePlan,
  OverrideListFilter,
  OverrideMatchQuery,
  RateOverridePatch,
  RatePlanPatch,
} from '../lease/ports'
import {
  toAttributeTypeId,
  toAttributeValueId,
  type AttributeType,
  type AttributeTypeId,
  type AttributeValueId,
  type CurrentAttributeValue,
  type ShiftAttributeValue,
} from '../attribute/index'
import type { AttributeStore, NewAttributeType, NewShiftAttributeValue } from '../attribute/ports'
import {
  matchesStatic,
  toAssignmentId,
  toProfileId,
  type AssignmentId,
  type ProfileAttributeRequirement,
  type ProfileId,
  type ShiftProfile,
  type ShiftProfileAssignment,
} from '../profile/index'
import type {
  NewShiftProfile,
  NewShiftProfileAssignment,
  ProfileStore,
  ShiftProfilePatch,
  ShiftRecord,
} from '../profile/ports'

interface State {
  drivers: Map<string, DriverRecord>
  cabs: Set<string>
  shifts: Map<string, ShiftRecord>
  overrides: Map<string, RateOverride>
  plans: Map<string, RatePlan>
  attributeTypes: Map<string, AttributeType>
  attributeValues: Map<string, ShiftAttributeValue>
  profiles: Map<string, ShiftProfile>
  assignments: Map<string, ShiftProfileAssignment>
  sequence: number
}

function emptyState(): State {
  return {
    drivers: new Map(),
    cabs: new Set(),
    shifts: new Map(),
    overrides: new Map(),
    plans: new Map(),
    attributeTypes: new Map(),
    attributeValues: new Map(),
    profiles: new Map(),
    assignments: new Map(),
    sequence: 0,
  }
}

type RecordKind = 'override' | 'plan' | 'entry' | 'attr' | 'value' | 'profile' | 'assignment'

const KIND_PREFIX: Record<RecordKind, string> = {
  override: '00000001',
  plan: '00000002',
  entry: '00000003',
  attr: '00000004',
  value: '00000005',
  profile: '00000006',
  assignment: '00000007',
}

/** Clock start for generated timestamps; each record is one second newer than the last. */
const EPOCH = Date.UTC(2025, 0, 1)

export interface SeedShiftInput extends ShiftStaticAttributes {
  readonly id: ShiftId
  readonly cabId: CabId
}

export class InMemoryFleetStore implements LeaseStore, AttributeStore, ProfileStore {
  private state: State = emptyState()
  private queue: Promise<unknown> = Promise.resolve()

  /** Serialized, all-or-nothing unit of work over this store. */
  readonly transaction: RunInTransaction<InMemoryFleetStore> = <T>(
    work: (store: InMemoryFleetStore) => Promise<T>,
  ): Promise<T> => {
    const run = this.queue.then(async () => {
      const snapshot = structuredClone(this.state)
      try {
        return await work(this)
      } catch (error) {
        this.state = snapshot
        throw error
      }
    })
    this.queue = run.catch(() => undefined)
    return run
  }

  // -------------------------------------------------------------------------
  // Seeding
  // -------------------------------------------------------------------------

  addDriver(id: DriverId, isOwner = true): this {
    this.state.drivers.set(id, { id, isOwner })
    return this
  }

  addCab(id: CabId): this {
    this.state.cabs.add(id)
    return this
  }

  addShift(input: SeedShiftInput): this {
    this.state.cabs.add(input.cabId)
    this.state.shifts.set(input.id, { ...input, currentProfileId: null })
    return this
  }

  /** Sequential, UUID-shaped ids; the first group tells the record kind apart when debugging. */
  private nextId(kind: RecordKind): string {
    this.state.sequence += 1
    return `${KIND_PREFIX[kind]}-0000-4000-8000-${this.state.sequence.toString(16).padStart(12, '0')}`
  }

  private nextTimestamp(): Date {
    return new Date(EPOCH + this.state.sequence * 1000)
  }

  // -------------------------------------------------------------------------
  // Lease overrides
  // -------------------------------------------------------------------------

  async findDriverById(id: DriverId) {
    return this.state.drivers.get(id) ?? null
  }

  async cabExists(id: CabId) {
    return this.state.cabs.has(id)
  }

  async findOverrideById(id: OverrideId) {
    return this.state.overrides.get(id) ?? null
  }

  async findActiveOverridesMatching(query: OverrideMatchQuery) {
    return [...this.state.overrides.values()].filter(
      (override) =>
        override.ownerId === query.ownerId &&
        activeOn(override, query.onDate) &&
        (override.cabId === null || override.cabId === query.cabId) &&
        (override.shiftType === null || override.shiftType === query.shiftType) &&
        (override.dayOfWeek === null || override.dayOfWeek === query.dayOfWeek),
    )
  }

  async findOverridesForOwnerCab(ownerId: DriverId, cabId: CabId | null) {
    return [...this.state.overrides.values()].filter(
      (override) => override.ownerId === ownerId && override.cabId === cabId,
    )
  }

  async listOverrides(filter: OverrideListFilter = {}) {
    const { ownerId, activeOn: onDate, endingBetween } = filter
    return [...this.state.overrides.values()].filter((override) => {
      if (ownerId !== undefined && override.ownerId !== ownerId) return false
      if (onDate !== undefined && !activeOn(override, onDate)) return false
      if (endingBetween !== undefined) {
        if (!override.isActive || override.endDate === null) return false
        if (override.endDate < endingBetween.from || override.endDate > endingBetween.to) return false
      }
      return true
    })
  }

  async insertOverride(input: NewRateOverride) {
    const id = toOverrideId(this.nextId('override'))
    const now = this.nextTimestamp()
    const created: RateOverride = { ...input, id, createdAt: now, updatedAt: now }
    this.state.overrides.set(id, created)
    return created
  }

  async updateOverride(id: OverrideId, patch: RateOverridePatch) {
    const existing = this.state.overrides.get(id)
    if (!existing) throw new Error(`override ${id} vanished`)
    const updated: RateOverride = { ...existing, ...patch, updatedAt: this.nextTimestamp() }
    this.state.overrides.set(id, updated)
    return updated
  }

  async deleteOverride(id: OverrideId) {
    this.state.overrides.delete(id)
  }

  // -------------------------------------------------------------------------
  // Rate plans
  // -------------------------------------------------------------------------

  async findPlanById(id: RatePlanId) {
    return this.state.plans.get(id) ?? null
  }

  async listPlans() {
    return [...this.state.plans.values()]
  }

  async findPlanActiveOn(date: CalendarDate) {
    return [...this.state.plans.values()].find((plan) => planCoversDate(plan, date)) ?? null
  }

  async findEntry(planId: RatePlanId, key: RateEntryKey) {
    return this.state.plans.get(planId)?.entries.find((entry) => sameEntryKey(entry, key)) ?? null
  }

  private toEntries(planId: RatePlanId, entries: readonly NewRateEntry[]): RateEntry[] {
    return entries.map((entry) => ({ ...entry, id: toRateEntryId(this.nextId('entry')), planId }))
  }

  async insertPlan(input: NewRatePlan) {
    const id = toRatePlanId(this.nextId('plan'))
    const { entries, ...fields } = input
    const created: RatePlan = {
      ...fields,
      id,
      entries: this.toEntries(id, entries),
      createdAt: this.nextTimestamp(),
    }
    this.state.plans.set(id, created)
    return created
  }

  async updatePlan(id: RatePlanId, patch: RatePlanPatch) {
    const existing = this.state.plans.get(id)
    if (!existing) throw new Error(`rate plan ${id} vanished`)
    const updated: RatePlan = { ...existing, ...patch }
    this.state.plans.set(id, updated)
    return updated
  }

  async insertEntries(planId: RatePlanId, entries: readonly NewRateEntry[]) {
    const existing = this.state.plans.get(planId)
    if (!existing) throw new Error(`rate plan ${planId} vanished`)
    const updated: RatePlan = { ...existing, entries: [...existing.entries, ...this.toEntries(planId, entries)] }
    this.state.plans.set(planId, updated)
    return updated
  }

  // -------------------------------------------------------------------------
  // Attributes
  // -------------------------------------------------------------------------

  async shiftExists(id: ShiftId) {
    return this.state.shifts.has(id)
  }

  async findAttributeTypeById(id: AttributeTypeId) {
    return this.state.attributeTypes.get(id) ?? null
  }

  async findAttributeTypeByCode(code: string) {
    return [...this.state.attributeTypes.values()].find((type) => type.code === code) ?? null
  }

  async listAttributeTypes() {
    return [...this.state.attributeTypes.values()]
  }

  async insertAttributeType(input: NewAttributeType) {
    const created: AttributeType = { ...input, id: toAttributeTypeId(this.nextId('attr')) }
    this.state.attributeTypes.set(created.id, created)
    return created
  }

  async findAttributeValueById(id: AttributeValueId) {
    return this.state.attributeValues.get(id) ?? null
  }

  async findAttributeValues(shiftId: ShiftId, attributeTypeId: AttributeTypeId) {
    return [...this.state.attributeValues.values()].filter(
      (entry) => entry.shiftId === shiftId && entry.attributeTypeId === attributeTypeId,
    )
  }

  async findCurrentAttributeValues(shiftId: ShiftId, date: CalendarDate): Promise<CurrentAttributeValue[]> {
    return [...this.state.attributeValues.values()]
      .filter((entry) => entry.shiftId === shiftId && activeOn(entry, date))
      .map((entry) => ({ attributeTypeId: entry.attributeTypeId, value: entry.value }))
  }

  async insertAttributeValue(input: NewShiftAttributeValue) {
    const created: ShiftAttributeValue = { ...input, id: toAttributeValueId(this.nextId('value')) }
    this.state.attributeValues.set(created.id, created)
    return created
  }

  async endAttributeValue(id: AttributeValueId, endDate: CalendarDate) {
    const existing = this.state.attributeValues.get(id)
    if (!existing) throw new Error(`attribute value ${id} vanished`)
    const updated: ShiftAttributeValue = { ...existing, endDate }
    this.state.attributeValues.set(id, updated)
    return updated
  }

  // -------------------------------------------------------------------------
  // Profiles
  // -------------------------------------------------------------------------

  private requireStoredProfile(id: ProfileId): ShiftProfile {
    const profile = this.state.profiles.get(id)
    if (!profile) throw new Error(`profile ${id} vanished`)
    return profile
  }

  async findProfileById(id: ProfileId) {
    return this.state.profiles.get(id) ?? null
  }

  async findProfileByCode(code: string) {
    return [...this.state.profiles.values()].find((profile) => profile.code === code) ?? null
  }

  async listProfiles() {
    return [...this.state.profiles.values()]
  }

  async findActiveProfilesMatchingStatic(shift: ShiftStaticAttributes) {
    return [...this.state.profiles.values()].filter((profile) => profile.isActive && matchesStatic(profile, shift))
  }

  async insertProfile(input: NewShiftProfile) {
    const id = toProfileId(this.nextId('profile'))
    const now = this.nextTimestamp()
    const created: ShiftProfile = {
      ...input,
      id,
      usageCount: 0,
      requirements: [...input.requirements],
      createdAt: now,
      updatedAt: now,
    }
    this.state.profiles.set(id, created)
    return created
  }

  async updateProfile(id: ProfileId, patch: ShiftProfilePatch) {
    const updated: ShiftProfile = { ...this.requireStoredProfile(id), ...patch, updatedAt: this.nextTimestamp() }
    this.state.profiles.set(id, updated)
    return updated
  }

  async deleteProfile(id: ProfileId) {
    this.state.profiles.delete(id)
  }

  async adjustUsageCount(id: ProfileId, delta: number) {
    const profile = this.requireStoredProfile(id)
    this.state.profiles.set(id, { ...profile, usageCount: Math.max(0, profile.usageCount + delta) })
  }

  async attributeTypeExists(id: AttributeTypeId) {
    return this.state.attributeTypes.has(id)
  }

  async insertRequirement(profileId: ProfileId, requirement: ProfileAttributeRequirement) {
    const profile = this.requireStoredProfile(profileId)
    this.state.profiles.set(profileId, { ...profile, requirements: [...profile.requirements, requirement] })
  }

  async deleteRequirement(profileId: ProfileId, attributeTypeId: AttributeTypeId) {
    const profile = this.requireStoredProfile(profileId)
    const requirements = profile.requirements.filter((entry) => entry.attributeTypeId !== attributeTypeId)
    this.state.profiles.set(profileId, { ...profile, requirements })
    return requirements.length !== profile.requirements.length
  }

  async replaceRequirements(profileId: ProfileId, requirements: readonly ProfileAttributeRequirement[]) {
    const profile = this.requireStoredProfile(profileId)
    this.state.profiles.set(profileId, { ...profile, requirements: [...requirements] })
  }

  // -------------------------------------------------------------------------
  // Shifts and assignments
  // -------------------------------------------------------------------------

  async findShiftById(id: ShiftId) {
    return this.state.shifts.get(id) ?? null
  }

  async lockShift(id: ShiftId) {
    return this.findShiftById(id)
  }

  async setCurrentProfile(shiftId: ShiftId, profileId: ProfileId | null) {
    const shift = this.state.shifts.get(shiftId)
    if (!shift) throw new Error(`shift ${shiftId} vanished`)
    this.state.shifts.set(shiftId, { ...shift, currentProfileId: profileId })
  }

  async findOpenAssignment(shiftId: ShiftId) {
    return (
      [...this.state.assignments.values()].find(
        (assignment) => assignment.shiftId === shiftId && assignment.endDate === null,
      ) ?? null
    )
  }

  async listAssignments(shiftId: ShiftId) {
    return [...this.state.assignments.values()].filter((assignment) => assignment.shiftId === shiftId)
  }

  async profileHasAssignments(profileId: ProfileId) {
    return [...this.state.assignments.values()].some((assignment) => assignment.profileId === profileId)
  }

  async insertAssignment(input: NewShiftProfileAssignment) {
    const open = await this.findOpenAssignment(input.shiftId)
    if (open) throw new Error(`shift ${input.shiftId} already has open assignment ${open.id}`)
    const id: AssignmentId = toAssignmentId(this.nextId('assignment'))
    const created: ShiftProfileAssignment = { ...input, id, endDate: null, createdAt: this.nextTimestamp() }
    this.state.assignments.set(id, created)
    return created
  }

  async endAssignment(id: AssignmentId, endDate: CalendarDate) {
    const existing = this.state.assignments.get(id)
    if (!existing) throw new Error(`assignment ${id} vanished`)
    const updated: ShiftProfileAssignment = { ...existing, endDate }
    this.state.assignments.set(id, updated)
    return updated
  }
}

export function createInMemoryStore(): InMemoryFleetStore {
  return new InMemoryFleetStore()
}
