import { and, asc, desc, eq, getTableColumns, gte, inArray, isNull, lte, or, type SQL } from 'drizzle-orm'
import type { AnyPgColumn } from 'drizzle-orm/pg-core'
import type {
  CabId,
  CalendarDate,
  DriverId,
  DriverRecord,
  LeaseStore,
  NewRateEntry,
  NewRateOverride,
  NewRatePlan,
  OverrideId,
  OverrideListFilter,
  OverrideMatchQuery,
  RateEntry,
  RateEntryKey,
  RateOverride,
  RateOverridePatch,
  RatePlan,
  RatePlanId,
  RatePlanPatch,
} from '@cabdesk/domain'
import {
  toCabId,
  toCalendarDate,
  toDriverId,
  toOverrideId,
  toRateEntryId,
  toRatePlanId,
} from '@cabdesk/domain'
import type { Executor } from '../db'
import {
  cabs,
  drivers,
  leaseRateOverrides,
  rateEntries,
  ratePlans,
  type LeaseRateOverrideRow,
  type RateEntryRow,
  type RatePlanRow,
} from '../db/schema'

// ---------------------------------------------------------------------------
// Mappers
// ---------------------------------------------------------------------------

function mapOverride(row: LeaseRateOverrideRow): RateOverride {
  return {
    id: toOverrideId(row.id),
    ownerId: toDriverId(row.ownerId),
    cabId: row.cabId != null ? toCabId(row.cabId) : null,
    shiftType: row.shiftType,
    dayOfWeek: row.dayOfWeek,
    leaseRate: Number(row.leaseRate),
    startDate: toCalendarDate(row.startDate),
    endDate: row.endDate != null ? toCalendarDate(row.endDate) : null,
    isActive: row.isActive,
    priority: row.priority,
    notes: row.notes,
    createdBy: row.createdBy,
    updatedBy: row.updatedBy,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  }
}

function mapEntry(row: RateEntryRow): RateEntry {
  return {
    id: toRateEntryId(row.id),
    planId: toRatePlanId(row.planId),
    cabCategory: row.cabCategory,
    hasAirportLicense: row.hasAirportLicense,
    shiftType: row.shiftType,
    dayOfWeek: row.dayOfWeek,
    baseRate: Number(row.baseRate),
    distanceRate: Number(row.distanceRate),
    notes: row.notes,
  }
}

function mapPlan(row: RatePlanRow, entries: readonly RateEntryRow[]): RatePlan {
  return {
    id: toRatePlanId(row.id),
    name: row.name,
    effectiveFrom: toCalendarDate(row.effectiveFrom),
    effectiveTo: row.effectiveTo != null ? toCalendarDate(row.effectiveTo) : null,
    isActive: row.isActive,
    notes: row.notes,
    entries: entries.map(mapEntry),
    createdAt: row.createdAt,
  }
}

// ---------------------------------------------------------------------------
// Query helpers
// ---------------------------------------------------------------------------

/** A nullable filter column matches a query value when it is null or equal. */
function wildcardMatch(column: AnyPgColumn, value: string | null): SQL | undefined {
  return value === null ? isNull(column) : or(isNull(column), eq(column, value))
}

function nullableEquals(column: AnyPgColumn, value: string | null): SQL {
  return value === null ? isNull(column) : eq(column, value)
}

function windowContains(
  start: AnyPgColumn,
  end: AnyPgColumn,
  date: CalendarDate,
): SQL | undefined {
  return and(lte(start, date), or(isNull(end), gte(end, date)))
}

// ---------------------------------------------------------------------------
// Owners and cabs
// ---------------------------------------------------------------------------

export async function findDriverById(db: Executor, tenantId: string, id: DriverId): Promise<DriverRecord | null> {
  const [row] = await db
    .select({ id: drivers.id, isOwner: drivers.isOwner })
    .from(drivers)
    .where(and(eq(drivers.tenantId, tenantId), eq(drivers.id, id)))
    .limit(1)
  return row ? { id: toDriverId(row.id), isOwner: row.isOwner } : null
}

export async function cabExists(db: Executor, tenantId: string, id: CabId): Promise<boolean> {
  const [row] = await db
    .select({ id: cabs.id })
    .from(cabs)
    .where(and(eq(cabs.tenantId, tenantId), eq(cabs.id, id)))
    .limit(1)
  return row !== undefined
}

// ---------------------------------------------------------------------------
// Overrides
// ---------------------------------------------------------------------------

export async function findOverrideById(db: Executor, tenantId: string, id: OverrideId): Promise<RateOverride | null> {
  const [row] = await db
    .select()
    .from(leaseRateOverrides)
    .where(and(eq(leaseRateOverrides.tenantId, tenantId), eq(leaseRateOverrides.id, id)))
    .limit(1)
  return row ? mapOverride(row) : null
}

export async function findActiveOverridesMatching(
  db: Executor,
  tenantId: string,
  query: OverrideMatchQuery,
): Promise<RateOverride[]> {
  const rows = await db
    .select()
    .from(leaseRateOverrides)
    .where(
      and(
        eq(leaseRateOverrides.tenantId, tenantId),
        eq(leaseRateOverrides.ownerId, query.ownerId),
        eq(leaseRateOverrides.isActive, true),
        windowContains(leaseRateOverrides.startDate, leaseRateOverrides.endDate, query.onDate),
        wildcardMatch(leaseRateOverrides.cabId, query.cabId),
        wildcardMatch(leaseRateOverrides.shiftType, query.shiftType),
        wildcardMatch(leaseRateOverrides.dayOfWeek, query.dayOfWeek),
      ),
    )
  return rows.map(mapOverride)
}

export async function findOverridesForOwnerCab(
  db: Executor,
  tenantId: string,
  ownerId: DriverId,
  cabId: CabId | null,
): Promise<RateOverride[]> {
  const rows = await db
    .select()
    .from(leaseRateOverrides)
    .where(
      and(
        eq(leaseRateOverrides.tenantId, tenantId),
        eq(leaseRateOverrides.ownerId, ownerId),
        nullableEquals(leaseRateOverrides.cabId, cabId),
      ),
    )
  return rows.map(mapOverride)
}

export async function listOverrides(
  db: Executor,
  tenantId: string,
  filter: OverrideListFilter = {},
): Promise<RateOverride[]> {
  const conditions: (SQL | undefined)[] = [eq(leaseRateOverrides.tenantId, tenantId)]
  if (filter.ownerId !== undefined) {
    conditions.push(eq(leaseRateOverrides.ownerId, filter.ownerId))
  }
  if (filter.activeOn !== undefined) {
    conditions.push(
      eq(leaseRateOverrides.isActive, true),
      windowContains(leaseRateOverrides.startDate, leaseRateOverrides.endDate, filter.activeOn),
    )
  }
  if (filter.endingBetween !== undefined) {
    conditions.push(
      eq(leaseRateOverrides.isActive, true),
      gte(leaseRateOverrides.endDate, filter.endingBetween.from),
      lte(leaseRateOverrides.endDate, filter.endingBetween.to),
    )
  }
  const rows = await db
    .select()
    .from(leaseRateOverrides)
    .where(and(...conditions))
    .orderBy(asc(leaseRateOverrides.startDate))
  return rows.map(mapOverride)
}

export async function insertOverride(db: Executor, tenantId: string, input: NewRateOverride): Promise<RateOverride> {
  const [row] = await db
    .insert(leaseRateOverrides)
    .values({
      tenantId,
      ownerId: input.ownerId,
      cabId: input.cabId,
      shiftType: input.shiftType,
      dayOfWeek: input.dayOfWeek,
      leaseRate: String(input.leaseRate),
      startDate: input.startDate,
      endDate: input.endDate,
      isActive: input.isActive,
      priority: input.priority,
      notes: input.notes,
      createdBy: input.createdBy,
      updatedBy: input.updatedBy,
    })
    .returning()
  if (!row) throw new Error('Insert into lease_rate_overrides returned no row')
  return mapOverride(row)
}

export async function updateOverride(
  db: Executor,
  tenantId: string,
  id: OverrideId,
  patch: RateOverridePatch,
): Promise<RateOverride> {
  const { leaseRate, ...rest } = patch
  const [row] = await db
    .update(leaseRateOverrides)
    .set({
      ...rest,
      ...(leaseRate !== undefined ? { leaseRate: String(leaseRate) } : {}),
      updatedAt: new Date(),
    })
    .where(and(eq(leaseRateOverrides.tenantId, tenantId), eq(leaseRateOverrides.id, id)))
    .returning()
  if (!row) throw new Error(`Lease rate override ${id} disappeared during update`)
  return mapOverride(row)
}

export async function deleteOverride(db: Executor, tenantId: string, id: OverrideId): Promise<void> {
  await db
    .delete(leaseRateOverrides)
    .where(and(eq(leaseRateOverrides.tenantId, tenantId), eq(leaseRateOverrides.id, id)))
}

// ---------------------------------------------------------------------------
// Rate plans
// ---------------------------------------------------------------------------

async function loadEntries(db: Executor, planIds: readonly string[]): Promise<Map<string, RateEntryRow[]>> {
  const byPlan = new Map<string, RateEntryRow[]>()
  if (planIds.length === 0) return byPlan
  const rows = await db
    .select()
    .from(rateEntries)
    .where(inArray(rateEntries.planId, [...planIds]))
    .orderBy(asc(rateEntries.cabCategory), asc(rateEntries.shiftType), asc(rateEntries.dayOfWeek))
  for (const row of rows) {
    const list = byPlan.get(row.planId) ?? []
    list.push(row)
    byPlan.set(row.planId, list)
  }
  return byPlan
}

async function hydratePlans(db: Executor, rows: readonly RatePlanRow[]): Promise<RatePlan[]> {
  const entries = await loadEntries(
    db,
    rows.map((row) => row.id),
  )
  return rows.map((row) => mapPlan(row, entries.get(row.id) ?? []))
}

export async function findPlanById(db: Executor, tenantId: string, id: RatePlanId): Promise<RatePlan | null> {
  const rows = await db
    .select()
    .from(ratePlans)
    .where(and(eq(ratePlans.tenantId, tenantId), eq(ratePlans.id, id)))
    .limit(1)
  const [plan] = await hydratePlans(db, rows)
  return plan ?? null
}

export async function listPlans(db: Executor, tenantId: string): Promise<RatePlan[]> {
  const rows = await db
    .select()
    .from(ratePlans)
    .where(eq(ratePlans.tenantId, tenantId))
    .orderBy(asc(ratePlans.effectiveFrom))
  return hydratePlans(db, rows)
}

export async function findPlanActiveOn(db: Executor, tenantId: string, date: CalendarDate): Promise<RatePlan | null> {
  const rows = await db
    .select()
    .from(ratePlans)
    .where(
      and(
        eq(ratePlans.tenantId, tenantId),
        windowContains(ratePlans.effectiveFrom, ratePlans.effectiveTo, date),
      ),
    )
    .orderBy(desc(ratePlans.effectiveFrom))
    .limit(1)
  const [plan] = await hydratePlans(db, rows)
  return plan ?? null
}

export async function findEntry(
  db: Executor,
  tenantId: string,
  planId: RatePlanId,
  key: RateEntryKey,
): Promise<RateEntry | null> {
  const [row] = await db
    .select(getTableColumns(rateEntries))
    .from(rateEntries)
    .innerJoin(ratePlans, eq(ratePlans.id, rateEntries.planId))
    .where(
      and(
        eq(ratePlans.tenantId, tenantId),
        eq(rateEntries.planId, planId),
        eq(rateEntries.cabCategory, key.cabCategory),
        eq(rateEntries.hasAirportLicense, key.hasAirportLicense),
        eq(rateEntries.shiftType, key.shiftType),
        eq(rateEntries.dayOfWeek, key.dayOfWeek),
      ),
    )
    .limit(1)
  return row ? mapEntry(row) : null
}

function entryValues(planId: string, entries: readonly NewRateEntry[]) {
  return entries.map((entry) => ({
    planId,
    cabCategory: entry.cabCategory,
    hasAirportLicense: entry.hasAirportLicense,
    shiftType: entry.shiftType,
    dayOfWeek: entry.dayOfWeek,
    baseRate: String(entry.baseRate),
    distanceRate: String(entry.distanceRate),
    notes: entry.notes,
  }))
}

export async function insertPlan(db: Executor, tenantId: string, input: NewRatePlan): Promise<RatePlan> {
  const [row] = await db
    .insert(ratePlans)
    .values({
      tenantId,
      name: input.name,
      effectiveFrom: input.effectiveFrom,
      effectiveTo: input.effectiveTo,
      isActive: input.isActive,
      notes: input.notes,
    })
    .returning()
  if (!row) throw new Error('Insert into rate_plans returned no row')
  if (input.entries.length > 0) {
    await db.insert(rateEntries).values(entryValues(row.id, input.entries))
  }
  const [plan] = await hydratePlans(db, [row])
  if (!plan) throw new Error(`Rate plan ${row.id} could not be reloaded`)
  return plan
}

async function requirePlan(db: Executor, tenantId: string, id: RatePlanId): Promise<RatePlan> {
  const plan = await findPlanById(db, tenantId, id)
  if (!plan) throw new Error(`Rate plan ${id} disappeared during update`)
  return plan
}

export async function updatePlan(
  db: Executor,
  tenantId: string,
  id: RatePlanId,
  patch: RatePlanPatch,
): Promise<RatePlan> {
  await db
    .update(ratePlans)
    .set(patch)
    .where(and(eq(ratePlans.tenantId, tenantId), eq(ratePlans.id, id)))
  return requirePlan(db, tenantId, id)
}

export async function insertEntries(
  db: Executor,
  tenantId: string,
  planId: RatePlanId,
  entries: readonly NewRateEntry[],
): Promise<RatePlan> {
  await requirePlan(db, tenantId, planId)
  if (entries.length > 0) {
    await db.insert(rateEntries).values(entryValues(planId, entries))
  }
  return requirePlan(db, tenantId, planId)
}

// ---------------------------------------------------------------------------
// Port adapter
// ---------------------------------------------------------------------------

export function createLeaseStore(db: Executor, tenantId: string): LeaseStore {
  return {
    findDriverById: (id) => findDriverById(db, tenantId, id),
    cabExists: (id) => cabExists(db, tenantId, id),
    findOverrideById: (id) => findOverrideById(db, tenantId, id),
    findActiveOverridesMatching: (query) => findActiveOverridesMatching(db, tenantId, query),
    findOverridesForOwnerCab: (ownerId, cabId) => findOverridesForOwnerCab(db, tenantId, ownerId, cabId),
    listOverrides: (filter) => listOverrides(db, tenantId, filter),
    insertOverride: (input) => insertOverride(db, tenantId, input),
    updateOverride: (id, patch) => updateOverride(db, tenantId, id, patch),
    deleteOverride: (id) => deleteOverride(db, tenantId, id),
    findPlanById: (id) => findPlanById(db, tenantId, id),
    listPlans: () => listPlans(db, tenantId),
    findPlanActiveOn: (date) => findPlanActiveOn(db, tenantId, date),
    findEntry: (planId, key) => findEntry(db, tenantId, planId, key),
    insertPlan: (input) => insertPlan(db, tenantId, input),
    updatePlan: (id, patch) => updatePlan(db, tenantId, id, patch),
    insertEntries: (planId, entries) => insertEntries(db, tenantId, planId, entries),
  }
}
