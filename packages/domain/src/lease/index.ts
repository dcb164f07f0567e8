// ---------------------------------------------------------------------------
// Lease bounded context
// What an owner charges a driver for a shift: custom overrides first, the
// dated rate plan otherwise.
// ---------------------------------------------------------------------------

import type {
  Brand,
  CabCategory,
  CabId,
  DayOfWeek,
  DriverId,
  ShiftType,
} from '../shared/types'
import type { CalendarDate } from '../shared/calendar-date'
import { dayOfWeekOf } from '../shared/calendar-date'
import { ValidationError } from '../shared/errors'
import { activeOn, type DateWindow } from '../temporal/index'

// ---------------------------------------------------------------------------
// Branded ID types
// ---------------------------------------------------------------------------

/** Uniquely identifies a RateOverride. */
export type OverrideId = Brand<string, 'OverrideId'>

/** Uniquely identifies a RatePlan aggregate. */
export type RatePlanId = Brand<string, 'RatePlanId'>

/** Uniquely identifies a RateEntry within a RatePlan. */
export type RateEntryId = Brand<string, 'RateEntryId'>

export const toOverrideId = (raw: string): OverrideId => raw as OverrideId
export const toRatePlanId = (raw: string): RatePlanId => raw as RatePlanId
export const toRateEntryId = (raw: string): RateEntryId => raw as RateEntryId

// ---------------------------------------------------------------------------
// Rate overrides
// ---------------------------------------------------------------------------

/**
 * The filter columns of an override. A null filter is a wildcard.
 * Within one key, at most one active override may cover any given date.
 */
export interface OverrideKey {
  readonly ownerId: DriverId
  readonly cabId: CabId | null
  readonly shiftType: ShiftType | null
  readonly dayOfWeek: DayOfWeek | null
}

/**
 * A custom lease rate an owner sets for a narrower scope and time window.
 *
 * Examples:
 *   cab 1, DAY, MONDAY            → 45.00, ongoing
 *   all cabs, NIGHT, every day    → 75.00, Dec 1–31
 *
 * @invariant `endDate` is null or ≥ `startDate`.
 * @invariant `priority` equals `computeOverridePriority(this)`.
 */
export interface RateOverride extends OverrideKey, DateWindow {
  readonly id: OverrideId
  readonly leaseRate: number
  readonly isActive: boolean
  readonly priority: number
  readonly notes: string | null
  readonly createdBy: string | null
  readonly updatedBy: string | null
  readonly createdAt: Date
  readonly updatedAt: Date
}

/** Specificity weights. A cab filter outranks shift type, which outranks day. */
export const OVERRIDE_PRIORITY_WEIGHTS = {
  cab: 50,
  shiftType: 30,
  dayOfWeek: 20,
} as const

/**
 * Scores an override by how many wildcard filters it narrows. Always
 * recomputed on create and update; a caller-supplied priority is ignored.
 */
export function computeOverridePriority(
  filters: Pick<OverrideKey, 'cabId' | 'shiftType' | 'dayOfWeek'>,
): number {
  let priority = 0
  if (filters.cabId !== null) priority += OVERRIDE_PRIORITY_WEIGHTS.cab
  if (filters.shiftType !== null) priority += OVERRIDE_PRIORITY_WEIGHTS.shiftType
  if (filters.dayOfWeek !== null) priority += OVERRIDE_PRIORITY_WEIGHTS.dayOfWeek
  return priority
}

export function sameOverrideKey(a: OverrideKey, b: OverrideKey): boolean {
  return (
    a.ownerId === b.ownerId &&
    a.cabId === b.cabId &&
    a.shiftType === b.shiftType &&
    a.dayOfWeek === b.dayOfWeek
  )
}

/** The (owner, cab, shift, date) tuple a lease rate is resolved for. */
export interface LeaseRateLookup {
  readonly ownerId: DriverId
  readonly cabId: CabId
  readonly shiftType: ShiftType
  readonly date: CalendarDate
}

/**
 * Returns true when the override applies to the lookup: it is active on the
 * date and each of its filters is either a wildcard or equal to the lookup.
 */
export function overrideApplies(override: RateOverride, lookup: LeaseRateLookup): boolean {
  if (override.ownerId !== lookup.ownerId) return false
  if (!activeOn(override, lookup.date)) return false
  if (override.cabId !== null && override.cabId !== lookup.cabId) return false
  if (override.shiftType !== null && override.shiftType !== lookup.shiftType) return false
  if (override.dayOfWeek !== null && override.dayOfWeek !== dayOfWeekOf(lookup.date)) return false
  return true
}

/**
 * Resolution order: highest priority first, then most recently created.
 * The id comparison only makes the order total for identical timestamps.
 */
export function compareOverridePrecedence(a: RateOverride, b: RateOverride): number {
  if (a.priority !== b.priority) return b.priority - a.priority
  const created = b.createdAt.getTime() - a.createdAt.getTime()
  if (created !== 0) return created
  return a.id < b.id ? 1 : a.id > b.id ? -1 : 0
}

/**
 * Picks the winning override among `candidates` for the lookup, or null when
 * none applies (the caller then falls back to the rate plan).
 */
export function selectOverride(
  candidates: readonly RateOverride[],
  lookup: LeaseRateLookup,
): RateOverride | null {
  const applicable = candidates.filter((candidate) => overrideApplies(candidate, lookup))
  if (applicable.length === 0) return null
  return [...applicable].sort(compareOverridePrecedence)[0] ?? null
}

// ---------------------------------------------------------------------------
// Rate plans
// ---------------------------------------------------------------------------

/** The columns that identify one line of a rate plan. */
export interface RateEntryKey {
  readonly cabCategory: CabCategory
  readonly hasAirportLicense: boolean
  readonly shiftType: ShiftType
  readonly dayOfWeek: DayOfWeek
}

/**
 * An immutable line of a rate plan.
 *
 * @invariant `baseRate` and `distanceRate` are ≥ 0.
 */
export interface RateEntry extends RateEntryKey {
  readonly id: RateEntryId
  readonly planId: RatePlanId
  readonly baseRate: number
  /** Charge per distance unit driven. */
  readonly distanceRate: number
  readonly notes: string | null
}

/**
 * The default rate source for a period.
 *
 * Only one plan may cover any date. Plans are never deleted and their
 * entries are never edited: a correction closes the current plan and opens
 * a new one.
 *
 * @invariant `effectiveTo` is null or ≥ `effectiveFrom`.
 */
export interface RatePlan {
  readonly id: RatePlanId
  readonly name: string
  readonly effectiveFrom: CalendarDate
  readonly effectiveTo: CalendarDate | null
  readonly isActive: boolean
  readonly notes: string | null
  readonly entries: readonly RateEntry[]
  readonly createdAt: Date
}

/**
 * Returns true when `date` falls inside the plan's effective window. The
 * `isActive` flag is housekeeping for expired plans and does not hide a plan
 * from lookups of dates it covered.
 */
export function planCoversDate(plan: Pick<RatePlan, 'effectiveFrom' | 'effectiveTo'>, date: CalendarDate): boolean {
  return activeOn({ startDate: plan.effectiveFrom, endDate: plan.effectiveTo }, date)
}

export function sameEntryKey(a: RateEntryKey, b: RateEntryKey): boolean {
  return (
    a.cabCategory === b.cabCategory &&
    a.hasAirportLicense === b.hasAirportLicense &&
    a.shiftType === b.shiftType &&
    a.dayOfWeek === b.dayOfWeek
  )
}

export function findPlanEntry(plan: RatePlan, key: RateEntryKey): RateEntry | undefined {
  return plan.entries.find((entry) => sameEntryKey(entry, key))
}

/**
 * Total lease for an entry: base + distanceRate × distance, rounded to cents.
 *
 * @throws {ValidationError} if `distance` is negative.
 */
export function calculateEntryTotal(entry: Pick<RateEntry, 'baseRate' | 'distanceRate'>, distance = 0): number {
  if (distance < 0) {
    throw new ValidationError(`Distance cannot be negative: ${distance}`)
  }
  return Math.round((entry.baseRate + entry.distanceRate * distance) * 100) / 100
}

// ---------------------------------------------------------------------------
// Resolution result
// ---------------------------------------------------------------------------

export type ResolvedLeaseRate =
  | {
      readonly source: 'OVERRIDE'
      readonly amount: number
      readonly overrideId: OverrideId
      readonly priority: number
    }
  | {
      readonly source: 'PLAN'
      readonly amount: number
      readonly planId: RatePlanId
      readonly entryId: RateEntryId
    }
