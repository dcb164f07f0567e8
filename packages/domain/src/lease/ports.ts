// ---------------------------------------------------------------------------
// Lease collaborator contracts
// The engine owns no I/O; the api implements these over PostgreSQL and the
// tests over the in-memory store.
// ---------------------------------------------------------------------------

import type { CabId, DayOfWeek, DriverId, ShiftType } from '../shared/types'
import type { CalendarDate } from '../shared/calendar-date'
import type {
  OverrideId,
  RateEntry,
  RateEntryKey,
  RateOverride,
  RatePlan,
  RatePlanId,
} from './index'

export interface DriverRecord {
  readonly id: DriverId
  readonly isOwner: boolean
}

/** Arguments of `findActiveOverridesMatching`. */
export interface OverrideMatchQuery {
  readonly ownerId: DriverId
  readonly cabId: CabId | null
  readonly shiftType: ShiftType | null
  readonly dayOfWeek: DayOfWeek | null
  readonly onDate: CalendarDate
}

export interface OverrideListFilter {
  readonly ownerId?: DriverId
  /** Only overrides active on this date. */
  readonly activeOn?: CalendarDate
  /** Only active overrides whose end date falls within [from, to]. */
  readonly endingBetween?: { readonly from: CalendarDate; readonly to: CalendarDate }
}

export type NewRateOverride = Omit<RateOverride, 'id' | 'createdAt' | 'updatedAt'>

export type RateOverridePatch = Partial<
  Pick<
    RateOverride,
    | 'cabId'
    | 'shiftType'
    | 'dayOfWeek'
    | 'leaseRate'
    | 'startDate'
    | 'endDate'
    | 'isActive'
    | 'priority'
    | 'notes'
    | 'updatedBy'
  >
>

export interface OverrideStore {
  findDriverById(id: DriverId): Promise<DriverRecord | null>
  cabExists(id: CabId): Promise<boolean>
  findOverrideById(id: OverrideId): Promise<RateOverride | null>
  /**
   * Active overrides of `ownerId` applying on `onDate` whose filters are
   * null or equal to the query's. Order is not significant.
   */
  findActiveOverridesMatching(query: OverrideMatchQuery): Promise<RateOverride[]>
  /** Every override (active or not) of the owner whose cab filter equals `cabId`, null included. */
  findOverridesForOwnerCab(ownerId: DriverId, cabId: CabId | null): Promise<RateOverride[]>
  listOverrides(filter?: OverrideListFilter): Promise<RateOverride[]>
  insertOverride(input: NewRateOverride): Promise<RateOverride>
  updateOverride(id: OverrideId, patch: RateOverridePatch): Promise<RateOverride>
  deleteOverride(id: OverrideId): Promise<void>
}

export type NewRateEntry = Omit<RateEntry, 'id' | 'planId'>

export interface NewRatePlan {
  readonly name: string
  readonly effectiveFrom: CalendarDate
  readonly effectiveTo: CalendarDate | null
  readonly isActive: boolean
  readonly notes: string | null
  readonly entries: readonly NewRateEntry[]
}

export type RatePlanPatch = Partial<Pick<RatePlan, 'effectiveTo' | 'isActive'>>

export interface RatePlanStore {
  findPlanById(id: RatePlanId): Promise<RatePlan | null>
  listPlans(): Promise<RatePlan[]>
  /** The plan whose effective window contains `date`, expired or not. */
  findPlanActiveOn(date: CalendarDate): Promise<RatePlan | null>
  findEntry(planId: RatePlanId, key: RateEntryKey): Promise<RateEntry | null>
  insertPlan(input: NewRatePlan): Promise<RatePlan>
  updatePlan(id: RatePlanId, patch: RatePlanPatch): Promise<RatePlan>
  insertEntries(planId: RatePlanId, entries: readonly NewRateEntry[]): Promise<RatePlan>
}

export type LeaseStore = OverrideStore & RatePlanStore
