// ---------------------------------------------------------------------------
// Lease rate resolver
//
//   1. Collect the owner's active overrides matching cab / shift / weekday.
//   2. None → NONE; the caller falls back to the rate plan active on the date.
//   3. Otherwise the highest priority wins, most recently created on a tie.
//
// Read-only and stateless: safe to share across concurrent requests.
// ---------------------------------------------------------------------------

import type { CabCategory, CabId, DriverId, ShiftType } from '../shared/types'
import { dayOfWeekOf, type CalendarDate } from '../shared/calendar-date'
import { silentLogger, type Logger } from '../shared/logger'
import {
  calculateEntryTotal,
  selectOverride,
  type LeaseRateLookup,
  type RateOverride,
  type ResolvedLeaseRate,
} from './index'
import type { OverrideStore, RatePlanStore } from './ports'

export interface LeaseRateContext extends LeaseRateLookup {
  readonly cabCategory: CabCategory
  readonly hasAirportLicense: boolean
  /** Distance driven during the shift; only plan entries charge for it. */
  readonly distance?: number
}

export interface LeaseRateResolver {
  /** The winning override's rate, or null (NONE) when no override applies. */
  resolve(ownerId: DriverId, cabId: CabId, shiftType: ShiftType, date: CalendarDate): Promise<number | null>
  resolveOverride(lookup: LeaseRateLookup): Promise<RateOverride | null>
  /** Override first, then the rate plan active on the date. Null when neither applies. */
  resolveLeaseRate(context: LeaseRateContext): Promise<ResolvedLeaseRate | null>
}

export interface LeaseRateResolverDeps {
  readonly store: Pick<OverrideStore, 'findActiveOverridesMatching'> &
    Pick<RatePlanStore, 'findPlanActiveOn' | 'findEntry'>
  readonly logger?: Logger
}

export function createLeaseRateResolver(deps: LeaseRateResolverDeps): LeaseRateResolver {
  const { store } = deps
  const logger = deps.logger ?? silentLogger

  async function resolveOverride(lookup: LeaseRateLookup): Promise<RateOverride | null> {
    const dayOfWeek = dayOfWeekOf(lookup.date)
    const candidates = await store.findActiveOverridesMatching({
      ownerId: lookup.ownerId,
      cabId: lookup.cabId,
      shiftType: lookup.shiftType,
      dayOfWeek,
      onDate: lookup.date,
    })
    const winner = selectOverride(candidates, lookup)
    logger.debug('lease override lookup', {
      ownerId: lookup.ownerId,
      cabId: lookup.cabId,
      shiftType: lookup.shiftType,
      date: lookup.date,
      dayOfWeek,
      candidates: candidates.length,
      winner: winner?.id ?? null,
    })
    return winner
  }

  return {
    async resolve(ownerId, cabId, shiftType, date) {
      const winner = await resolveOverride({ ownerId, cabId, shiftType, date })
      return winner ? winner.leaseRate : null
    },

    resolveOverride,

    async resolveLeaseRate(context) {
      const override = await resolveOverride(context)
      if (override) {
        return {
          source: 'OVERRIDE',
          amount: override.leaseRate,
          overrideId: override.id,
          priority: override.priority,
        }
      }

      const plan = await store.findPlanActiveOn(context.date)
      if (!plan) {
        logger.warn('no rate plan active', { date: context.date })
        return null
      }

      const entry = await store.findEntry(plan.id, {
        cabCategory: context.cabCategory,
        hasAirportLicense: context.hasAirportLicense,
        shiftType: context.shiftType,
        dayOfWeek: dayOfWeekOf(context.date),
      })
      if (!entry) {
        logger.warn('rate plan has no matching entry', { planId: plan.id, date: context.date })
        return null
      }

      return {
        source: 'PLAN',
        amount: calculateEntryTotal(entry, context.distance ?? 0),
        planId: plan.id,
        entryId: entry.id,
      }
    },
  }
}
