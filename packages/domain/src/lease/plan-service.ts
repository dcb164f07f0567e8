// ---------------------------------------------------------------------------
// Rate plan lifecycle
//
// Business rules:
//   1. Plans are never deleted.
//   2. Entries are never edited or removed; new keys may be appended.
//   3. At most one plan covers any date.
//   4. The end date is set once, to close the plan.
// ---------------------------------------------------------------------------

import type { RunInTransaction } from '../shared/types'
import { todayDate, type CalendarDate } from '../shared/calendar-date'
import { NotFoundError, ValidationError } from '../shared/errors'
import { silentLogger, type Logger } from '../shared/logger'
import { assertNoOverlap, assertValidWindow, formatWindow } from '../temporal/index'
import {
  planCoversDate,
  sameEntryKey,
  type RateEntryKey,
  type RatePlan,
  type RatePlanId,
} from './index'
import type { NewRateEntry, RatePlanStore } from './ports'

export interface CreatePlanInput {
  readonly name: string
  readonly effectiveFrom: CalendarDate
  readonly effectiveTo?: CalendarDate | null
  readonly notes?: string | null
  readonly entries?: readonly NewRateEntry[]
}

export interface RatePlanService {
  createPlan(input: CreatePlanInput): Promise<RatePlan>
  closePlan(id: RatePlanId, endDate: CalendarDate): Promise<RatePlan>
  addEntries(id: RatePlanId, entries: readonly NewRateEntry[]): Promise<RatePlan>
  getPlan(id: RatePlanId): Promise<RatePlan>
  listPlans(): Promise<RatePlan[]>
  findPlanActiveOn(date: CalendarDate): Promise<RatePlan | null>
  /** Flags every still-active plan whose end date is before `today`. Returns how many changed. */
  deactivateExpiredPlans(today?: CalendarDate): Promise<number>
}

export interface RatePlanServiceDeps {
  readonly store: RatePlanStore
  readonly transaction: RunInTransaction<RatePlanStore>
  readonly today?: () => CalendarDate
  readonly logger?: Logger
}

function describeEntryKey(key: RateEntryKey): string {
  return `${key.cabCategory}/${key.hasAirportLicense ? 'AIRPORT' : 'NO_AIRPORT'}/${key.shiftType}/${key.dayOfWeek}`
}

function assertEntries(entries: readonly NewRateEntry[], existing: readonly RateEntryKey[] = []): void {
  const seen: RateEntryKey[] = [...existing]
  for (const entry of entries) {
    if (entry.baseRate < 0 || entry.distanceRate < 0) {
      throw new ValidationError(`Rates cannot be negative for ${describeEntryKey(entry)}`)
    }
    if (seen.some((key) => sameEntryKey(key, entry))) {
      throw new ValidationError(`Rate plan already has an entry for ${describeEntryKey(entry)}`)
    }
    seen.push(entry)
  }
}

async function assertPlanWindowFree(
  store: RatePlanStore,
  window: { startDate: CalendarDate; endDate: CalendarDate | null },
  excludeId?: RatePlanId,
): Promise<void> {
  const plans = (await store.listPlans()).map((plan) => ({
    id: plan.id,
    name: plan.name,
    startDate: plan.effectiveFrom,
    endDate: plan.effectiveTo,
  }))
  assertNoOverlap(plans, window, {
    ...(excludeId !== undefined ? { excludeId } : {}),
    describe: (conflict) =>
      `Date range overlaps with '${conflict.name}' (${formatWindow(conflict)}). Only one plan can be active at a time.`,
  })
}

export function createRatePlanService(deps: RatePlanServiceDeps): RatePlanService {
  const { store, transaction } = deps
  const today = deps.today ?? (() => todayDate())
  const logger = deps.logger ?? silentLogger

  async function requirePlan(tx: RatePlanStore, id: RatePlanId): Promise<RatePlan> {
    const plan = await tx.findPlanById(id)
    if (!plan) throw new NotFoundError('Rate plan', id)
    return plan
  }

  return {
    async createPlan(input) {
      const name = input.name.trim()
      if (name === '') throw new ValidationError('Plan name is required')
      const window = { startDate: input.effectiveFrom, endDate: input.effectiveTo ?? null }
      assertValidWindow(window, 'Rate plan')
      const entries = input.entries ?? []
      assertEntries(entries)

      return transaction(async (tx) => {
        await assertPlanWindowFree(tx, window)
        const plan = await tx.insertPlan({
          name,
          effectiveFrom: window.startDate,
          effectiveTo: window.endDate,
          isActive: window.endDate === null || window.endDate >= today(),
          notes: input.notes ?? null,
          entries,
        })
        logger.info('created rate plan', { id: plan.id, name, entries: entries.length })
        return plan
      })
    },

    async closePlan(id, endDate) {
      return transaction(async (tx) => {
        const plan = await requirePlan(tx, id)
        if (plan.effectiveTo !== null) {
          throw new ValidationError(
            `Rate plan '${plan.name}' already ends on ${plan.effectiveTo}. Create a new plan instead.`,
          )
        }
        const window = { startDate: plan.effectiveFrom, endDate }
        assertValidWindow(window, 'Rate plan')
        await assertPlanWindowFree(tx, window, id)
        const closed = await tx.updatePlan(id, {
          effectiveTo: endDate,
          ...(endDate < today() ? { isActive: false } : {}),
        })
        logger.info('closed rate plan', { id, endDate })
        return closed
      })
    },

    async addEntries(id, entries) {
      return transaction(async (tx) => {
        const plan = await requirePlan(tx, id)
        assertEntries(entries, plan.entries)
        return tx.insertEntries(id, entries)
      })
    },

    async getPlan(id) {
      return requirePlan(store, id)
    },

    async listPlans() {
      const plans = await store.listPlans()
      return [...plans].sort((a, b) => (a.effectiveFrom < b.effectiveFrom ? 1 : a.effectiveFrom > b.effectiveFrom ? -1 : 0))
    },

    async findPlanActiveOn(date) {
      const plan = await store.findPlanActiveOn(date)
      return plan && planCoversDate(plan, date) ? plan : null
    },

    async deactivateExpiredPlans(asOf) {
      const cutoff = asOf ?? today()
      return transaction(async (tx) => {
        const expired = (await tx.listPlans()).filter(
          (plan) => plan.isActive && plan.effectiveTo !== null && plan.effectiveTo < cutoff,
        )
        for (const plan of expired) {
          await tx.updatePlan(plan.id, { isActive: false })
          logger.info('auto-deactivated rate plan', { id: plan.id })
        }
        return expired.length
      })
    },
  }
}
