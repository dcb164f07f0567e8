// ---------------------------------------------------------------------------
// Override write paths
//
// Every mutation runs inside one transaction: the overlap check and the
// write it guards must see the same snapshot.
// ---------------------------------------------------------------------------

import type { CabId, DayOfWeek, DriverId, RunInTransaction, ShiftType } from '../shared/types'
import { addDays, todayDate, type CalendarDate } from '../shared/calendar-date'
import { DomainError, NotFoundError, ValidationError } from '../shared/errors'
import { silentLogger, type Logger } from '../shared/logger'
import { assertNoOverlap, assertValidWindow, formatWindow } from '../temporal/index'
import {
  compareOverridePrecedence,
  computeOverridePriority,
  sameOverrideKey,
  type OverrideId,
  type OverrideKey,
  type RateOverride,
} from './index'
import type { OverrideListFilter, OverrideStore } from './ports'

/** Overrides starting within this many days of today end the owner's current one. */
export const DEFAULT_AUTO_CLOSE_WINDOW_DAYS = 7

export interface CreateOverrideInput {
  readonly ownerId: DriverId
  readonly cabId?: CabId | null
  readonly shiftType?: ShiftType | null
  readonly dayOfWeek?: DayOfWeek | null
  readonly leaseRate: number
  /** Defaults to today. */
  readonly startDate?: CalendarDate
  readonly endDate?: CalendarDate | null
  readonly isActive?: boolean
  readonly notes?: string | null
  readonly createdBy?: string | null
}

export interface UpdateOverrideInput {
  readonly cabId?: CabId | null
  readonly shiftType?: ShiftType | null
  readonly dayOfWeek?: DayOfWeek | null
  readonly leaseRate?: number
  readonly startDate?: CalendarDate
  readonly endDate?: CalendarDate | null
  readonly isActive?: boolean
  readonly notes?: string | null
  readonly updatedBy?: string | null
}

export interface CreateBulkOverridesInput extends Omit<CreateOverrideInput, 'dayOfWeek'> {
  readonly daysOfWeek: readonly DayOfWeek[]
}

export interface BulkOverrideResult {
  readonly created: readonly RateOverride[]
  readonly failed: readonly { readonly dayOfWeek: DayOfWeek; readonly error: DomainError }[]
}

export interface OverrideService {
  createOverride(input: CreateOverrideInput): Promise<RateOverride>
  createBulkOverrides(input: CreateBulkOverridesInput): Promise<BulkOverrideResult>
  updateOverride(id: OverrideId, input: UpdateOverrideInput): Promise<RateOverride>
  endDateOverride(id: OverrideId, endDate: CalendarDate): Promise<RateOverride>
  activateOverride(id: OverrideId): Promise<RateOverride>
  deactivateOverride(id: OverrideId): Promise<RateOverride>
  deleteOverride(id: OverrideId): Promise<void>
  getOverride(id: OverrideId): Promise<RateOverride>
  listOverrides(filter?: OverrideListFilter): Promise<RateOverride[]>
  listActiveOverrides(date?: CalendarDate): Promise<RateOverride[]>
  listExpiringSoon(days: number): Promise<RateOverride[]>
}

export interface OverrideServiceDeps {
  readonly store: OverrideStore
  readonly transaction: RunInTransaction<OverrideStore>
  readonly today?: () => CalendarDate
  readonly autoCloseWindowDays?: number
  readonly logger?: Logger
}

/** Listing order: owner, then resolution precedence. */
function compareForListing(a: RateOverride, b: RateOverride): number {
  if (a.ownerId !== b.ownerId) return a.ownerId < b.ownerId ? -1 : 1
  return compareOverridePrecedence(a, b)
}

function describeKey(key: OverrideKey): string {
  return `owner=${key.ownerId}, cab=${key.cabId ?? 'ALL'}, shift=${key.shiftType ?? 'ALL'}, day=${key.dayOfWeek ?? 'ALL'}`
}

function assertRate(leaseRate: number): void {
  if (!Number.isFinite(leaseRate) || leaseRate < 0) {
    throw new ValidationError(`Lease rate must be a non-negative amount: ${leaseRate}`)
  }
}

async function requireOverride(store: OverrideStore, id: OverrideId): Promise<RateOverride> {
  const override = await store.findOverrideById(id)
  if (!override) throw new NotFoundError('Lease rate override', id)
  return override
}

/**
 * Rejects `candidate` when another active override with the same key covers
 * any of its dates. Inactive candidates never conflict.
 */
async function assertNoKeyOverlap(
  store: OverrideStore,
  candidate: OverrideKey & { startDate: CalendarDate; endDate: CalendarDate | null; isActive: boolean },
  excludeId?: OverrideId,
): Promise<void> {
  if (!candidate.isActive) return
  const siblings = (await store.findOverridesForOwnerCab(candidate.ownerId, candidate.cabId)).filter(
    (existing) => existing.isActive && sameOverrideKey(existing, candidate),
  )
  assertNoOverlap(siblings, candidate, {
    ...(excludeId !== undefined ? { excludeId } : {}),
    describe: (conflict) =>
      `Override ${conflict.id} (${formatWindow(conflict)}) already covers ${describeKey(candidate)}`,
  })
}

export function createOverrideService(deps: OverrideServiceDeps): OverrideService {
  const { store, transaction } = deps
  const today = deps.today ?? (() => todayDate())
  const autoCloseWindowDays = deps.autoCloseWindowDays ?? DEFAULT_AUTO_CLOSE_WINDOW_DAYS
  const logger = deps.logger ?? silentLogger

  async function validateOwnerAndCab(tx: OverrideStore, ownerId: DriverId, cabId: CabId | null): Promise<void> {
    const owner = await tx.findDriverById(ownerId)
    if (!owner || !owner.isOwner) {
      throw new NotFoundError('Owner', ownerId)
    }
    if (cabId !== null && !(await tx.cabExists(cabId))) {
      throw new NotFoundError('Cab', cabId)
    }
  }

  /**
   * A change starting before today + the window (backdated ones included)
   * closes the owner's currently open override for the same cab on the day
   * before. Later start dates leave the present untouched so future changes
   * can be scheduled.
   */
  async function autoCloseCurrent(tx: OverrideStore, ownerId: DriverId, cabId: CabId | null, startDate: CalendarDate) {
    if (startDate >= addDays(today(), autoCloseWindowDays)) return

    const open = (await tx.findOverridesForOwnerCab(ownerId, cabId)).filter(
      (existing) => existing.isActive && existing.endDate === null && existing.startDate < startDate,
    )
    const closingDate = addDays(startDate, -1)
    for (const existing of open) {
      await tx.updateOverride(existing.id, { endDate: closingDate })
      logger.info('auto-closed lease rate override', { id: existing.id, endDate: closingDate })
    }
  }

  async function createOverride(input: CreateOverrideInput): Promise<RateOverride> {
    return transaction(async (tx) => {
      const key: OverrideKey = {
        ownerId: input.ownerId,
        cabId: input.cabId ?? null,
        shiftType: input.shiftType ?? null,
        dayOfWeek: input.dayOfWeek ?? null,
      }
      await validateOwnerAndCab(tx, key.ownerId, key.cabId)
      assertRate(input.leaseRate)

      const window = { startDate: input.startDate ?? today(), endDate: input.endDate ?? null }
      assertValidWindow(window, 'Override')
      const isActive = input.isActive ?? true

      if (isActive) {
        await autoCloseCurrent(tx, key.ownerId, key.cabId, window.startDate)
      }
      await assertNoKeyOverlap(tx, { ...key, ...window, isActive })

      const created = await tx.insertOverride({
        ...key,
        ...window,
        leaseRate: input.leaseRate,
        isActive,
        priority: computeOverridePriority(key),
        notes: input.notes ?? null,
        createdBy: input.createdBy ?? null,
        updatedBy: input.createdBy ?? null,
      })
      logger.info('created lease rate override', {
        id: created.id,
        key: describeKey(key),
        leaseRate: created.leaseRate,
        priority: created.priority,
      })
      return created
    })
  }

  return {
    createOverride,

    async createBulkOverrides(input) {
      const { daysOfWeek, ...common } = input
      const created: RateOverride[] = []
      const failed: { dayOfWeek: DayOfWeek; error: DomainError }[] = []
      // Each day is its own unit of work; one failure does not undo the others.
      for (const dayOfWeek of daysOfWeek) {
        try {
          created.push(await createOverride({ ...common, dayOfWeek }))
        } catch (error) {
          if (!(error instanceof DomainError)) throw error
          failed.push({ dayOfWeek, error })
        }
      }
      logger.info('bulk lease rate overrides', {
        ownerId: input.ownerId,
        created: created.length,
        failed: failed.length,
      })
      return { created, failed }
    },

    async updateOverride(id, input) {
      return transaction(async (tx) => {
        const existing = await requireOverride(tx, id)
        const merged = {
          ownerId: existing.ownerId,
          cabId: input.cabId !== undefined ? input.cabId : existing.cabId,
          shiftType: input.shiftType !== undefined ? input.shiftType : existing.shiftType,
          dayOfWeek: input.dayOfWeek !== undefined ? input.dayOfWeek : existing.dayOfWeek,
          startDate: input.startDate ?? existing.startDate,
          endDate: input.endDate !== undefined ? input.endDate : existing.endDate,
          isActive: input.isActive ?? existing.isActive,
        }
        if (merged.cabId !== null && merged.cabId !== existing.cabId && !(await tx.cabExists(merged.cabId))) {
          throw new NotFoundError('Cab', merged.cabId)
        }
        if (input.leaseRate !== undefined) assertRate(input.leaseRate)
        assertValidWindow(merged, 'Override')
        await assertNoKeyOverlap(tx, merged, id)

        const updated = await tx.updateOverride(id, {
          cabId: merged.cabId,
          shiftType: merged.shiftType,
          dayOfWeek: merged.dayOfWeek,
          startDate: merged.startDate,
          endDate: merged.endDate,
          isActive: merged.isActive,
          priority: computeOverridePriority(merged),
          ...(input.leaseRate !== undefined ? { leaseRate: input.leaseRate } : {}),
          ...(input.notes !== undefined ? { notes: input.notes } : {}),
          ...(input.updatedBy !== undefined ? { updatedBy: input.updatedBy } : {}),
        })
        logger.info('updated lease rate override', { id, priority: updated.priority })
        return updated
      })
    },

    async endDateOverride(id, endDate) {
      return transaction(async (tx) => {
        const existing = await requireOverride(tx, id)
        assertValidWindow({ startDate: existing.startDate, endDate }, 'Override')
        await assertNoKeyOverlap(tx, { ...existing, endDate }, id)
        return tx.updateOverride(id, { endDate })
      })
    },

    async activateOverride(id) {
      return transaction(async (tx) => {
        const existing = await requireOverride(tx, id)
        if (existing.isActive) return existing
        await assertNoKeyOverlap(tx, { ...existing, isActive: true }, id)
        return tx.updateOverride(id, { isActive: true })
      })
    },

    async deactivateOverride(id) {
      return transaction(async (tx) => {
        await requireOverride(tx, id)
        return tx.updateOverride(id, { isActive: false })
      })
    },

    async deleteOverride(id) {
      await transaction(async (tx) => {
        await requireOverride(tx, id)
        await tx.deleteOverride(id)
      })
      logger.info('deleted lease rate override', { id })
    },

    async getOverride(id) {
      return requireOverride(store, id)
    },

    async listOverrides(filter) {
      const overrides = await store.listOverrides(filter)
      return [...overrides].sort(compareForListing)
    },

    async listActiveOverrides(date) {
      const overrides = await store.listOverrides({ activeOn: date ?? today() })
      return [...overrides].sort(compareForListing)
    },

    async listExpiringSoon(days) {
      if (!Number.isInteger(days) || days < 0) {
        throw new ValidationError(`Days must be a non-negative integer: ${days}`)
      }
      const from = today()
      const overrides = await store.listOverrides({ endingBetween: { from, to: addDays(from, days) } })
      return [...overrides].sort((a, b) =>
        a.endDate === b.endDate ? compareForListing(a, b) : (a.endDate ?? '') < (b.endDate ?? '') ? -1 : 1,
      )
    },
  }
}
