import { describe, it, expect } from 'vitest'
import {
  calculateEntryTotal,
  computeOverridePriority,
  createFleetServices,
  overrideApplies,
  selectOverride,
  toCabId,
  toCalendarDate,
  toDriverId,
  toOverrideId,
  ValidationError,
  type RateOverride,
} from '../index'
import { createInMemoryStore } from '../testing'

const d = toCalendarDate
const OWNER = toDriverId('O1')
const CAB = toCabId('C1')
const OTHER_CAB = toCabId('C2')
const TODAY = d('2025-01-06')

function makeOverride(overrides: Partial<RateOverride> = {}): RateOverride {
  return {
    id: toOverrideId('ov-1'),
    ownerId: OWNER,
    cabId: null,
    shiftType: null,
    dayOfWeek: null,
    leaseRate: 50,
    startDate: d('2025-01-01'),
    endDate: null,
    isActive: true,
    priority: 0,
    notes: null,
    createdBy: null,
    updatedBy: null,
    createdAt: new Date('2025-01-01T00:00:00Z'),
    updatedAt: new Date('2025-01-01T00:00:00Z'),
    ...overrides,
  }
}

function setup() {
  const store = createInMemoryStore().addDriver(OWNER).addCab(CAB).addCab(OTHER_CAB)
  const services = createFleetServices({ store, transaction: store.transaction, today: () => TODAY })
  return { store, ...services }
}

// ---------------------------------------------------------------------------
// Priority scoring
// ---------------------------------------------------------------------------
describe('computeOverridePriority', () => {
  it('scores a bare cab filter at 50', () => {
    expect(computeOverridePriority({ cabId: CAB, shiftType: null, dayOfWeek: null })).toBe(50)
  })

  it('scores a fully specified override at 100', () => {
    expect(computeOverridePriority({ cabId: CAB, shiftType: 'DAY', dayOfWeek: 'MONDAY' })).toBe(100)
  })

  it('scores a catch-all override at 0', () => {
    expect(computeOverridePriority({ cabId: null, shiftType: null, dayOfWeek: null })).toBe(0)
  })

  it('weighs shift type above day of week', () => {
    expect(computeOverridePriority({ cabId: null, shiftType: 'NIGHT', dayOfWeek: null })).toBe(30)
    expect(computeOverridePriority({ cabId: null, shiftType: null, dayOfWeek: 'FRIDAY' })).toBe(20)
  })

  it('never lets a broader rule outrank a narrower one that adds a filter', () => {
    const base = computeOverridePriority({ cabId: null, shiftType: 'DAY', dayOfWeek: null })
    const narrower = computeOverridePriority({ cabId: null, shiftType: 'DAY', dayOfWeek: 'MONDAY' })
    expect(narrower).toBeGreaterThan(base)
  })
})

// ---------------------------------------------------------------------------
// Selection
// ---------------------------------------------------------------------------
describe('selectOverride', () => {
  const lookup = { ownerId: OWNER, cabId: CAB, shiftType: 'DAY' as const, date: d('2025-01-06') }

  it('picks the highest priority among matching candidates', () => {
    const a = makeOverride({ id: toOverrideId('A'), shiftType: 'DAY', leaseRate: 50, priority: 80 })
    const b = makeOverride({ id: toOverrideId('B'), cabId: CAB, dayOfWeek: 'MONDAY', leaseRate: 65, priority: 70 })

    const winner = selectOverride([b, a], lookup)

    expect(winner?.id).toBe('A')
    expect(winner?.leaseRate).toBe(50)
  })

  it('breaks a priority tie by the most recent creation', () => {
    const older = makeOverride({ id: toOverrideId('old'), createdAt: new Date('2025-01-01T00:00:00Z') })
    const newer = makeOverride({ id: toOverrideId('new'), createdAt: new Date('2025-01-02T00:00:00Z') })
    expect(selectOverride([older, newer], lookup)?.id).toBe('new')
    expect(selectOverride([newer, older], lookup)?.id).toBe('new')
  })

  it('returns null when nothing applies', () => {
    const night = makeOverride({ shiftType: 'NIGHT' })
    expect(selectOverride([night], lookup)).toBeNull()
  })

  it('ignores inactive and out-of-range candidates', () => {
    expect(overrideApplies(makeOverride({ isActive: false }), lookup)).toBe(false)
    expect(overrideApplies(makeOverride({ endDate: d('2025-01-05') }), lookup)).toBe(false)
    expect(overrideApplies(makeOverride({ startDate: d('2025-01-07') }), lookup)).toBe(false)
  })

  it('matches the day of week of the lookup date', () => {
    expect(overrideApplies(makeOverride({ dayOfWeek: 'MONDAY' }), lookup)).toBe(true)
    expect(overrideApplies(makeOverride({ dayOfWeek: 'TUESDAY' }), lookup)).toBe(false)
  })

  it('only applies to its own owner', () => {
    expect(overrideApplies(makeOverride({ ownerId: toDriverId('O2') }), lookup)).toBe(false)
  })
})

describe('calculateEntryTotal', () => {
  it('adds the distance charge to the base', () => {
    expect(calculateEntryTotal({ baseRate: 40, distanceRate: 0.35 }, 12)).toBe(44.2)
  })

  it('defaults to no distance', () => {
    expect(calculateEntryTotal({ baseRate: 40, distanceRate: 0.35 })).toBe(40)
  })

  it('rejects a negative distance', () => {
    expect(() => calculateEntryTotal({ baseRate: 40, distanceRate: 0.35 }, -1)).toThrow(ValidationError)
  })
})

// ---------------------------------------------------------------------------
// Resolver over the store
// ---------------------------------------------------------------------------
describe('LeaseRateResolver', () => {
  async function seeded() {
    const ctx = setup()
    await ctx.overrides.createOverride({
      ownerId: OWNER,
      shiftType: 'DAY',
      leaseRate: 50,
      startDate: d('2025-01-01'),
    })
    await ctx.overrides.createOverride({
      ownerId: OWNER,
      cabId: CAB,
      dayOfWeek: 'MONDAY',
      leaseRate: 65,
      startDate: d('2025-01-01'),
    })
    return ctx
  }

  it('prefers the more specific override', async () => {
    const { leaseRates } = await seeded()
    // cab + day (70) beats shift type alone (30)
    expect(await leaseRates.resolve(OWNER, CAB, 'DAY', d('2025-01-06'))).toBe(65)
  })

  it('falls through to the broader override on other days', async () => {
    const { leaseRates } = await seeded()
    expect(await leaseRates.resolve(OWNER, CAB, 'DAY', d('2025-01-07'))).toBe(50)
  })

  it('applies cab-scoped overrides to that cab only', async () => {
    const { leaseRates } = await seeded()
    expect(await leaseRates.resolve(OWNER, OTHER_CAB, 'DAY', d('2025-01-06'))).toBe(50)
  })

  it('returns null when no override applies', async () => {
    const { leaseRates } = await seeded()
    expect(await leaseRates.resolve(OWNER, CAB, 'NIGHT', d('2025-01-07'))).toBeNull()
    expect(await leaseRates.resolve(OWNER, CAB, 'DAY', d('2024-12-31'))).toBeNull()
  })

  describe('resolveLeaseRate', () => {
    async function withPlan() {
      const ctx = setup()
      const plan = await ctx.ratePlans.createPlan({
        name: 'Winter 2025',
        effectiveFrom: d('2025-01-01'),
        entries: [
          {
            cabCategory: 'SEDAN',
            hasAirportLicense: false,
            shiftType: 'DAY',
            dayOfWeek: 'TUESDAY',
            baseRate: 40,
            distanceRate: 0.5,
            notes: null,
          },
        ],
      })
      return { ...ctx, plan }
    }

    const context = {
      ownerId: OWNER,
      cabId: CAB,
      shiftType: 'DAY' as const,
      date: d('2025-01-07'),
      cabCategory: 'SEDAN' as const,
      hasAirportLicense: false,
      distance: 10,
    }

    it('falls back to the active plan entry', async () => {
      const { leaseRates, plan } = await withPlan()
      const entry = plan.entries[0]

      expect(await leaseRates.resolveLeaseRate(context)).toEqual({
        source: 'PLAN',
        amount: 45,
        planId: plan.id,
        entryId: entry?.id,
      })
    })

    it('uses an applicable override before the plan', async () => {
      const { leaseRates, overrides } = await withPlan()
      const created = await overrides.createOverride({
        ownerId: OWNER,
        cabId: CAB,
        leaseRate: 30,
        startDate: d('2025-01-01'),
      })

      expect(await leaseRates.resolveLeaseRate(context)).toEqual({
        source: 'OVERRIDE',
        amount: 30,
        overrideId: created.id,
        priority: 50,
      })
    })

    it('returns null when the plan has no matching entry', async () => {
      const { leaseRates } = await withPlan()
      expect(await leaseRates.resolveLeaseRate({ ...context, shiftType: 'NIGHT' })).toBeNull()
    })

    it('returns null when no plan covers the date', async () => {
      const { leaseRates } = setup()
      expect(await leaseRates.resolveLeaseRate(context)).toBeNull()
    })

    it('rejects a negative distance', async () => {
      const { leaseRates } = await withPlan()
      await expect(leaseRates.resolveLeaseRate({ ...context, distance: -5 })).rejects.toThrow(ValidationError)
    })
  })
})
