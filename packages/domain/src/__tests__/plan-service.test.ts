import { describe, it, expect } from 'vitest'
import {
  ConflictError,
  NotFoundError,
  ValidationError,
  createFleetServices,
  toCabId,
  toCalendarDate,
  toDriverId,
  toRatePlanId,
  type NewRateEntry,
} from '../index'
import { createInMemoryStore } from '../testing'

const d = toCalendarDate
const TODAY = d('2025-01-06')

function entry(overrides: Partial<NewRateEntry> = {}): NewRateEntry {
  return {
    cabCategory: 'SEDAN',
    hasAirportLicense: false,
    shiftType: 'DAY',
    dayOfWeek: 'MONDAY',
    baseRate: 40,
    distanceRate: 0.25,
    notes: null,
    ...overrides,
  }
}

function setup() {
  const store = createInMemoryStore()
  const { ratePlans } = createFleetServices({ store, transaction: store.transaction, today: () => TODAY })
  return ratePlans
}

describe('createPlan', () => {
  it('creates an open-ended active plan with its entries', async () => {
    const ratePlans = setup()
    const plan = await ratePlans.createPlan({
      name: '  Winter 2025 ',
      effectiveFrom: d('2025-01-01'),
      entries: [entry(), entry({ dayOfWeek: 'TUESDAY' })],
    })
    expect(plan.name).toBe('Winter 2025')
    expect(plan.isActive).toBe(true)
    expect(plan.effectiveTo).toBeNull()
    expect(plan.entries).toHaveLength(2)
    expect(plan.entries.every((e) => e.planId === plan.id)).toBe(true)
  })

  it('requires a name', async () => {
    const ratePlans = setup()
    await expect(ratePlans.createPlan({ name: ' ', effectiveFrom: d('2025-01-01') })).rejects.toThrow(
      'Plan name is required',
    )
  })

  it('rejects an end date before the start date', async () => {
    const ratePlans = setup()
    await expect(
      ratePlans.createPlan({ name: 'Bad', effectiveFrom: d('2025-02-01'), effectiveTo: d('2025-01-01') }),
    ).rejects.toBeInstanceOf(ValidationError)
  })

  it('rejects duplicate entry keys', async () => {
    const ratePlans = setup()
    await expect(
      ratePlans.createPlan({ name: 'Dup', effectiveFrom: d('2025-01-01'), entries: [entry(), entry({ baseRate: 45 })] }),
    ).rejects.toThrow('Rate plan already has an entry for SEDAN/NO_AIRPORT/DAY/MONDAY')
  })

  it('rejects negative rates', async () => {
    const ratePlans = setup()
    await expect(
      ratePlans.createPlan({ name: 'Neg', effectiveFrom: d('2025-01-01'), entries: [entry({ distanceRate: -1 })] }),
    ).rejects.toBeInstanceOf(ValidationError)
  })

  it('allows one plan per date', async () => {
    const ratePlans = setup()
    await ratePlans.createPlan({ name: 'Winter 2025', effectiveFrom: d('2025-01-01') })
    await expect(ratePlans.createPlan({ name: 'Spring 2025', effectiveFrom: d('2025-03-01') })).rejects.toThrow(
      "Date range overlaps with 'Winter 2025' (2025-01-01 to ongoing). Only one plan can be active at a time.",
    )
  })

  it('flags a plan that already ended as inactive', async () => {
    const ratePlans = setup()
    const plan = await ratePlans.createPlan({
      name: 'Autumn 2024',
      effectiveFrom: d('2024-09-01'),
      effectiveTo: d('2024-11-30'),
    })
    expect(plan.isActive).toBe(false)
  })
})

describe('closePlan', () => {
  it('sets the end date once', async () => {
    const ratePlans = setup()
    const plan = await ratePlans.createPlan({ name: 'Winter 2025', effectiveFrom: d('2025-01-01') })

    const closed = await ratePlans.closePlan(plan.id, d('2025-02-28'))

    expect(closed.effectiveTo).toBe('2025-02-28')
    expect(closed.isActive).toBe(true)
    await expect(ratePlans.closePlan(plan.id, d('2025-03-31'))).rejects.toThrow(
      "Rate plan 'Winter 2025' already ends on 2025-02-28. Create a new plan instead.",
    )
  })

  it('makes room for the next plan', async () => {
    const ratePlans = setup()
    const winter = await ratePlans.createPlan({ name: 'Winter 2025', effectiveFrom: d('2025-01-01') })
    await ratePlans.closePlan(winter.id, d('2025-02-28'))
    const spring = await ratePlans.createPlan({ name: 'Spring 2025', effectiveFrom: d('2025-03-01') })

    expect((await ratePlans.findPlanActiveOn(d('2025-02-28')))?.id).toBe(winter.id)
    expect((await ratePlans.findPlanActiveOn(d('2025-03-01')))?.id).toBe(spring.id)
    expect((await ratePlans.listPlans()).map((p) => p.name)).toEqual(['Spring 2025', 'Winter 2025'])
  })

  it('deactivates a plan closed in the past', async () => {
    const ratePlans = setup()
    const plan = await ratePlans.createPlan({ name: 'Late 2024', effectiveFrom: d('2024-12-01') })
    const closed = await ratePlans.closePlan(plan.id, d('2024-12-31'))
    expect(closed.isActive).toBe(false)
  })

  it('rejects an end date before the start', async () => {
    const ratePlans = setup()
    const plan = await ratePlans.createPlan({ name: 'Winter 2025', effectiveFrom: d('2025-01-01') })
    await expect(ratePlans.closePlan(plan.id, d('2024-12-31'))).rejects.toBeInstanceOf(ValidationError)
  })

  it('reports a missing plan', async () => {
    const ratePlans = setup()
    await expect(ratePlans.closePlan(toRatePlanId('nope'), d('2025-01-31'))).rejects.toBeInstanceOf(NotFoundError)
  })
})

describe('addEntries', () => {
  it('appends new keys', async () => {
    const ratePlans = setup()
    const plan = await ratePlans.createPlan({ name: 'Winter 2025', effectiveFrom: d('2025-01-01'), entries: [entry()] })
    const updated = await ratePlans.addEntries(plan.id, [entry({ shiftType: 'NIGHT', baseRate: 70 })])
    expect(updated.entries.map((e) => e.shiftType)).toEqual(['DAY', 'NIGHT'])
  })

  it('refuses to replace an existing key', async () => {
    const ratePlans = setup()
    const plan = await ratePlans.createPlan({ name: 'Winter 2025', effectiveFrom: d('2025-01-01'), entries: [entry()] })
    await expect(ratePlans.addEntries(plan.id, [entry({ baseRate: 99 })])).rejects.toBeInstanceOf(ValidationError)
    expect((await ratePlans.getPlan(plan.id)).entries[0]?.baseRate).toBe(40)
  })
})

describe('deactivateExpiredPlans', () => {
  it('flags plans whose end date has passed', async () => {
    const ratePlans = setup()
    const plan = await ratePlans.createPlan({
      name: 'January',
      effectiveFrom: d('2025-01-01'),
      effectiveTo: d('2025-01-31'),
    })

    expect(await ratePlans.deactivateExpiredPlans(d('2025-01-31'))).toBe(0)
    expect(await ratePlans.deactivateExpiredPlans(d('2025-02-01'))).toBe(1)
    expect((await ratePlans.getPlan(plan.id)).isActive).toBe(false)
    expect((await ratePlans.findPlanActiveOn(d('2025-01-15')))?.id).toBe(plan.id)
    expect(await ratePlans.findPlanActiveOn(d('2025-02-01'))).toBeNull()
  })

  it('keeps overlap checks on inactive plans', async () => {
    const ratePlans = setup()
    await ratePlans.createPlan({ name: 'Autumn 2024', effectiveFrom: d('2024-09-01'), effectiveTo: d('2024-11-30') })
    await expect(
      ratePlans.createPlan({ name: 'Late 2024', effectiveFrom: d('2024-11-15') }),
    ).rejects.toBeInstanceOf(ConflictError)
  })
})

describe('plan fallback for past dates', () => {
  it('resolves a date inside a plan that has since expired', async () => {
    const store = createInMemoryStore()
    const { ratePlans, leaseRates } = createFleetServices({ store, transaction: store.transaction, today: () => TODAY })
    const autumn = await ratePlans.createPlan({
      name: 'Autumn 2024',
      effectiveFrom: d('2024-09-01'),
      effectiveTo: d('2024-12-31'),
      entries: [entry({ dayOfWeek: 'TUESDAY' })],
    })
    expect(autumn.isActive).toBe(false)

    const resolved = await leaseRates.resolveLeaseRate({
      ownerId: toDriverId('owner-1'),
      cabId: toCabId('cab-1'),
      shiftType: 'DAY',
      date: d('2024-10-01'),
      cabCategory: 'SEDAN',
      hasAirportLicense: false,
    })
    expect(resolved).toMatchObject({ source: 'PLAN', amount: 40, planId: autumn.id })
  })
})
