import { describe, it, expect } from 'vitest'
import {
  ConflictError,
  NotFoundError,
  ValidationError,
  attributeValueMap,
  createFleetServices,
  toAttributeTypeId,
  toAttributeValueId,
  toCabId,
  toCalendarDate,
  toShiftId,
} from '../index'
import { createInMemoryStore } from '../testing'

const d = toCalendarDate
const TODAY = d('2025-01-06')
const SHIFT = toShiftId('S1')

function setup() {
  const store = createInMemoryStore().addShift({
    id: SHIFT,
    cabId: toCabId('C1'),
    cabCategory: 'SEDAN',
    shareCategory: 'VOTING_SHARE',
    hasAirportLicense: false,
    shiftType: 'DAY',
  })
  const { attributes } = createFleetServices({ store, transaction: store.transaction, today: () => TODAY })
  return attributes
}

describe('createAttributeType', () => {
  it('upper-cases the code', async () => {
    const attributes = setup()
    const created = await attributes.createAttributeType({ code: 'transponder', name: ' Transponder ' })
    expect(created).toMatchObject({ code: 'TRANSPONDER', name: 'Transponder', description: null, isActive: true })
  })

  it('rejects codes with other characters', async () => {
    const attributes = setup()
    await expect(attributes.createAttributeType({ code: 'has space', name: 'x' })).rejects.toBeInstanceOf(
      ValidationError,
    )
  })

  it('keeps codes unique', async () => {
    const attributes = setup()
    await attributes.createAttributeType({ code: 'TRANSPONDER', name: 'Transponder' })
    await expect(attributes.createAttributeType({ code: 'transponder', name: 'Again' })).rejects.toThrow(
      'Attribute type code already exists: TRANSPONDER',
    )
  })

  it('lists types by code', async () => {
    const attributes = setup()
    await attributes.createAttributeType({ code: 'WHEELCHAIR_LIFT', name: 'Lift' })
    await attributes.createAttributeType({ code: 'SPECIALTY_PERMIT', name: 'Permit' })
    expect((await attributes.listAttributeTypes()).map((t) => t.code)).toEqual(['SPECIALTY_PERMIT', 'WHEELCHAIR_LIFT'])
  })
})

describe('assignShiftAttribute', () => {
  it('holds one value per attribute type on any date', async () => {
    const attributes = setup()
    const type = await attributes.createAttributeType({ code: 'TRANSPONDER', name: 'Transponder' })
    await attributes.assignShiftAttribute({
      shiftId: SHIFT,
      attributeTypeId: type.id,
      value: 'E-ZPASS',
      startDate: d('2025-01-01'),
      endDate: d('2025-01-31'),
    })

    await expect(
      attributes.assignShiftAttribute({ shiftId: SHIFT, attributeTypeId: type.id, value: 'I-PASS', startDate: d('2025-01-31') }),
    ).rejects.toBeInstanceOf(ConflictError)

    const next = await attributes.assignShiftAttribute({
      shiftId: SHIFT,
      attributeTypeId: type.id,
      value: 'I-PASS',
      startDate: d('2025-02-01'),
    })
    expect(next.value).toBe('I-PASS')
  })

  it('requires a known shift and attribute type', async () => {
    const attributes = setup()
    const type = await attributes.createAttributeType({ code: 'TRANSPONDER', name: 'Transponder' })
    await expect(
      attributes.assignShiftAttribute({ shiftId: toShiftId('nope'), attributeTypeId: type.id }),
    ).rejects.toThrow('Shift not found: nope')
    await expect(
      attributes.assignShiftAttribute({ shiftId: SHIFT, attributeTypeId: toAttributeTypeId('nope') }),
    ).rejects.toBeInstanceOf(NotFoundError)
  })
})

describe('findCurrentAttributeValues', () => {
  it('returns the values active on the date', async () => {
    const attributes = setup()
    const transponder = await attributes.createAttributeType({ code: 'TRANSPONDER', name: 'Transponder' })
    const lift = await attributes.createAttributeType({ code: 'WHEELCHAIR_LIFT', name: 'Lift' })
    await attributes.assignShiftAttribute({
      shiftId: SHIFT,
      attributeTypeId: transponder.id,
      value: 'E-ZPASS',
      startDate: d('2025-01-01'),
    })
    const liftValue = await attributes.assignShiftAttribute({
      shiftId: SHIFT,
      attributeTypeId: lift.id,
      startDate: d('2025-01-01'),
    })
    await attributes.endShiftAttribute(liftValue.id, d('2025-01-05'))

    expect(await attributes.findCurrentAttributeValues(SHIFT)).toEqual([
      { attributeTypeId: transponder.id, value: 'E-ZPASS' },
    ])
    expect(await attributes.findCurrentAttributeValues(SHIFT, d('2025-01-05'))).toHaveLength(2)
  })

  it('treats presence-only attributes as present', () => {
    const map = attributeValueMap([{ attributeTypeId: toAttributeTypeId('attr-1'), value: null }])
    expect(map.get(toAttributeTypeId('attr-1'))).toBe('')
  })
})

describe('endShiftAttribute', () => {
  it('rejects an end before the start', async () => {
    const attributes = setup()
    const type = await attributes.createAttributeType({ code: 'TRANSPONDER', name: 'Transponder' })
    const value = await attributes.assignShiftAttribute({ shiftId: SHIFT, attributeTypeId: type.id, startDate: d('2025-01-10') })
    await expect(attributes.endShiftAttribute(value.id, d('2025-01-09'))).rejects.toBeInstanceOf(ValidationError)
  })

  it('reports a missing value', async () => {
    const attributes = setup()
    await expect(attributes.endShiftAttribute(toAttributeValueId('nope'), TODAY)).rejects.toBeInstanceOf(NotFoundError)
  })
})
