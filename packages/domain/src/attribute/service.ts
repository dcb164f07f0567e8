// ---------------------------------------------------------------------------
// Dynamic attribute write paths
// ---------------------------------------------------------------------------

import type { RunInTransaction, ShiftId } from '../shared/types'
import { todayDate, type CalendarDate } from '../shared/calendar-date'
import { NotFoundError, ValidationError } from '../shared/errors'
import { silentLogger, type Logger } from '../shared/logger'
import { assertNoOverlap, assertValidWindow, formatWindow } from '../temporal/index'
import {
  ATTRIBUTE_CODE_PATTERN,
  type AttributeType,
  type AttributeTypeId,
  type AttributeValueId,
  type CurrentAttributeValue,
  type ShiftAttributeValue,
} from './index'
import type { AttributeStore } from './ports'

export interface CreateAttributeTypeInput {
  readonly code: string
  readonly name: string
  readonly description?: string | null
}

export interface AssignShiftAttributeInput {
  readonly shiftId: ShiftId
  readonly attributeTypeId: AttributeTypeId
  readonly value?: string | null
  /** Defaults to today. */
  readonly startDate?: CalendarDate
  readonly endDate?: CalendarDate | null
  readonly notes?: string | null
}

export interface AttributeService {
  createAttributeType(input: CreateAttributeTypeInput): Promise<AttributeType>
  listAttributeTypes(): Promise<AttributeType[]>
  assignShiftAttribute(input: AssignShiftAttributeInput): Promise<ShiftAttributeValue>
  endShiftAttribute(id: AttributeValueId, endDate: CalendarDate): Promise<ShiftAttributeValue>
  findCurrentAttributeValues(shiftId: ShiftId, date?: CalendarDate): Promise<CurrentAttributeValue[]>
}

export interface AttributeServiceDeps {
  readonly store: AttributeStore
  readonly transaction: RunInTransaction<AttributeStore>
  readonly today?: () => CalendarDate
  readonly logger?: Logger
}

export function createAttributeService(deps: AttributeServiceDeps): AttributeService {
  const { store, transaction } = deps
  const today = deps.today ?? (() => todayDate())
  const logger = deps.logger ?? silentLogger

  async function requireShift(tx: AttributeStore, shiftId: ShiftId): Promise<void> {
    if (!(await tx.shiftExists(shiftId))) throw new NotFoundError('Shift', shiftId)
  }

  return {
    async createAttributeType(input) {
      const code = input.code.trim().toUpperCase()
      const name = input.name.trim()
      if (!ATTRIBUTE_CODE_PATTERN.test(code)) {
        throw new ValidationError(`Attribute code must be letters, digits and underscores: ${input.code}`)
      }
      if (name === '') throw new ValidationError('Attribute name is required')

      return transaction(async (tx) => {
        if (await tx.findAttributeTypeByCode(code)) {
          throw new ValidationError(`Attribute type code already exists: ${code}`)
        }
        const created = await tx.insertAttributeType({
          code,
          name,
          description: input.description ?? null,
          isActive: true,
        })
        logger.info('created attribute type', { id: created.id, code })
        return created
      })
    },

    async listAttributeTypes() {
      const types = await store.listAttributeTypes()
      return [...types].sort((a, b) => (a.code < b.code ? -1 : a.code > b.code ? 1 : 0))
    },

    async assignShiftAttribute(input) {
      const window = { startDate: input.startDate ?? today(), endDate: input.endDate ?? null }
      assertValidWindow(window, 'Attribute')

      return transaction(async (tx) => {
        await requireShift(tx, input.shiftId)
        const type = await tx.findAttributeTypeById(input.attributeTypeId)
        if (!type) throw new NotFoundError('Attribute type', input.attributeTypeId)
        if (!type.isActive) throw new ValidationError(`Attribute type is inactive: ${type.code}`)

        const existing = await tx.findAttributeValues(input.shiftId, input.attributeTypeId)
        assertNoOverlap(existing, window, {
          describe: (conflict) =>
            `Shift ${input.shiftId} already carries ${type.code} for ${formatWindow(conflict)}`,
        })

        const created = await tx.insertAttributeValue({
          shiftId: input.shiftId,
          attributeTypeId: input.attributeTypeId,
          value: input.value ?? null,
          startDate: window.startDate,
          endDate: window.endDate,
          notes: input.notes ?? null,
        })
        logger.info('assigned shift attribute', { id: created.id, shiftId: input.shiftId, code: type.code })
        return created
      })
    },

    async endShiftAttribute(id, endDate) {
      return transaction(async (tx) => {
        const existing = await tx.findAttributeValueById(id)
        if (!existing) throw new NotFoundError('Shift attribute', id)
        if (existing.endDate !== null && existing.endDate <= endDate) return existing
        assertValidWindow({ startDate: existing.startDate, endDate }, 'Attribute')
        return tx.endAttributeValue(id, endDate)
      })
    },

    async findCurrentAttributeValues(shiftId, date) {
      await requireShift(store, shiftId)
      return store.findCurrentAttributeValues(shiftId, date ?? today())
    },
  }
}
