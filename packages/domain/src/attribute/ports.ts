import type { ShiftId } from '../shared/types'
import type { CalendarDate } from '../shared/calendar-date'
import type {
  AttributeType,
  AttributeTypeId,
  AttributeValueId,
  CurrentAttributeValue,
  ShiftAttributeValue,
} from './index'

export type NewAttributeType = Omit<AttributeType, 'id'>

export type NewShiftAttributeValue = Omit<ShiftAttributeValue, 'id'>

export interface AttributeStore {
  shiftExists(id: ShiftId): Promise<boolean>
  findAttributeTypeById(id: AttributeTypeId): Promise<AttributeType | null>
  findAttributeTypeByCode(code: string): Promise<AttributeType | null>
  listAttributeTypes(): Promise<AttributeType[]>
  insertAttributeType(input: NewAttributeType): Promise<AttributeType>
  findAttributeValueById(id: AttributeValueId): Promise<ShiftAttributeValue | null>
  /** Every window, past and future, of one attribute type on one shift. */
  findAttributeValues(shiftId: ShiftId, attributeTypeId: AttributeTypeId): Promise<ShiftAttributeValue[]>
  /** The values of the shift's attributes whose window contains `date`. */
  findCurrentAttributeValues(shiftId: ShiftId, date: CalendarDate): Promise<CurrentAttributeValue[]>
  insertAttributeValue(input: NewShiftAttributeValue): Promise<ShiftAttributeValue>
  endAttributeValue(id: AttributeValueId, endDate: CalendarDate): Promise<ShiftAttributeValue>
}
