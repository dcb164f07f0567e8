import { and, asc, eq, gte, isNull, lte, or } from 'drizzle-orm'
import type {
  AttributeStore,
  AttributeType,
  AttributeTypeId,
  AttributeValueId,
  CalendarDate,
  CurrentAttributeValue,
  NewAttributeType,
  NewShiftAttributeValue,
  ShiftAttributeValue,
  ShiftId,
} from '@cabdesk/domain'
import { toAttributeTypeId, toAttributeValueId, toCalendarDate, toShiftId } from '@cabdesk/domain'
import type { Executor } from '../db'
import {
  attributeTypes,
  cabShifts,
  shiftAttributeValues,
  type AttributeTypeRow,
  type ShiftAttributeValueRow,
} from '../db/schema'

// ---------------------------------------------------------------------------
// Mappers
// ---------------------------------------------------------------------------

function mapAttributeType(row: AttributeTypeRow): AttributeType {
  return {
    id: toAttributeTypeId(row.id),
    code: row.code,
    name: row.name,
    description: row.description,
    isActive: row.isActive,
  }
}

function mapAttributeValue(row: ShiftAttributeValueRow): ShiftAttributeValue {
  return {
    id: toAttributeValueId(row.id),
    shiftId: toShiftId(row.shiftId),
    attributeTypeId: toAttributeTypeId(row.attributeTypeId),
    value: row.value,
    startDate: toCalendarDate(row.startDate),
    endDate: row.endDate != null ? toCalendarDate(row.endDate) : null,
    notes: row.notes,
  }
}

// ---------------------------------------------------------------------------
// Repository
// ---------------------------------------------------------------------------

export async function shiftExists(db: Executor, tenantId: string, id: ShiftId): Promise<boolean> {
  const [row] = await db
    .select({ id: cabShifts.id })
    .from(cabShifts)
    .where(and(eq(cabShifts.tenantId, tenantId), eq(cabShifts.id, id)))
    .limit(1)
  return row !== undefined
}

export async function findAttributeTypeById(
  db: Executor,
  tenantId: string,
  id: AttributeTypeId,
): Promise<AttributeType | null> {
  const [row] = await db
    .select()
    .from(attributeTypes)
    .where(and(eq(attributeTypes.tenantId, tenantId), eq(attributeTypes.id, id)))
    .limit(1)
  return row ? mapAttributeType(row) : null
}

export async function findAttributeTypeByCode(
  db: Executor,
  tenantId: string,
  code: string,
): Promise<AttributeType | null> {
  const [row] = await db
    .select()
    .from(attributeTypes)
    .where(and(eq(attributeTypes.tenantId, tenantId), eq(attributeTypes.code, code)))
    .limit(1)
  return row ? mapAttributeType(row) : null
}

export async function listAttributeTypes(db: Executor, tenantId: string): Promise<AttributeType[]> {
  const rows = await db
    .select()
    .from(attributeTypes)
    .where(eq(attributeTypes.tenantId, tenantId))
    .orderBy(asc(attributeTypes.code))
  return rows.map(mapAttributeType)
}

export async function insertAttributeType(
  db: Executor,
  tenantId: string,
  input: NewAttributeType,
): Promise<AttributeType> {
  const [row] = await db
    .insert(attributeTypes)
    .values({ tenantId, ...input })
    .returning()
  if (!row) throw new Error('Insert into attribute_types returned no row')
  return mapAttributeType(row)
}

export async function findAttributeValueById(
  db: Executor,
  tenantId: string,
  id: AttributeValueId,
): Promise<ShiftAttributeValue | null> {
  const [row] = await db
    .select()
    .from(shiftAttributeValues)
    .where(and(eq(shiftAttributeValues.tenantId, tenantId), eq(shiftAttributeValues.id, id)))
    .limit(1)
  return row ? mapAttributeValue(row) : null
}

export async function findAttributeValues(
  db: Executor,
  tenantId: string,
  shiftId: ShiftId,
  attributeTypeId: AttributeTypeId,
): Promise<ShiftAttributeValue[]> {
  const rows = await db
    .select()
    .from(shiftAttributeValues)
    .where(
      and(
        eq(shiftAttributeValues.tenantId, tenantId),
        eq(shiftAttributeValues.shiftId, shiftId),
        eq(shiftAttributeValues.attributeTypeId, attributeTypeId),
      ),
    )
    .orderBy(asc(shiftAttributeValues.startDate))
  return rows.map(mapAttributeValue)
}

export async function findCurrentAttributeValues(
  db: Executor,
  tenantId: string,
  shiftId: ShiftId,
  date: CalendarDate,
): Promise<CurrentAttributeValue[]> {
  const rows = await db
    .select({ attributeTypeId: shiftAttributeValues.attributeTypeId, value: shiftAttributeValues.value })
    .from(shiftAttributeValues)
    .where(
      and(
        eq(shiftAttributeValues.tenantId, tenantId),
        eq(shiftAttributeValues.shiftId, shiftId),
        lte(shiftAttributeValues.startDate, date),
        or(isNull(shiftAttributeValues.endDate), gte(shiftAttributeValues.endDate, date)),
      ),
    )
  return rows.map((row) => ({ attributeTypeId: toAttributeTypeId(row.attributeTypeId), value: row.value }))
}

export async function insertAttributeValue(
  db: Executor,
  tenantId: string,
  input: NewShiftAttributeValue,
): Promise<ShiftAttributeValue> {
  const [row] = await db
    .insert(shiftAttributeValues)
    .values({ tenantId, ...input })
    .returning()
  if (!row) throw new Error('Insert into shift_attribute_values returned no row')
  return mapAttributeValue(row)
}

export async function endAttributeValue(
  db: Executor,
  tenantId: string,
  id: AttributeValueId,
  endDate: CalendarDate,
): Promise<ShiftAttributeValue> {
  const [row] = await db
    .update(shiftAttributeValues)
    .set({ endDate })
    .where(and(eq(shiftAttributeValues.tenantId, tenantId), eq(shiftAttributeValues.id, id)))
    .returning()
  if (!row) throw new Error(`Shift attribute ${id} disappeared during update`)
  return mapAttributeValue(row)
}

// ---------------------------------------------------------------------------
// Port adapter
// ---------------------------------------------------------------------------

export function createAttributeStore(db: Executor, tenantId: string): AttributeStore {
  return {
    shiftExists: (id) => shiftExists(db, tenantId, id),
    findAttributeTypeById: (id) => findAttributeTypeById(db, tenantId, id),
    findAttributeTypeByCode: (code) => findAttributeTypeByCode(db, tenantId, code),
    listAttributeTypes: () => listAttributeTypes(db, tenantId),
    insertAttributeType: (input) => insertAttributeType(db, tenantId, input),
    findAttributeValueById: (id) => findAttributeValueById(db, tenantId, id),
    findAttributeValues: (shiftId, attributeTypeId) => findAttributeValues(db, tenantId, shiftId, attributeTypeId),
    findCurrentAttributeValues: (shiftId, date) => findCurrentAttributeValues(db, tenantId, shiftId, date),
    insertAttributeValue: (input) => insertAttributeValue(db, tenantId, input),
    endAttributeValue: (id, endDate) => endAttributeValue(db, tenantId, id, endDate),
  }
}
