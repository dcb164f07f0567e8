// ---------------------------------------------------------------------------
// Attribute bounded context
// Free-form, dated key/value features carried by a shift (transponder,
// wheelchair lift, specialty permit …) that profiles can demand or exclude.
// ---------------------------------------------------------------------------

import type { Brand, ShiftId } from '../shared/types'
import type { DateWindow } from '../temporal/index'

/** Uniquely identifies an AttributeType. */
export type AttributeTypeId = Brand<string, 'AttributeTypeId'>

/** Uniquely identifies one dated value of an attribute on a shift. */
export type AttributeValueId = Brand<string, 'AttributeValueId'>

export const toAttributeTypeId = (raw: string): AttributeTypeId => raw as AttributeTypeId
export const toAttributeValueId = (raw: string): AttributeValueId => raw as AttributeValueId

/**
 * A kind of dynamic attribute.
 *
 * @invariant `code` is unique and upper snake case.
 */
export interface AttributeType {
  readonly id: AttributeTypeId
  readonly code: string
  readonly name: string
  readonly description: string | null
  readonly isActive: boolean
}

/**
 * An attribute carried by a shift over a date window. `value` is null for
 * presence-only attributes.
 *
 * @invariant Windows of the same (shift, attribute type) never overlap.
 */
export interface ShiftAttributeValue extends DateWindow {
  readonly id: AttributeValueId
  readonly shiftId: ShiftId
  readonly attributeTypeId: AttributeTypeId
  readonly value: string | null
  readonly notes: string | null
}

export const ATTRIBUTE_CODE_PATTERN = /^[A-Z][A-Z0-9_]*$/

/**
 * The value each attribute type has on the shift. Presence-only attributes
 * map to an empty string so that they count as present.
 */
export function attributeValueMap(
  values: readonly Pick<ShiftAttributeValue, 'attributeTypeId' | 'value'>[],
): Map<AttributeTypeId, string> {
  const map = new Map<AttributeTypeId, string>()
  for (const entry of values) {
    map.set(entry.attributeTypeId, entry.value ?? '')
  }
  return map
}

/** What a shift carries for one attribute type on a given date. */
export interface CurrentAttributeValue {
  readonly attributeTypeId: AttributeTypeId
  readonly value: string | null
}
